/**
 * Application constants
 *
 * Values that do not come from the environment, plus the defaults that
 * ConfigLoader falls back to when a variable is unset.
 */

/**
 * Application metadata
 *
 * ⚠️ VERSION must be kept in sync with package.json by hand
 * (package.json lives outside src/ and cannot be imported through @/).
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Order Extractor",
  ARCHITECTURE: "API v1 with incremental extraction",
} as const;

/**
 * Service names used for log routing
 */
export const SERVICE_NAMES = {
  /** Express server */
  SERVER: "server",
  /** One-shot extraction script (cron) */
  EXTRACTOR: "extractor",
} as const;

/**
 * Extraction defaults
 */
export const EXTRACTION_DEFAULTS = {
  REQUEST_TIMEOUT_MS: 30_000,
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 2_000,
  RETRY_MAX_DELAY_MS: 10_000,
  /** Safety bound on listing traversal */
  MAX_PAGES: 500,
  LISTING_READY_SELECTOR: ".nk-tb-item",
  DETAIL_READY_SELECTOR: ".invoice",
  STATE_FILE: "data/last_order_state.json",
  EXPORTS_DIR: "data/exports",
} as const;

/**
 * Browser context defaults
 */
export const SCRAPER_CONFIG = {
  DEFAULT_VIEWPORT: { width: 1920, height: 1080 },
  DEFAULT_USER_AGENT:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  LOCALE: "pt-BR",
  TIMEZONE_ID: "America/Sao_Paulo",
  /** Settle time after the login form is submitted (Livewire boot) */
  POST_LOGIN_SETTLE_MS: 2_000,
  /** Wait for the URL to leave /login after submit */
  LOGIN_NAVIGATION_TIMEOUT_MS: 10_000,
} as const;

/**
 * API settings
 */
export const API_CONFIG = {
  /** Upper bound for the `limit` query parameter */
  MAX_LIMIT: Number(process.env.MAX_LIMIT) || 5_000,
  /** Characters of HTML returned by the raw-page debug endpoint */
  RAW_PAGE_PREVIEW_CHARS: 2_000,
} as const;
