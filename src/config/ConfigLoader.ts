/**
 * Environment config loader
 * Singleton Pattern
 *
 * Reads process.env (populated from .env by dotenv) and validates it with a
 * zod schema once; a missing credential or malformed URL fails at startup
 * instead of on the first extraction run.
 */

import "dotenv/config";
import { z } from "zod";
import { EXTRACTION_DEFAULTS } from "@/config/constants";
import { ConfigError } from "@/core/errors";
import { BACKEND_KINDS, BackendKind } from "@/core/domain/PageDescriptor";
import type { RetryOptions } from "@/utils/retry";

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(defaultValue ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

/**
 * Raw environment schema
 */
const EnvSchema = z.object({
  ORDERS_EMAIL: z.string().min(1, "ORDERS_EMAIL is required"),
  ORDERS_PASSWORD: z.string().min(1, "ORDERS_PASSWORD is required"),
  ORDERS_BASE_URL: z.string().url(),
  ORDERS_LOGIN_URL: z.string().url().optional(),
  ORDERS_LISTING_URL: z.string().url().optional(),

  FETCH_BACKEND: z.enum(BACKEND_KINDS).default("http"),
  FALLBACK_BACKEND_ENABLED: booleanFlag(true),
  REQUEST_TIMEOUT_MS: positiveInt(EXTRACTION_DEFAULTS.REQUEST_TIMEOUT_MS),
  MAX_RETRIES: positiveInt(EXTRACTION_DEFAULTS.MAX_RETRIES),
  RETRY_DELAY_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(EXTRACTION_DEFAULTS.RETRY_DELAY_MS),
  RETRY_MAX_DELAY_MS: positiveInt(EXTRACTION_DEFAULTS.RETRY_MAX_DELAY_MS),
  RETRY_BACKOFF: z.enum(["fixed", "exponential"]).default("exponential"),
  MAX_PAGES: positiveInt(EXTRACTION_DEFAULTS.MAX_PAGES),

  BROWSER_HEADLESS: booleanFlag(true),
  BROWSER_READY_SELECTOR: z
    .string()
    .min(1)
    .default(EXTRACTION_DEFAULTS.LISTING_READY_SELECTOR),
  BROWSER_DETAIL_READY_SELECTOR: z
    .string()
    .min(1)
    .default(EXTRACTION_DEFAULTS.DETAIL_READY_SELECTOR),

  STATE_FILE: z.string().min(1).default(EXTRACTION_DEFAULTS.STATE_FILE),
  EXPORTS_DIR: z.string().min(1).default(EXTRACTION_DEFAULTS.EXPORTS_DIR),
  EXPORT_JSON: booleanFlag(true),

  PORT: positiveInt(3000),
});

export interface PanelUrls {
  base: string;
  login: string;
  listing: string;
}

export interface ExtractorConfig {
  credentials: {
    email: string;
    password: string;
  };
  urls: PanelUrls;
  backend: BackendKind;
  fallbackEnabled: boolean;
  requestTimeoutMs: number;
  retry: RetryOptions;
  maxPages: number;
  browser: {
    headless: boolean;
    listingReadySelector: string;
    detailReadySelector: string;
  };
  state: {
    stateFile: string;
    exportsDir: string;
    exportEnabled: boolean;
  };
  server: {
    port: number;
  };
}

/**
 * Parse and validate an environment map
 * @throws ConfigError
 */
export function parseConfig(
  env: Record<string, string | undefined>,
): ExtractorConfig {
  // Empty strings in .env mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.errors.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${details.join("; ")}`);
  }

  const e = parsed.data;
  const base = e.ORDERS_BASE_URL.replace(/\/+$/, "");

  return {
    credentials: {
      email: e.ORDERS_EMAIL,
      password: e.ORDERS_PASSWORD,
    },
    urls: {
      base,
      login: e.ORDERS_LOGIN_URL ?? `${base}/login`,
      listing: e.ORDERS_LISTING_URL ?? `${base}/pedidos`,
    },
    backend: e.FETCH_BACKEND,
    fallbackEnabled: e.FALLBACK_BACKEND_ENABLED,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    retry: {
      maxAttempts: e.MAX_RETRIES,
      delayMs: e.RETRY_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      backoff: e.RETRY_BACKOFF,
    },
    maxPages: e.MAX_PAGES,
    browser: {
      headless: e.BROWSER_HEADLESS,
      listingReadySelector: e.BROWSER_READY_SELECTOR,
      detailReadySelector: e.BROWSER_DETAIL_READY_SELECTOR,
    },
    state: {
      stateFile: e.STATE_FILE,
      exportsDir: e.EXPORTS_DIR,
      exportEnabled: e.EXPORT_JSON,
    },
    server: {
      port: e.PORT,
    },
  };
}

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private cached: ExtractorConfig | null = null;

  private constructor() {}

  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * Load (and cache) the config from process.env
   */
  load(): ExtractorConfig {
    if (!this.cached) {
      this.cached = parseConfig(process.env);
    }
    return this.cached;
  }

  /**
   * Clear the cache (tests)
   */
  clearCache(): void {
    this.cached = null;
  }
}
