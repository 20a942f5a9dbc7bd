/**
 * Browser authenticator
 *
 * Owns one Chromium instance for the whole run; each session is a fresh
 * context + page logged in through the real form, so Livewire/JS-driven
 * logins work where the plain POST does not.
 */

import { chromium, errors } from "playwright";
import type { Browser, BrowserContext, Page } from "playwright";
import { logger } from "@/config/logger";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import type { PanelUrls } from "@/config/ConfigLoader";
import { SCRAPER_CONFIG } from "@/config/constants";
import type { BrowserSession } from "@/core/domain/Session";
import type { IAuthenticator } from "@/core/interfaces/IAuthenticator";
import { AuthenticationError, errorMessage } from "@/core/errors";
import { extractCsrfToken, isLoginUrl } from "@/auth/LoginForm";

/** Elements only rendered once logged in */
const AUTHENTICATED_MARKERS = ".nk-sidebar, .sidebar, [data-sidebar], nav";

export interface BrowserAuthenticatorOptions {
  urls: PanelUrls;
  credentials: { email: string; password: string };
  requestTimeoutMs: number;
  headless: boolean;
}

export class BrowserAuthenticator implements IAuthenticator<BrowserSession> {
  private browser: Browser | null = null;
  private session: BrowserSession | null = null;

  constructor(private readonly options: BrowserAuthenticatorOptions) {}

  async ensureSession(): Promise<BrowserSession> {
    if (this.session) {
      return this.session;
    }

    const browser = await this.launch();
    let context: BrowserContext | null = null;

    try {
      context = await browser.newContext({
        viewport: SCRAPER_CONFIG.DEFAULT_VIEWPORT,
        userAgent: SCRAPER_CONFIG.DEFAULT_USER_AGENT,
        locale: SCRAPER_CONFIG.LOCALE,
        timezoneId: SCRAPER_CONFIG.TIMEZONE_ID,
      });
      await context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", { get: () => false });
      });

      const page = await context.newPage();
      await this.login(page);

      const session: BrowserSession = {
        backend: "browser",
        context,
        page,
        createdAt: new Date(),
      };
      this.session = session;
      logger.info(
        { backend: "browser", email: this.options.credentials.email },
        "Login succeeded",
      );
      return session;
    } catch (error) {
      if (context) {
        await this.closeContext(context);
      }
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError(
        `Browser login failed: ${errorMessage(error)}`,
        { backend: "browser", url: this.options.urls.login },
        error,
      );
    }
  }

  async invalidate(): Promise<void> {
    const current = this.session;
    this.session = null;
    if (current) {
      await this.closeContext(current.context);
    }
  }

  async close(): Promise<void> {
    await this.invalidate();
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close();
      logger.debug("Browser closed");
    }
  }

  private async launch(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser;
    }
    try {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        args: BROWSER_ARGS.DEFAULT,
      });
      return this.browser;
    } catch (error) {
      throw new AuthenticationError(
        `Browser could not be started: ${errorMessage(error)}`,
        { backend: "browser" },
        error,
      );
    }
  }

  private async login(page: Page): Promise<void> {
    const { urls, credentials, requestTimeoutMs } = this.options;
    const context = { backend: "browser" as const, url: urls.login };

    await page.goto(urls.login, {
      waitUntil: "domcontentloaded",
      timeout: requestTimeoutMs,
    });

    if (!extractCsrfToken(await page.content())) {
      throw new AuthenticationError(
        "Login page not recognized: no anti-forgery token",
        context,
      );
    }

    await page.fill('input[name="email"]', credentials.email);
    await page.fill('input[name="password"]', credentials.password);
    await page.click('button[type="submit"], input[type="submit"]');

    await this.waitForLoginOutcome(page);
    await page.waitForTimeout(SCRAPER_CONFIG.POST_LOGIN_SETTLE_MS);

    if (isLoginUrl(page.url())) {
      logger.error({ url: page.url() }, "Login rejected");
      throw new AuthenticationError(
        "Credentials rejected: still on the login page",
        { ...context, url: page.url() },
      );
    }
  }

  /**
   * URL leaving /login, else an authenticated marker; neither is fatal here,
   * the final URL check decides
   */
  private async waitForLoginOutcome(page: Page): Promise<void> {
    const timeout = SCRAPER_CONFIG.LOGIN_NAVIGATION_TIMEOUT_MS;
    try {
      await page.waitForURL((url) => !isLoginUrl(url.toString()), { timeout });
      return;
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) {
        throw error;
      }
      logger.debug("URL still on login after submit, waiting for sidebar");
    }

    try {
      await page.waitForSelector(AUTHENTICATED_MARKERS, {
        state: "visible",
        timeout,
      });
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) {
        throw error;
      }
      logger.debug("No authenticated marker after submit");
    }
  }

  private async closeContext(context: BrowserContext): Promise<void> {
    try {
      await context.close();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Browser context close failed");
    }
  }
}
