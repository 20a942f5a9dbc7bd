/**
 * HTTP authenticator
 *
 * GET login page → read _token → POST {_token, email, password}.
 * Success means a 2xx final response whose URL has left the login page.
 */

import { logger } from "@/config/logger";
import type { PanelUrls } from "@/config/ConfigLoader";
import type { HttpSession } from "@/core/domain/Session";
import type { IAuthenticator } from "@/core/interfaces/IAuthenticator";
import {
  AuthenticationError,
  errorMessage,
  FetchError,
} from "@/core/errors";
import { CookieJar } from "@/auth/CookieJar";
import { extractCsrfToken, isLoginUrl } from "@/auth/LoginForm";
import { isTransientStatus, sendRequest } from "@/fetchers/HttpClient";
import { RetryOptions, Sleep, withRetry } from "@/utils/retry";

export interface HttpAuthenticatorOptions {
  urls: PanelUrls;
  credentials: { email: string; password: string };
  requestTimeoutMs: number;
  retry: RetryOptions;
  sleep?: Sleep;
}

export class HttpAuthenticator implements IAuthenticator<HttpSession> {
  private session: HttpSession | null = null;

  constructor(private readonly options: HttpAuthenticatorOptions) {}

  async ensureSession(): Promise<HttpSession> {
    if (this.session) {
      return this.session;
    }

    let session: HttpSession;
    try {
      session = await withRetry(() => this.login(), this.options.retry, {
        shouldRetry: (error) => error instanceof FetchError && error.retryable,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            { attempt, delay_ms: delayMs, error: errorMessage(error) },
            "Login request failed, retrying",
          ),
        sleep: this.options.sleep,
      });
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError(
        `Login unreachable: ${errorMessage(error)}`,
        { backend: "http", url: this.options.urls.login },
        error,
      );
    }

    logger.info(
      { backend: "http", email: this.options.credentials.email },
      "Login succeeded",
    );
    this.session = session;
    return session;
  }

  async invalidate(): Promise<void> {
    this.session?.cookies.clear();
    this.session = null;
  }

  async close(): Promise<void> {
    await this.invalidate();
  }

  private async login(): Promise<HttpSession> {
    const { urls, credentials, requestTimeoutMs } = this.options;
    const cookies = new CookieJar();
    const context = { backend: "http" as const, url: urls.login };

    const loginPage = await sendRequest(
      { url: urls.login, cookies, timeoutMs: requestTimeoutMs },
      context,
    );
    this.assertOk(loginPage.status, "Login page");

    const csrfToken = extractCsrfToken(loginPage.html);
    if (!csrfToken) {
      throw new AuthenticationError(
        "Login page not recognized: no anti-forgery token",
        context,
      );
    }

    const result = await sendRequest(
      {
        url: urls.login,
        method: "POST",
        form: {
          _token: csrfToken,
          email: credentials.email,
          password: credentials.password,
        },
        cookies,
        timeoutMs: requestTimeoutMs,
        referer: urls.login,
      },
      context,
    );
    this.assertOk(result.status, "Login submit");

    if (isLoginUrl(result.url)) {
      logger.error(
        { status: result.status, url: result.url },
        "Login rejected",
      );
      throw new AuthenticationError("Credentials rejected", {
        ...context,
        status: result.status,
      });
    }

    return { backend: "http", cookies, csrfToken, createdAt: new Date() };
  }

  /**
   * 5xx/408/429 are retried by ensureSession; any other non-2xx rejects
   */
  private assertOk(status: number, step: string): void {
    if (status >= 200 && status < 300) {
      return;
    }
    const context = { backend: "http" as const, url: this.options.urls.login, status };
    if (isTransientStatus(status)) {
      throw FetchError.transient(`${step} returned HTTP ${status}`, context);
    }
    throw new AuthenticationError(`${step} returned HTTP ${status}`, context);
  }
}
