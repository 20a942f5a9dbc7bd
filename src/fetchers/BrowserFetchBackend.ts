/**
 * Browser fetch backend
 *
 * Navigates the session's page and waits for a ready selector before reading
 * the rendered DOM, for listings that are filled in by JavaScript.
 */

import { errors } from "playwright";
import type { Response } from "playwright";
import type { PanelUrls } from "@/config/ConfigLoader";
import type { FetchTarget, RawContent } from "@/core/domain/PageDescriptor";
import type { BrowserSession } from "@/core/domain/Session";
import type { IFetchBackend } from "@/core/interfaces/IFetchBackend";
import {
  ErrorContext,
  errorMessage,
  FetchError,
  SessionExpiredError,
} from "@/core/errors";
import type { BrowserAuthenticator } from "@/auth/BrowserAuthenticator";
import { hasLoginForm, isLoginUrl } from "@/auth/LoginForm";
import { isTransientStatus } from "@/fetchers/HttpClient";
import { listingPageUrl } from "@/fetchers/HttpFetchBackend";

export interface BrowserFetchBackendOptions {
  urls: PanelUrls;
  requestTimeoutMs: number;
  listingReadySelector: string;
  detailReadySelector: string;
}

export class BrowserFetchBackend implements IFetchBackend<BrowserSession> {
  readonly kind = "browser" as const;

  constructor(
    readonly authenticator: BrowserAuthenticator,
    private readonly options: BrowserFetchBackendOptions,
  ) {}

  async fetch(
    target: FetchTarget,
    session: BrowserSession,
  ): Promise<RawContent> {
    const { page } = session;
    const url =
      target.kind === "listing"
        ? listingPageUrl(this.options.urls.listing, target.page)
        : target.url;
    const context: ErrorContext = {
      backend: this.kind,
      url,
      page: target.kind === "listing" ? target.page : undefined,
      orderId: target.kind === "detail" ? target.orderId : undefined,
    };

    const response = await this.navigate(session, url, context);
    const status = response?.status() ?? 200;
    const landed = { ...context, status, url: page.url() };

    if (status === 401 || status === 419 || isLoginUrl(page.url())) {
      throw new SessionExpiredError("Redirected to the login page", landed);
    }
    if (isTransientStatus(status)) {
      throw FetchError.transient(`HTTP ${status}`, landed);
    }
    if (status >= 400) {
      throw FetchError.permanent(`HTTP ${status}`, landed);
    }

    const readySelector =
      target.kind === "listing"
        ? this.options.listingReadySelector
        : this.options.detailReadySelector;

    try {
      await page.waitForSelector(readySelector, {
        timeout: this.options.requestTimeoutMs,
      });
    } catch (error) {
      if (!(error instanceof errors.TimeoutError)) {
        throw FetchError.transient(errorMessage(error), landed, error);
      }
      const html = await page.content();
      if (hasLoginForm(html)) {
        throw new SessionExpiredError("Login form rendered instead of content", landed);
      }
      // Empty listings legitimately lack row markup; let the extractor decide
      if (target.kind === "listing") {
        return { html, status, url: page.url(), backend: this.kind };
      }
      throw FetchError.transient(
        `Ready selector "${readySelector}" not found`,
        landed,
        error,
      );
    }

    return {
      html: await page.content(),
      status,
      url: page.url(),
      backend: this.kind,
    };
  }

  async close(): Promise<void> {
    await this.authenticator.close();
  }

  private async navigate(
    session: BrowserSession,
    url: string,
    context: ErrorContext,
  ): Promise<Response | null> {
    try {
      return await session.page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.options.requestTimeoutMs,
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw FetchError.transient("Navigation timeout", context, error);
      }
      const message = errorMessage(error);
      if (/invalid url/i.test(message)) {
        throw FetchError.permanent(`Malformed URL: ${url}`, context, error);
      }
      throw FetchError.transient(`Navigation failed: ${message}`, context, error);
    }
  }
}
