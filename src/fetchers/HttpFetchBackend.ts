/**
 * HTTP fetch backend
 *
 * Plain GET with the session's cookies. Status classification:
 * - 401 / 419 / redirect to login / login form in body → SessionExpiredError
 * - 408 / 429 / 5xx / network / timeout → FetchError transient
 * - other 4xx → FetchError permanent
 */

import type { PanelUrls } from "@/config/ConfigLoader";
import type {
  FetchTarget,
  RawContent,
} from "@/core/domain/PageDescriptor";
import type { HttpSession } from "@/core/domain/Session";
import type { IFetchBackend } from "@/core/interfaces/IFetchBackend";
import { FetchError, SessionExpiredError } from "@/core/errors";
import type { HttpAuthenticator } from "@/auth/HttpAuthenticator";
import { looksLikeLoginPage } from "@/auth/LoginForm";
import { isTransientStatus, sendRequest } from "@/fetchers/HttpClient";

/** Laravel answers 419 when the session's CSRF token expired */
const SESSION_EXPIRED_STATUSES: ReadonlySet<number> = new Set([401, 419]);

export interface HttpFetchBackendOptions {
  urls: PanelUrls;
  requestTimeoutMs: number;
}

/**
 * Listing URL of a 1-based page
 */
export function listingPageUrl(listingUrl: string, page: number): string {
  const url = new URL(listingUrl);
  url.searchParams.set("page", String(page));
  return url.toString();
}

export class HttpFetchBackend implements IFetchBackend<HttpSession> {
  readonly kind = "http" as const;

  constructor(
    readonly authenticator: HttpAuthenticator,
    private readonly options: HttpFetchBackendOptions,
  ) {}

  async fetch(target: FetchTarget, session: HttpSession): Promise<RawContent> {
    const url =
      target.kind === "listing"
        ? listingPageUrl(this.options.urls.listing, target.page)
        : target.url;
    const context = {
      backend: this.kind,
      url,
      page: target.kind === "listing" ? target.page : undefined,
      orderId: target.kind === "detail" ? target.orderId : undefined,
    };

    const response = await sendRequest(
      {
        url,
        cookies: session.cookies,
        timeoutMs: this.options.requestTimeoutMs,
        referer: this.options.urls.listing,
      },
      context,
    );
    const withStatus = { ...context, status: response.status, url: response.url };

    if (SESSION_EXPIRED_STATUSES.has(response.status)) {
      throw new SessionExpiredError(
        `Session rejected with HTTP ${response.status}`,
        withStatus,
      );
    }
    if (isTransientStatus(response.status)) {
      throw FetchError.transient(`HTTP ${response.status}`, withStatus);
    }
    if (response.status >= 400) {
      throw FetchError.permanent(`HTTP ${response.status}`, withStatus);
    }
    if (looksLikeLoginPage(response.html, response.url)) {
      throw new SessionExpiredError("Redirected to the login page", withStatus);
    }

    return {
      html: response.html,
      status: response.status,
      url: response.url,
      backend: this.kind,
    };
  }

  async close(): Promise<void> {
    await this.authenticator.close();
  }
}
