/**
 * Fetch backend factory
 *
 * Builds the authenticator + backend pair for a backend kind from config.
 */

import type { ExtractorConfig } from "@/config/ConfigLoader";
import type { Logger } from "@/config/logger";
import { BackendKind, otherBackend } from "@/core/domain/PageDescriptor";
import { BrowserAuthenticator } from "@/auth/BrowserAuthenticator";
import { HttpAuthenticator } from "@/auth/HttpAuthenticator";
import { BrowserFetchBackend } from "@/fetchers/BrowserFetchBackend";
import { HttpFetchBackend } from "@/fetchers/HttpFetchBackend";
import { bindBackend, BoundBackend, PageFetcher } from "@/fetchers/PageFetcher";

export function createBackend(
  kind: BackendKind,
  config: ExtractorConfig,
): BoundBackend {
  const { urls, credentials, requestTimeoutMs } = config;

  switch (kind) {
    case "http":
      return bindBackend(
        new HttpFetchBackend(
          new HttpAuthenticator({
            urls,
            credentials,
            requestTimeoutMs,
            retry: config.retry,
          }),
          { urls, requestTimeoutMs },
        ),
      );
    case "browser":
      return bindBackend(
        new BrowserFetchBackend(
          new BrowserAuthenticator({
            urls,
            credentials,
            requestTimeoutMs,
            headless: config.browser.headless,
          }),
          {
            urls,
            requestTimeoutMs,
            listingReadySelector: config.browser.listingReadySelector,
            detailReadySelector: config.browser.detailReadySelector,
          },
        ),
      );
  }
}

export interface PageFetcherRequest {
  /** Overrides config.backend */
  backend?: BackendKind;
  /** Overrides config.fallbackEnabled */
  allowFallback?: boolean;
}

/**
 * Page fetcher for one run
 */
export function createPageFetcher(
  config: ExtractorConfig,
  logger: Logger,
  request: PageFetcherRequest = {},
): PageFetcher {
  const primary = request.backend ?? config.backend;
  const allowFallback = request.allowFallback ?? config.fallbackEnabled;

  return new PageFetcher({
    primary: createBackend(primary, config),
    fallback: allowFallback
      ? createBackend(otherBackend(primary), config)
      : null,
    retry: config.retry,
    logger,
  });
}
