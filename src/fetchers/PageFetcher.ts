/**
 * Page fetcher
 *
 * Wraps the run's fetch backends behind one `fetch(target)`:
 * - transient FetchError → retried with backoff (RetryOptions)
 * - SessionExpiredError → invalidate + log in again, once per target
 * - retry budget exhausted on transient errors for a listing page → demote
 *   to the fallback backend once for the rest of the run (when one is
 *   configured); a detail page never triggers the switch
 */

import type { Logger } from "@/config/logger";
import type {
  BackendKind,
  FetchTarget,
  RawContent,
} from "@/core/domain/PageDescriptor";
import { describeTarget } from "@/core/domain/PageDescriptor";
import type { Session } from "@/core/domain/Session";
import type { IFetchBackend } from "@/core/interfaces/IFetchBackend";
import {
  AuthenticationError,
  errorMessage,
  FetchError,
  SessionExpiredError,
} from "@/core/errors";
import { RetryOptions, Sleep, withRetry } from "@/utils/retry";

/**
 * A backend bound to its own authenticator; the session type stays inside
 */
export interface BoundBackend {
  readonly kind: BackendKind;
  authenticate(): Promise<void>;
  fetch(target: FetchTarget): Promise<RawContent>;
  invalidate(): Promise<void>;
  close(): Promise<void>;
}

export function bindBackend<TSession extends Session>(
  backend: IFetchBackend<TSession>,
): BoundBackend {
  return {
    kind: backend.kind,
    authenticate: async () => {
      await backend.authenticator.ensureSession();
    },
    fetch: async (target) =>
      backend.fetch(target, await backend.authenticator.ensureSession()),
    invalidate: () => backend.authenticator.invalidate(),
    close: () => backend.close(),
  };
}

export interface PageFetcherOptions {
  primary: BoundBackend;
  fallback?: BoundBackend | null;
  retry: RetryOptions;
  logger: Logger;
  sleep?: Sleep;
}

export class PageFetcher {
  private active: BoundBackend;
  private fallback: BoundBackend | null;
  private demoted = false;

  constructor(private readonly options: PageFetcherOptions) {
    this.active = options.primary;
    this.fallback = options.fallback ?? null;
  }

  /** Backend currently serving fetches */
  get backend(): BackendKind {
    return this.active.kind;
  }

  get fallbackUsed(): boolean {
    return this.demoted;
  }

  /**
   * Log in up front so credential problems surface before any page is walked
   * @throws AuthenticationError
   */
  async authenticate(): Promise<void> {
    await this.active.authenticate();
  }

  /**
   * @throws FetchError | AuthenticationError
   */
  async fetch(target: FetchTarget): Promise<RawContent> {
    try {
      return await this.fetchWithRetry(this.active, target);
    } catch (error) {
      const fallback = this.fallback;
      if (
        !(error instanceof FetchError && error.retryable) ||
        !fallback ||
        target.kind !== "listing"
      ) {
        throw error;
      }

      this.options.logger.warn(
        {
          from: this.active.kind,
          to: fallback.kind,
          target: describeTarget(target),
          error: errorMessage(error),
        },
        "Retries exhausted, switching fetch backend for the rest of the run",
      );
      this.active = fallback;
      this.fallback = null;
      this.demoted = true;
      return this.fetchWithRetry(this.active, target);
    }
  }

  /**
   * Close every backend this fetcher was given
   */
  async close(): Promise<void> {
    const backends = [this.options.primary, this.options.fallback].filter(
      (backend): backend is BoundBackend => Boolean(backend),
    );
    for (const backend of backends) {
      try {
        await backend.close();
      } catch (error) {
        this.options.logger.warn(
          { backend: backend.kind, error: errorMessage(error) },
          "Fetch backend close failed",
        );
      }
    }
  }

  private fetchWithRetry(
    backend: BoundBackend,
    target: FetchTarget,
  ): Promise<RawContent> {
    let relogged = false;

    const attempt = async (): Promise<RawContent> => {
      try {
        return await backend.fetch(target);
      } catch (error) {
        if (!(error instanceof SessionExpiredError)) {
          throw error;
        }
        if (relogged) {
          throw new AuthenticationError(
            "Session rejected again right after logging in",
            error.context,
            error,
          );
        }
        relogged = true;
        this.options.logger.info(
          { backend: backend.kind, target: describeTarget(target) },
          "Session expired, logging in again",
        );
        await backend.invalidate();
        return attempt();
      }
    };

    return withRetry(
      attempt,
      this.options.retry,
      {
        shouldRetry: (error) => error instanceof FetchError && error.retryable,
        onRetry: (error, attemptNumber, delayMs) =>
          this.options.logger.warn(
            {
              backend: backend.kind,
              target: describeTarget(target),
              attempt: attemptNumber,
              delay_ms: delayMs,
              error: errorMessage(error),
            },
            "Fetch failed, retrying",
          ),
        sleep: this.options.sleep,
      },
    );
  }
}
