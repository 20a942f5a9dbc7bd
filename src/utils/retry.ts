/**
 * Retry policy
 *
 * Attempts are counted from 1 and `maxAttempts` includes the first try.
 */

export type BackoffKind = "fixed" | "exponential";

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  maxDelayMs: number;
  backoff: BackoffKind;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the attempt following `attempt`
 */
export function retryDelay(options: RetryOptions, attempt: number): number {
  if (options.backoff === "fixed") {
    return Math.min(options.delayMs, options.maxDelayMs);
  }
  return Math.min(
    options.delayMs * 2 ** Math.max(attempt - 1, 0),
    options.maxDelayMs,
  );
}

export interface RetryHooks {
  /** Only errors accepted here are retried; anything else is rethrown */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

/**
 * Run `operation` until it resolves, a non-retryable error is thrown,
 * or the attempt budget is spent (the last error is rethrown).
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
  hooks: RetryHooks,
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(options.maxAttempts, 1);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !hooks.shouldRetry(error)) {
        throw error;
      }
      const delay = retryDelay(options, attempt);
      hooks.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
