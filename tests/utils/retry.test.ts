/**
 * retry unit tests
 */

import { describe, it, expect, jest } from "@jest/globals";
import { retryDelay, RetryOptions, withRetry } from "@/utils/retry";

const options: RetryOptions = {
  maxAttempts: 3,
  delayMs: 100,
  maxDelayMs: 250,
  backoff: "exponential",
};

describe("retryDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(retryDelay(options, 1)).toBe(100);
    expect(retryDelay(options, 2)).toBe(200);
    expect(retryDelay(options, 3)).toBe(250);
  });

  it("fixed backoff keeps the base delay", () => {
    const fixed: RetryOptions = { ...options, backoff: "fixed" };
    expect(retryDelay(fixed, 1)).toBe(100);
    expect(retryDelay(fixed, 5)).toBe(100);
  });
});

describe("withRetry", () => {
  const noSleep = jest.fn(async (_ms: number) => undefined);

  it("returns the first success", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) {
          throw new Error("flaky");
        }
        return "ok";
      },
      options,
      { shouldRetry: () => true, sleep: noSleep },
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("rethrows the last error once attempts run out", async () => {
    const onRetry = jest.fn();
    let calls = 0;

    await expect(
      withRetry(
        async (attempt) => {
          calls++;
          throw new Error(`attempt ${attempt}`);
        },
        options,
        { shouldRetry: () => true, onRetry, sleep: noSleep },
      ),
    ).rejects.toThrow("attempt 3");

    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.any(Error), 2, 200);
  });

  it("does not retry errors the predicate rejects", async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error("permanent");
        },
        options,
        { shouldRetry: () => false, sleep: noSleep },
      ),
    ).rejects.toThrow("permanent");

    expect(calls).toBe(1);
  });
});
