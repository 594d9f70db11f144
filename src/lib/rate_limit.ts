import { FeedClientError, RateLimitedError } from "./errors";
import { logger } from "./logger";

export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

export type RetryOptions = {
  tries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  label?: string;
  /** Injected in tests to skip the real wait. */
  wait?: (ms: number) => Promise<void>;
  random?: () => number;
};

/**
 * Retry `fn` on errors the client marks retryable. A RateLimitedError's
 * retry-after hint is honoured as the minimum wait.
 */
export async function withRetries<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const tries = opts.tries ?? 4;
  const base = opts.baseDelayMs ?? 2000; // 2s base
  const cap = opts.maxDelayMs ?? 60_000;
  const wait = opts.wait ?? sleep;
  const random = opts.random ?? Math.random;

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (e) {
      attempt++;
      if (!(e instanceof FeedClientError) || !e.retryable) throw e;
      if (attempt >= tries) throw e;

      // Exponential backoff + jitter; if the provider said "retry after Xs", honor that
      let delay = Math.min(base * 2 ** (attempt - 1), cap);
      if (e instanceof RateLimitedError && e.retryAfterSeconds !== undefined) {
        delay = Math.max(delay, e.retryAfterSeconds * 1000);
      }

      // Jitter 0–300ms
      delay += Math.floor(random() * 300);

      logger.warn(
        { label: opts.label, attempt, tries, code: e.code, delay },
        "retrying"
      );
      await wait(delay);
    }
  }
}
