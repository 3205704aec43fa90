import { RateLimitedError, isRetryable as defaultIsRetryable } from "./errors.js";
import { logger, errorMessage } from "./logger.js";
import { sleep as defaultSleep } from "./async.js";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryOptions = {
  label: string;
  isRetryable?: (e: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

/** Exponential backoff for the attempt that just failed (0-based), capped at maxDelayMs. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

function retryDelay(e: unknown, attempt: number, policy: RetryPolicy): number {
  const backoff = backoffDelay(attempt, policy);
  if (e instanceof RateLimitedError && e.retryAfterMs !== null) {
    return Math.min(Math.max(backoff, e.retryAfterMs), policy.maxDelayMs);
  }
  return backoff;
}

/**
 * Runs `op` until it succeeds, fails with a non-retryable error, or maxAttempts is reached.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions
): Promise<T> {
  const isRetryable = opts.isRetryable ?? defaultIsRetryable;
  const sleep = opts.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await op(attempt);
    } catch (e) {
      if (attempt + 1 >= maxAttempts || !isRetryable(e)) throw e;
      const delay = retryDelay(e, attempt, policy);
      logger.warn(`${opts.label}: attempt ${attempt + 1}/${maxAttempts} failed, retrying in ${delay}ms`, errorMessage(e));
      await sleep(delay);
    }
  }
}
