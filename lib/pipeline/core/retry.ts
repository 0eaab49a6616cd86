import type { RetryPolicy } from "./types";
import { ExhaustedRetriesError, isTransientError, ThrottledError } from "./errors";

export interface RetryEvent {
  /** The attempt that just failed (1-based) */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface WithRetryOptions {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (event: RetryEvent) => void;
}

export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {}
): RetryPolicy {
  return {
    maxAttempts: overrides.maxAttempts ?? 5,
    waitMs: overrides.waitMs ?? 40_000,
    isRetryable: overrides.isRetryable ?? isTransientError,
  };
}

/** Process-wide default: 5 attempts, 40 s apart, on throttling or timeout */
export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();

/**
 * Run `operation` until it succeeds, the error is not retryable, or the
 * policy's attempts are used up.
 *
 * Waits a fixed `policy.waitMs` between attempts, or the delay the
 * service asked for when that is longer. Non-retryable errors propagate
 * unchanged; running out of attempts raises ExhaustedRetriesError.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: WithRetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!policy.isRetryable(err)) throw err;
      if (attempt >= maxAttempts) {
        throw new ExhaustedRetriesError(attempt, err);
      }

      const delayMs = retryDelay(policy, err);
      options.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}

function retryDelay(policy: RetryPolicy, error: unknown): number {
  const suggested =
    error instanceof ThrottledError ? error.retryAfterMs ?? 0 : 0;
  return Math.max(policy.waitMs, suggested);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
