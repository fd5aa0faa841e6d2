/**
 * Bounded exponential backoff, shared by transient-infrastructure retries on the
 * controller and the worker, and by the log stream reconnect policy.
 */

export interface BackoffPolicy {
  /** First delay in ms. */
  baseMs: number;
  /** Upper bound for a single delay in ms. */
  maxMs: number;
  /** Total attempts including the first one. */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 200, maxMs: 5_000, maxAttempts: 5 };

/** Delay before retry number `attempt` (1-based): base × 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  const exp = policy.baseMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(exp, policy.maxMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions extends BackoffPolicy {
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` until it succeeds or the attempt budget is spent. The last error is rethrown.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      const retryable = options.isRetryable ? options.isRetryable(err) : true;
      if (!retryable || attempt >= options.maxAttempts) throw err;
      const delay = backoffDelay(attempt, options);
      options.onRetry?.(err, attempt, delay);
      await sleep(delay);
      attempt++;
    }
  }
}
