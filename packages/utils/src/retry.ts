/**
 * Retry Logic
 *
 * Exponential backoff policy. The caller owns the retry loop; this module
 * only answers "how long until the next attempt".
 */

export interface RetryPolicy {
  /** Retries after the first attempt (0 = never retry) */
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export const defaultRetryPolicy: RetryPolicy = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay before retry number `retry` (1-based): initialDelay, then multiplied
 * by backoffMultiplier per retry, capped at maxDelay.
 */
export function computeBackoffDelay(
  retry: number,
  policy: Partial<RetryPolicy> = {}
): number {
  const opts = { ...defaultRetryPolicy, ...policy };
  const exponent = Math.max(0, retry - 1);
  const delay = opts.initialDelay * Math.pow(opts.backoffMultiplier, exponent);
  return Math.min(delay, opts.maxDelay);
}

/**
 * Whether another attempt is allowed after `attemptsMade` attempts
 */
export function canRetry(attemptsMade: number, policy: Pick<RetryPolicy, 'maxRetries'>): boolean {
  return attemptsMade < policy.maxRetries + 1;
}
