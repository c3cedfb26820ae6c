/**
 * Exponential backoff for retryable registry operations.
 */

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Growth factor between consecutive delays */
  multiplier: number;
  /** Jitter factor (0-1) applied symmetrically around the delay */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  initialDelayMs: 1_000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: 0.1,
};

/**
 * Delay before retry number `retry` (0-based: 0 is the wait after the first
 * failed attempt).
 */
export function calculateBackoff(
  retry: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(
    policy.initialDelayMs * Math.pow(policy.multiplier, retry),
    policy.maxDelayMs,
  );
  const jitter = exponential * policy.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential + jitter));
}
