export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter is uniform in [0, jitterRatio * delay]. */
  jitterRatio: number;
}

/**
 * Delay before retrying after `failedAttempt` (zero-based) failed:
 * `min(max, base * 2^attempt)` plus jitter.
 */
export function retryDelayMs(failedAttempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** failedAttempt);
  return Math.round(exponential + random() * policy.jitterRatio * exponential);
}
