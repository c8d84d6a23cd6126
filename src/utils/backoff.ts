/**
 * Retry delay calculation for sync attempts.
 *
 * delay = min(base * 2^(attempt-1), cap) * (1 ± jitter)
 */

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay, e.g. 0.2 for ±20% */
  jitter: number;
  random?: () => number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 2_000,
  maxDelayMs: 5 * 60 * 1000,
  jitter: 0.2,
};

/**
 * Delay before the next attempt, given how many attempts have failed so far (>= 1).
 */
export function calculateBackoff(failedAttempts: number, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const { baseDelayMs, maxDelayMs, jitter } = options;
  const random = options.random ?? Math.random;

  const exponent = Math.max(0, failedAttempts - 1);
  const exponentialDelay = baseDelayMs * Math.pow(2, exponent);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const factor = 1 + (random() * 2 - 1) * jitter;
  return Math.round(cappedDelay * factor);
}
