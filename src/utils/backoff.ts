/** Bounds for {@link exponentialBackoff}. */
export interface BackoffOptions {
  /**
   * Delay before the first retry, in milliseconds.
   * @default 1000
   */
  minDelay?: number;
  /**
   * Upper bound for any single delay, in milliseconds.
   * @default 30000
   */
  maxDelay?: number;
}

/** Default delay before the first retry. */
export const DEFAULT_MIN_DELAY = 1_000;

/** Default cap on a single retry delay. */
export const DEFAULT_MAX_DELAY = 30_000;

/**
 * Returns a delay function for retry `n` (1-based): `min(minDelay * 2^(n-1), maxDelay)`.
 *
 * @example
 * const delay = exponentialBackoff({ minDelay: 100 });
 * delay(1); // 100
 * delay(3); // 400
 */
export function exponentialBackoff({
  minDelay = DEFAULT_MIN_DELAY,
  maxDelay = DEFAULT_MAX_DELAY,
}: BackoffOptions = {}): (retry: number) => number {
  return (retry) => Math.min(minDelay * 2 ** Math.max(retry - 1, 0), maxDelay);
}
