import { RetryExhaustedError, RetrySuppressedError } from '../error/retryError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryOptions<R> {
  /** Function to execute, receives the 1-based attempt number; must return a tuple-style result. */
  fn: (attempt: number) => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   * @default 3
   */
  attempts?: number;
  /**
   * Milliseconds to wait before retry `n`, either fixed or computed per retry.
   * @default 1000
   */
  delay?: number | ((retry: number) => number);
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called right before sleeping ahead of retry `n`. */
  onRetry?: (e: Error, retry: number, delay: number) => void;
}

/**
 * Keeps retrying a tuple-returning function until it succeeds, the error is
 * classified as final by `errFn`, or the retry budget is spent.
 *
 * `This is for functions that catch their own errors and return them in a tuple structure like [Error, Response]`
 *
 * Failures surface as {@link RetrySuppressedError} (stopped by `errFn`) or
 * {@link RetryExhaustedError} (budget spent), both carrying the last error as `cause`.
 */
export async function retry<R = unknown>({
  fn,
  attempts = 3,
  delay = 1000,
  errFn,
  onRetry,
}: RetryOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn(attempt);
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError(`error further retries suppressed`, attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError(`error retries exhausted`, attempt, { cause: err }), null];
    }

    const wait = typeof delay === 'function' ? delay(attempt) : delay;
    onRetry?.(err, attempt, wait);
    await sleep(wait);
  }
}
