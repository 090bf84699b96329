import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Base for retry outcomes, carrying how many attempts were made.
 */
export class RetryError extends Error {
  /** RetryError error-name */
  static name = 'RetryError';
  /** Attempts made before giving up */
  readonly attempts: number;

  /** Creates a new retry outcome with the attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.attempts = attempts;
  }
}

/**
 * Error representing a retry budget that ran out. `cause` holds the last attempt's error.
 */
export class RetryExhaustedError extends RetryError {
  /** RetryExhaustedError error-name */
  static name = 'RetryExhaustedError';
}

/**
 * Error representing an attempt whose error was final, so no further retries were made.
 */
export class RetrySuppressedError extends RetryError {
  /** RetrySuppressedError error-name */
  static name = 'RetrySuppressedError';
}

/** Type guard for {@link RetryExhaustedError} anywhere in the cause chain. */
export function isRetryExhaustedError(error: unknown): boolean {
  return isErrorType(RetryExhaustedError, error);
}

/** Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes. */
export function getRetryExhaustedError(error: unknown): null | RetryExhaustedError {
  return unwrapErrorType(RetryExhaustedError, error);
}

/** Type guard for {@link RetrySuppressedError} anywhere in the cause chain. */
export function isRetrySuppressedError(error: unknown): boolean {
  return isErrorType(RetrySuppressedError, error);
}

/** Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes. */
export function getRetrySuppressedError(error: unknown): null | RetrySuppressedError {
  return unwrapErrorType(RetrySuppressedError, error);
}
