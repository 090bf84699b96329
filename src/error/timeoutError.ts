import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a single attempt exceeds the send timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
}

/**
 * Type guard for {@link TimeoutError} anywhere in the cause chain.
 */
export function isTimeoutError(error: unknown): boolean {
  return isErrorType(TimeoutError, error);
}
