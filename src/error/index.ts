/**
 * Error entrypoint: typed errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error representing a 4xx/5xx response, with the body text attached. */
/** Extracts an {@link HTTPError} from an unknown error value. */
/** Checks whether an error is, or was caused by, an {@link HTTPError}. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';

/** Generic check that matches an error class against an unknown error and its causes. */
export { isErrorType } from './isErrorType.js';

/** Retry outcomes and helpers. */
export {
  getRetryExhaustedError,
  getRetrySuppressedError,
  isRetryExhaustedError,
  isRetrySuppressedError,
  RetryError,
  RetryExhaustedError,
  RetrySuppressedError,
} from './retryError.js';

/** Error thrown when an attempt exceeds the send timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';

/** Recursively unwraps nested causes to find a specific error class, or any error matching a predicate. */
export { type ErrorClass, findError, unwrapErrorType } from './unwrapErrorType.js';

/** Error raised when a request, option set or response fails schema validation. */
export { formatIssues, getValidationError, isValidationError, ValidationError } from './validationError.js';
