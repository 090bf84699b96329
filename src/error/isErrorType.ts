import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error matches a specific error class,
 * either directly or anywhere in its `cause` chain.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): boolean {
  return unwrapErrorType(errorClass, err) !== null;
}
