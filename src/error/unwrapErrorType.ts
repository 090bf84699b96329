/** Any error class, including ones whose constructor takes extra arguments. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Finds the outermost error in a cause chain that satisfies `predicate`.
 * Stops on non-`Error` causes and on cause cycles.
 */
export function findError<T extends Error>(err: unknown, predicate: (error: Error) => error is T): T | null;
export function findError(err: unknown, predicate: (error: Error) => boolean): Error | null;
export function findError(err: unknown, predicate: (error: Error) => boolean): Error | null {
  const seen = new Set<Error>();
  let current: unknown = err;
  while (current instanceof Error && !seen.has(current)) {
    if (predicate(current)) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  return findError(err, (error): error is T => error instanceof errorClass);
}
