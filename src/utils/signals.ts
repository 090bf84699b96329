import { TimeoutError } from '../error/timeoutError.js';
import { type SafeWrapAsync, toError } from './wrap.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * after `timeoutMs`. Returns `null` when `timeoutMs` is `0`.
 *
 * The timer is cleared once the signal aborts; callers that finish early
 * should call the returned `clear` so no timer outlives the request.
 */
export function createTimeoutSignal(timeoutMs: number): { signal: AbortSignal; clear: () => void } | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/**
 * Settles with `[signal.reason, null]` once `signal` aborts, or with the result of
 * `work` if that comes first. Bounds work the signal cannot cancel itself, such as
 * reading a response body.
 */
export function raceSignal<T>(signal: AbortSignal, work: SafeWrapAsync<Error, T>): SafeWrapAsync<Error, T> {
  if (signal.aborted) {
    return Promise.resolve([toError(signal.reason), null]);
  }

  return new Promise((resolve) => {
    const onAbort = () => resolve([toError(signal.reason), null]);
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve([toError(error), null]);
      },
    );
  });
}
