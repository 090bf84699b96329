import { HTTPError } from '../error/httpError.js';
import type { FetchClientOptions, FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - merges default and per-request headers,
 * - reads the body of 4xx/5xx responses into an {@link HTTPError},
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Holds no mutable state, so one instance can serve any number of concurrent calls.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default headers sent with every request. */
  readonly #headers: Headers;

  /** Creates a new instance of the fetch-client with default headers */
  constructor(opts: FetchClientOptions = {}) {
    this.#headers = mergeHeaderOptions(opts.headers);
  }

  /**
   * Executes a POST request against the given URL.
   *
   * @param url - Absolute request URL.
   * @param opts - Body, headers and signal merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('POST', url, opts);
  }

  /**
   * Core request implementation.
   *
   * Errors:
   * - Network / fetch errors (including aborts from the timeout signal) are wrapped in `Error`.
   * - 4xx/5xx responses become `HTTPError` carrying the body text.
   */
  async #request(method: string, url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(this.#headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        method,
        body: opts.body,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error calling ${method} in fetchClient`, { cause: err }), null];
    }

    if (res.status >= 400) {
      const [errBody, body] = await safeWrapAsync(() => res.text());
      if (errBody) {
        return [new HTTPError(res, '', undefined, { cause: errBody }), null];
      }

      return [new HTTPError(res, body), null];
    }

    return [null, res];
  }
}
