import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP status codes the client reasons about. */
export type StatusCode =
  | 200
  | 201
  | 202
  | 203
  | 204
  | 205
  | 206
  | 400
  | 401
  | 402
  | 403
  | 404
  | 405
  | 406
  | 407
  | 408
  | 409
  | 410
  | 411
  | 412
  | 413
  | 414
  | 415
  | 416
  | 417
  | 418
  | 421
  | 422
  | 423
  | 424
  | 425
  | 426
  | 428
  | 429
  | 431
  | 451
  | 500
  | 501
  | 502
  | 503
  | 504
  | 505
  | 506
  | 507
  | 508
  | 510
  | 511;

/** HTTP methods the provider API is called with. */
export type HttpMethod = 'POST';

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Request body, a JSON string or a multipart form. */
  body?: string | FormData;
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request (carries the send timeout). */
  signal?: AbortSignal;
}

/**
 * An outbound request produced from a typed request value, ready for the transport.
 */
export interface PreparedRequest {
  /** Absolute URL, `{baseUrl}/{operation path}`. */
  url: string;
  method: HttpMethod;
  body: string | FormData;
  headers: HeaderOptions;
}

/**
 * Converts a typed request value into a {@link PreparedRequest} against a base URL.
 * JSON and multipart operations differ in body encoding and path.
 */
export interface IntoRequest {
  intoRequest(baseUrl: string): PreparedRequest;
}

/** Contract for HTTP transports used by the client. */
export interface FetchClientProviderDefinition {
  /**
   * Executes a POST request against an absolute URL.
   * Resolves `[HTTPError, null]` for 4xx/5xx responses and `[Error, null]` for transport failures.
   */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
}

/** Factory signature for constructing HTTP transports. */
export interface FetchClientProvider {
  /** Creates a transport with default headers applied to every request */
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}

/** Options to configure a transport. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
}
