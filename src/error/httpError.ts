import type { StatusCode } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a 4xx or 5xx status code.
 * The response body is read eagerly so it survives retries and logging.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';
  /** Response status */
  readonly status: StatusCode;
  /** Response status text */
  readonly statusText: string;
  /** Full response body as text, empty when it could not be read */
  readonly body: string;

  /** Creates a new HTTPError, defaulting the message to `API failed: <body>` */
  constructor(
    response: Pick<Response, 'status' | 'statusText'>,
    body: string,
    message = `API failed: ${body || `${response.status} ${response.statusText}`.trim()}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.status = toStatusCode(response.status);
    this.statusText = response.statusText;
    this.body = body;
  }

  /** Whether the status is one a retry may fix: 408, 429 or any 5xx. */
  get transient(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

/** Narrows a raw numeric status; unknown codes fall back to their class (4xx -> 400, 5xx -> 500). */
function toStatusCode(status: number): StatusCode {
  if (isStatusCode(status)) {
    return status;
  }

  return status >= 500 ? 500 : 400;
}

const STATUS_CODES: ReadonlySet<number> = new Set<StatusCode>([
  400, 401, 402, 403, 404, 405, 406, 407, 408, 409, 410, 411, 412, 413, 414, 415, 416, 417, 418, 421, 422, 423, 424,
  425, 426, 428, 429, 431, 451, 500, 501, 502, 503, 504, 505, 506, 507, 508, 510, 511,
]);

function isStatusCode(status: number): status is StatusCode {
  return STATUS_CODES.has(status);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): boolean {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
