import type { StandardSchemaV1 } from '@standard-schema/spec';
import { SpanKind, SpanStatusCode, type Span, type Tracer, trace } from '@opentelemetry/api';
import type { Logger } from 'pino';
import { type ChatCompletionRequest, type ChatCompletionResponse, chatCompletionResponseSchema } from '../api/chat.js';
import { type EmbeddingRequest, type EmbeddingResponse, embeddingResponseSchema } from '../api/embedding.js';
import { type CreateImageRequest, type CreateImageResponse, createImageResponseSchema } from '../api/image.js';
import type { SpeechRequest } from '../api/speech.js';
import {
  type WhisperRequest,
  WhisperResponseFormat,
  type WhisperResponse,
  whisperResponseSchema,
} from '../api/whisper.js';
import { getHttpError } from '../error/httpError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { findError } from '../error/unwrapErrorType.js';
import { FetchClient } from '../fetch/client.js';
import { createLogger } from '../logger.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  IntoRequest,
  PreparedRequest,
} from '../types/request.js';
import { exponentialBackoff } from '../utils/backoff.js';
import { getResponseBytes, getResponseJson, getResponseText } from '../utils/getResponseData.js';
import { retry } from '../utils/retry.js';
import { createTimeoutSignal, raceSignal } from '../utils/signals.js';
import { validateSync, validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import {
  clientConfigSchema,
  DEFAULT_TIMEOUT,
  type LlmClientConfig,
  type LlmClientConfigInput,
  loadEnvConfig,
  USER_AGENT,
} from './config.js';

/** Constructor options for {@link LlmClient}; every field is optional. */
export type LlmClientOptions = LlmClientConfigInput & {
  /** HTTP transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Logger for attempts, retries and final failures. Defaults to {@link createLogger}. */
  logger?: Logger;
  /** Tracer for call and attempt spans. Defaults to the global `llm-sdk` tracer. */
  tracer?: Tracer;
};

/** Name of a client operation, used in span names and log fields. */
export type LlmOperation = 'chatCompletion' | 'createImage' | 'speech' | 'whisper' | 'embedding';

/** System and undici error codes of a dropped or unreachable connection. */
const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function isNetworkFailure(error: Error): boolean {
  // undici reports every connection-level failure as this TypeError
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return true;
  }

  return 'code' in error && typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code);
}

/**
 * An error worth retrying: HTTP 408, 429 or any 5xx, an attempt timeout, or a
 * network failure. Invalid requests (such as a malformed header value) and
 * unreadable response bodies are final.
 */
export function isTransientError(error: unknown): boolean {
  const httpError = getHttpError(error);
  if (httpError) {
    return httpError.transient;
  }

  return isTimeoutError(error) || findError(error, isNetworkFailure) !== null;
}

/**
 * Client for an OpenAI-compatible provider API that:
 * - signs every request with the bearer token and a fixed user agent,
 * - bounds each attempt, response body included, by a 30 s timeout,
 * - retries transient failures with exponential backoff,
 * - traces each call and attempt, and logs the final failure with the response body.
 *
 * Every operation resolves to an error-first tuple and never throws. Options are
 * fixed at construction, so one instance can serve concurrent calls.
 *
 * @example
 * const client = new LlmClient({ token: process.env.LLM_API_KEY });
 * const [buildErr, req] = ChatCompletionRequest.new('gpt-4o-mini', [ChatMessage.user('Hello')]);
 * const [err, res] = await client.chatCompletion(req);
 */
export class LlmClient {
  /** Validated settings. */
  readonly #config: LlmClientConfig;
  /** Shared transport, carrying the auth and user-agent headers. */
  readonly #fetchClient: FetchClientProviderDefinition;
  readonly #logger: Logger;
  readonly #tracer: Tracer;
  /** Delay before retry `n`. */
  readonly #delay: (retry: number) => number;

  /**
   * Creates a client. Throws a {@link ValidationError} when the options are invalid.
   */
  constructor({ fetchProvider = FetchClient, logger, tracer, ...options }: LlmClientOptions = {}) {
    const [err, config] = validateSync(options, clientConfigSchema, 'error validating LlmClient options');
    if (err) {
      throw err;
    }

    this.#config = config;
    this.#logger = logger ?? createLogger();
    this.#tracer = tracer ?? trace.getTracer('llm-sdk');
    this.#delay = exponentialBackoff(config.backoff);
    this.#fetchClient = new fetchProvider({
      headers: {
        'User-Agent': USER_AGENT,
        ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
      },
    });
  }

  /**
   * Creates a client from `LLM_API_KEY`, `LLM_BASE_URL` and `LLM_MAX_RETRIES`
   * (falling back to `OPENAI_API_KEY` and `OPENAI_BASE_URL`). `overrides` win over
   * the environment. Throws a {@link ValidationError} on invalid values.
   */
  static fromEnv(env: Record<string, string | undefined> = process.env, overrides: LlmClientOptions = {}): LlmClient {
    const [err, config] = loadEnvConfig(env);
    if (err) {
      throw err;
    }

    return new LlmClient({ ...config, ...overrides });
  }

  /** Provider root URL. */
  get baseUrl(): string {
    return this.#config.baseUrl;
  }

  /** Retries allowed after the first attempt. */
  get maxRetries(): number {
    return this.#config.maxRetries;
  }

  /** Creates a chat completion. */
  chatCompletion(request: ChatCompletionRequest): SafeWrapAsync<Error, ChatCompletionResponse> {
    return this.#send('chatCompletion', request, (response) => parseJson(response, chatCompletionResponseSchema));
  }

  /** Generates images from a prompt. */
  createImage(request: CreateImageRequest): SafeWrapAsync<Error, CreateImageResponse> {
    return this.#send('createImage', request, (response) => parseJson(response, createImageResponseSchema));
  }

  /** Synthesizes speech, resolving to the raw audio bytes. */
  speech(request: SpeechRequest): SafeWrapAsync<Error, Uint8Array> {
    return this.#send('speech', request, getResponseBytes);
  }

  /**
   * Transcribes or translates audio. With the `json` format the body is parsed;
   * any other format comes back verbatim as `text`.
   */
  whisper(request: WhisperRequest): SafeWrapAsync<Error, WhisperResponse> {
    return this.#send('whisper', request, async (response): SafeWrapAsync<Error, WhisperResponse> => {
      if (request.responseFormat === WhisperResponseFormat.Json) {
        return parseJson(response, whisperResponseSchema);
      }

      const [err, text] = await getResponseText(response);
      if (err) {
        return [err, null];
      }

      return [null, { text }];
    });
  }

  /** Creates embedding vectors for one or more inputs. */
  embedding(request: EmbeddingRequest): SafeWrapAsync<Error, EmbeddingResponse> {
    return this.#send('embedding', request, (response) => parseJson(response, embeddingResponseSchema));
  }

  /**
   * Runs one call: a call span around the retry loop. The final failure is
   * logged once, at error level.
   */
  async #send<T>(
    operation: LlmOperation,
    request: IntoRequest,
    parse: (response: Response) => SafeWrapAsync<Error, T>,
  ): SafeWrapAsync<Error, T> {
    const prepared = request.intoRequest(this.#config.baseUrl);

    return this.#tracer.startActiveSpan(
      `llm.${operation}`,
      {
        kind: SpanKind.CLIENT,
        attributes: {
          'http.method': prepared.method,
          'url.full': prepared.url,
          'llm.operation': operation,
        },
      },
      async (span): SafeWrapAsync<Error, T> => {
        let attempts = 0;

        try {
          const [err, data] = await retry({
            fn: (attempt) => {
              attempts = attempt;
              return this.#attempt(operation, prepared, attempt, parse);
            },
            attempts: this.#config.maxRetries,
            delay: this.#delay,
            errFn: (e) => !isTransientError(e),
            onRetry: (e, attempt, delay) => {
              this.#logger.warn({ operation, attempt, delay, err: e }, `retrying ${operation}`);
            },
          });
          span.setAttribute('llm.attempts', attempts);

          if (err) {
            const httpError = getHttpError(err);
            if (httpError) {
              this.#logger.error({ operation, status: httpError.status }, httpError.message);
            } else {
              this.#logger.error({ operation, err }, `error doing request in ${operation}`);
            }

            failSpan(span, err);
            return [new Error(`error doing request in ${operation}`, { cause: err }), null];
          }

          span.setStatus({ code: SpanStatusCode.OK });
          return [null, data];
        } finally {
          span.end();
        }
      },
    );
  }

  /**
   * One send over the transport plus reading the body, both bounded by the
   * attempt timeout. A timeout while reading the body is a {@link TimeoutError}.
   */
  async #attempt<T>(
    operation: LlmOperation,
    prepared: PreparedRequest,
    attempt: number,
    parse: (response: Response) => SafeWrapAsync<Error, T>,
  ): SafeWrapAsync<Error, T> {
    return this.#tracer.startActiveSpan(
      `llm.${operation}.attempt`,
      { kind: SpanKind.CLIENT, attributes: { 'llm.attempt': attempt } },
      async (span): SafeWrapAsync<Error, T> => {
        const timeout = createTimeoutSignal(DEFAULT_TIMEOUT);

        try {
          const [err, response] = await this.#fetchClient.post(prepared.url, {
            body: prepared.body,
            headers: prepared.headers,
            ...(timeout && { signal: timeout.signal }),
          });

          const status = response?.status ?? getHttpError(err)?.status ?? null;
          if (status !== null) {
            span.setAttribute('http.response.status_code', status);
          }
          this.#logger.debug({ operation, attempt, status }, `${operation} attempt ${attempt} finished`);

          if (err) {
            failSpan(span, err);
            return [err, null];
          }

          const [errParse, data] = await (timeout ? raceSignal(timeout.signal, parse(response)) : parse(response));
          if (errParse) {
            const parseError = new Error(`error parsing response in ${operation}`, { cause: errParse });
            failSpan(span, parseError);
            return [parseError, null];
          }

          span.setStatus({ code: SpanStatusCode.OK });
          return [null, data];
        } finally {
          timeout?.clear();
          span.end();
        }
      },
    );
  }
}

function failSpan(span: Span, error: Error): void {
  span.recordException(error);
  span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
}

/** Parses a JSON body and validates it against a response schema. */
async function parseJson<Output>(
  response: Response,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<Error, Output> {
  const [errJson, json] = await getResponseJson(response);
  if (errJson) {
    return [errJson, null];
  }

  return validator(json, schema);
}
