/**
 * Root entrypoint: the client, request models, schema export and error utilities.
 * @module
 */

export * from './api/index.js';
export * from './core/index.js';
export * from './error/index.js';
export { FetchClient, mergeHeaderOptions } from './fetch/index.js';
export { type CreateLoggerOptions, createLogger } from './logger.js';
export * from './schema/index.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  IntoRequest,
  PreparedRequest,
} from './types/request.js';
export { exponentialBackoff, type BackoffOptions } from './utils/backoff.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
