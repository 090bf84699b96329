/**
 * Core entrypoint: the provider client and its configuration.
 * @module
 */

export { isTransientError, LlmClient, type LlmClientOptions, type LlmOperation } from './client.js';
export {
  clientConfigSchema,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT,
  type LlmClientConfig,
  type LlmClientConfigInput,
  loadEnvConfig,
  USER_AGENT,
} from './config.js';
