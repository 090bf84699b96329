import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import { DEFAULT_MAX_DELAY, DEFAULT_MIN_DELAY } from '../utils/backoff.js';
import { validateSync } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Provider root every operation path is joined onto. */
export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

/** Retries after the first attempt. */
export const DEFAULT_MAX_RETRIES = 3;

/** Per-attempt send timeout, in milliseconds. */
export const DEFAULT_TIMEOUT = 30_000;

export const USER_AGENT = 'llm-sdk/0.1.0';

const backoffSchema = z
  .object({
    minDelay: z.number().min(0).default(DEFAULT_MIN_DELAY),
    maxDelay: z.number().min(0).default(DEFAULT_MAX_DELAY),
  })
  .refine((backoff) => backoff.minDelay <= backoff.maxDelay, {
    message: 'minDelay must not exceed maxDelay',
  });

/** Plain-data client settings, defaults applied on parse. */
export const clientConfigSchema = z.object({
  baseUrl: z.url({ protocol: /^https?$/ }).default(DEFAULT_BASE_URL),
  /** Bearer token; empty sends no `Authorization` header. */
  token: z.string().default(''),
  maxRetries: z.int().min(0).default(DEFAULT_MAX_RETRIES),
  backoff: backoffSchema.default({ minDelay: DEFAULT_MIN_DELAY, maxDelay: DEFAULT_MAX_DELAY }),
});
export type LlmClientConfig = z.output<typeof clientConfigSchema>;
export type LlmClientConfigInput = z.input<typeof clientConfigSchema>;

const envSchema = z.object({
  LLM_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  LLM_MAX_RETRIES: z
    .string()
    .regex(/^\d*$/, { message: 'expected a non-negative integer' })
    .transform((value) => (value === '' ? undefined : Number(value)))
    .optional(),
});

/**
 * Reads client settings from environment variables. `LLM_*` names win over
 * their `OPENAI_*` fallbacks; empty values count as unset.
 */
export function loadEnvConfig(
  env: Record<string, string | undefined>,
): SafeWrap<ValidationError, LlmClientConfigInput> {
  const [err, vars] = validateSync(env, envSchema, 'error loading client config from environment');
  if (err) {
    return [err, null];
  }

  const config: LlmClientConfigInput = {};

  const token = vars.LLM_API_KEY || vars.OPENAI_API_KEY;
  if (token) {
    config.token = token;
  }

  const baseUrl = vars.LLM_BASE_URL || vars.OPENAI_BASE_URL;
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }

  if (vars.LLM_MAX_RETRIES !== undefined) {
    config.maxRetries = vars.LLM_MAX_RETRIES;
  }

  return [null, config];
}
