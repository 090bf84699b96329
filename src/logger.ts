import pino, { type DestinationStream, type Logger } from 'pino';

/** Credential fields never written to logs. */
const LOG_REDACTIONS = ['token', 'authorization', 'headers.authorization', 'headers.Authorization'];

export interface CreateLoggerOptions {
  /** Minimum level; falls back to `LOG_LEVEL`, then `info`. */
  level?: string;
  /** Where lines are written; stdout when omitted. */
  destination?: DestinationStream;
}

/**
 * Creates the client's default pino logger, tagged with `service: 'llm-sdk'`.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      base: {
        service: 'llm-sdk',
      },
      redact: {
        paths: LOG_REDACTIONS,
        remove: true,
      },
    },
    options.destination,
  );
}
