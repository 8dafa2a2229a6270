/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Structured JSON logs with stable metadata (service, env) for querying.
 * - Built ONCE by the composition root and passed down explicitly.
 *   Request code never reaches for a module-level logger.
 *
 * HOW TO USE:
 * - const logger = createLogger({ level, serviceName, nodeEnv })
 * - Inside request handlers prefer `withRequestContext(req)`.
 * - Do not log raw Error objects only; pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

export type LogMeta = Record<string, unknown>;

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

/**
 * The logging capability every layer depends on.
 * winston.Logger satisfies it; tests use an in-memory implementation.
 */
export interface Logger {
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  isDebugEnabled(): boolean;
  child(meta: LogMeta): Logger;
}

export function createLogger(opts: {
  level: LogLevel;
  serviceName: string;
  nodeEnv: string;
}): Logger {
  return winston.createLogger({
    level: opts.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      winston.format.json(),
    ),
    defaultMeta: {
      service: opts.serviceName,
      env: opts.nodeEnv,
    },
    transports: [new winston.transports.Console()],
  });
}
