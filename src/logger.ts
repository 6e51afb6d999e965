import pino from 'pino';
import type { BaseLogger, Bindings, LoggerOptions } from 'pino';

// Satisfied by Fastify's `app.log` and by a plain pino instance.
export interface Logger extends BaseLogger {
  child(bindings: Bindings): Logger;
}

export const REDACT_PATHS = ['req.body', 'reply.body', 'req.headers["x-api-key"]'];

export function loggerOptions(level: string): LoggerOptions {
  return {
    level,
    redact: REDACT_PATHS,
  };
}

// Logger for code running outside a Fastify instance (CLI, tests).
export function createLogger(level = process.env.LOG_LEVEL || 'info'): pino.Logger {
  return pino(loggerOptions(level));
}
