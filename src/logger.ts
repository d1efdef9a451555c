import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger };

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Create Pino logger options for a run.
 */
export function createLoggerConfig(level: LogLevel): LoggerOptions {
  return {
    name: 'literal-rewrite',
    level,
    base: undefined
  };
}

/**
 * Creates the run logger.
 *
 * Records go to stderr so that stdout carries only the run summary.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino(createLoggerConfig(level), pino.destination(2));
}

/**
 * A logger that discards everything; the default for library callers that
 * pass none.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
