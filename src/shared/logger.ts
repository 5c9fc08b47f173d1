// Diagnostic logger. Writes to stderr so stdout carries only trace lines.
import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Unknown or empty values fall back to `info` instead of making pino throw. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export const logger = pino(
  {
    name: 'directive-runner',
    level: resolveLogLevel(process.env['LOG_LEVEL']),
  },
  pino.destination(2),
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
