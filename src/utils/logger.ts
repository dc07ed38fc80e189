import { pino } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/** Unknown levels fall back to info; the config loader rejects them. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return value && isLogLevel(value) ? value : 'info';
}

export const logger = pino({
  name: 'docshift',
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function setLogLevel(level: LogLevel) {
  logger.level = level;
}
