/**
 * Logger for the strings demo
 *
 * Uses pino for structured JSON logging. In development the output is
 * piped through pino-pretty.
 */

import { pino } from 'pino';
import { LOG_LEVELS, type LogLevel } from '../config.js';

/**
 * Level to start at before configuration is loaded
 *
 * An unknown LOG_LEVEL falls back to 'info' here; `loadConfig` reports it.
 */
export function initialLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return LOG_LEVELS.find((level) => level === env.LOG_LEVEL) ?? 'info';
}

export const logger = pino({
  name: 'uint256-strings',
  level: initialLogLevel(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}
