/**
 * Logger Configuration
 * Structured logging with pino
 */

import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * Create a named logger. Pretty output goes through pino-pretty outside production.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const pretty =
    options.pretty !== false &&
    process.env.LOG_PRETTY !== 'false' &&
    process.env.NODE_ENV !== 'production';

  const config = {
    level: options.level || process.env.LOG_LEVEL || 'info',
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  };

  return pino({
    ...config,
    base: { name },
  });
}

/**
 * Create a child logger with additional context
 */
export function childLogger(parent: Logger, context: Record<string, unknown>): Logger {
  return parent.child(context);
}
