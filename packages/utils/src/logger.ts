/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino, type Logger as PinoLogger } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export type Logger = PinoLogger;

export interface LoggerOptions {
  service: string;
  level?: string;
  env?: string;
  /** Pretty-print to stdout. Defaults to true in development. */
  pretty?: boolean;
}

/**
 * Build a service logger. Every app in the monorepo goes through here so
 * log lines share the same shape.
 */
export function createServiceLogger(options: LoggerOptions): Logger {
  const env = options.env ?? NODE_ENV;
  const pretty = options.pretty ?? env === 'development';

  return pino({
    level: options.level ?? LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: options.service,
      env,
    },
    transport: pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}

export const logger = createServiceLogger({ service: 'adsync' });

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
