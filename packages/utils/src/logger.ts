/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import {
  destination,
  multistream,
  pino,
  stdTimeFunctions,
  type Level,
  type Logger as PinoLogger,
  type LoggerOptions,
} from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export type Logger = PinoLogger;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env['LOG_LEVEL'];
const LOG_LEVEL: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export interface RootLoggerOptions {
  level: LogLevel;
  service: string;
  env?: string;
  /** Also append JSON lines to this file */
  file?: string | null;
}

/**
 * Build a root logger. With a log file the output is duplicated to stdout
 * and the file; otherwise development runs get pino-pretty.
 */
export function createRootLogger(options: RootLoggerOptions): Logger {
  const env = options.env ?? NODE_ENV;
  const base: LoggerOptions = {
    level: options.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: stdTimeFunctions.isoTime,
    base: {
      service: options.service,
      env,
    },
  };

  if (options.file) {
    const streamLevel: Level = options.level === 'silent' ? 'fatal' : options.level;
    return pino(
      base,
      multistream([
        { level: streamLevel, stream: process.stdout },
        {
          level: streamLevel,
          stream: destination({ dest: options.file, mkdir: true, sync: false }),
        },
      ])
    );
  }

  return pino({
    ...base,
    transport: env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}

export const logger = createRootLogger({ level: LOG_LEVEL, service: 'brandcast' });

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}
