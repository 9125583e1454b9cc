/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, log rotation,
 * and namespaced context.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import { getLoggingConfig } from './config/index.js';

export type LogContext = Record<string, unknown>;

const config = getLoggingConfig();

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.production ? structuredFormat : consoleFormat,
    level: config.level,
    silent: !config.enableConsole,
    // stdout is reserved for command output
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  }),
];

// File transports with rotation, never under test
if (config.enableFile && process.env.NODE_ENV !== 'test') {
  fs.mkdirSync(config.logDir, { recursive: true });

  transports.push(
    new DailyRotateFile({
      filename: path.join(config.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    }),
    new DailyRotateFile({
      filename: path.join(config.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: config.maxSize,
      maxFiles: config.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: config.level,
  format: structuredFormat,
  defaultMeta: { service: 'fractime' },
  transports,
  exitOnError: false,
});

/**
 * Namespaced logger. Every record carries the namespace and the context the
 * logger was created with; per-call context is merged over it.
 */
class Logger {
  constructor(
    readonly namespace: string,
    private readonly bound: LogContext = {}
  ) {}

  private meta(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...this.bound, ...context };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...this.meta(context),
        error: { message: error.message, stack: error.stack, name: error.name },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...this.meta(context), error });
    } else {
      winstonLogger.error(message, this.meta(context));
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.meta(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.meta(context));
  }

  /**
   * Logger in the same namespace with `context` added to every record
   */
  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.bound, ...context });
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

export const logger = createLogger('fractime');

export { Logger, winstonLogger };
