/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, log rotation,
 * and namespaced context so planner, CLI and utilities share one sink.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import { getLoggingConfig } from './config/index.js';

// Log context interface
export interface LogContext {
  matrixSetIndex?: number;
  matrixUuid?: string;
  matrixType?: string;
  command?: string;
  [key: string]: unknown;
}

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

let winstonLogger: winston.Logger | undefined;

/**
 * Shared winston instance, created on first write. Importing this module
 * opens no transports and touches no files.
 */
export function getWinstonLogger(): winston.Logger {
  winstonLogger ??= createWinstonLogger();
  return winstonLogger;
}

function createWinstonLogger(): winston.Logger {
  const loggingConfig = getLoggingConfig();
  const transports: winston.transport[] = [];

  if (loggingConfig.enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
        level: loggingConfig.level,
        // Plans go to stdout; keep log lines on stderr
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  // Skip file logging in test environment to avoid file system issues
  if (loggingConfig.enableFile && process.env.NODE_ENV !== 'test') {
    transports.push(
      new DailyRotateFile({
        filename: path.join(loggingConfig.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: structuredFormat,
        maxSize: loggingConfig.maxSize,
        maxFiles: loggingConfig.maxFiles,
        zippedArchive: true,
      })
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(loggingConfig.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        format: structuredFormat,
        maxSize: loggingConfig.maxSize,
        maxFiles: loggingConfig.maxFiles,
        zippedArchive: true,
      })
    );
  }

  // Winston warns when a logger has no transports
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: loggingConfig.level,
    format: structuredFormat,
    defaultMeta: { service: 'matrixplan' },
    transports,
    exitOnError: false,
  });
}

// Logger class with package namespacing
class Logger {
  private namespace: string = 'matrixplan';

  /**
   * Create a logger with a specific namespace (package name)
   */
  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      getWinstonLogger().error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error !== undefined) {
      getWinstonLogger().error(message, { ...logContext, error });
    } else {
      getWinstonLogger().error(message, logContext);
    }
  }

  info(message: string, context?: LogContext): void {
    getWinstonLogger().info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    getWinstonLogger().debug(message, this.mergeContext(context));
  }
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

// Default logger
export const logger = new Logger('matrixplan');

export { Logger };
