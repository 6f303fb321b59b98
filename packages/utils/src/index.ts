/**
 * @matrixplan/utils - Shared utilities package
 *
 * Logging, configuration loading and the error classes the planner and CLI
 * throw. Loading this package opens no log files; the first log write does.
 */

export { logger, Logger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
