/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and planner defaults.
 */

import * as path from 'path';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

export interface PlannerEnvConfig {
  matrixDirectory: string;
}

export const DEFAULT_MATRIX_DIRECTORY = './matrices';

/**
 * Load logging configuration from environment variables
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } = env;

  return {
    level: LOG_LEVEL || (NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: LOG_CONSOLE !== 'false',
    enableFile: LOG_FILE !== 'false',
    logDir: LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
  };
}

/**
 * Load planner defaults from environment variables
 */
export function getPlannerEnvConfig(env: NodeJS.ProcessEnv = process.env): PlannerEnvConfig {
  return {
    matrixDirectory: env.MATRIX_DIRECTORY || DEFAULT_MATRIX_DIRECTORY,
  };
}

export * from './config-loader.js';
