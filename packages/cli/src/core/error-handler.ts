/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, logger } from '@matrixplan/utils';

/**
 * Credentials that may sit in planner configs (user metadata, matrix
 * storage settings) and must never reach the terminal
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /private[_-]?key/i,
  /credential/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }

  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

function redact(values?: Record<string, unknown>): Record<string, unknown> | undefined {
  return values
    ? Object.fromEntries(
        Object.entries(values).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;
}

/**
 * Log error with full context (for debugging), redacting sensitive values
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof AppError) {
    logger.error('CLI error', error, {
      code: error.code,
      details: redact(error.context),
      context: redact(context),
    });
  } else {
    logger.error('CLI error', error, { context: redact(context) });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
