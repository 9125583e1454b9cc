/**
 * Error Handler - user-facing messages for CLI failures
 */

import { AppError, handleError as logHandledError } from '@fractime/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    return error.isOperational ? error.message : `${error.message} (${error.code})`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unexpected error occurred';
}

/**
 * Log the error with full context and return the message to show the user
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logHandledError(error, context);
  return formatError(error);
}
