/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code?: string;
}

/**
 * Handle and log error appropriately
 */
export function handleError(
  error: Error | unknown,
  context?: Record<string, unknown>
): ErrorHandlerResult {
  // Convert unknown errors to Error instances
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      // Programming or contract errors
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }

    return { handled: true, message: err.message, code: err.code };
  }

  logger.error('Unknown error occurred', err, context);
  return { handled: true, message: err.message };
}
