/**
 * Error Handler
 * =============
 * Centralized logging and classification of errors that reach an entry point
 * (HTTP error handler, CLI action).
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code: string;
  statusCode: number;
}

/**
 * Handle and log error appropriately
 */
export function handleError(
  error: Error | unknown,
  context?: Record<string, unknown>
): ErrorHandlerResult {
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
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }

    return {
      handled: true,
      message: err.message,
      code: err.code,
      statusCode: err.statusCode,
    };
  }

  logger.error('Unknown error occurred', err, context);

  return {
    handled: true,
    message: err.message,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
  };
}
