/**
 * Error Handler - User-facing error messages
 */

import { AppError, handleError } from '@modelvault/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.message} (${error.code})`;
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
 * Log the error and return the message to print
 */
export function reportError(error: unknown, context?: Record<string, unknown>): string {
  handleError(error, context);
  return formatError(error);
}
