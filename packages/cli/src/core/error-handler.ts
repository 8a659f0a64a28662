/**
 * Error Handler - one-line messages for the terminal, full context for the log
 */

import { handleError as logAndClassify } from '@gridtrend/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.split('\n').join('; ');
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unexpected error occurred';
}

/**
 * Log error with full context and return the message to print
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logAndClassify(error, context);
  return formatError(error);
}
