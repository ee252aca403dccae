/**
 * Shared Error Handling Utilities
 *
 * Normalises thrown values for logs and alert payloads.
 */

import { SwarmWatchError } from '@swarmwatch/types';

/**
 * Safe message extraction from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Check if an error is worth retrying.
 * Coded errors carry the flag; anything else is judged by its message.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SwarmWatchError) {
    return error.retryable;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }

  const message = getErrorMessage(error).toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('econnrefused')
  );
}

/**
 * Format error for logging.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof SwarmWatchError) {
    return {
      name: error.name,
      code: error.code,
      component: error.component,
      retryable: error.retryable,
      message: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: getErrorMessage(error) };
}
