/**
 * Error sanitization utilities for safe logging
 */

/**
 * Reduces an error to plain metadata before it is logged. Stack traces are
 * only included on request, since the session log may be uploaded.
 */
export function sanitizeError(error: unknown, includeStack = false): Record<string, unknown> {
  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
    };

    if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
      sanitized['code'] = error.code;
    }

    if (includeStack && error.stack) {
      sanitized['stack'] = error.stack;
    }

    return sanitized;
  }

  // For non-Error values, convert to string safely
  return {
    message: String(error),
    name: 'Unknown',
  };
}
