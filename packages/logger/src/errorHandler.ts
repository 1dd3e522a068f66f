/**
 * @fileoverview Process-wide handlers for uncaught exceptions and unhandled rejections
 * The last-resort safety net of a CLI run: failures that escape the
 * dispatcher's own error handling are handed to a single reporting function.
 */

import type { Logger } from './types.js';

/**
 * Where an escaped failure came from.
 */
export type FatalErrorOrigin = 'uncaughtException' | 'unhandledRejection';

/**
 * Receives every escaped failure. Must not throw; if it does anyway, the
 * secondary failure is logged at debug level and dropped.
 */
export type FatalErrorHandler = (error: unknown, origin: FatalErrorOrigin) => void;

interface AttachedHandlers {
  uncaughtException: (error: Error) => void;
  unhandledRejection: (reason: unknown) => void;
}

/**
 * Tracks the listeners currently registered to prevent duplicate registration.
 */
let attached: AttachedHandlers | undefined;

/**
 * Registers `handler` for `uncaughtException` and `unhandledRejection`.
 *
 * Only one pair of listeners exists per process; a second attachment is
 * skipped with a warning.
 *
 * @param handler - Reporting function for escaped failures
 * @param logger - Logger used for bookkeeping messages
 * @returns `true` when the listeners were registered by this call
 *
 * @example
 * ```typescript
 * attachGlobalHandlers((error) => translator.reportUncaught(error), loggers.traceLogger);
 * try {
 *   await dispatch();
 * } finally {
 *   detachGlobalHandlers();
 * }
 * ```
 */
export function attachGlobalHandlers(handler: FatalErrorHandler, logger: Logger): boolean {
  if (attached) {
    logger.warn('Global error handlers already attached, skipping');
    return false;
  }

  const invoke = (error: unknown, origin: FatalErrorOrigin): void => {
    try {
      handler(error, origin);
    } catch (secondary) {
      logger.debug('Failure while reporting an uncaught error', {
        event: origin,
        error: secondary instanceof Error ? secondary.message : String(secondary),
      });
    }
  };

  attached = {
    uncaughtException: (error: Error) => invoke(error, 'uncaughtException'),
    unhandledRejection: (reason: unknown) => invoke(reason, 'unhandledRejection'),
  };

  process.on('uncaughtException', attached.uncaughtException);
  process.on('unhandledRejection', attached.unhandledRejection);

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
  return true;
}

/**
 * Removes the listeners registered by {@link attachGlobalHandlers}, if any.
 */
export function detachGlobalHandlers(): void {
  if (!attached) {
    return;
  }
  process.off('uncaughtException', attached.uncaughtException);
  process.off('unhandledRejection', attached.unhandledRejection);
  attached = undefined;
}

export function globalHandlersAttached(): boolean {
  return attached !== undefined;
}
