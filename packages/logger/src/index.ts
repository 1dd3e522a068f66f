/**
 * @fileoverview Public API exports for @jobsub/logger
 * Buffered session logging and process-wide failure hooks for the jobsub CLI
 */

// Session loggers
export {
  initLoggers,
  setConsoleLevel,
  consoleLevelFor,
  flushMemoryLogger,
  attachedLogFiles,
  settleLoggers,
} from './session.js';

// Transports
export { MemoryTransport, SessionFileTransport } from './transports.js';
export type { SessionFileTransportOptions } from './transports.js';

// Formats
export {
  REDACTED,
  redactSecrets,
  redactSensitiveFields,
  isSensitiveFieldName,
  standardFields,
  consoleLine,
  renderConsoleLine,
  renderFileLine,
  messageText,
} from './formats.js';

// Global error handlers
export { attachGlobalHandlers, detachGlobalHandlers, globalHandlersAttached } from './errorHandler.js';
export type { FatalErrorHandler, FatalErrorOrigin } from './errorHandler.js';

// Type exports
export type {
  Logger,
  LoggerConfig,
  LoggerSet,
  LogLevel,
  LogRecord,
  FlushResult,
  Verbosity,
} from './types.js';
