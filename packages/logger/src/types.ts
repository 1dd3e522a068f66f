/**
 * @fileoverview Type definitions for the jobsub session logger
 * Describes logger configuration, console verbosity and buffered log records.
 */

import type { Logger as WinstonLogger } from 'winston';
import type TransportStream from 'winston-transport';
import type { MemoryTransport, SessionFileTransport } from './transports.js';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that end the command
 * - 'warn': Conditions the user should look at
 * - 'info': Normal progress messages
 * - 'debug': Detailed information that normally only reaches the log file
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Console verbosity selected by the global `--quiet` / `--debug` flags.
 * Only the terminal is affected; the session log always gets full detail.
 */
export type Verbosity = 'quiet' | 'default' | 'debug';

/**
 * Configuration options for {@link initLoggers}.
 *
 * @example
 * ```typescript
 * const loggers = initLoggers({ console: true, verbosity: 'quiet' });
 * ```
 */
export interface LoggerConfig {
  /**
   * Whether to enable console output.
   * Tests turn this off to keep the runner output clean.
   * @default true
   */
  console?: boolean;

  /**
   * Initial console verbosity.
   * @default 'default'
   */
  verbosity?: Verbosity;

  /**
   * Minimum severity kept by the memory buffer and later written to the log file.
   * @default 'debug'
   */
  memoryLevel?: LogLevel;

  /**
   * Value of the `component` field on user-facing records.
   * @default 'jobsub'
   */
  component?: string;
}

/**
 * A log record as it leaves winston's format pipeline.
 * Symbol-keyed winston internals are carried along untouched.
 */
export interface LogRecord {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

/**
 * The loggers and handlers owned by one CLI run.
 *
 * `userLogger` reaches the console and the session log; `traceLogger` only
 * reaches the session log and is where stack traces go.
 */
export interface LoggerSet {
  readonly userLogger: Logger;
  readonly traceLogger: Logger;
  readonly memoryHandler: MemoryTransport;
  readonly consoleHandler?: TransportStream;
  /** Set once the session log file is known and attached. */
  fileHandler?: SessionFileTransport;
}

/**
 * Outcome of {@link flushMemoryLogger}.
 */
export interface FlushResult {
  status: 'attached' | 'already-attached';
  /** The file every record now goes to. */
  logFilePath: string;
  /** Number of buffered records written by this call. */
  replayed: number;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
