/**
 * @fileoverview Session logger factory for jobsub
 * Creates the user and trace loggers of one CLI run. Records are buffered in
 * memory until the executed command tells us where its log file lives, then
 * replayed into that file.
 */

import path from 'node:path';
import winston, { format } from 'winston';
import { consoleLine, redactSecrets, standardFields } from './formats.js';
import { MemoryTransport, SessionFileTransport } from './transports.js';
import type { FlushResult, LogLevel, Logger, LoggerConfig, LoggerSet, Verbosity } from './types.js';

const CONSOLE_LEVELS: Record<Verbosity, LogLevel> = {
  quiet: 'warn',
  default: 'info',
  debug: 'debug',
};

/**
 * Maps the global verbosity flag to the console transport level.
 */
export function consoleLevelFor(verbosity: Verbosity): LogLevel {
  return CONSOLE_LEVELS[verbosity];
}

/**
 * Creates the loggers of one CLI run.
 *
 * - `userLogger`: console (at the verbosity level) and the memory buffer
 * - `traceLogger`: the memory buffer only; nothing it logs reaches the terminal
 *
 * Both loggers accept every level. Console filtering happens on the console
 * transport alone, so the buffer keeps full detail even under `--quiet`.
 *
 * @example
 * ```typescript
 * const loggers = initLoggers({ verbosity: 'quiet' });
 * loggers.userLogger.debug('Resolved command', { command: 'submit' }); // buffered, not printed
 * // ... later, once the project directory is known
 * flushMemoryLogger(loggers, '/work/project/jobsub.log');
 * ```
 */
export function initLoggers(config: LoggerConfig = {}): LoggerSet {
  const {
    console: enableConsole = true,
    verbosity = 'default',
    memoryLevel = 'debug',
    component = 'jobsub',
  } = config;

  // Redaction first: nothing unredacted may reach the buffer
  const logFormat = format.combine(redactSecrets(), standardFields);

  const memoryHandler = new MemoryTransport({ level: memoryLevel });

  const consoleHandler = enableConsole
    ? new winston.transports.Console({
        level: consoleLevelFor(verbosity),
        format: consoleLine,
        stderrLevels: ['error', 'warn'],
      })
    : undefined;

  const userLogger = winston.createLogger({
    level: 'debug',
    format: logFormat,
    defaultMeta: { component },
    transports: consoleHandler ? [consoleHandler, memoryHandler] : [memoryHandler],
    exitOnError: false,
  });

  const traceLogger = winston.createLogger({
    level: 'debug',
    format: logFormat,
    defaultMeta: { component: `${component}:trace` },
    transports: [memoryHandler],
    exitOnError: false,
  });

  return { userLogger, traceLogger, memoryHandler, consoleHandler };
}

/**
 * Changes what reaches the terminal. The buffer and the log file are unaffected.
 */
export function setConsoleLevel(loggers: LoggerSet, verbosity: Verbosity): void {
  if (loggers.consoleHandler) {
    loggers.consoleHandler.level = consoleLevelFor(verbosity);
  }
}

/**
 * Filenames of the session file transports attached to `logger`.
 */
export function attachedLogFiles(logger: Logger): string[] {
  return logger.transports
    .filter((transport): transport is SessionFileTransport => transport instanceof SessionFileTransport)
    .map((transport) => transport.filename);
}

/**
 * Attaches the session log file and replays the memory buffer into it.
 *
 * Idempotent: once a file is attached, later calls write nothing. The log
 * file path is set once per run, so a call naming a different file keeps the
 * first one.
 *
 * @param loggers - Loggers returned by {@link initLoggers}
 * @param targetFilePath - Log file chosen by the executed command
 */
export function flushMemoryLogger(loggers: LoggerSet, targetFilePath: string): FlushResult {
  const target = path.resolve(targetFilePath);
  const attached = attachedLogFiles(loggers.traceLogger);

  if (attached.includes(target)) {
    return { status: 'already-attached', logFilePath: target, replayed: 0 };
  }

  const [current] = attached;
  if (current !== undefined) {
    loggers.traceLogger.debug('Log file already attached, keeping it', {
      attached: current,
      requested: target,
    });
    return { status: 'already-attached', logFilePath: current, replayed: 0 };
  }

  const fileHandler = new SessionFileTransport({
    filename: target,
    level: loggers.memoryHandler.level ?? 'debug',
  });
  const buffered = loggers.memoryHandler.drain();
  for (const record of buffered) {
    fileHandler.append(record);
  }

  for (const logger of [loggers.userLogger, loggers.traceLogger]) {
    logger.remove(loggers.memoryHandler);
    logger.add(fileHandler);
  }
  loggers.fileHandler = fileHandler;

  return { status: 'attached', logFilePath: target, replayed: buffered.length };
}

/**
 * Waits until records already handed to winston have reached the transports.
 * Winston pipes records through streams, so delivery can lag by a tick.
 */
export function settleLoggers(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
