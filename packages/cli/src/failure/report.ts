/**
 * Reporting of classified outcomes: console summary, session log trace and
 * best-effort upload of the log
 */

import {
  flushMemoryLogger,
  settleLoggers,
  type FatalErrorHandler,
  type Logger,
  type LoggerSet,
} from '@jobsub/logger';
import type { CommandInstance } from '../commands/types.js';
import type { LogUploader } from '../services/log-upload.service.js';
import { sanitizeError } from '../utils/error-sanitizer.js';
import { classifyUnhandled, type ClassifyContext, type FailureClassification } from './classify.js';

type ReportLoggers = Pick<LoggerSet, 'userLogger' | 'traceLogger'>;

/**
 * Mutable state of one run, shared between the dispatcher and the
 * uncaught-failure handler.
 */
export interface RunState {
  /** Set once the command is constructed */
  instance?: CommandInstance;
  /** Log file used when the command never names one */
  defaultLogFile: string;
  /** Server instance used when the command never names one */
  defaultServerInstance: string;
  /** Set once the outcome is classified */
  exitCode?: number;
  /** Set once `terminate` was called */
  terminated?: boolean;
}

export function currentLogFile(state: RunState): string {
  return state.instance?.logFilePath ?? state.defaultLogFile;
}

/**
 * Calls the command's `terminate` once per run. A failing `terminate` is
 * logged and does not change the exit code.
 */
export async function terminateInstance(state: RunState, exitCode: number, traceLogger: Logger): Promise<void> {
  const { instance } = state;
  if (!instance || state.terminated) {
    return;
  }
  state.terminated = true;

  try {
    await instance.terminate(exitCode);
  } catch (error) {
    traceLogger.debug('terminate failed', { error: sanitizeError(error, true) });
  }
}

/**
 * Writes the summary to the user logger and the detail to the trace logger.
 */
export function reportFailure(classification: FailureClassification, loggers: ReportLoggers): void {
  for (const line of classification.summary) {
    loggers.userLogger.log(classification.level, line);
  }
  for (const line of classification.trace) {
    loggers.traceLogger.debug(line);
  }
  loggers.traceLogger.debug('Run classified', {
    category: classification.category,
    exitCode: classification.exitCode,
  });
}

export function manualUploadInstructions(logFilePath: string, proxyFilePath?: string): string {
  const proxy = proxyFilePath ?? '<proxy file>';
  return `To upload the log file manually, run: jobsub uploadlog --proxy ${proxy} --logfile ${logFilePath}`;
}

export type UploadOutcome =
  | { status: 'uploaded'; url: string }
  | { status: 'skipped'; reason: 'not-requested' | 'no-proxy' | 'disabled' }
  | { status: 'failed' };

export interface UploadSessionLogParams {
  classification: Pick<FailureClassification, 'uploadLog'>;
  loggers: ReportLoggers;
  instance?: CommandInstance;
  logFilePath: string;
  serverInstance: string;
  /** Absent when uploads are disabled */
  uploader?: LogUploader;
}

/**
 * Uploads the session log when the classification asks for it and the
 * command knows its proxy file. Failures are reported with manual
 * instructions and never rethrown.
 */
export async function uploadSessionLog(params: UploadSessionLogParams): Promise<UploadOutcome> {
  const { classification, loggers, instance, logFilePath, uploader } = params;

  if (!classification.uploadLog) {
    return { status: 'skipped', reason: 'not-requested' };
  }

  const proxyFilePath = instance?.proxyFilePath;
  if (proxyFilePath === undefined) {
    loggers.traceLogger.debug('No proxy file known, log file not uploaded');
    return { status: 'skipped', reason: 'no-proxy' };
  }

  if (!uploader) {
    loggers.userLogger.info(manualUploadInstructions(logFilePath, proxyFilePath));
    return { status: 'skipped', reason: 'disabled' };
  }

  // Everything logged so far must be in the file before it is read
  await settleLoggers();

  try {
    const url = await uploader(
      loggers.traceLogger,
      proxyFilePath,
      logFilePath,
      instance?.instance ?? params.serverInstance
    );
    loggers.userLogger.info(`Log file uploaded to ${url}`);
    return { status: 'uploaded', url };
  } catch (error) {
    loggers.traceLogger.debug('Log upload failed', { error: sanitizeError(error, true) });
    loggers.userLogger.warn('Unable to upload the log file.');
    loggers.userLogger.info(manualUploadInstructions(logFilePath, proxyFilePath));
    return { status: 'failed' };
  }
}

export interface UncaughtFailureHandlerDeps {
  loggers: LoggerSet;
  state: RunState;
  context: ClassifyContext;
  uploader?: LogUploader;
  exit: (code: number) => void;
}

/**
 * Last-resort handler for failures that escape the dispatcher. It writes
 * what it can to the session log, tries the upload, terminates the command
 * and exits with the code already computed for the run, or 1.
 */
export function createUncaughtFailureHandler(deps: UncaughtFailureHandlerDeps): FatalErrorHandler {
  const { loggers, state } = deps;

  async function terminateAndExit(exitCode: number): Promise<void> {
    await terminateInstance(state, exitCode, loggers.traceLogger);
    deps.exit(exitCode);
  }

  return (error, origin) => {
    const exitCode = state.exitCode ?? 1;
    let logFilePath = state.defaultLogFile;

    try {
      logFilePath = flushMemoryLogger(loggers, currentLogFile(state)).logFilePath;
      const classification = classifyUnhandled(error, deps.context);

      loggers.traceLogger.error('Unhandled exception', { origin });
      for (const line of classification.trace) {
        loggers.traceLogger.error(line);
      }
      loggers.userLogger.error(classification.summary.join('\n'));

      void uploadSessionLog({
        classification,
        loggers,
        instance: state.instance,
        logFilePath,
        serverInstance: state.instance?.instance ?? state.defaultServerInstance,
        uploader: deps.uploader,
      })
        .catch((uploadError: unknown) => {
          loggers.traceLogger.debug('Log upload failed', { error: sanitizeError(uploadError) });
        })
        .then(() => terminateAndExit(exitCode));
    } catch (secondary) {
      loggers.traceLogger.debug('Failure while handling an uncaught error', {
        error: sanitizeError(secondary),
      });
      loggers.userLogger.info(manualUploadInstructions(logFilePath, state.instance?.proxyFilePath));
      void terminateAndExit(exitCode);
    }
  };
}
