/**
 * Front controller: runs one command and turns its outcome into an exit code
 */

import path from 'node:path';
import {
  attachGlobalHandlers,
  detachGlobalHandlers,
  flushMemoryLogger,
  initLoggers,
  setConsoleLevel,
  settleLoggers,
  type LoggerConfig,
  type LoggerSet,
} from '@jobsub/logger';
import { UnknownCommandError, UsageError, UserCancelledError } from './commands/errors.js';
import { resolve } from './commands/registry.js';
import type { CommandRegistry } from './commands/types.js';
import { formatHelp, formatUsage } from './help.js';
import { parseGlobalOptions } from './options.js';
import { getConfigSummary, type Config } from './config/index.js';
import { classify, type ClassifyContext, type RunOutcome } from './failure/classify.js';
import type { ParameterAliases } from './failure/parameter-aliases.js';
import {
  createUncaughtFailureHandler,
  currentLogFile,
  reportFailure,
  terminateInstance,
  uploadSessionLog,
  type RunState,
} from './failure/report.js';
import type { LogUploader } from './services/log-upload.service.js';

/**
 * Subscribes to interrupts and returns the unsubscribe function.
 */
export type InterruptSource = (onInterrupt: (signal: NodeJS.Signals) => void) => () => void;

/**
 * SIGINT and SIGTERM of the current process.
 */
export const processInterrupts: InterruptSource = (onInterrupt) => {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  const listeners = signals.map((signal) => {
    const listener = (): void => onInterrupt(signal);
    process.once(signal, listener);
    return { signal, listener };
  });
  return () => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
  };
};

export interface DispatcherDeps {
  commands: CommandRegistry;
  config: Config;
  parameterAliases: ParameterAliases;
  /** Base directory of the default log file */
  cwd: string;
  /** Absent when automatic uploads are disabled */
  uploader?: LogUploader;
  loggerConfig?: LoggerConfig;
  interrupts?: InterruptSource;
  /** Writes help and version text */
  print?: (text: string) => void;
  /** Used by the uncaught-failure handler only */
  exit?: (code: number) => void;
}

function defaultPrint(text: string): void {
  process.stdout.write(`${text}\n`);
}

interface InterruptWatch {
  /** Resolves with the first interrupt received */
  readonly interrupted: Promise<NodeJS.Signals>;
  received(): NodeJS.Signals | undefined;
  stop(): void;
}

function watchInterrupts(source: InterruptSource): InterruptWatch {
  let signal: NodeJS.Signals | undefined;
  let unsubscribe: () => void = () => undefined;
  const interrupted = new Promise<NodeJS.Signals>((resolve) => {
    unsubscribe = source((received) => {
      signal ??= received;
      resolve(received);
    });
  });
  return { interrupted, received: () => signal, stop: () => unsubscribe() };
}

/**
 * Waits for `work` unless the first interrupt of the run arrives before it
 * settles. Returns that interrupt, or undefined once `work` is done. After
 * an interrupt, `work` is awaited in full.
 */
async function unlessInterrupted(work: Promise<unknown>, watch: InterruptWatch): Promise<NodeJS.Signals | undefined> {
  if (watch.received() !== undefined) {
    await work;
    return undefined;
  }
  return Promise.race([work.then(() => undefined), watch.interrupted]);
}

/**
 * Runs the command named on the command line and returns the exit code.
 *
 * Every path, including usage errors, ends with the buffered records in the
 * session log.
 *
 * @example
 * ```typescript
 * const exitCode = await run(process.argv.slice(2), { commands, config, parameterAliases, cwd: process.cwd() });
 * process.exit(exitCode);
 * ```
 */
export async function run(argv: readonly string[], deps: DispatcherDeps): Promise<number> {
  const loggers = initLoggers(deps.loggerConfig);
  const state: RunState = {
    defaultLogFile: path.resolve(deps.cwd, deps.config.logging.fileName),
    defaultServerInstance: deps.config.server.instance,
  };
  const context: ClassifyContext = {
    parameterAliases: deps.parameterAliases,
    version: deps.config.app.version,
    supportContact: deps.config.support.contact,
  };

  const attachedHere = attachGlobalHandlers(
    createUncaughtFailureHandler({
      loggers,
      state,
      context,
      uploader: deps.uploader,
      exit: deps.exit ?? ((code) => process.exit(code)),
    }),
    loggers.traceLogger
  );

  // Interrupts count until the run returns, not only while the command executes
  const watch = watchInterrupts(deps.interrupts ?? processInterrupts);

  try {
    return await dispatch(argv, deps, loggers, state, context, watch);
  } finally {
    watch.stop();
    if (attachedHere) {
      detachGlobalHandlers();
    }
  }
}

async function dispatch(
  argv: readonly string[],
  deps: DispatcherDeps,
  loggers: LoggerSet,
  state: RunState,
  context: ClassifyContext,
  watch: InterruptWatch
): Promise<number> {
  const print = deps.print ?? defaultPrint;
  const { userLogger, traceLogger } = loggers;
  let outcome: RunOutcome = { kind: 'returned' };
  let helpText: string | undefined;

  traceLogger.debug('Command line', { argv, version: context.version });
  traceLogger.debug('Configuration', getConfigSummary(deps.config));

  try {
    const parsed = parseGlobalOptions(argv);
    setConsoleLevel(loggers, parsed.options.verbosity);

    if (parsed.options.version) {
      print(`jobsub ${context.version}`);
    } else if (parsed.options.help) {
      print(formatHelp(deps.commands, context.version));
    } else if (parsed.command === undefined) {
      throw new UsageError('No command given');
    } else {
      const descriptor = resolve(parsed.command, deps.commands);
      traceLogger.debug('Resolved command', { input: parsed.command, command: descriptor.name });

      state.instance = descriptor.factory(userLogger.child({ command: descriptor.name }), parsed.args);
      const signal = await unlessInterrupted(state.instance.execute(), watch);
      if (signal !== undefined) {
        throw new UserCancelledError(signal);
      }
    }
  } catch (error) {
    outcome = { kind: 'threw', error };
    if (error instanceof UnknownCommandError) {
      helpText = formatHelp(deps.commands, context.version);
    } else if (error instanceof UsageError) {
      helpText = formatUsage(deps.commands);
    }
  }

  let classification = classify(outcome, context);
  state.exitCode = classification.exitCode;
  reportFailure(classification, loggers);

  const cancelIfInterrupted = (): void => {
    const signal = watch.received();
    if (signal === undefined || classification.category === 'user-cancelled') {
      return;
    }
    classification = classify({ kind: 'threw', error: new UserCancelledError(signal) }, context);
    state.exitCode = classification.exitCode;
    reportFailure(classification, loggers);
  };

  if (helpText !== undefined) {
    await settleLoggers();
    print(helpText);
  }

  await settleLoggers();
  const { logFilePath } = flushMemoryLogger(loggers, path.resolve(deps.cwd, currentLogFile(state)));

  cancelIfInterrupted();
  const uploadSignal = await unlessInterrupted(
    uploadSessionLog({
      classification,
      loggers,
      instance: state.instance,
      logFilePath,
      serverInstance: state.defaultServerInstance,
      uploader: deps.uploader,
    }),
    watch
  );
  if (uploadSignal !== undefined) {
    traceLogger.debug('Log upload abandoned', { signal: uploadSignal });
  }

  cancelIfInterrupted();
  await unlessInterrupted(terminateInstance(state, classification.exitCode, traceLogger), watch);
  cancelIfInterrupted();

  traceLogger.debug('Exiting', { exitCode: classification.exitCode });
  await settleLoggers();
  return classification.exitCode;
}
