/**
 * Main exports for @jobsub/cli package
 */

// Command plug-in contract
export { defineCommand, discover, resolve, listCommands } from './commands/registry.js';
export { loadCommandPlugins, toImportSpecifier } from './commands/plugins.js';
export type { LoadPluginsOptions } from './commands/plugins.js';
export type {
  CommandDefinition,
  CommandDescriptor,
  CommandFactory,
  CommandInstance,
  CommandRegistry,
} from './commands/types.js';
export { UploadLogCommand, uploadLogCommand, parseUploadLogArgs } from './commands/uploadlog.command.js';

// Errors
export {
  EXIT_CODES,
  ClientError,
  UsageError,
  UnknownCommandError,
  RegistryConfigError,
  PluginLoadError,
  ControlledStop,
  UserCancelledError,
  RemoteServiceError,
  TransportError,
  fromAxiosError,
  normalizeRemoteFailure,
  transportExitCode,
} from './commands/errors.js';
export type { ClientErrorOptions, RemoteHeaders, RemoteServiceErrorDetails } from './commands/errors.js';

// Configuration exports
export { loadConfig, getConfigSummary, instanceUrls } from './config/index.js';
export type { Config } from './config/schema.js';

// Dispatcher
export { run, processInterrupts } from './dispatcher.js';
export type { DispatcherDeps, InterruptSource } from './dispatcher.js';
export { parseGlobalOptions } from './options.js';
export type { GlobalOptions, ParsedCommandLine } from './options.js';
export { formatHelp, formatUsage, formatCommandList } from './help.js';

// Failure translation
export { classify, classifyUnhandled, describeRemoteError } from './failure/classify.js';
export type { FailureCategory, FailureClassification, ClassifyContext, RunOutcome } from './failure/classify.js';
export { loadParameterAliases, expandParameterAliases } from './failure/parameter-aliases.js';
export type { ParameterAliases } from './failure/parameter-aliases.js';
export {
  reportFailure,
  uploadSessionLog,
  createUncaughtFailureHandler,
  manualUploadInstructions,
} from './failure/report.js';
export type { RunState, UploadOutcome } from './failure/report.js';

// Log upload
export { createLogUploader, logCacheUrl } from './services/log-upload.service.js';
export type { LogUploader, LogUploaderOptions } from './services/log-upload.service.js';
