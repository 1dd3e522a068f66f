/**
 * Main application entry point
 * Loads configuration and plug-ins, then hands the command line to the dispatcher
 */

// Load environment variables from .env file
import 'dotenv/config';

import { ClientError, EXIT_CODES } from './commands/errors.js';
import { loadCommandPlugins } from './commands/plugins.js';
import { discover } from './commands/registry.js';
import { uploadLogCommand } from './commands/uploadlog.command.js';
import { instanceUrls, loadConfig } from './config/index.js';
import { run } from './dispatcher.js';
import { loadParameterAliases } from './failure/parameter-aliases.js';
import { createLogUploader } from './services/log-upload.service.js';

/**
 * Main startup function
 */
export async function start(argv: readonly string[], cwd: string): Promise<number> {
  const config = loadConfig();
  const parameterAliases = loadParameterAliases(config.parameters.aliasFile);

  const uploader = createLogUploader({
    baseUrls: instanceUrls(config),
    timeoutMs: config.upload.timeoutMs,
  });

  const plugins = await loadCommandPlugins(config.plugins.modules, {
    cwd,
    timeoutMs: config.plugins.importTimeoutMs,
  });

  const commands = discover([
    uploadLogCommand({
      uploader,
      defaultLogFile: config.logging.fileName,
      defaultInstance: config.server.instance,
      cwd,
    }),
    ...plugins,
  ]);

  return run(argv, {
    commands,
    config,
    parameterAliases,
    cwd,
    uploader: config.upload.enabled ? uploader : undefined,
  });
}

start(process.argv.slice(2), process.cwd()).then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    // Failures before dispatch have no session log yet
    if (error instanceof ClientError) {
      process.stderr.write(`${error.message}\n`);
      process.exit(error.exitCode);
    }
    process.stderr.write(`jobsub failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(EXIT_CODES.FAILURE);
  }
);
