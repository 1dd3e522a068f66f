/**
 * Built-in uploadlog command
 */

import path from 'node:path';
import type { Logger } from '@jobsub/logger';
import type { LogUploader } from '../services/log-upload.service.js';
import { UsageError } from './errors.js';
import { defineCommand } from './registry.js';
import type { CommandDescriptor, CommandInstance } from './types.js';

export interface UploadLogOptions {
  proxy?: string;
  logFile?: string;
  instance?: string;
}

export interface UploadLogCommandConfig {
  uploader: LogUploader;
  /** Log file uploaded when `--logfile` is not given */
  defaultLogFile: string;
  defaultInstance: string;
  cwd: string;
}

const VALUE_FLAGS: Record<string, keyof UploadLogOptions> = {
  '--proxy': 'proxy',
  '--logfile': 'logFile',
  '--instance': 'instance',
};

export function parseUploadLogArgs(argv: readonly string[]): UploadLogOptions {
  const options: UploadLogOptions = {};

  for (let index = 0; index < argv.length; index++) {
    const token = argv[index] ?? '';
    const [flag = '', inline] = token.split(/=(.*)/s, 2);
    const key = Object.hasOwn(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
    if (!key) {
      throw new UsageError(`Unknown uploadlog argument "${token}"`, { argument: token });
    }

    const value = inline ?? argv[++index];
    if (value === undefined || value.length === 0) {
      throw new UsageError(`${flag} needs a value`);
    }
    options[key] = value;
  }

  return options;
}

/**
 * Uploads an existing session log, typically one a failed run could not
 * upload itself.
 *
 * The proxy file is only recorded once the upload succeeded, so a failed
 * attempt is not retried by the dispatcher.
 */
export class UploadLogCommand implements CommandInstance {
  proxyFilePath?: string;
  readonly instance: string;

  private readonly target: string;
  private readonly proxy?: string;

  constructor(
    private readonly logger: Logger,
    argv: readonly string[],
    private readonly config: UploadLogCommandConfig
  ) {
    const options = parseUploadLogArgs(argv);
    this.proxy = options.proxy;
    this.target = path.resolve(config.cwd, options.logFile ?? config.defaultLogFile);
    this.instance = options.instance ?? config.defaultInstance;
  }

  async execute(): Promise<void> {
    if (this.proxy === undefined) {
      throw new UsageError('uploadlog needs --proxy <file>');
    }
    const proxy = path.resolve(this.config.cwd, this.proxy);

    this.logger.debug('Uploading log file', { logFile: this.target, instance: this.instance });
    const url = await this.config.uploader(this.logger, proxy, this.target, this.instance);
    this.proxyFilePath = proxy;

    this.logger.info(`Log file uploaded to ${url}`);
  }

  terminate(exitCode: number): void {
    this.logger.debug('uploadlog finished', { exitCode });
  }
}

/**
 * Descriptor of the built-in uploadlog command.
 */
export function uploadLogCommand(config: UploadLogCommandConfig): CommandDescriptor {
  return defineCommand({
    name: 'uploadlog',
    shortAliases: ['ul'],
    description: 'Upload a session log file to the server',
    factory: (logger, argv) => new UploadLogCommand(logger, argv, config),
  });
}
