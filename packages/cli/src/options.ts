/**
 * Global options: the flags between `jobsub` and the command token
 */

import type { Verbosity } from '@jobsub/logger';
import { UsageError } from './commands/errors.js';

export interface GlobalOptions {
  verbosity: Verbosity;
  help: boolean;
  version: boolean;
}

export interface ParsedCommandLine {
  options: GlobalOptions;
  /** First token after the global options */
  command?: string;
  /** Everything after the command token, untouched */
  args: string[];
}

/**
 * Splits the command line into global options, command token and command
 * arguments. Parsing stops at the first token that is not an option, or
 * after `--`.
 *
 * @throws UsageError on an unknown option, or `--quiet` with `--debug`
 */
export function parseGlobalOptions(argv: readonly string[]): ParsedCommandLine {
  let quiet = false;
  let debug = false;
  let help = false;
  let version = false;

  let index = 0;
  for (; index < argv.length; index++) {
    const token = argv[index];
    if (token === undefined || !token.startsWith('-')) {
      break;
    }
    if (token === '--') {
      index++;
      break;
    }

    switch (token) {
      case '--quiet':
        quiet = true;
        break;
      case '--debug':
        debug = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
        version = true;
        break;
      default:
        throw new UsageError(`Unknown option "${token}"`, { option: token });
    }
  }

  if (quiet && debug) {
    throw new UsageError('--quiet and --debug cannot be used together');
  }

  const [command, ...args] = argv.slice(index);
  return {
    options: { verbosity: quiet ? 'quiet' : debug ? 'debug' : 'default', help, version },
    command,
    args,
  };
}
