/**
 * Usage and help text
 */

import { listCommands } from './commands/registry.js';
import type { CommandRegistry } from './commands/types.js';

export const USAGE_LINE = 'Usage: jobsub [--quiet | --debug] [--help] [--version] <command> [command options]';

export function formatCommandList(registry: CommandRegistry): string {
  const rows = listCommands(registry).map((descriptor) => {
    const aliases = [...descriptor.shortAliases].sort();
    const label = aliases.length > 0 ? `${descriptor.name} (${aliases.join(', ')})` : descriptor.name;
    return { label, description: descriptor.description ?? '' };
  });

  if (rows.length === 0) {
    return 'Commands:\n  (none installed)';
  }

  const width = Math.max(...rows.map((row) => row.label.length));
  const lines = rows.map((row) => `  ${row.label.padEnd(width)}  ${row.description}`.trimEnd());
  return ['Commands:', ...lines].join('\n');
}

/**
 * Short form printed when the command line is incomplete.
 */
export function formatUsage(registry: CommandRegistry): string {
  return [USAGE_LINE, '', formatCommandList(registry)].join('\n');
}

export function formatHelp(registry: CommandRegistry, version: string): string {
  return `jobsub ${version}

${USAGE_LINE}

${formatCommandList(registry)}

Options:
  --quiet            Only print warnings and errors
  --debug            Print debug messages
  --help, -h         Show this help message
  --version          Show version information

Environment Variables:
  JOBSUB_LOG_FILE         Session log file name (default jobsub.log)
  JOBSUB_INSTANCE         Server instance (prod/preprod/dev)
  JOBSUB_SERVER_URL       Server URL for the selected instance
  JOBSUB_UPLOAD_ENABLED   Upload the session log after failures
  JOBSUB_PLUGINS          Comma separated command plug-in modules

Run "jobsub <command> --help" for the options of a command.`;
}
