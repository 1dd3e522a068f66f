/**
 * Mapping from internal server parameter names to the configuration keys
 * users write
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ClientError, EXIT_CODES } from '../commands/errors.js';
import bundledAliases from '../../data/parameter-aliases.json' with { type: 'json' };

export type ParameterAliases = Readonly<Record<string, readonly string[]>>;

const aliasFileSchema = z.record(z.array(z.string().min(1)).min(1));

function parseAliases(raw: unknown, source: string): ParameterAliases {
  const result = aliasFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ClientError(`Invalid parameter alias file ${source}: ${errors.join('; ')}`, {
      exitCode: EXIT_CODES.CONFIG,
    });
  }
  return result.data;
}

/**
 * Reads an alias file, or returns the bundled mapping when no file is given.
 *
 * @throws ClientError (exit code 2) when the file is unreadable or malformed
 */
export function loadParameterAliases(file?: string): ParameterAliases {
  if (file === undefined) {
    return parseAliases(bundledAliases, 'parameter-aliases.json');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ClientError(`Unable to read parameter aliases from ${file}`, {
      exitCode: EXIT_CODES.CONFIG,
      cause: error,
    });
  }
  return parseAliases(raw, file);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces every quoted internal parameter name in `text` with its quoted
 * aliases, joined by " or ". Only exact quoted names from the table match,
 * so apostrophes elsewhere in the text are left alone.
 *
 * @example
 * ```typescript
 * expandParameterAliases("Invalid value for 'jobtype'", { jobtype: ['JobType.pluginName'] });
 * // => "Invalid value for 'JobType.pluginName'"
 * ```
 */
export function expandParameterAliases(text: string, aliases: ParameterAliases): string {
  const names = Object.keys(aliases).sort((a, b) => b.length - a.length);
  if (names.length === 0) {
    return text;
  }

  // One pass, so an alias is never expanded again
  const quotedName = new RegExp(`(['"])(${names.map(escapeRegExp).join('|')})\\1`, 'g');
  return text.replace(quotedName, (match: string, quote: string, name: string) => {
    const known = Object.hasOwn(aliases, name) ? aliases[name] : undefined;
    if (!known) {
      return match;
    }
    return known.map((alias) => `${quote}${alias}${quote}`).join(' or ');
  });
}
