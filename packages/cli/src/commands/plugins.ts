/**
 * Loading of command plug-ins from configured modules
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { Logger } from '@jobsub/logger';
import { PluginLoadError } from './errors.js';
import { defineCommand } from './registry.js';
import type { CommandDescriptor, CommandFactory } from './types.js';

const DEFAULT_IMPORT_TIMEOUT_MS = 5000;

const descriptorSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/, 'command names are lowercase words'),
  shortAliases: z
    .union([
      z.array(z.string().min(1)),
      z.custom<ReadonlySet<string>>(
        (value) => value instanceof Set && [...value].every((alias) => typeof alias === 'string'),
        { message: 'shortAliases must be a set of strings' }
      ),
    ])
    .optional(),
  description: z.string().optional(),
  factory: z.custom<CommandFactory>((value) => typeof value === 'function', {
    message: 'factory must be a function',
  }),
});

const exportSchema = z.union([descriptorSchema, z.array(descriptorSchema)]);

const moduleSchema = z.object({
  default: exportSchema.optional(),
  commands: exportSchema.optional(),
});

export interface LoadPluginsOptions {
  /** Base directory for relative specifiers */
  cwd: string;
  /** Per-module import timeout */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Relative and absolute paths become file URLs; package names pass through.
 */
export function toImportSpecifier(specifier: string, cwd: string): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

/**
 * Dynamic import guarded by a timeout, so a plug-in stuck in top-level
 * initialisation cannot hang the CLI.
 */
async function importWithTimeout(specifier: string, timeoutMs: number): Promise<unknown> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Import timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  const load: Promise<unknown> = import(specifier);
  try {
    return await Promise.race([load, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Imports each configured module and returns the commands it exports.
 *
 * A module exports one descriptor or an array of them, as its default export
 * or as `commands`.
 *
 * @throws PluginLoadError naming the first module that fails
 */
export async function loadCommandPlugins(
  specifiers: readonly string[],
  options: LoadPluginsOptions
): Promise<CommandDescriptor[]> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_IMPORT_TIMEOUT_MS;
  const descriptors: CommandDescriptor[] = [];

  for (const specifier of specifiers) {
    let loaded: unknown;
    try {
      loaded = await importWithTimeout(toImportSpecifier(specifier, options.cwd), timeoutMs);
    } catch (error) {
      throw new PluginLoadError(specifier, error instanceof Error ? error.message : String(error), error);
    }

    const parsed = moduleSchema.safeParse(loaded);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new PluginLoadError(specifier, issues.join('; '));
    }

    const exported = [parsed.data.default, parsed.data.commands]
      .flatMap((entry) => (entry === undefined ? [] : Array.isArray(entry) ? entry : [entry]));
    if (exported.length === 0) {
      throw new PluginLoadError(specifier, 'module exports no commands');
    }

    for (const definition of exported) {
      descriptors.push(defineCommand(definition));
    }
    options.logger?.debug('Loaded command plug-in', {
      specifier,
      commands: exported.map((definition) => definition.name),
    });
  }

  return descriptors;
}
