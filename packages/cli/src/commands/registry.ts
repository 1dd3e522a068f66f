/**
 * Command registry: indexing and resolution of installed commands
 */

import { RegistryConfigError, UnknownCommandError } from './errors.js';
import type { CommandDefinition, CommandDescriptor, CommandRegistry } from './types.js';

/**
 * Builds an immutable descriptor.
 *
 * @example
 * ```typescript
 * export default defineCommand({
 *   name: 'status',
 *   shortAliases: ['st'],
 *   description: 'Show the status of a task',
 *   factory: (logger, argv) => new StatusCommand(logger, argv),
 * });
 * ```
 */
export function defineCommand(definition: CommandDefinition): CommandDescriptor {
  return Object.freeze({
    name: definition.name,
    shortAliases: new Set(definition.shortAliases ?? []),
    description: definition.description,
    factory: definition.factory,
  });
}

/**
 * Indexes commands by canonical name.
 *
 * Every name and alias must identify exactly one command. All conflicts are
 * collected and reported together instead of letting one entry shadow another.
 *
 * @throws RegistryConfigError when two commands claim the same token
 */
export function discover(plugins: Iterable<CommandDescriptor>): CommandRegistry {
  const registry = new Map<string, CommandDescriptor>();
  const owners = new Map<string, string>();
  const conflicts: string[] = [];

  const claim = (token: string, owner: string, kind: 'name' | 'alias'): void => {
    const current = owners.get(token);
    if (current !== undefined && current !== owner) {
      conflicts.push(`${kind} "${token}" of "${owner}" is already used by "${current}"`);
      return;
    }
    owners.set(token, owner);
  };

  const descriptors = [...plugins];

  for (const descriptor of descriptors) {
    if (registry.has(descriptor.name)) {
      conflicts.push(`command "${descriptor.name}" is registered twice`);
      continue;
    }
    registry.set(descriptor.name, descriptor);
    claim(descriptor.name, descriptor.name, 'name');
  }

  for (const descriptor of registry.values()) {
    for (const alias of descriptor.shortAliases) {
      claim(alias, descriptor.name, 'alias');
    }
  }

  if (conflicts.length > 0) {
    throw new RegistryConfigError(conflicts);
  }

  return registry;
}

/**
 * Finds the command a token names, by canonical name or short alias.
 *
 * @throws UnknownCommandError when nothing matches
 */
export function resolve(token: string, registry: CommandRegistry): CommandDescriptor {
  const byName = registry.get(token);
  if (byName) {
    return byName;
  }

  for (const descriptor of registry.values()) {
    if (descriptor.shortAliases.has(token)) {
      return descriptor;
    }
  }

  throw new UnknownCommandError(token);
}

/**
 * Descriptors sorted by name, for help output.
 */
export function listCommands(registry: CommandRegistry): CommandDescriptor[] {
  return [...registry.values()].sort((a, b) => a.name.localeCompare(b.name));
}
