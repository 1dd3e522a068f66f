/**
 * Command plug-in contract
 */

import type { Logger } from '@jobsub/logger';

/**
 * One constructed command, bound to a logger and its own arguments.
 */
export interface CommandInstance {
  /**
   * Runs the command. Any throw is classified by the failure translator.
   */
  execute(): Promise<void>;

  /**
   * Last-chance cleanup, called once with the final exit code.
   */
  terminate(exitCode: number): void | Promise<void>;

  /**
   * Credential (proxy) file, set once the command has authenticated.
   * `undefined` means unknown; the session log is never uploaded then.
   */
  readonly proxyFilePath?: string;

  /**
   * Session log file, set once the command knows its project directory.
   */
  readonly logFilePath?: string;

  /**
   * Server instance the command talked to; used as the upload target.
   */
  readonly instance?: string;
}

/**
 * Builds a command instance from the run's logger and the arguments that
 * follow the command token.
 */
export type CommandFactory = (logger: Logger, argv: readonly string[]) => CommandInstance;

/**
 * Registry entry for one command.
 */
export interface CommandDescriptor {
  readonly name: string;
  readonly shortAliases: ReadonlySet<string>;
  readonly description?: string;
  readonly factory: CommandFactory;
}

/**
 * Input accepted by {@link defineCommand}.
 */
export interface CommandDefinition {
  name: string;
  shortAliases?: Iterable<string>;
  description?: string;
  factory: CommandFactory;
}

/**
 * Commands indexed by canonical name.
 */
export type CommandRegistry = ReadonlyMap<string, CommandDescriptor>;
