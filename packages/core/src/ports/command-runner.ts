import type { CommandResult, CommandSpec } from '../domain/command/command-spec.js';

/**
 * Runs an external program to completion. A non-zero exit resolves normally;
 * the caller decides what it means. A program that cannot be found rejects
 * with `CommandNotFoundError`.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}
