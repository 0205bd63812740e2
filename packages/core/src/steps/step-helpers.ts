import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import {
  describeExit,
  formatCommand,
  succeeded,
  type CommandResult,
  type CommandSpec,
} from '../domain/command/command-spec.js';
import type { TapRunContext } from '../domain/tap/tap-state.js';
import type { CommandRunner } from '../ports/command-runner.js';
import type { TapSetupEvents } from '../ports/workflow-events.js';

export interface TapStepDeps {
  commands: CommandRunner;
  events: Pick<TapSetupEvents, 'onStepLog' | 'onSummary'>;
}

export function requireTapPath(ctx: TapRunContext): string {
  const tapPath = ctx.state.scratch.tapPath?.trim();
  if (!tapPath) {
    throw new Error('tap path is not set; brew tap-new must run first');
  }
  return tapPath;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function assertGitRepo(tapPath: string): Promise<void> {
  if (!(await pathExists(tapPath))) {
    throw new Error(`tap path does not exist: ${tapPath}`);
  }
  if (!(await isDirectory(join(tapPath, '.git')))) {
    throw new Error(`tap path is not a git repo: ${tapPath}`);
  }
}

export function git(tapPath: string, ...args: string[]): CommandSpec {
  return { command: 'git', args: ['-C', tapPath, ...args] };
}

export function commandFailure(result: CommandResult, label = result.command.join(' ')): Error {
  const stderr = result.stderr.trim();
  return new Error(`${label} returned non-zero status (${describeExit(result)})${stderr ? `: ${stderr}` : ''}`);
}

/** Runs the command and throws unless it exits 0. */
export async function runChecked(commands: CommandRunner, spec: CommandSpec): Promise<CommandResult> {
  const result = await commands.run(spec);
  if (!succeeded(result)) {
    throw commandFailure(result, formatCommand(spec));
  }
  return result;
}
