import { describeExit, succeeded } from '../domain/command/command-spec.js';
import type { VerifyStatus } from '../domain/step/step.js';
import type { TapStep } from '../domain/tap/tap-state.js';
import { CommandNotFoundError, errorMessage } from '../shared/errors.js';
import type { TapStepDeps } from './step-helpers.js';

interface RequiredCommand {
  command: string;
  args: string[];
  label: string;
}

const REQUIRED_COMMANDS: RequiredCommand[] = [
  { command: 'git', args: ['--version'], label: 'git' },
  { command: 'brew', args: ['--version'], label: 'homebrew' },
  { command: 'gh', args: ['--version'], label: 'GitHub CLI' },
];

export class PreflightStep implements TapStep {
  readonly id = 'preflight';
  readonly description = 'Preflight checks';

  constructor(
    private readonly deps: TapStepDeps,
    private readonly required: RequiredCommand[] = REQUIRED_COMMANDS,
  ) {}

  private async checkRequired(): Promise<void> {
    const missing: string[] = [];
    const failures: string[] = [];

    for (const cmd of this.required) {
      try {
        const result = await this.deps.commands.run({ command: cmd.command, args: cmd.args });
        if (!succeeded(result)) {
          failures.push(`${cmd.label}: ${cmd.command} returned ${describeExit(result)}`);
        }
      } catch (err) {
        if (err instanceof CommandNotFoundError) {
          missing.push(cmd.label);
        } else {
          failures.push(`${cmd.label}: ${errorMessage(err)}`);
        }
      }
    }

    if (missing.length > 0) {
      throw new Error(`Missing required tools: ${missing.join(', ')}`);
    }
    if (failures.length > 0) {
      throw new Error(`Required tools failed to run: ${failures.join('; ')}`);
    }
  }

  async preflight(): Promise<void> {
    await this.checkRequired();
  }

  async apply(): Promise<void> {}

  async verify(): Promise<VerifyStatus> {
    await this.checkRequired();
    return 'complete';
  }
}
