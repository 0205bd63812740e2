import type { VerifyStatus } from '../domain/step/step.js';
import { preferredTapName, repoSlug, supportsShorthand, tapShorthand } from '../domain/tap/tap-inputs.js';
import type { TapRunContext, TapStep } from '../domain/tap/tap-state.js';
import { runChecked, type TapStepDeps } from './step-helpers.js';

export class ValidateTapStep implements TapStep {
  readonly id = 'validate_tap';
  readonly description = 'Validate tap is registered';

  constructor(private readonly deps: TapStepDeps) {}

  private async tappedNames(): Promise<Set<string>> {
    const result = await runChecked(this.deps.commands, { command: 'brew', args: ['tap'] });
    return new Set(
      result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter(Boolean),
    );
  }

  async preflight(): Promise<void> {}

  async apply(ctx: TapRunContext): Promise<void> {
    const name = preferredTapName(ctx.inputs);
    this.deps.events.onStepLog(`brew tap ${name}`);
    await runChecked(this.deps.commands, { command: 'brew', args: ['tap', name] });
  }

  async verify(ctx: TapRunContext): Promise<VerifyStatus> {
    const candidates = [repoSlug(ctx.inputs)];
    if (supportsShorthand(ctx.inputs)) {
      candidates.push(tapShorthand(ctx.inputs));
    }

    const tapped = await this.tappedNames();
    return candidates.some((name) => tapped.has(name)) ? 'complete' : 'incomplete';
  }
}
