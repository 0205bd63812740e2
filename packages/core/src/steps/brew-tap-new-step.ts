import { join } from 'node:path';
import type { VerifyStatus } from '../domain/step/step.js';
import { repoSlug } from '../domain/tap/tap-inputs.js';
import type { TapRunContext, TapStep } from '../domain/tap/tap-state.js';
import { isDirectory, pathExists, runChecked, type TapStepDeps } from './step-helpers.js';

export class BrewTapNewStep implements TapStep {
  readonly id = 'brew_tap_new';
  readonly description = 'Create local tap (brew tap-new)';

  constructor(private readonly deps: TapStepDeps) {}

  /** Resolves `<brew --repository>/Library/Taps/<owner>/<repo>` once and keeps it in scratch. */
  private async ensureTapPath(ctx: TapRunContext): Promise<string> {
    const known = ctx.state.scratch.tapPath;
    if (known) return known;

    const result = await runChecked(this.deps.commands, { command: 'brew', args: ['--repository'] });
    const base = result.stdout.trim();
    if (!base) {
      throw new Error('brew --repository returned empty output');
    }

    const tapPath = join(base, 'Library', 'Taps', ctx.inputs.owner, ctx.inputs.repoName);
    await ctx.updateScratch({ tapPath });
    return tapPath;
  }

  async preflight(): Promise<void> {}

  async apply(ctx: TapRunContext): Promise<void> {
    const slug = repoSlug(ctx.inputs);
    this.deps.events.onStepLog(`brew tap-new ${slug}`);
    await runChecked(this.deps.commands, { command: 'brew', args: ['tap-new', slug] });
    await this.ensureTapPath(ctx);
  }

  async verify(ctx: TapRunContext): Promise<VerifyStatus> {
    const tapPath = await this.ensureTapPath(ctx);

    if (!(await pathExists(tapPath))) {
      return 'incomplete';
    }
    if (!(await isDirectory(join(tapPath, '.git')))) {
      throw new Error(`tap path exists but is not a git repo: ${tapPath}`);
    }
    return 'complete';
  }
}
