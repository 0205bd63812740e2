import type { VerifyStatus } from '../domain/step/step.js';
import type { TapRunContext, TapStep } from '../domain/tap/tap-state.js';
import { buildTapSummary } from '../domain/tap/tap-summary.js';
import type { TapStepDeps } from './step-helpers.js';

export class FinalSummaryStep implements TapStep {
  readonly id = 'final_summary';
  readonly description = 'Final summary';

  constructor(private readonly deps: TapStepDeps) {}

  async preflight(): Promise<void> {}

  async apply(ctx: TapRunContext): Promise<void> {
    this.deps.events.onSummary(buildTapSummary(ctx.runId, ctx.inputs, ctx.state.scratch, ctx.statePath));
    await ctx.updateScratch({ summaryPrinted: true });
  }

  async verify(ctx: TapRunContext): Promise<VerifyStatus> {
    return ctx.state.scratch.summaryPrinted ? 'complete' : 'incomplete';
  }

  async undo(ctx: TapRunContext): Promise<void> {
    await ctx.updateScratch({ summaryPrinted: false });
  }
}
