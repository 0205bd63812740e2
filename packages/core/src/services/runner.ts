import { ensureStepRecord, findStepRecord, nowIso, type StepRecord } from '../domain/run/run-state.js';
import type { Step, StepDescriptor } from '../domain/step/step.js';
import type { RunnerEvents } from '../ports/workflow-events.js';
import {
  CheckError,
  EffectError,
  PostconditionMismatchError,
  PreconditionError,
  RunCancelledError,
  WorkflowDefinitionError,
  errorMessage,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { RunContext } from './run-context.js';

const log = createLogger('runner');

export interface RunOptions {
  /** Checked between steps. A step that is already running is not interrupted here. */
  signal?: AbortSignal;
  /**
   * Re-run preflight and verify for steps a previous invocation already
   * completed. By default their records are left exactly as they are.
   */
  reverify?: boolean;
}

type Phase = 'preflight' | 'apply' | 'verify';

function describe<TInputs, TScratch extends object>(step: Step<TInputs, TScratch>): StepDescriptor {
  return { id: step.id, description: step.description };
}

const noopRunnerEvents: RunnerEvents = {
  onRunStart: () => {},
  onStepStart: () => {},
  onStepFinish: () => {},
  onStepSkipped: () => {},
  onStepFailed: () => {},
  onStepLog: () => {},
};

/**
 * Drives an ordered list of steps against a run context.
 *
 * Steps whose record is already `complete` are skipped untouched unless
 * `reverify` is set. For every other step: mark running, preflight, verify;
 * when the goal state already holds
 * the step completes without apply, under dry run it stops at `dry-run`,
 * otherwise apply and verify again. Every transition is persisted before the
 * next one starts. The first failure is recorded on the step and rethrown;
 * later steps are not touched.
 */
export class Runner<TInputs, TScratch extends object> {
  private readonly steps: ReadonlyArray<Step<TInputs, TScratch>>;

  constructor(
    steps: ReadonlyArray<Step<TInputs, TScratch>>,
    private readonly events: RunnerEvents = noopRunnerEvents,
  ) {
    const seen = new Set<string>();
    for (const step of steps) {
      if (seen.has(step.id)) {
        throw new WorkflowDefinitionError(`Duplicate step id: ${step.id}`);
      }
      seen.add(step.id);
    }
    this.steps = [...steps];
  }

  get stepIds(): string[] {
    return this.steps.map((step) => step.id);
  }

  get descriptors(): StepDescriptor[] {
    return this.steps.map(describe);
  }

  async run(ctx: RunContext<TInputs, TScratch>, options: RunOptions = {}): Promise<void> {
    ctx.state.dryRun = ctx.dryRun;
    await ctx.persist();
    this.events.onRunStart(ctx.runId, ctx.dryRun);

    for (const step of this.steps) {
      if (options.signal?.aborted) {
        log.warn(`run: ${ctx.runId} cancelled before ${step.id}`);
        throw new RunCancelledError(ctx.runId, step.id);
      }

      const previous = findStepRecord(ctx.state, step.id);
      if (previous?.status === 'complete' && !options.reverify) {
        log.debug(`run: ${step.id} completed by an earlier invocation, skipping`);
        this.events.onStepSkipped(describe(step), { ...previous });
        continue;
      }

      await this.runStep(step, ctx);
    }

    log.info(`run: ${ctx.runId} finished ${this.steps.length} steps`);
  }

  /**
   * Manual compensation: runs the step's `undo` (when it has one) and resets
   * its record to pending so the next run attempts it again.
   */
  async undo(ctx: RunContext<TInputs, TScratch>, stepId: string): Promise<void> {
    const step = this.steps.find((candidate) => candidate.id === stepId);
    if (!step) {
      throw new WorkflowDefinitionError(`Unknown step id: ${stepId}. Known steps: ${this.stepIds.join(', ')}`);
    }

    if (step.undo) {
      log.info(`undo: running compensation for ${stepId}`);
      await step.undo(ctx);
    } else {
      log.info(`undo: ${stepId} has no compensation; resetting its record only`);
    }

    const record = findStepRecord(ctx.state, stepId);
    if (record) {
      record.status = 'pending';
      record.startedAt = undefined;
      record.finishedAt = undefined;
      record.error = undefined;
      record.skippedApply = false;
      await ctx.persist();
    }
  }

  private async runStep(step: Step<TInputs, TScratch>, ctx: RunContext<TInputs, TScratch>): Promise<void> {
    const descriptor = describe(step);
    const record = ensureStepRecord(ctx.state, step.id);

    record.status = 'running';
    record.startedAt = nowIso();
    record.finishedAt = undefined;
    record.error = undefined;
    record.skippedApply = false;
    await ctx.persist();
    this.events.onStepStart(descriptor);
    log.debug(`runStep: ${step.id} running`);

    try {
      await this.phase(step, 'preflight', () => step.preflight(ctx));

      if ((await this.phase(step, 'verify', () => step.verify(ctx))) === 'complete') {
        await this.finish(ctx, descriptor, record, 'complete', true);
        return;
      }

      if (ctx.dryRun) {
        await this.finish(ctx, descriptor, record, 'dry-run', true);
        return;
      }

      await this.phase(step, 'apply', () => step.apply(ctx));

      if ((await this.phase(step, 'verify', () => step.verify(ctx))) === 'incomplete') {
        throw new PostconditionMismatchError(step.id);
      }
      await this.finish(ctx, descriptor, record, 'complete', false);
    } catch (err) {
      const message = errorMessage(err);
      record.status = 'failed';
      record.finishedAt = nowIso();
      record.error = message;
      await ctx.persist();
      log.error(`runStep: ${step.id} failed:`, message);
      this.events.onStepFailed(descriptor, message);
      throw err;
    }
  }

  private async phase<T>(step: Step<TInputs, TScratch>, phase: Phase, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const message = `${phase.charAt(0).toUpperCase()}${phase.slice(1)} failed for step ${step.id}: ${errorMessage(err)}`;
      switch (phase) {
        case 'preflight':
          throw new PreconditionError(message, step.id, { cause: err });
        case 'apply':
          throw new EffectError(message, step.id, { cause: err });
        case 'verify':
          throw new CheckError(message, step.id, { cause: err });
      }
    }
  }

  private async finish(
    ctx: RunContext<TInputs, TScratch>,
    descriptor: StepDescriptor,
    record: StepRecord,
    status: 'complete' | 'dry-run',
    skippedApply: boolean,
  ): Promise<void> {
    record.status = status;
    record.finishedAt = nowIso();
    record.skippedApply = skippedApply;
    await ctx.persist();
    log.debug(`runStep: ${descriptor.id} -> ${status}${skippedApply ? ' (apply skipped)' : ''}`);
    this.events.onStepFinish(descriptor, { ...record });
  }
}
