import { summarizeRun, type RunSummary } from '../domain/run/run-summary.js';
import type { StepDescriptor } from '../domain/step/step.js';
import type { TapInputs } from '../domain/tap/tap-inputs.js';
import type { TapRunContext, TapRunState, TapScratch } from '../domain/tap/tap-state.js';
import type { CommandRunner } from '../ports/command-runner.js';
import type { StateStore } from '../ports/state-store.js';
import type { TapSetupEvents } from '../ports/workflow-events.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { buildTapSteps } from '../steps/index.js';
import { RunContext } from './run-context.js';
import { Runner, type RunOptions } from './runner.js';

const log = createLogger('tap-setup-service');

export interface TapSetupDeps {
  stateStore: StateStore<TapInputs, TapScratch>;
  commands: CommandRunner;
  events: TapSetupEvents;
}

export interface StartTapSetupInput {
  inputs: TapInputs;
  dryRun: boolean;
}

export class TapSetupService {
  private readonly runner: Runner<TapInputs, TapScratch>;

  constructor(private readonly deps: TapSetupDeps) {
    this.runner = new Runner(buildTapSteps({ commands: deps.commands, events: deps.events }), deps.events);
  }

  get steps(): StepDescriptor[] {
    return this.runner.descriptors;
  }

  async start(input: StartTapSetupInput, options: RunOptions = {}): Promise<TapRunState> {
    const ctx = await RunContext.create(this.deps.stateStore, {
      dryRun: input.dryRun,
      inputs: input.inputs,
      scratch: {},
    });
    log.info(`start: run ${ctx.runId} for ${input.inputs.owner}/${input.inputs.repoName}`);
    return this.execute(ctx, options);
  }

  async resume(runId: string, dryRun: boolean, options: RunOptions = {}): Promise<TapRunState> {
    let ctx: TapRunContext;
    try {
      ctx = await RunContext.load(this.deps.stateStore, runId, dryRun);
    } catch (err) {
      this.deps.events.onError(errorMessage(err));
      throw err;
    }
    return this.execute(ctx, options);
  }

  async undo(runId: string, stepId: string): Promise<TapRunState> {
    const ctx = await RunContext.load(this.deps.stateStore, runId, false);
    await this.runner.undo(ctx, stepId);
    return ctx.state;
  }

  async status(runId: string): Promise<TapRunState> {
    return this.deps.stateStore.readState(runId);
  }

  locate(runId: string): string {
    return this.deps.stateStore.locate(runId);
  }

  async list(): Promise<RunSummary[]> {
    const runs = await this.deps.stateStore.listRuns();
    return runs.map((state) => this.summarize(state));
  }

  summarize(state: TapRunState): RunSummary {
    return summarizeRun(state, this.runner.stepIds);
  }

  private async execute(ctx: TapRunContext, options: RunOptions): Promise<TapRunState> {
    try {
      await this.runner.run(ctx, options);
      log.info(`execute: run ${ctx.runId} complete`);
      this.deps.events.onComplete(ctx.state);
      return ctx.state;
    } catch (err) {
      log.error(`execute: run ${ctx.runId} stopped:`, errorMessage(err));
      this.deps.events.onError(errorMessage(err));
      throw err;
    }
  }
}
