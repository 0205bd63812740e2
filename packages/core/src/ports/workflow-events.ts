import type { StepRecord } from '../domain/run/run-state.js';
import type { TapRunState } from '../domain/tap/tap-state.js';
import type { StepDescriptor } from '../domain/step/step.js';
import type { TapSummary } from '../domain/tap/tap-summary.js';

export interface RunnerEvents {
  onRunStart(runId: string, dryRun: boolean): void;
  onStepStart(step: StepDescriptor): void;
  onStepFinish(step: StepDescriptor, record: StepRecord): void;
  /** The step was completed by an earlier invocation and was not run again. */
  onStepSkipped(step: StepDescriptor, record: StepRecord): void;
  onStepFailed(step: StepDescriptor, error: string): void;
  /** Free-form progress lines from the running step (e.g. the command it is about to run). */
  onStepLog(message: string): void;
}

export interface TapSetupEvents extends RunnerEvents {
  onCommandOutput(line: string, stream: 'stdout' | 'stderr'): void;
  onSummary(summary: TapSummary): void;
  onComplete(state: TapRunState): void;
  onError(error: string): void;
}

export const noopTapSetupEvents: TapSetupEvents = {
  onRunStart: () => {},
  onStepStart: () => {},
  onStepFinish: () => {},
  onStepSkipped: () => {},
  onStepFailed: () => {},
  onStepLog: () => {},
  onCommandOutput: () => {},
  onSummary: () => {},
  onComplete: () => {},
  onError: () => {},
};
