import type { StepDescriptor, StepRecord, TapRunState, TapSummary } from '@tapsmith/core';

export interface OutputFormatter {
  renderRunStart(runId: string, dryRun: boolean): void;
  renderStepStart(step: StepDescriptor): void;
  renderStepFinish(step: StepDescriptor, record: StepRecord): void;
  /** A step an earlier invocation completed. */
  renderStepSkipped(step: StepDescriptor): void;
  renderStepFailed(step: StepDescriptor, error: string): void;
  renderStepLog(message: string): void;
  renderCommandOutput(line: string): void;
  renderWarning(message: string): void;
  renderSummary(summary: TapSummary): void;
  renderComplete(state: TapRunState): void;
  /** `runId` is set once a run exists and can be resumed. */
  renderError(error: string, runId?: string): void;
}

export interface Writer {
  out(line: string): void;
  err(line: string): void;
}

export const consoleWriter: Writer = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};
