import type { RunState } from './run-state.js';

export type RunOutcome = 'complete' | 'failed' | 'interrupted' | 'dry-run' | 'in-progress';

export interface RunSummary {
  runId: string;
  startedAt: string;
  dryRun: boolean;
  outcome: RunOutcome;
  completedSteps: number;
  totalSteps: number;
  /** The failed, interrupted or next pending step. */
  currentStep?: string;
  error?: string;
}

/**
 * Condenses a snapshot against the workflow's step list. A record left in
 * `running` means the process died mid-step.
 */
export function summarizeRun<TInputs, TScratch extends object>(
  state: RunState<TInputs, TScratch>,
  stepIds: readonly string[],
): RunSummary {
  const records = new Map(state.steps.map((record) => [record.id, record]));
  const completedSteps = stepIds.filter((id) => records.get(id)?.status === 'complete').length;
  const base = {
    runId: state.runId,
    startedAt: state.startedAt,
    dryRun: state.dryRun,
    completedSteps,
    totalSteps: stepIds.length,
  };

  const failed = state.steps.find((record) => record.status === 'failed');
  if (failed) {
    return { ...base, outcome: 'failed', currentStep: failed.id, error: failed.error };
  }

  const running = state.steps.find((record) => record.status === 'running');
  if (running) {
    return { ...base, outcome: 'interrupted', currentStep: running.id };
  }

  if (completedSteps === stepIds.length) {
    return { ...base, outcome: 'complete' };
  }

  const next = stepIds.find((id) => records.get(id)?.status !== 'complete');
  const outcome = state.steps.some((record) => record.status === 'dry-run') ? 'dry-run' : 'in-progress';
  return { ...base, outcome, currentStep: next };
}
