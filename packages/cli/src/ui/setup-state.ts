import type { StepDescriptor, StepRecord, TapRunState, TapSummary } from '@tapsmith/core';

export type StepViewStatus = 'pending' | 'running' | 'complete' | 'skipped' | 'dry-run' | 'failed';

export interface StepView {
  id: string;
  description: string;
  status: StepViewStatus;
  /** Reached its status without apply. */
  applySkipped: boolean;
  startedAt?: number;
  finishedAt?: number;
  error?: string;
}

export interface SetupState {
  runId: string | null;
  dryRun: boolean;
  steps: StepView[];
  /** Latest step log line, e.g. the command about to run. */
  activity: string | null;
  /** Latest line of command output. */
  lastOutput: string | null;
  warnings: string[];
  summary: TapSummary | null;
  finalState: TapRunState | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'RUN_START'; runId: string; dryRun: boolean }
  | { type: 'STEP_START'; step: StepDescriptor; at: number }
  | { type: 'STEP_FINISH'; step: StepDescriptor; record: StepRecord; at: number }
  | { type: 'STEP_SKIPPED'; step: StepDescriptor }
  | { type: 'STEP_FAILED'; step: StepDescriptor; error: string; at: number }
  | { type: 'STEP_LOG'; message: string }
  | { type: 'COMMAND_OUTPUT'; line: string }
  | { type: 'WARNING'; message: string }
  | { type: 'SUMMARY'; summary: TapSummary }
  | { type: 'COMPLETE'; state: TapRunState }
  | { type: 'ERROR'; error: string };

function updateStep(state: SetupState, id: string, patch: Partial<StepView>): SetupState {
  return {
    ...state,
    steps: state.steps.map((step) => (step.id === id ? { ...step, ...patch } : step)),
  };
}

export function setupReducer(state: SetupState, action: Action): SetupState {
  switch (action.type) {
    case 'RUN_START':
      return { ...state, runId: action.runId, dryRun: action.dryRun };

    case 'STEP_START':
      return {
        ...updateStep(state, action.step.id, {
          status: 'running',
          applySkipped: false,
          startedAt: action.at,
          finishedAt: undefined,
          error: undefined,
        }),
        activity: null,
        lastOutput: null,
      };

    case 'STEP_FINISH':
      return updateStep(state, action.step.id, {
        status: action.record.status === 'dry-run' ? 'dry-run' : 'complete',
        applySkipped: action.record.skippedApply,
        finishedAt: action.at,
      });

    case 'STEP_SKIPPED':
      return updateStep(state, action.step.id, { status: 'skipped', applySkipped: true });

    case 'STEP_FAILED':
      return updateStep(state, action.step.id, { status: 'failed', error: action.error, finishedAt: action.at });

    case 'STEP_LOG':
      return { ...state, activity: action.message, lastOutput: null };

    case 'COMMAND_OUTPUT':
      return action.line.trim() ? { ...state, lastOutput: action.line } : state;

    case 'WARNING':
      return { ...state, warnings: [...state.warnings, action.message] };

    case 'SUMMARY':
      return { ...state, summary: action.summary };

    case 'COMPLETE':
      return { ...state, finalState: action.state, activity: null, lastOutput: null, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export function initialSetupState(steps: StepDescriptor[]): SetupState {
  return {
    runId: null,
    dryRun: false,
    steps: steps.map((step): StepView => ({ ...step, status: 'pending', applySkipped: false })),
    activity: null,
    lastOutput: null,
    warnings: [],
    summary: null,
    finalState: null,
    error: null,
    done: false,
  };
}
