import type { RunState } from '../domain/run/run-state.js';

export interface StateStore<TInputs, TScratch extends object> {
  initRun(runId: string, state: RunState<TInputs, TScratch>): Promise<void>;
  readState(runId: string): Promise<RunState<TInputs, TScratch>>;
  writeState(runId: string, state: RunState<TInputs, TScratch>): Promise<void>;
  /** Where the snapshot lives, for display only. */
  locate(runId: string): string;
  listRuns(): Promise<RunState<TInputs, TScratch>[]>;
}
