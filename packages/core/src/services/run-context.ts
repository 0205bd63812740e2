import { randomUUID } from 'node:crypto';
import { createRunState, type RunState } from '../domain/run/run-state.js';
import type { StateStore } from '../ports/state-store.js';
import { MissingConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('run-context');

function frozenCopy<T>(value: T): T {
  if (typeof value !== 'object' || value === null) return value;
  const copy = { ...value };
  Object.freeze(copy);
  return copy;
}

export interface CreateRunOptions<TInputs, TScratch extends object> {
  dryRun: boolean;
  inputs: TInputs;
  /** Initial scratch fields; usually empty. */
  scratch: TScratch;
}

/**
 * A run's identity, its mutable state and its immutable inputs, bound to the
 * store that persists them. Steps read `inputs`, read and write
 * `state.scratch`, and never touch `state.steps` (that is the runner's job).
 */
export class RunContext<TInputs, TScratch extends object> {
  private constructor(
    readonly runId: string,
    readonly dryRun: boolean,
    readonly store: StateStore<TInputs, TScratch>,
    public state: RunState<TInputs, TScratch>,
    readonly inputs: TInputs,
  ) {}

  static async create<TInputs, TScratch extends object>(
    store: StateStore<TInputs, TScratch>,
    options: CreateRunOptions<TInputs, TScratch>,
  ): Promise<RunContext<TInputs, TScratch>> {
    const runId = randomUUID();
    const inputs = frozenCopy(options.inputs);
    const state = createRunState<TInputs, TScratch>(runId, {
      dryRun: options.dryRun,
      inputs,
      scratch: options.scratch,
    });

    await store.initRun(runId, state);
    log.info(`create: started run ${runId}${options.dryRun ? ' (dry run)' : ''}`);

    return new RunContext(runId, options.dryRun, store, state, inputs);
  }

  static async load<TInputs, TScratch extends object>(
    store: StateStore<TInputs, TScratch>,
    runId: string,
    dryRun: boolean,
  ): Promise<RunContext<TInputs, TScratch>> {
    const state = await store.readState(runId);
    if (state.inputs === undefined) {
      throw new MissingConfigError(runId);
    }

    const inputs = frozenCopy(state.inputs);
    state.dryRun = dryRun;
    await store.writeState(runId, { ...state, inputs });
    log.info(`load: resuming run ${runId}${dryRun ? ' (dry run)' : ''}`);

    return new RunContext(runId, dryRun, store, state, inputs);
  }

  get statePath(): string {
    return this.store.locate(this.runId);
  }

  /** Overwrites the stored snapshot. The embedded inputs always come from this context. */
  async persist(): Promise<void> {
    await this.store.writeState(this.runId, { ...this.state, inputs: this.inputs });
  }

  async updateScratch(patch: Partial<TScratch>): Promise<void> {
    this.state.scratch = { ...this.state.scratch, ...patch };
    await this.persist();
  }
}
