import type { RunContext } from '../../services/run-context.js';

export type VerifyStatus = 'complete' | 'incomplete';

/**
 * One idempotent, verifiable unit of work.
 *
 * - `preflight` checks that the step can be attempted at all and must not
 *   change anything.
 * - `verify` reports whether the step's goal state already holds. It throws
 *   only when the check itself cannot be performed; "not done yet" is
 *   `'incomplete'`, not an error.
 * - `apply` performs the effect.
 * - `undo` is a compensating action. The runner never calls it on its own.
 */
export interface Step<TInputs, TScratch extends object> {
  readonly id: string;
  readonly description: string;
  preflight(ctx: RunContext<TInputs, TScratch>): Promise<void>;
  apply(ctx: RunContext<TInputs, TScratch>): Promise<void>;
  verify(ctx: RunContext<TInputs, TScratch>): Promise<VerifyStatus>;
  undo?(ctx: RunContext<TInputs, TScratch>): Promise<void>;
}

export interface StepDescriptor {
  id: string;
  description: string;
}
