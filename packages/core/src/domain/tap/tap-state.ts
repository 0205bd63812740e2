import { z } from 'zod';
import { runStateEnvelopeShape, type RunState, type RunStateSchema } from '../run/run-state.js';
import type { Step } from '../step/step.js';
import type { RunContext } from '../../services/run-context.js';
import { tapInputsSchema, type TapInputs } from './tap-inputs.js';

/**
 * Fields the tap steps hand forward:
 * - `tapPath`: written by brew_tap_new, read by every later step
 * - `formulaName`: written by add_formula, read by final_summary
 * - `summaryPrinted`: written and checked by final_summary
 */
export const tapScratchSchema = z.object({
  tapPath: z.string().optional(),
  formulaName: z.string().optional(),
  summaryPrinted: z.boolean().optional(),
});

export type TapScratch = z.infer<typeof tapScratchSchema>;

export const tapRunStateSchema: RunStateSchema<TapInputs, TapScratch> = z.object({
  ...runStateEnvelopeShape,
  inputs: tapInputsSchema.nullish().transform((value) => value ?? undefined),
  scratch: tapScratchSchema.default({}),
});

export type TapRunState = RunState<TapInputs, TapScratch>;
export type TapRunContext = RunContext<TapInputs, TapScratch>;
export type TapStep = Step<TapInputs, TapScratch>;
