import { z } from 'zod';

export const SCHEMA_VERSION = 1;

export const STEP_STATUSES = ['pending', 'running', 'complete', 'failed', 'dry-run'] as const;

export type StepStatus = (typeof STEP_STATUSES)[number];

export interface StepRecord {
  id: string;
  status: StepStatus;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
  /** True when the current status was reached without calling apply. */
  skippedApply: boolean;
}

/**
 * One workflow instance. `inputs` is the domain configuration embedded at
 * creation; `scratch` holds the named fields steps hand forward to later steps.
 */
export interface RunState<TInputs, TScratch extends object> {
  schemaVersion: number;
  runId: string;
  startedAt: string;
  dryRun: boolean;
  steps: StepRecord[];
  inputs?: TInputs;
  scratch: TScratch;
}

export const stepRecordSchema = z.object({
  id: z.string().min(1),
  status: z.enum(STEP_STATUSES),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  error: z.string().optional(),
  skippedApply: z.boolean().default(false),
});

/**
 * Envelope fields shared by every snapshot. Domains spread this into their own
 * object schema next to `inputs` and `scratch`.
 */
export const runStateEnvelopeShape = {
  schemaVersion: z.number().int().positive(),
  runId: z.string().min(1),
  startedAt: z.string(),
  dryRun: z.boolean(),
  steps: z.array(stepRecordSchema),
};

export type RunStateSchema<TInputs, TScratch extends object> = z.ZodType<
  RunState<TInputs, TScratch>,
  z.ZodTypeDef,
  unknown
>;

export function nowIso(): string {
  return new Date().toISOString();
}

export function createRunState<TInputs, TScratch extends object>(
  runId: string,
  init: { dryRun: boolean; inputs: TInputs; scratch: TScratch },
): RunState<TInputs, TScratch> {
  return {
    schemaVersion: SCHEMA_VERSION,
    runId,
    startedAt: nowIso(),
    dryRun: init.dryRun,
    steps: [],
    inputs: init.inputs,
    scratch: init.scratch,
  };
}

export function findStepRecord<TInputs, TScratch extends object>(
  state: RunState<TInputs, TScratch>,
  stepId: string,
): StepRecord | undefined {
  return state.steps.find((step) => step.id === stepId);
}

/** Returns the record for `stepId`, appending a pending one on first encounter. */
export function ensureStepRecord<TInputs, TScratch extends object>(
  state: RunState<TInputs, TScratch>,
  stepId: string,
): StepRecord {
  const existing = findStepRecord(state, stepId);
  if (existing) return existing;

  const record: StepRecord = { id: stepId, status: 'pending', skippedApply: false };
  state.steps.push(record);
  return record;
}
