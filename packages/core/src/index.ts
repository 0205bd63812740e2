// Domain types
export {
  SCHEMA_VERSION,
  STEP_STATUSES,
  createRunState,
  ensureStepRecord,
  findStepRecord,
  nowIso,
  runStateEnvelopeShape,
  stepRecordSchema,
} from './domain/run/run-state.js';
export type { RunState, RunStateSchema, StepRecord, StepStatus } from './domain/run/run-state.js';
export { summarizeRun } from './domain/run/run-summary.js';
export type { RunOutcome, RunSummary } from './domain/run/run-summary.js';
export type { Step, StepDescriptor, VerifyStatus } from './domain/step/step.js';
export { describeExit, formatCommand, succeeded } from './domain/command/command-spec.js';
export type { CommandResult, CommandSpec } from './domain/command/command-spec.js';

export {
  DEFAULT_BRANCH,
  FORMULA_MODES,
  VISIBILITIES,
  createTapInputs,
  isFormulaMode,
  isVisibility,
  preferredTapName,
  repoSlug,
  supportsShorthand,
  tapInputsSchema,
  tapShorthand,
} from './domain/tap/tap-inputs.js';
export type { FormulaMode, TapInputs, TapInputsDraft, Visibility } from './domain/tap/tap-inputs.js';
export { tapRunStateSchema, tapScratchSchema } from './domain/tap/tap-state.js';
export type { TapRunContext, TapRunState, TapScratch, TapStep } from './domain/tap/tap-state.js';
export { buildTapSummary } from './domain/tap/tap-summary.js';
export type { TapSummary } from './domain/tap/tap-summary.js';
export { deriveFormulaNameFromUrl, formulaClassName, renderStubFormula } from './domain/tap/formula.js';

// Port interfaces
export type { StateStore } from './ports/state-store.js';
export type { CommandRunner } from './ports/command-runner.js';
export type { ConfigStore, TapsmithPrefs } from './ports/config-store.js';
export type { RunnerEvents, TapSetupEvents } from './ports/workflow-events.js';
export { noopTapSetupEvents } from './ports/workflow-events.js';

// Adapters
export { JsonStateStore } from './adapters/json-state-store.js';
export { JsonConfigStore } from './adapters/json-config-store.js';
export { SpawnCommandRunner } from './adapters/spawn-command-runner.js';
export type { SpawnCommandRunnerOptions } from './adapters/spawn-command-runner.js';

// Steps
export { buildTapSteps } from './steps/index.js';
export type { TapStepDeps } from './steps/index.js';

// Application services
export { RunContext } from './services/run-context.js';
export type { CreateRunOptions } from './services/run-context.js';
export { Runner } from './services/runner.js';
export type { RunOptions } from './services/runner.js';
export { TapSetupService } from './services/tap-setup-service.js';
export type { StartTapSetupInput, TapSetupDeps } from './services/tap-setup-service.js';
export { CONFIG_KEYS, ConfigService, isConfigKey } from './services/config-service.js';
export type { ConfigKey, TapsmithConfig } from './services/config-service.js';

// Shared
export { createLogger, getLogLevel, isLogLevel, setLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  CheckError,
  CommandNotFoundError,
  ConfigError,
  CorruptStateError,
  EffectError,
  InputError,
  MissingConfigError,
  NotFoundError,
  PostconditionMismatchError,
  PreconditionError,
  RunCancelledError,
  StorageError,
  TapsmithError,
  WorkflowDefinitionError,
  errorMessage,
} from './shared/errors.js';
