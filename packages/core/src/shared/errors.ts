export class TapsmithError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TapsmithError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- step phase failures ---

export class PreconditionError extends TapsmithError {
  constructor(message: string, public readonly stepId?: string, options?: { cause?: unknown }) {
    super(message, 'PRECONDITION_FAILED', options);
    this.name = 'PreconditionError';
  }
}

export class EffectError extends TapsmithError {
  constructor(message: string, public readonly stepId?: string, options?: { cause?: unknown }) {
    super(message, 'EFFECT_FAILED', options);
    this.name = 'EffectError';
  }
}

export class CheckError extends TapsmithError {
  constructor(message: string, public readonly stepId?: string, options?: { cause?: unknown }) {
    super(message, 'CHECK_FAILED', options);
    this.name = 'CheckError';
  }
}

/** The effect was applied but the postcondition still does not hold. Never retried. */
export class PostconditionMismatchError extends TapsmithError {
  constructor(public readonly stepId: string) {
    super(`Step ${stepId} did not verify after apply. See logs/state for details.`, 'POSTCONDITION_MISMATCH');
    this.name = 'PostconditionMismatchError';
  }
}

// --- state store ---

export class StorageError extends TapsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class NotFoundError extends TapsmithError {
  constructor(public readonly runId: string, location: string) {
    super(`No state found for run ${runId} (${location})`, 'RUN_NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class CorruptStateError extends TapsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CORRUPT_STATE', options);
    this.name = 'CorruptStateError';
  }
}

export class MissingConfigError extends TapsmithError {
  constructor(public readonly runId: string) {
    super(`State for run ${runId} does not contain inputs`, 'MISSING_CONFIG');
    this.name = 'MissingConfigError';
  }
}

// --- everything around the engine ---

export class InputError extends TapsmithError {
  constructor(message: string) {
    super(message, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

export class ConfigError extends TapsmithError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class WorkflowDefinitionError extends TapsmithError {
  constructor(message: string) {
    super(message, 'WORKFLOW_DEFINITION');
    this.name = 'WorkflowDefinitionError';
  }
}

export class RunCancelledError extends TapsmithError {
  constructor(public readonly runId: string, public readonly nextStepId?: string) {
    super(
      nextStepId ? `Run ${runId} cancelled before step ${nextStepId}` : `Run ${runId} cancelled`,
      'RUN_CANCELLED',
    );
    this.name = 'RunCancelledError';
  }
}

export class CommandNotFoundError extends TapsmithError {
  constructor(public readonly command: string, options?: { cause?: unknown }) {
    super(`Command not found: ${command}`, 'COMMAND_NOT_FOUND', options);
    this.name = 'CommandNotFoundError';
  }
}
