import type { TapSetupEvents } from '@tapsmith/core';

export type EventHandler = Partial<TapSetupEvents>;

export function createCallbackEventBridge(handlers: EventHandler): TapSetupEvents {
  return {
    onRunStart: (runId, dryRun) => handlers.onRunStart?.(runId, dryRun),
    onStepStart: (step) => handlers.onStepStart?.(step),
    onStepFinish: (step, record) => handlers.onStepFinish?.(step, record),
    onStepSkipped: (step, record) => handlers.onStepSkipped?.(step, record),
    onStepFailed: (step, error) => handlers.onStepFailed?.(step, error),
    onStepLog: (message) => handlers.onStepLog?.(message),
    onCommandOutput: (line, stream) => handlers.onCommandOutput?.(line, stream),
    onSummary: (summary) => handlers.onSummary?.(summary),
    onComplete: (state) => handlers.onComplete?.(state),
    onError: (error) => handlers.onError?.(error),
  };
}
