import {
  createTapInputs,
  type TapInputsDraft,
  type TapRunState,
} from '@tapsmith/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { createTapSetupService, resolveConfig } from './runtime.js';

export interface SetupTapOptions extends TapInputsDraft {
  dryRun?: boolean;
  /** Resume this run instead of starting a new one; the draft fields are then ignored. */
  resume?: string;
  reverify?: boolean;
  /** Overrides the configured state directory. */
  stateDir?: string;
  signal?: AbortSignal;
  onProgress?: EventHandler;
}

/**
 * Runs the tap workflow with the user's configuration. Input warnings go to
 * `onProgress.onStepLog`. Rejects with the error that stopped the run.
 */
export async function setupTap(options: SetupTapOptions): Promise<TapRunState> {
  const { dryRun = false, resume, reverify, stateDir, signal, onProgress, ...draft } = options;
  const config = await resolveConfig();
  if (stateDir) {
    config.stateDir = stateDir;
  }

  const events = createCallbackEventBridge(onProgress ?? {});
  const service = createTapSetupService(config, { events, signal });

  if (resume) {
    return service.resume(resume, dryRun, { signal, reverify });
  }

  const { inputs, warnings } = createTapInputs({
    ...draft,
    owner: draft.owner ?? config.defaults.owner,
    visibility: draft.visibility ?? config.defaults.visibility,
    branch: draft.branch ?? config.defaults.branch,
    formulaMode: draft.formulaMode ?? config.defaults.formulaMode,
  });
  for (const warning of warnings) {
    events.onStepLog(`warning: ${warning}`);
  }

  return service.start({ inputs, dryRun }, { signal, reverify });
}

export type { EventHandler } from './adapters/callback-event-bridge.js';

// Re-export everything from core for advanced usage
export * from '@tapsmith/core';
