import {
  ConfigService,
  JsonConfigStore,
  JsonStateStore,
  SpawnCommandRunner,
  TapSetupService,
  tapRunStateSchema,
  type TapSetupEvents,
  type TapsmithConfig,
} from '@tapsmith/core';
import { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

export function createConfigService(): ConfigService {
  return new ConfigService(new JsonConfigStore(getConfigDir()), getDataDir());
}

export async function resolveConfig(): Promise<TapsmithConfig> {
  return createConfigService().resolve();
}

export interface ServiceOptions {
  events: TapSetupEvents;
  /** Aborting terminates the running command; the runner stops before the next step. */
  signal?: AbortSignal;
}

export function createTapSetupService(config: TapsmithConfig, options: ServiceOptions): TapSetupService {
  return new TapSetupService({
    stateStore: new JsonStateStore(config.stateDir, tapRunStateSchema),
    commands: new SpawnCommandRunner({
      timeoutMs: config.commandTimeoutMs,
      signal: options.signal,
      onOutput: (line, stream) => options.events.onCommandOutput(line, stream),
    }),
    events: options.events,
  });
}
