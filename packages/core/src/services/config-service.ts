import {
  DEFAULT_BRANCH,
  isFormulaMode,
  isVisibility,
  type FormulaMode,
  type Visibility,
} from '../domain/tap/tap-inputs.js';
import type { ConfigStore, TapsmithPrefs } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';

export interface TapsmithConfig {
  stateDir: string;
  defaults: {
    owner?: string;
    branch: string;
    visibility: Visibility;
    formulaMode: FormulaMode;
  };
  commandTimeoutMs?: number;
}

export const CONFIG_KEYS = ['state-dir', 'owner', 'branch', 'visibility', 'formula-mode', 'command-timeout'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

function parseTimeout(value: string, source: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${source} must be a positive integer (milliseconds), got '${value}'`);
  }
  return parsed;
}

function parseVisibility(value: string, source: string): Visibility {
  if (!isVisibility(value)) {
    throw new ConfigError(`${source} must be 'public' or 'private', got '${value}'`);
  }
  return value;
}

function parseFormulaMode(value: string, source: string): FormulaMode {
  if (!isFormulaMode(value)) {
    throw new ConfigError(`${source} must be 'stub' or 'brew-create', got '${value}'`);
  }
  return value;
}

/**
 * Resolves configuration from, in order of precedence: TAPSMITH_* environment
 * variables, the preferences file, built-in defaults.
 */
export class ConfigService {
  constructor(
    private readonly configStore: ConfigStore,
    private readonly defaultStateDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async resolve(): Promise<TapsmithConfig> {
    const prefs = await this.configStore.getPrefs();

    const envStateDir = this.env.TAPSMITH_STATE_DIR?.trim() ?? '';
    const envOwner = this.env.TAPSMITH_OWNER?.trim() ?? '';
    const envBranch = this.env.TAPSMITH_BRANCH?.trim() ?? '';
    const envVisibility = this.env.TAPSMITH_VISIBILITY?.trim() ?? '';
    const envFormulaMode = this.env.TAPSMITH_FORMULA_MODE?.trim() ?? '';
    const envTimeout = this.env.TAPSMITH_COMMAND_TIMEOUT_MS?.trim() ?? '';

    return {
      stateDir: envStateDir || prefs.stateDir || this.defaultStateDir,
      defaults: {
        owner: envOwner || prefs.owner,
        branch: envBranch || prefs.branch || DEFAULT_BRANCH,
        visibility: envVisibility
          ? parseVisibility(envVisibility, 'TAPSMITH_VISIBILITY')
          : prefs.visibility ?? 'public',
        formulaMode: envFormulaMode
          ? parseFormulaMode(envFormulaMode, 'TAPSMITH_FORMULA_MODE')
          : prefs.formulaMode ?? 'stub',
      },
      commandTimeoutMs: envTimeout
        ? parseTimeout(envTimeout, 'TAPSMITH_COMMAND_TIMEOUT_MS')
        : prefs.commandTimeoutMs,
    };
  }

  async setPreference(key: ConfigKey, value: string): Promise<TapsmithPrefs> {
    const trimmed = value.trim();
    if (!trimmed) {
      throw new ConfigError(`A value is required for ${key}`);
    }

    const prefs = await this.configStore.getPrefs();
    switch (key) {
      case 'state-dir':
        prefs.stateDir = trimmed;
        break;
      case 'owner':
        prefs.owner = trimmed;
        break;
      case 'branch':
        prefs.branch = trimmed;
        break;
      case 'visibility':
        prefs.visibility = parseVisibility(trimmed, key);
        break;
      case 'formula-mode':
        prefs.formulaMode = parseFormulaMode(trimmed, key);
        break;
      case 'command-timeout':
        prefs.commandTimeoutMs = parseTimeout(trimmed, key);
        break;
    }

    await this.configStore.savePrefs(prefs);
    return prefs;
  }

  async reset(): Promise<void> {
    await this.configStore.savePrefs({});
  }
}
