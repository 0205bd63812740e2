import type { FormulaMode, Visibility } from '../domain/tap/tap-inputs.js';

export interface TapsmithPrefs {
  stateDir?: string;
  owner?: string;
  branch?: string;
  visibility?: Visibility;
  formulaMode?: FormulaMode;
  commandTimeoutMs?: number;
}

export interface ConfigStore {
  getPrefs(): Promise<TapsmithPrefs>;
  savePrefs(prefs: TapsmithPrefs): Promise<void>;
  readonly location: string;
}
