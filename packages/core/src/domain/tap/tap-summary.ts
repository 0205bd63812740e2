import { preferredTapName, repoSlug, type TapInputs } from './tap-inputs.js';
import type { TapScratch } from './tap-state.js';

export interface TapSummary {
  runId: string;
  repoSlug: string;
  tapName: string;
  tapPath: string;
  statePath: string;
  formulaMode: TapInputs['formulaMode'];
  /** The stub file in stub mode, the Formula directory in brew-create mode. */
  formulaLocation: string;
  installCommand: string;
}

export function buildTapSummary(
  runId: string,
  inputs: TapInputs,
  scratch: TapScratch,
  statePath: string,
): TapSummary {
  const tapPath = scratch.tapPath ?? '<unknown>';
  const tapName = preferredTapName(inputs);
  const formula = scratch.formulaName ?? inputs.tap;

  return {
    runId,
    repoSlug: repoSlug(inputs),
    tapName,
    tapPath,
    statePath,
    formulaMode: inputs.formulaMode,
    formulaLocation: inputs.formulaMode === 'stub'
      ? `${tapPath}/Formula/${inputs.tap}.rb`
      : `${tapPath}/Formula`,
    installCommand: `brew install ${tapName}/${formula}`,
  };
}
