import type { TapStep } from '../domain/tap/tap-state.js';
import { AddFormulaStep } from './add-formula-step.js';
import { BrewTapNewStep } from './brew-tap-new-step.js';
import { CommitAndPushStep } from './commit-and-push-step.js';
import { FinalSummaryStep } from './final-summary-step.js';
import { GhRepoCreateStep } from './gh-repo-create-step.js';
import { PreflightStep } from './preflight-step.js';
import type { TapStepDeps } from './step-helpers.js';
import { ValidateTapStep } from './validate-tap-step.js';

/** The tap workflow, in execution order. Later steps rely on scratch fields earlier ones write. */
export function buildTapSteps(deps: TapStepDeps): TapStep[] {
  return [
    new PreflightStep(deps),
    new BrewTapNewStep(deps),
    new GhRepoCreateStep(deps),
    new AddFormulaStep(deps),
    new CommitAndPushStep(deps),
    new ValidateTapStep(deps),
    new FinalSummaryStep(deps),
  ];
}

export {
  AddFormulaStep,
  BrewTapNewStep,
  CommitAndPushStep,
  FinalSummaryStep,
  GhRepoCreateStep,
  PreflightStep,
  ValidateTapStep,
};
export type { TapStepDeps } from './step-helpers.js';
