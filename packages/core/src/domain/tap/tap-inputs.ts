import { z } from 'zod';
import { InputError } from '../../shared/errors.js';

export const VISIBILITIES = ['public', 'private'] as const;
export type Visibility = (typeof VISIBILITIES)[number];

export const FORMULA_MODES = ['stub', 'brew-create'] as const;
export type FormulaMode = (typeof FORMULA_MODES)[number];

export const DEFAULT_BRANCH = 'main';

export const tapInputsSchema = z.object({
  owner: z.string().min(1),
  tap: z.string().min(1),
  repoName: z.string().min(1),
  visibility: z.enum(VISIBILITIES),
  branch: z.string().min(1),
  formulaMode: z.enum(FORMULA_MODES),
  formulaUrl: z.string().optional(),
  formulaName: z.string().optional(),
});

export type TapInputs = z.infer<typeof tapInputsSchema>;

/** Raw values as they arrive from flags, preferences or the programmatic API. */
export interface TapInputsDraft {
  owner?: string;
  tap?: string;
  repoName?: string;
  visibility?: Visibility;
  branch?: string;
  formulaMode?: FormulaMode;
  formulaUrl?: string;
  formulaName?: string;
}

export function isVisibility(value: unknown): value is Visibility {
  return typeof value === 'string' && VISIBILITIES.some((v) => v === value);
}

export function isFormulaMode(value: unknown): value is FormulaMode {
  return typeof value === 'string' && FORMULA_MODES.some((m) => m === value);
}

function normalizeToken(label: string, value: string | undefined): string {
  const trimmed = (value ?? '').trim();
  if (!trimmed) throw new InputError(`${label} is required`);
  if (trimmed.includes('/')) throw new InputError(`${label} must not include '/'`);
  if (/\s/.test(trimmed)) throw new InputError(`${label} must not contain whitespace`);
  return trimmed;
}

function normalizeBranch(value: string | undefined): string {
  const trimmed = (value ?? DEFAULT_BRANCH).trim();
  if (!trimmed) throw new InputError('branch is required');
  return trimmed;
}

export function createTapInputs(draft: TapInputsDraft): { inputs: TapInputs; warnings: string[] } {
  const warnings: string[] = [];

  const owner = normalizeToken('owner', draft.owner);
  const tap = normalizeToken('tap', draft.tap);
  const branch = normalizeBranch(draft.branch);
  const formulaMode = draft.formulaMode ?? 'stub';
  const formulaUrl = draft.formulaUrl?.trim() || undefined;
  const formulaName = draft.formulaName === undefined
    ? undefined
    : normalizeToken('formula name', draft.formulaName);

  if (formulaMode === 'brew-create' && !formulaUrl) {
    throw new InputError('formula-url is required when formula-mode is brew-create');
  }

  if (tap.startsWith('homebrew-')) {
    warnings.push(`Tap short name includes 'homebrew-'; default repo would become 'homebrew-${tap}'.`);
  }

  const repoName = draft.repoName === undefined
    ? `homebrew-${tap}`
    : normalizeToken('repo name', draft.repoName);

  if (repoName !== `homebrew-${tap}`) {
    warnings.push(`Repo name does not match homebrew-<short>; 'brew tap ${owner}/${tap}' shorthand may not work.`);
  }

  return {
    inputs: {
      owner,
      tap,
      repoName,
      visibility: draft.visibility ?? 'public',
      branch,
      formulaMode,
      formulaUrl,
      formulaName,
    },
    warnings,
  };
}

export function repoSlug(inputs: TapInputs): string {
  return `${inputs.owner}/${inputs.repoName}`;
}

export function tapShorthand(inputs: TapInputs): string {
  return `${inputs.owner}/${inputs.tap}`;
}

/** `brew tap owner/name` only maps to github.com/owner/homebrew-name. */
export function supportsShorthand(inputs: TapInputs): boolean {
  return inputs.repoName === `homebrew-${inputs.tap}`;
}

export function preferredTapName(inputs: TapInputs): string {
  return supportsShorthand(inputs) ? tapShorthand(inputs) : repoSlug(inputs);
}
