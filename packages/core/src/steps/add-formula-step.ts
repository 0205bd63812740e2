import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { VerifyStatus } from '../domain/step/step.js';
import { deriveFormulaNameFromUrl, formulaClassName, renderStubFormula } from '../domain/tap/formula.js';
import { repoSlug } from '../domain/tap/tap-inputs.js';
import type { TapRunContext, TapStep } from '../domain/tap/tap-state.js';
import { createLogger } from '../shared/logger.js';
import { pathExists, requireTapPath, runChecked, type TapStepDeps } from './step-helpers.js';

const log = createLogger('add-formula');

const NO_EDITOR = '/usr/bin/true';

function formulaDir(tapPath: string): string {
  return join(tapPath, 'Formula');
}

function stubFormulaPath(ctx: TapRunContext): string {
  return join(formulaDir(requireTapPath(ctx)), `${ctx.inputs.tap}.rb`);
}

async function listFormulaNames(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) return [];
  const entries = await readdir(dir);
  return entries
    .filter((entry) => entry.endsWith('.rb'))
    .map((entry) => entry.slice(0, -'.rb'.length))
    .sort();
}

export class AddFormulaStep implements TapStep {
  readonly id = 'add_formula';
  readonly description = 'Add formula';

  constructor(private readonly deps: TapStepDeps) {}

  async preflight(ctx: TapRunContext): Promise<void> {
    const tapPath = requireTapPath(ctx);
    if (!(await pathExists(tapPath))) {
      throw new Error(`tap path does not exist: ${tapPath}`);
    }
    if (ctx.inputs.formulaMode === 'brew-create' && !ctx.inputs.formulaUrl) {
      throw new Error('formula-url is required for brew-create mode');
    }
  }

  async apply(ctx: TapRunContext): Promise<void> {
    const dir = formulaDir(requireTapPath(ctx));

    if (ctx.inputs.formulaMode === 'stub') {
      await mkdir(dir, { recursive: true });
      const formulaPath = stubFormulaPath(ctx);
      if (!(await pathExists(formulaPath))) {
        this.deps.events.onStepLog(`write ${formulaPath}`);
        await writeFile(formulaPath, renderStubFormula(formulaClassName(ctx.inputs.tap)), 'utf-8');
      }
      await ctx.updateScratch({ formulaName: ctx.inputs.tap });
      return;
    }

    const url = ctx.inputs.formulaUrl ?? '';
    const name = ctx.inputs.formulaName ?? deriveFormulaNameFromUrl(url);
    if (!name) {
      throw new Error('formula-name is required when it cannot be derived from the formula URL');
    }

    const slug = repoSlug(ctx.inputs);
    this.deps.events.onStepLog(`brew create --tap ${slug} ${url}`);
    await runChecked(this.deps.commands, {
      command: 'brew',
      args: ['create', '--tap', slug, '--set-name', name, url],
      env: { HOMEBREW_EDITOR: NO_EDITOR, EDITOR: NO_EDITOR },
    });

    // brew may normalise the name; trust the file it wrote when there is exactly one.
    const names = await listFormulaNames(dir);
    await ctx.updateScratch({ formulaName: names.length === 1 ? names[0] : name });
  }

  async verify(ctx: TapRunContext): Promise<VerifyStatus> {
    if (ctx.inputs.formulaMode === 'stub') {
      return (await pathExists(stubFormulaPath(ctx))) ? 'complete' : 'incomplete';
    }
    const names = await listFormulaNames(formulaDir(requireTapPath(ctx)));
    return names.length > 0 ? 'complete' : 'incomplete';
  }

  /** Removes the formula file this step produced. */
  async undo(ctx: TapRunContext): Promise<void> {
    const name = ctx.inputs.formulaMode === 'stub' ? ctx.inputs.tap : ctx.state.scratch.formulaName;
    if (!name) {
      log.info('undo: no formula was recorded for this run');
      return;
    }

    const formulaPath = join(formulaDir(requireTapPath(ctx)), `${name}.rb`);
    this.deps.events.onStepLog(`remove ${formulaPath}`);
    await rm(formulaPath, { force: true });
    await ctx.updateScratch({ formulaName: undefined });
  }
}
