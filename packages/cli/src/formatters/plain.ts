import type { RunSummary, StepDescriptor, StepRecord, TapRunState, TapSummary } from '@tapsmith/core';
import { consoleWriter, type OutputFormatter, type Writer } from './formatter.js';

export interface PlainFormatterOptions {
  /** Only warnings, the summary and errors. */
  quiet?: boolean;
  /** Echo the output of every command. */
  showOutput?: boolean;
}

export function resumeHint(runId: string): string {
  return `Resume with: tapsmith setup --resume ${runId}`;
}

export function formatSummary(summary: TapSummary): string[] {
  const lines = [
    '',
    'Summary',
    `  Run ID: ${summary.runId}`,
    `  Repo: ${summary.repoSlug}`,
    `  Tap path: ${summary.tapPath}`,
    `  State: ${summary.statePath}`,
    summary.formulaMode === 'stub'
      ? `  Stub formula: ${summary.formulaLocation}`
      : `  Formula directory: ${summary.formulaLocation}`,
    '',
    'Next steps',
    '  - Edit the formula and replace the TODO fields.',
    `  - ${summary.installCommand} (once the formula URL and sha256 are valid)`,
  ];
  return lines;
}

export function formatRunList(runs: RunSummary[]): string[] {
  const lines = [
    `  ${'ID'.padEnd(38)} ${'Started'.padEnd(26)} ${'Outcome'.padEnd(12)} ${'Steps'.padEnd(6)} Current`,
    `  ${'-'.repeat(38)} ${'-'.repeat(26)} ${'-'.repeat(12)} ${'-'.repeat(6)} ${'-'.repeat(16)}`,
  ];
  for (const run of runs) {
    const steps = `${run.completedSteps}/${run.totalSteps}`;
    lines.push(
      `  ${run.runId.padEnd(38)} ${run.startedAt.padEnd(26)} ${run.outcome.padEnd(12)} ${steps.padEnd(6)} ${run.currentStep ?? ''}`.trimEnd(),
    );
  }
  return lines;
}

export function formatRunDetails(state: TapRunState, summary: RunSummary, statePath: string): string[] {
  const lines = [
    `Run: ${state.runId}`,
    `Started: ${state.startedAt}`,
    `Outcome: ${summary.outcome}${state.dryRun ? ' (dry run)' : ''}`,
    `State: ${statePath}`,
  ];
  if (state.inputs) {
    lines.push(`Repo: ${state.inputs.owner}/${state.inputs.repoName} (${state.inputs.visibility})`);
  }
  if (state.scratch.tapPath) {
    lines.push(`Tap path: ${state.scratch.tapPath}`);
  }

  lines.push('', 'Steps:');
  for (const record of state.steps) {
    const note = record.skippedApply && record.status === 'complete' ? ' (apply skipped)' : '';
    lines.push(`  ${record.status.padEnd(9)} ${record.id}${note}`);
    if (record.error) {
      lines.push(`            ${record.error}`);
    }
  }
  return lines;
}

export class PlainFormatter implements OutputFormatter {
  constructor(
    private readonly options: PlainFormatterOptions = {},
    private readonly writer: Writer = consoleWriter,
  ) {}

  private progress(line: string): void {
    if (!this.options.quiet) this.writer.out(line);
  }

  renderRunStart(runId: string, dryRun: boolean): void {
    this.progress(`Run ${runId}${dryRun ? ' (dry run)' : ''}`);
  }

  renderStepStart(step: StepDescriptor): void {
    this.progress(`==> ${step.description} (${step.id})`);
  }

  renderStepFinish(_step: StepDescriptor, record: StepRecord): void {
    if (record.status === 'dry-run') {
      this.progress('    dry-run: apply skipped');
    } else if (record.skippedApply) {
      this.progress('    already complete');
    }
  }

  renderStepSkipped(step: StepDescriptor): void {
    this.progress(`==> ${step.description} (${step.id})`);
    this.progress('    already complete (earlier run)');
  }

  renderStepFailed(): void {
    this.progress('    failed');
  }

  renderStepLog(message: string): void {
    this.progress(`    ${message}`);
  }

  renderCommandOutput(line: string): void {
    if (this.options.showOutput) this.progress(`      ${line}`);
  }

  renderWarning(message: string): void {
    this.writer.err(`Warning: ${message}`);
  }

  renderSummary(summary: TapSummary): void {
    for (const line of formatSummary(summary)) {
      this.writer.out(line);
    }
  }

  renderComplete(state: TapRunState): void {
    this.progress(
      state.dryRun ? `\nDry run ${state.runId} finished; nothing was applied.` : `\nRun ${state.runId} complete.`,
    );
  }

  renderError(error: string, runId?: string): void {
    this.writer.err(`Error: ${error}`);
    if (runId) this.writer.err(resumeHint(runId));
  }
}
