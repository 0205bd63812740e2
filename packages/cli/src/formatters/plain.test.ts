import { describe, expect, it } from 'vitest';
import type { RunSummary, TapRunState, TapSummary } from '@tapsmith/core';
import type { Writer } from './formatter.js';
import { PlainFormatter, formatRunDetails, formatRunList, formatSummary } from './plain.js';

function recordingWriter(): Writer & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
  };
}

const STEP = { id: 'brew_tap_new', description: 'Create local tap' };

const SUMMARY: TapSummary = {
  runId: 'run-1',
  repoSlug: 'octo/homebrew-tools',
  tapName: 'octo/tools',
  tapPath: '/brew/Library/Taps/octo/homebrew-tools',
  statePath: '/state/runs/run-1/state.json',
  formulaMode: 'stub',
  formulaLocation: '/brew/Library/Taps/octo/homebrew-tools/Formula/tools.rb',
  installCommand: 'brew install octo/tools/tools',
};

function tapState(overrides: Partial<TapRunState> = {}): TapRunState {
  return {
    schemaVersion: 1,
    runId: 'run-1',
    startedAt: '2026-03-01T10:00:00.000Z',
    dryRun: false,
    steps: [],
    inputs: {
      owner: 'octo',
      tap: 'tools',
      repoName: 'homebrew-tools',
      visibility: 'public',
      branch: 'main',
      formulaMode: 'stub',
    },
    scratch: { summaryPrinted: false },
    ...overrides,
  };
}

describe('formatSummary', () => {
  it('should list the stub formula and next steps', () => {
    expect(formatSummary(SUMMARY)).toEqual([
      '',
      'Summary',
      '  Run ID: run-1',
      '  Repo: octo/homebrew-tools',
      '  Tap path: /brew/Library/Taps/octo/homebrew-tools',
      '  State: /state/runs/run-1/state.json',
      '  Stub formula: /brew/Library/Taps/octo/homebrew-tools/Formula/tools.rb',
      '',
      'Next steps',
      '  - Edit the formula and replace the TODO fields.',
      '  - brew install octo/tools/tools (once the formula URL and sha256 are valid)',
    ]);
  });

  it('should name the formula directory in brew-create mode', () => {
    const lines = formatSummary({
      ...SUMMARY,
      formulaMode: 'brew-create',
      formulaLocation: '/brew/Library/Taps/octo/homebrew-tools/Formula',
    });

    expect(lines[6]).toBe('  Formula directory: /brew/Library/Taps/octo/homebrew-tools/Formula');
  });
});

describe('formatRunList', () => {
  it('should print one padded row per run', () => {
    const runs: RunSummary[] = [
      {
        runId: 'run-1',
        startedAt: '2026-03-01T10:00:00.000Z',
        dryRun: false,
        outcome: 'failed',
        completedSteps: 2,
        totalSteps: 7,
        currentStep: 'gh_repo_create',
      },
      {
        runId: 'run-2',
        startedAt: '2026-03-02T10:00:00.000Z',
        dryRun: false,
        outcome: 'complete',
        completedSteps: 7,
        totalSteps: 7,
      },
    ];

    const lines = formatRunList(runs);

    expect(lines).toHaveLength(4);
    expect(lines[2]).toBe(
      `  ${'run-1'.padEnd(38)} ${'2026-03-01T10:00:00.000Z'.padEnd(26)} ${'failed'.padEnd(12)} ${'2/7'.padEnd(6)} gh_repo_create`,
    );
    expect(lines[3]).toBe(
      `  ${'run-2'.padEnd(38)} ${'2026-03-02T10:00:00.000Z'.padEnd(26)} ${'complete'.padEnd(12)} 7/7`,
    );
  });
});

describe('formatRunDetails', () => {
  it('should show inputs, step statuses and errors', () => {
    const state = tapState({
      dryRun: true,
      steps: [
        { id: 'preflight', status: 'complete', skippedApply: true },
        { id: 'brew_tap_new', status: 'dry-run', skippedApply: true },
        { id: 'gh_repo_create', status: 'failed', skippedApply: false, error: 'tap path does not exist' },
      ],
      scratch: { tapPath: '/taps/octo/homebrew-tools', summaryPrinted: false },
    });
    const summary: RunSummary = {
      runId: 'run-1',
      startedAt: state.startedAt,
      dryRun: true,
      outcome: 'failed',
      completedSteps: 1,
      totalSteps: 7,
      currentStep: 'gh_repo_create',
      error: 'tap path does not exist',
    };

    expect(formatRunDetails(state, summary, '/state/runs/run-1/state.json')).toEqual([
      'Run: run-1',
      'Started: 2026-03-01T10:00:00.000Z',
      'Outcome: failed (dry run)',
      'State: /state/runs/run-1/state.json',
      'Repo: octo/homebrew-tools (public)',
      'Tap path: /taps/octo/homebrew-tools',
      '',
      'Steps:',
      '  complete  preflight (apply skipped)',
      '  dry-run   brew_tap_new',
      '  failed    gh_repo_create',
      '            tap path does not exist',
    ]);
  });
});

describe('PlainFormatter', () => {
  it('should print step headers and apply notes', () => {
    const writer = recordingWriter();
    const formatter = new PlainFormatter({}, writer);

    formatter.renderRunStart('run-1', true);
    formatter.renderStepStart(STEP);
    formatter.renderStepLog('$ brew tap-new octo/tools');
    formatter.renderStepFinish(STEP, { id: STEP.id, status: 'dry-run', skippedApply: true });
    formatter.renderStepSkipped({ id: 'preflight', description: 'Preflight checks' });

    expect(writer.lines).toEqual([
      'Run run-1 (dry run)',
      '==> Create local tap (brew_tap_new)',
      '    $ brew tap-new octo/tools',
      '    dry-run: apply skipped',
      '==> Preflight checks (preflight)',
      '    already complete (earlier run)',
    ]);
  });

  it('should note a step whose goal already held', () => {
    const writer = recordingWriter();
    const formatter = new PlainFormatter({}, writer);

    formatter.renderStepFinish(STEP, { id: STEP.id, status: 'complete', skippedApply: true });
    formatter.renderStepFinish(STEP, { id: STEP.id, status: 'complete', skippedApply: false });

    expect(writer.lines).toEqual(['    already complete']);
  });

  it('should echo command output only when asked to', () => {
    const quietOutput = recordingWriter();
    new PlainFormatter({}, quietOutput).renderCommandOutput('Cloning into...');
    const verbose = recordingWriter();
    new PlainFormatter({ showOutput: true }, verbose).renderCommandOutput('Cloning into...');

    expect(quietOutput.lines).toEqual([]);
    expect(verbose.lines).toEqual(['      Cloning into...']);
  });

  it('should keep the summary and errors in quiet mode', () => {
    const writer = recordingWriter();
    const formatter = new PlainFormatter({ quiet: true }, writer);

    formatter.renderStepStart(STEP);
    formatter.renderSummary(SUMMARY);
    formatter.renderComplete(tapState());
    formatter.renderWarning('repo name does not start with homebrew-');

    expect(writer.lines).toEqual(formatSummary(SUMMARY));
    expect(writer.errors).toEqual(['Warning: repo name does not start with homebrew-']);
  });

  it('should announce how a run ended', () => {
    const writer = recordingWriter();
    const formatter = new PlainFormatter({}, writer);

    formatter.renderComplete(tapState());
    formatter.renderComplete(tapState({ runId: 'run-2', dryRun: true }));

    expect(writer.lines).toEqual(['\nRun run-1 complete.', '\nDry run run-2 finished; nothing was applied.']);
  });

  it('should follow an error with the resume command once a run exists', () => {
    const writer = recordingWriter();
    const formatter = new PlainFormatter({}, writer);

    formatter.renderError('owner is required');
    formatter.renderError('Apply failed for step gh_repo_create: HTTP 500', 'run-1');

    expect(writer.errors).toEqual([
      'Error: owner is required',
      'Error: Apply failed for step gh_repo_create: HTTP 500',
      'Resume with: tapsmith setup --resume run-1',
    ]);
  });
});
