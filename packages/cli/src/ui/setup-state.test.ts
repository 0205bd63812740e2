import { describe, expect, it } from 'vitest';
import { initialSetupState, setupReducer, type Action, type SetupState } from './setup-state.js';

const PREFLIGHT = { id: 'preflight', description: 'Preflight checks' };
const TAP_NEW = { id: 'brew_tap_new', description: 'Create local tap' };

function reduce(actions: Action[]): SetupState {
  return actions.reduce(setupReducer, initialSetupState([PREFLIGHT, TAP_NEW]));
}

describe('setupReducer', () => {
  it('should start with every step pending', () => {
    const state = initialSetupState([PREFLIGHT, TAP_NEW]);

    expect(state.steps).toEqual([
      { id: 'preflight', description: 'Preflight checks', status: 'pending', applySkipped: false },
      { id: 'brew_tap_new', description: 'Create local tap', status: 'pending', applySkipped: false },
    ]);
    expect(state.done).toBe(false);
  });

  it('should track a step from start to finish', () => {
    const state = reduce([
      { type: 'RUN_START', runId: 'run-1', dryRun: false },
      { type: 'STEP_START', step: TAP_NEW, at: 1000 },
      { type: 'STEP_LOG', message: '$ brew tap-new octo/tools' },
      { type: 'STEP_FINISH', step: TAP_NEW, record: { id: 'brew_tap_new', status: 'complete', skippedApply: false }, at: 2500 },
    ]);

    expect(state.runId).toBe('run-1');
    expect(state.steps[1]).toMatchObject({ status: 'complete', applySkipped: false, startedAt: 1000, finishedAt: 2500 });
    expect(state.activity).toBe('$ brew tap-new octo/tools');
  });

  it('should show dry-run and skipped steps apart from applied ones', () => {
    const state = reduce([
      { type: 'STEP_SKIPPED', step: PREFLIGHT },
      { type: 'STEP_START', step: TAP_NEW, at: 0 },
      { type: 'STEP_FINISH', step: TAP_NEW, record: { id: 'brew_tap_new', status: 'dry-run', skippedApply: true }, at: 5 },
    ]);

    expect(state.steps.map((step) => [step.status, step.applySkipped])).toEqual([
      ['skipped', true],
      ['dry-run', true],
    ]);
  });

  it('should clear the previous error when a step starts again', () => {
    const state = reduce([
      { type: 'STEP_START', step: TAP_NEW, at: 0 },
      { type: 'STEP_FAILED', step: TAP_NEW, error: 'tap-new exited with code 1', at: 10 },
      { type: 'STEP_START', step: TAP_NEW, at: 20 },
    ]);

    expect(state.steps[1]).toMatchObject({ status: 'running', startedAt: 20 });
    expect(state.steps[1].error).toBeUndefined();
    expect(state.steps[1].finishedAt).toBeUndefined();
  });

  it('should keep the latest non-blank command output until the next log line', () => {
    let state = reduce([
      { type: 'COMMAND_OUTPUT', line: 'Initialized empty Git repository' },
      { type: 'COMMAND_OUTPUT', line: '   ' },
    ]);
    expect(state.lastOutput).toBe('Initialized empty Git repository');

    state = setupReducer(state, { type: 'STEP_LOG', message: '$ git push' });
    expect(state.lastOutput).toBeNull();
  });

  it('should finish on an error', () => {
    const state = reduce([
      { type: 'WARNING', message: 'repo name does not start with homebrew-' },
      { type: 'ERROR', error: 'Apply failed for step gh_repo_create: HTTP 500' },
    ]);

    expect(state.warnings).toEqual(['repo name does not start with homebrew-']);
    expect(state.error).toBe('Apply failed for step gh_repo_create: HTTP 500');
    expect(state.done).toBe(true);
  });
});
