import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonStateStore } from '../adapters/json-state-store.js';
import type { TapRunState } from '../domain/tap/tap-state.js';
import { tapRunStateSchema } from '../domain/tap/tap-state.js';
import type { TapSummary } from '../domain/tap/tap-summary.js';
import { noopTapSetupEvents, type TapSetupEvents } from '../ports/workflow-events.js';
import { EffectError, PreconditionError } from '../shared/errors.js';
import { pathExists } from '../steps/step-helpers.js';
import { FakeCommandRunner } from '../testing/fake-command-runner.js';
import { TEST_INPUTS } from '../testing/tap-fixtures.js';
import { TapSetupService } from './tap-setup-service.js';

interface World {
  commands: FakeCommandRunner;
  failCreate: boolean;
  tapNewCalls: number;
}

/** brew, gh and git answers for a machine where nothing exists yet. */
function fakeWorld(brewRoot: string, tapPath: string): World {
  let created = false;
  let committed = false;
  let ahead = 0;
  let tapped = false;

  const world: World = { commands: new FakeCommandRunner(), failCreate: false, tapNewCalls: 0 };
  world.commands
    .on('brew --repository', { stdout: `${brewRoot}\n` })
    .on('brew tap', (spec) => {
      if (spec.args.length > 1) {
        tapped = true;
        return {};
      }
      return { stdout: tapped ? 'homebrew/core\nocto/tools\n' : 'homebrew/core\n' };
    })
    .on('brew tap-new', async () => {
      world.tapNewCalls += 1;
      await mkdir(join(tapPath, '.git'), { recursive: true });
      return {};
    })
    .on('gh repo view', () => (created ? {} : { exitCode: 1, stderr: 'GraphQL: Could not resolve to a Repository' }))
    .on('gh repo view octo/homebrew-tools --json sshUrl,url', {
      stdout: JSON.stringify({
        sshUrl: 'git@github.com:octo/homebrew-tools.git',
        url: 'https://github.com/octo/homebrew-tools',
      }),
    })
    .on('gh repo create', () => {
      if (world.failCreate) return { exitCode: 1, stderr: 'HTTP 500' };
      created = true;
      return {};
    })
    .on('git rev-parse --abbrev-ref HEAD', { stdout: 'main\n' })
    .on('git remote get-url origin', () =>
      created
        ? { stdout: 'https://github.com/octo/homebrew-tools.git\n' }
        : { exitCode: 2, stderr: "error: No such remote 'origin'" },
    )
    .on('git status --porcelain', async () => {
      const dirty = !committed && (await pathExists(join(tapPath, 'Formula', 'tools.rb')));
      return { stdout: dirty ? '?? Formula/tools.rb\n' : '' };
    })
    .on('git status -sb', () => ({ stdout: `## main...origin/main${ahead ? ` [ahead ${ahead}]` : ''}\n` }))
    .on('git commit', () => {
      committed = true;
      ahead = 1;
      return {};
    })
    .on('git push', () => {
      ahead = 0;
      return {};
    });
  return world;
}

interface Recorder {
  events: TapSetupEvents;
  runIds: string[];
  summaries: TapSummary[];
  completed: TapRunState[];
  errors: string[];
}

function recorder(): Recorder {
  const rec: Recorder = {
    runIds: [],
    summaries: [],
    completed: [],
    errors: [],
    events: noopTapSetupEvents,
  };
  rec.events = {
    ...noopTapSetupEvents,
    onRunStart: (runId) => rec.runIds.push(runId),
    onSummary: (summary) => rec.summaries.push(summary),
    onComplete: (state) => rec.completed.push(state),
    onError: (error) => rec.errors.push(error),
  };
  return rec;
}

describe('TapSetupService', () => {
  let root: string;
  let brewRoot: string;
  let tapPath: string;
  let world: World;
  let rec: Recorder;
  let service: TapSetupService;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'tapsmith-service-'));
    brewRoot = join(root, 'brew');
    tapPath = join(brewRoot, 'Library', 'Taps', 'octo', 'homebrew-tools');
    world = fakeWorld(brewRoot, tapPath);
    rec = recorder();
    service = new TapSetupService({
      stateStore: new JsonStateStore(join(root, 'state'), tapRunStateSchema),
      commands: world.commands,
      events: rec.events,
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should list the workflow steps in order', () => {
    expect(service.steps.map((step) => step.id)).toEqual([
      'preflight',
      'brew_tap_new',
      'gh_repo_create',
      'add_formula',
      'commit_and_push',
      'validate_tap',
      'final_summary',
    ]);
  });

  it('should provision a tap from scratch', async () => {
    const state = await service.start({ inputs: TEST_INPUTS, dryRun: false });

    expect(state.steps.map((record) => [record.id, record.status, record.skippedApply])).toEqual([
      ['preflight', 'complete', true],
      ['brew_tap_new', 'complete', false],
      ['gh_repo_create', 'complete', false],
      ['add_formula', 'complete', false],
      ['commit_and_push', 'complete', false],
      ['validate_tap', 'complete', false],
      ['final_summary', 'complete', false],
    ]);
    expect(state.scratch).toEqual({ tapPath, formulaName: 'tools', summaryPrinted: true });
    expect(await pathExists(join(tapPath, 'Formula', 'tools.rb'))).toBe(true);
    expect(rec.summaries.map((summary) => summary.installCommand)).toEqual(['brew install octo/tools/tools']);
    expect(rec.completed).toHaveLength(1);
    expect(rec.errors).toEqual([]);

    const [summary] = await service.list();
    expect(summary).toMatchObject({ runId: state.runId, outcome: 'complete', completedSteps: 7, totalSteps: 7 });
  });

  it('should resume a failed run without repeating finished steps', async () => {
    world.failCreate = true;

    const error = await service.start({ inputs: TEST_INPUTS, dryRun: false }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EffectError);
    expect(rec.errors).toHaveLength(1);
    expect(rec.errors[0].startsWith('Apply failed for step gh_repo_create: ')).toBe(true);
    const [runId] = rec.runIds;
    expect((await service.list())[0]).toMatchObject({
      runId,
      outcome: 'failed',
      currentStep: 'gh_repo_create',
      completedSteps: 2,
    });

    world.failCreate = false;
    const state = await service.resume(runId, false);

    expect(state.steps.every((record) => record.status === 'complete')).toBe(true);
    expect(world.tapNewCalls).toBe(1);
    expect(world.commands.keys.filter((key) => key === 'brew --repository')).toHaveLength(1);
    expect(rec.runIds).toEqual([runId, runId]);
  });

  it('should stop a fresh dry run where the tap would have to exist', async () => {
    const error = await service.start({ inputs: TEST_INPUTS, dryRun: true }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PreconditionError);
    const state = await service.status(rec.runIds[0]);
    expect(state.dryRun).toBe(true);
    expect(state.steps.map((record) => [record.id, record.status])).toEqual([
      ['preflight', 'complete'],
      ['brew_tap_new', 'dry-run'],
      ['gh_repo_create', 'failed'],
    ]);
    expect(state.steps[2].error).toBe(`Preflight failed for step gh_repo_create: tap path does not exist: ${tapPath}`);
    expect(world.tapNewCalls).toBe(0);
  });

  it('should undo a finished step so the next resume repeats it', async () => {
    const { runId } = await service.start({ inputs: TEST_INPUTS, dryRun: false });

    await service.undo(runId, 'final_summary');

    const state = await service.status(runId);
    expect(state.steps[6]).toMatchObject({ id: 'final_summary', status: 'pending' });
    expect(state.scratch.summaryPrinted).toBe(false);

    await service.resume(runId, false);
    expect(rec.summaries).toHaveLength(2);
  });

  it('should report resuming an unknown run through onError', async () => {
    await expect(service.resume('missing', false)).rejects.toThrow('No state found for run missing');
    expect(rec.errors).toEqual([
      `No state found for run missing (${join(root, 'state', 'runs', 'missing', 'state.json')})`,
    ]);
  });
});
