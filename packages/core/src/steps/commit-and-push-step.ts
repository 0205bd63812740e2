import { succeeded } from '../domain/command/command-spec.js';
import { isDirty, parseBranchHeader } from '../domain/tap/git-status.js';
import type { VerifyStatus } from '../domain/step/step.js';
import type { TapRunContext, TapStep } from '../domain/tap/tap-state.js';
import {
  assertGitRepo,
  commandFailure,
  git,
  requireTapPath,
  runChecked,
  type TapStepDeps,
} from './step-helpers.js';

export const COMMIT_MESSAGE = 'Update tap files';

const BEHIND_MESSAGE = 'local branch is behind origin; pull is required before pushing';

interface StatusInfo {
  dirty: boolean;
  branch: string;
  hasUpstream: boolean;
  ahead: number;
  behind: number;
}

export class CommitAndPushStep implements TapStep {
  readonly id = 'commit_and_push';
  readonly description = 'Commit and push changes';

  constructor(private readonly deps: TapStepDeps) {}

  private async statusInfo(tapPath: string): Promise<StatusInfo> {
    const porcelain = await runChecked(this.deps.commands, git(tapPath, 'status', '--porcelain'));
    const short = await runChecked(this.deps.commands, git(tapPath, 'status', '-sb'));
    const header = parseBranchHeader(short.stdout);

    let branch = header.branch;
    if (!branch) {
      const head = await runChecked(this.deps.commands, git(tapPath, 'rev-parse', '--abbrev-ref', 'HEAD'));
      branch = head.stdout.trim();
    }

    return { ...header, branch, dirty: isDirty(porcelain.stdout) };
  }

  private async commit(tapPath: string): Promise<void> {
    this.deps.events.onStepLog(`git commit -m "${COMMIT_MESSAGE}"`);
    await runChecked(this.deps.commands, git(tapPath, 'add', '-A'));

    const result = await this.deps.commands.run(git(tapPath, 'commit', '-m', COMMIT_MESSAGE));
    if (succeeded(result)) return;

    const combined = `${result.stdout}${result.stderr}`.toLowerCase();
    if (combined.includes('nothing to commit')) return;
    throw commandFailure(result, 'git commit');
  }

  private async push(tapPath: string, branch: string, setUpstream: boolean): Promise<void> {
    const args = setUpstream ? ['push', '-u', 'origin', branch] : ['push'];
    this.deps.events.onStepLog(`git ${args.join(' ')}`);
    await runChecked(this.deps.commands, git(tapPath, ...args));
  }

  async preflight(ctx: TapRunContext): Promise<void> {
    const tapPath = requireTapPath(ctx);
    await assertGitRepo(tapPath);

    const origin = await this.deps.commands.run(git(tapPath, 'remote', 'get-url', 'origin'));
    if (!succeeded(origin)) {
      throw new Error(`origin remote is missing: ${origin.stderr.trim()}`);
    }
  }

  async apply(ctx: TapRunContext): Promise<void> {
    const tapPath = requireTapPath(ctx);

    let status = await this.statusInfo(tapPath);
    if (status.behind > 0) throw new Error(BEHIND_MESSAGE);

    if (status.dirty) {
      await this.commit(tapPath);
      status = await this.statusInfo(tapPath);
      if (status.behind > 0) throw new Error(BEHIND_MESSAGE);
    }

    if (status.ahead > 0 || !status.hasUpstream) {
      await this.push(tapPath, status.branch, !status.hasUpstream);
    }
  }

  async verify(ctx: TapRunContext): Promise<VerifyStatus> {
    const status = await this.statusInfo(requireTapPath(ctx));
    if (status.behind > 0) throw new Error(BEHIND_MESSAGE);

    if (status.dirty || status.ahead > 0 || !status.hasUpstream) {
      return 'incomplete';
    }
    return 'complete';
  }
}
