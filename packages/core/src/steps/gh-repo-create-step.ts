import { z } from 'zod';
import { succeeded } from '../domain/command/command-spec.js';
import type { VerifyStatus } from '../domain/step/step.js';
import { repoSlug } from '../domain/tap/tap-inputs.js';
import type { TapRunContext, TapStep } from '../domain/tap/tap-state.js';
import {
  assertGitRepo,
  commandFailure,
  git,
  requireTapPath,
  runChecked,
  type TapStepDeps,
} from './step-helpers.js';

const repoUrlsSchema = z.object({
  sshUrl: z.string(),
  url: z.string(),
});

type RepoUrls = z.infer<typeof repoUrlsSchema>;

function isRepoMissing(stderr: string): boolean {
  const text = stderr.toLowerCase();
  return text.includes('not found') || text.includes('could not resolve to a repository') || text.includes('404');
}

function isRemoteMissing(stderr: string): boolean {
  const text = stderr.toLowerCase();
  return text.includes('no such remote') || text.includes('does not appear to be a git repository');
}

export class GhRepoCreateStep implements TapStep {
  readonly id = 'gh_repo_create';
  readonly description = 'Create GitHub repo and push';

  constructor(private readonly deps: TapStepDeps) {}

  private async repoExists(slug: string): Promise<boolean> {
    const result = await this.deps.commands.run({ command: 'gh', args: ['repo', 'view', slug, '--json', 'name'] });
    if (succeeded(result)) return true;
    if (isRepoMissing(result.stderr)) return false;
    throw new Error(`gh repo view failed: ${result.stderr.trim()}`);
  }

  private async fetchRepoUrls(slug: string): Promise<RepoUrls> {
    const result = await runChecked(this.deps.commands, {
      command: 'gh',
      args: ['repo', 'view', slug, '--json', 'sshUrl,url'],
    });

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch (err) {
      throw new Error('failed to parse gh repo view output', { cause: err });
    }
    const parsed = repoUrlsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`unexpected gh repo view output: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async originUrl(tapPath: string): Promise<string | undefined> {
    const result = await this.deps.commands.run(git(tapPath, 'remote', 'get-url', 'origin'));
    if (succeeded(result)) return result.stdout.trim();
    if (isRemoteMissing(result.stderr)) return undefined;
    throw new Error(`git remote get-url failed: ${result.stderr.trim()}`);
  }

  private async ensureBranch(tapPath: string, branch: string): Promise<void> {
    const head = await this.deps.commands.run(git(tapPath, 'rev-parse', '--abbrev-ref', 'HEAD'));
    if (!succeeded(head)) {
      throw commandFailure(head, 'git rev-parse');
    }
    if (head.stdout.trim() === branch) return;

    this.deps.events.onStepLog(`git branch -M ${branch}`);
    await runChecked(this.deps.commands, git(tapPath, 'branch', '-M', branch));
  }

  async preflight(ctx: TapRunContext): Promise<void> {
    await assertGitRepo(requireTapPath(ctx));
  }

  async apply(ctx: TapRunContext): Promise<void> {
    const tapPath = requireTapPath(ctx);
    const slug = repoSlug(ctx.inputs);

    await this.ensureBranch(tapPath, ctx.inputs.branch);

    const visibilityFlag = ctx.inputs.visibility === 'private' ? '--private' : '--public';
    this.deps.events.onStepLog(`gh repo create ${slug} --source ${tapPath} --push`);
    await runChecked(this.deps.commands, {
      command: 'gh',
      args: ['repo', 'create', slug, '--source', tapPath, '--push', '--remote', 'origin', visibilityFlag],
    });
  }

  async verify(ctx: TapRunContext): Promise<VerifyStatus> {
    const tapPath = requireTapPath(ctx);
    const slug = repoSlug(ctx.inputs);

    if (!(await this.repoExists(slug))) {
      return 'incomplete';
    }

    const remoteUrl = await this.originUrl(tapPath);
    if (remoteUrl === undefined) {
      throw new Error(`GitHub repo exists but no 'origin' remote is set for ${tapPath}`);
    }

    const urls = await this.fetchRepoUrls(slug);
    const accepted = [urls.sshUrl, urls.url, `${urls.url}.git`];
    if (!accepted.includes(remoteUrl)) {
      throw new Error(`origin remote does not match repo ${slug} (found: ${remoteUrl})`);
    }
    return 'complete';
  }
}
