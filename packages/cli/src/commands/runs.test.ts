import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { registerRunsCommand } from './runs.js';

describe('runs command', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tapsmith-runs-'));
    vi.stubEnv('XDG_CONFIG_HOME', join(dir, 'config'));
    vi.stubEnv('TAPSMITH_STATE_DIR', join(dir, 'state'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function program(): Command {
    const root = new Command().exitOverride();
    registerRunsCommand(root);
    return root;
  }

  it('should print an invalid setting as an error and exit 1', async () => {
    vi.stubEnv('TAPSMITH_VISIBILITY', 'secret');
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    await expect(program().parseAsync(['node', 'tapsmith', 'runs'])).rejects.toThrow('exit 1');

    expect(errors).toHaveBeenCalledWith("Error: TAPSMITH_VISIBILITY must be 'public' or 'private', got 'secret'");
  });

  it('should report an unknown run id as an error', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    await expect(program().parseAsync(['node', 'tapsmith', 'runs', 'missing'])).rejects.toThrow('exit 1');

    expect(errors).toHaveBeenCalledWith(
      `Error: No state found for run missing (${join(dir, 'state', 'runs', 'missing', 'state.json')})`,
    );
  });

  it('should say so when there are no runs', async () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    await program().parseAsync(['node', 'tapsmith', 'runs']);

    expect(out).toHaveBeenCalledWith('No runs found.');
  });
});
