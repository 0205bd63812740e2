import { describe, expect, it } from 'vitest';
import { FakeCommandRunner } from '../testing/fake-command-runner.js';
import { TEST_INPUTS, recordingDeps, tapContext } from '../testing/tap-fixtures.js';
import { ValidateTapStep } from './validate-tap-step.js';

describe('ValidateTapStep', () => {
  it('should find the tap by its shorthand', async () => {
    const commands = new FakeCommandRunner().on('brew tap', { stdout: 'homebrew/core\nocto/tools\n' });
    const ctx = await tapContext();

    expect(await new ValidateTapStep(recordingDeps(commands)).verify(ctx)).toBe('complete');
  });

  it('should report an unregistered tap as incomplete', async () => {
    const commands = new FakeCommandRunner().on('brew tap', { stdout: 'homebrew/core\n' });
    const ctx = await tapContext();

    expect(await new ValidateTapStep(recordingDeps(commands)).verify(ctx)).toBe('incomplete');
  });

  it('should only accept the full slug for a custom repo name', async () => {
    const commands = new FakeCommandRunner().on('brew tap', { stdout: 'octo/tools\n' });
    const ctx = await tapContext({}, { ...TEST_INPUTS, repoName: 'my-tap' });

    expect(await new ValidateTapStep(recordingDeps(commands)).verify(ctx)).toBe('incomplete');
  });

  it('should tap the preferred name', async () => {
    const commands = new FakeCommandRunner();
    const deps = recordingDeps(commands);
    const custom = await tapContext({}, { ...TEST_INPUTS, repoName: 'my-tap' });

    await new ValidateTapStep(deps).apply(await tapContext());
    await new ValidateTapStep(deps).apply(custom);

    expect(commands.keys).toEqual(['brew tap octo/tools', 'brew tap octo/my-tap']);
    expect(deps.logs).toEqual(['brew tap octo/tools', 'brew tap octo/my-tap']);
  });
});
