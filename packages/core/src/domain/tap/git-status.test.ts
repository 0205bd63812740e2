import { describe, expect, it } from 'vitest';
import { isDirty, parseBranchHeader } from './git-status.js';

describe('parseBranchHeader', () => {
  it('should read ahead and behind counts against the upstream', () => {
    expect(parseBranchHeader('## main...origin/main [ahead 2, behind 1]\n M Formula/tools.rb\n')).toEqual({
      branch: 'main',
      hasUpstream: true,
      ahead: 2,
      behind: 1,
    });
  });

  it('should report an up-to-date tracking branch', () => {
    expect(parseBranchHeader('## main...origin/main')).toEqual({
      branch: 'main',
      hasUpstream: true,
      ahead: 0,
      behind: 0,
    });
  });

  it('should report a branch without upstream', () => {
    expect(parseBranchHeader('## trunk\n')).toEqual({ branch: 'trunk', hasUpstream: false, ahead: 0, behind: 0 });
  });

  it('should read the branch of a repository without commits', () => {
    expect(parseBranchHeader('## No commits yet on main').branch).toBe('main');
  });

  it('should return an empty branch for unrecognised output', () => {
    expect(parseBranchHeader('').branch).toBe('');
    expect(parseBranchHeader('fatal: not a git repository').branch).toBe('');
  });
});

describe('isDirty', () => {
  it('should treat any porcelain output as dirty', () => {
    expect(isDirty('')).toBe(false);
    expect(isDirty('\n')).toBe(false);
    expect(isDirty('?? Formula/tools.rb\n')).toBe(true);
  });
});
