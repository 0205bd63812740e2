export interface BranchStatus {
  branch: string;
  hasUpstream: boolean;
  ahead: number;
  behind: number;
}

/**
 * Parses the header line of `git status -sb`, e.g.
 * `## main...origin/main [ahead 2, behind 1]`, `## main` or
 * `## No commits yet on main`.
 * Returns an empty branch when the header is missing or unrecognised.
 */
export function parseBranchHeader(output: string): BranchStatus {
  const firstLine = (output.split('\n')[0] ?? '').trim();
  const status: BranchStatus = { branch: '', hasUpstream: false, ahead: 0, behind: 0 };

  if (!firstLine.startsWith('## ')) return status;
  const line = firstLine.slice(3);

  const split = line.indexOf('...');
  if (split < 0) {
    status.branch = line.trim().replace(/^No commits yet on /, '');
    return status;
  }

  status.branch = line.slice(0, split).trim();
  status.hasUpstream = true;

  const rest = line.slice(split + 3);
  const match = /\[([^\]]*)\]/.exec(rest);
  if (match) {
    for (const part of match[1].split(',')) {
      const item = part.trim();
      if (item.startsWith('ahead ')) {
        status.ahead = Number.parseInt(item.slice('ahead '.length), 10) || 0;
      } else if (item.startsWith('behind ')) {
        status.behind = Number.parseInt(item.slice('behind '.length), 10) || 0;
      }
    }
  }

  return status;
}

export function isDirty(porcelain: string): boolean {
  return porcelain.trim().length > 0;
}
