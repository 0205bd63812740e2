import type { StepViewStatus } from './setup-state.js';

/** `850ms`, `4.2s`, `2m 05s` */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.max(0, Math.round(ms))}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}

export function statusIcon(status: StepViewStatus): string {
  switch (status) {
    case 'complete':
    case 'skipped':
      return '✓';
    case 'failed':
      return '✗';
    case 'running':
      return '▶';
    case 'dry-run':
      return '◌';
    case 'pending':
      return '○';
  }
}

export function statusColor(status: StepViewStatus): string {
  switch (status) {
    case 'complete':
      return 'green';
    case 'skipped':
      return 'gray';
    case 'failed':
      return 'red';
    case 'running':
      return 'cyan';
    case 'dry-run':
      return 'yellow';
    case 'pending':
      return 'gray';
  }
}
