import React from 'react';
import { Box, Text } from 'ink';
import type { StepView } from '../setup-state.js';
import { formatDuration, statusColor, statusIcon } from '../format.js';
import { Spinner } from './Spinner.js';

interface StepProgressProps {
  step: StepView;
  now: number;
}

function note(step: StepView): string {
  switch (step.status) {
    case 'skipped':
      return 'done earlier';
    case 'dry-run':
      return 'dry-run: apply skipped';
    case 'complete':
      return step.applySkipped ? 'already complete' : 'applied';
    default:
      return '';
  }
}

export function StepProgress({ step, now }: StepProgressProps) {
  const color = statusColor(step.status);
  const elapsed = step.startedAt ? (step.finishedAt ?? now) - step.startedAt : undefined;
  const detail = note(step);

  return (
    <Box>
      {step.status === 'running' ? <Spinner /> : <Text color={color}>{statusIcon(step.status)}</Text>}
      <Text> {step.description.padEnd(36)}</Text>
      <Text color="gray">{step.id.padEnd(17)}</Text>
      {detail ? <Text color={color}> {detail}</Text> : null}
      {elapsed !== undefined && step.status !== 'skipped' && <Text color="gray"> {formatDuration(elapsed)}</Text>}
    </Box>
  );
}
