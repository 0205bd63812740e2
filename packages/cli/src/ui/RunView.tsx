import React from 'react';
import { Box, Text } from 'ink';
import type { SetupState } from './setup-state.js';
import { StepProgress } from './components/StepProgress.js';
import { SummaryView } from './components/SummaryView.js';

interface RunViewProps {
  state: SetupState;
}

export function RunView({ state }: RunViewProps) {
  const now = Date.now();
  const running = state.steps.some((step) => step.status === 'running');

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      {state.warnings.map((warning) => (
        <Text key={warning} color="yellow">Warning: {warning}</Text>
      ))}

      <Box flexDirection="column" marginY={1}>
        {state.steps.map((step) => (
          <StepProgress key={step.id} step={step} now={now} />
        ))}
      </Box>

      {running && state.activity ? <Text color="gray">  $ {state.activity}</Text> : null}
      {running && state.lastOutput ? (
        <Text color="gray" wrap="truncate-end">    {state.lastOutput}</Text>
      ) : null}

      {state.summary && <SummaryView summary={state.summary} />}

      {state.finalState?.dryRun && (
        <Box marginTop={1}>
          <Text color="yellow">Dry run finished; nothing was applied.</Text>
        </Box>
      )}

      {state.error && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
          {state.runId ? <Text color="gray">Resume with: tapsmith setup --resume {state.runId}</Text> : null}
        </Box>
      )}
    </Box>
  );
}
