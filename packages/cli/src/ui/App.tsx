import React from 'react';
import { Box, Text } from 'ink';
import type { SetupState } from './setup-state.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: SetupState;
}

export function App({ state }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">tapsmith</Text>
        <Text color="gray"> · Homebrew tap setup</Text>
        {state.runId ? <Text color="gray">  run {state.runId}{state.dryRun ? ' (dry run)' : ''}</Text> : null}
      </Box>
      <RunView state={state} />
    </Box>
  );
}
