import React from 'react';
import { Box, Text } from 'ink';
import type { TapSummary } from '@tapsmith/core';

export function SummaryView({ summary }: { summary: TapSummary }) {
  const formulaLabel = summary.formulaMode === 'stub' ? 'Stub formula' : 'Formula directory';

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold color="green">Summary</Text>
      <Text>  Repo:       {summary.repoSlug}</Text>
      <Text>  Tap:        {summary.tapName}</Text>
      <Text>  Tap path:   {summary.tapPath}</Text>
      <Text>  {formulaLabel}: {summary.formulaLocation}</Text>
      <Text color="gray">  State:      {summary.statePath}</Text>
      <Box flexDirection="column" marginTop={1}>
        <Text bold>Next steps</Text>
        <Text>  - Edit the formula and replace the TODO fields.</Text>
        <Text>  - {summary.installCommand} (once the formula URL and sha256 are valid)</Text>
      </Box>
    </Box>
  );
}
