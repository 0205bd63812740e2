import type { Command } from 'commander';
import { errorMessage, noopTapSetupEvents } from '@tapsmith/core';
import { formatRunDetails, formatRunList, resumeHint } from '../formatters/plain.js';
import { createTapSetupService, resolveConfig } from '../runtime.js';

async function showRuns(runId: string | undefined, opts: { json?: boolean; last?: boolean }): Promise<void> {
  const config = await resolveConfig();
  const service = createTapSetupService(config, { events: noopTapSetupEvents });

  if (opts.last) {
    const runs = await service.list();
    if (runs.length === 0) {
      console.log('No runs found.');
      return;
    }
    runId = runs[0].runId;
  }

  if (runId) {
    const state = await service.status(runId);
    const summary = service.summarize(state);
    if (opts.json) {
      console.log(JSON.stringify(state, null, 2));
      return;
    }
    for (const line of formatRunDetails(state, summary, service.locate(runId))) {
      console.log(line);
    }
    if (summary.outcome !== 'complete') {
      console.log(`\n${resumeHint(runId)}`);
    }
    return;
  }

  const runs = await service.list();
  if (opts.json) {
    console.log(JSON.stringify(runs, null, 2));
    return;
  }
  if (runs.length === 0) {
    console.log('No runs found.');
    return;
  }

  console.log();
  for (const line of formatRunList(runs)) {
    console.log(line);
  }
  console.log();
}

export function registerRunsCommand(program: Command): void {
  program
    .command('runs')
    .description('List past setup runs or show one run')
    .argument('[run-id]', 'Show a specific run by ID')
    .option('--json', 'Output as JSON')
    .option('--last', 'Show the most recent run')
    .action(async (runId: string | undefined, opts: { json?: boolean; last?: boolean }) => {
      try {
        await showRuns(runId, opts);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
