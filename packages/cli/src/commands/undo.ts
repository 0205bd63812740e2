import type { Command } from 'commander';
import { errorMessage, noopTapSetupEvents } from '@tapsmith/core';
import { resumeHint } from '../formatters/plain.js';
import { createTapSetupService, resolveConfig } from '../runtime.js';

export function registerUndoCommand(program: Command): void {
  program
    .command('undo')
    .description("Run a step's compensating action and mark it pending")
    .argument('<run-id>', 'Run ID')
    .argument('<step-id>', 'Step ID, e.g. add_formula')
    .action(async (runId: string, stepId: string) => {
      try {
        const config = await resolveConfig();
        const service = createTapSetupService(config, {
          events: { ...noopTapSetupEvents, onStepLog: (message) => console.log(`    ${message}`) },
        });
        await service.undo(runId, stepId);
        console.log(`Step ${stepId} of run ${runId} is pending again.`);
        console.log(resumeHint(runId));
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
