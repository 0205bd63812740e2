#!/usr/bin/env -S npx tsx

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod';
import { registerConfigCommand } from '../src/commands/config.js';
import { registerRunsCommand } from '../src/commands/runs.js';
import { registerSetupCommand } from '../src/commands/setup.js';
import { registerUndoCommand } from '../src/commands/undo.js';

const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command();

program
  .name('tapsmith')
  .description('Resumable Homebrew tap setup: create, publish and validate a tap step by step')
  .version(version);

registerSetupCommand(program);
registerRunsCommand(program);
registerUndoCommand(program);
registerConfigCommand(program);
await program.parseAsync();
