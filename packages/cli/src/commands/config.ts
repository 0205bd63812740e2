import type { Command } from 'commander';
import { CONFIG_KEYS, JsonConfigStore, errorMessage, isConfigKey } from '@tapsmith/core';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { createConfigService } from '../runtime.js';

async function showConfig(opts: { json?: boolean }): Promise<void> {
  const resolved = await createConfigService().resolve();
  const display = {
    stateDir: resolved.stateDir,
    owner: resolved.defaults.owner ?? null,
    branch: resolved.defaults.branch,
    visibility: resolved.defaults.visibility,
    formulaMode: resolved.defaults.formulaMode,
    commandTimeoutMs: resolved.commandTimeoutMs ?? null,
    configFile: new JsonConfigStore(getConfigDir()).location,
  };

  if (opts.json) {
    console.log(JSON.stringify(display, null, 2));
    return;
  }
  console.log(`\n  Configuration:`);
  console.log(`  State Dir:       ${display.stateDir}`);
  console.log(`  Owner:           ${display.owner ?? '(not set)'}`);
  console.log(`  Branch:          ${display.branch}`);
  console.log(`  Visibility:      ${display.visibility}`);
  console.log(`  Formula Mode:    ${display.formulaMode}`);
  console.log(`  Command Timeout: ${display.commandTimeoutMs === null ? '(none)' : `${display.commandTimeoutMs}ms`}`);
  console.log(`  Config File:     ${display.configFile}`);
  console.log();
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage default preferences');

  config
    .command('show')
    .description('Show the resolved configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      try {
        await showConfig(opts);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  config
    .command('set')
    .description('Set a preference')
    .argument('<key>', `Preference key (${CONFIG_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
        process.exit(1);
      }
      try {
        await createConfigService().setPreference(key, value);
        console.log(`${key} set to: ${value.trim()}`);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  config
    .command('reset')
    .description('Reset preferences to defaults')
    .action(async () => {
      try {
        await createConfigService().reset();
        console.log('Preferences reset to defaults.');
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  config
    .command('path')
    .description('Print the preferences file location')
    .action(() => {
      console.log(new JsonConfigStore(getConfigDir()).location);
    });

  // Default: show config when no subcommand
  config.action(async () => {
    try {
      await showConfig({});
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  });
}
