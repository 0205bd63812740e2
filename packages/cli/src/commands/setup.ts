import React from 'react';
import { render as inkRender } from 'ink';
import { Option, type Command } from 'commander';
import {
  createTapInputs,
  errorMessage,
  setLogLevel,
  type FormulaMode,
  type TapRunState,
  type TapSetupService,
  type TapsmithConfig,
  type Visibility,
} from '@tapsmith/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import type { OutputFormatter } from '../formatters/formatter.js';
import { JsonFormatter } from '../formatters/json.js';
import { PlainFormatter } from '../formatters/plain.js';
import { createTapSetupService, resolveConfig } from '../runtime.js';
import { App } from '../ui/App.js';
import { initialSetupState, setupReducer, type Action, type SetupState } from '../ui/setup-state.js';

interface SetupOptions {
  owner?: string;
  tap?: string;
  repoName?: string;
  visibility?: Visibility;
  branch?: string;
  formulaMode?: FormulaMode;
  formulaUrl?: string;
  formulaName?: string;
  dryRun?: boolean;
  resume?: string;
  reverify?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

const DOMAIN_FLAGS: Array<keyof SetupOptions> = [
  'owner',
  'tap',
  'repoName',
  'visibility',
  'branch',
  'formulaMode',
  'formulaUrl',
  'formulaName',
];

interface Launch {
  /** Input warnings to show before the run starts. */
  warnings: string[];
  execute(service: TapSetupService, signal: AbortSignal): Promise<TapRunState>;
}

function flagName(key: string): string {
  return `--${key.replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`)}`;
}

function prepare(opts: SetupOptions, config: TapsmithConfig): Launch {
  const dryRun = opts.dryRun ?? false;
  const reverify = opts.reverify ?? false;

  const resumeId = opts.resume;
  if (resumeId) {
    const ignored = DOMAIN_FLAGS.filter((flag) => opts[flag] !== undefined);
    return {
      warnings: ignored.length > 0
        ? [`Resuming ${resumeId}: the run's stored inputs are used; ignoring ${ignored.map(flagName).join(', ')}.`]
        : [],
      execute: (service, signal) => service.resume(resumeId, dryRun, { signal, reverify }),
    };
  }

  const { inputs, warnings } = createTapInputs({
    owner: opts.owner ?? config.defaults.owner,
    tap: opts.tap,
    repoName: opts.repoName,
    visibility: opts.visibility ?? config.defaults.visibility,
    branch: opts.branch ?? config.defaults.branch,
    formulaMode: opts.formulaMode ?? config.defaults.formulaMode,
    formulaUrl: opts.formulaUrl,
    formulaName: opts.formulaName,
  });
  return {
    warnings,
    execute: (service, signal) => service.start({ inputs, dryRun }, { signal, reverify }),
  };
}

function interruptOnSigint(): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('\nInterrupted; stopping after the current command.');
    controller.abort();
  });
  return controller;
}

async function runInteractive(opts: SetupOptions): Promise<void> {
  if (!opts.verbose) setLogLevel('error');

  let config: TapsmithConfig;
  let launch: Launch;
  try {
    config = await resolveConfig();
    launch = prepare(opts, config);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
  const controller = interruptOnSigint();

  let state: SetupState = initialSetupState([]);
  let ink: ReturnType<typeof inkRender> | undefined;
  const dispatch = (action: Action) => {
    state = setupReducer(state, action);
    ink?.rerender(React.createElement(App, { state }));
  };

  const events = createCallbackEventBridge({
    onRunStart: (runId, dryRun) => dispatch({ type: 'RUN_START', runId, dryRun }),
    onStepStart: (step) => dispatch({ type: 'STEP_START', step, at: Date.now() }),
    onStepFinish: (step, record) => dispatch({ type: 'STEP_FINISH', step, record, at: Date.now() }),
    onStepSkipped: (step) => dispatch({ type: 'STEP_SKIPPED', step }),
    onStepFailed: (step, error) => dispatch({ type: 'STEP_FAILED', step, error, at: Date.now() }),
    onStepLog: (message) => dispatch({ type: 'STEP_LOG', message }),
    onCommandOutput: (line) => dispatch({ type: 'COMMAND_OUTPUT', line }),
    onSummary: (summary) => dispatch({ type: 'SUMMARY', summary }),
    onComplete: (finalState) => dispatch({ type: 'COMPLETE', state: finalState }),
    onError: (error) => dispatch({ type: 'ERROR', error }),
  });

  const service = createTapSetupService(config, { events, signal: controller.signal });
  state = initialSetupState(service.steps);
  for (const message of launch.warnings) {
    state = setupReducer(state, { type: 'WARNING', message });
  }
  ink = inkRender(React.createElement(App, { state }));

  let failed = false;
  try {
    await launch.execute(service, controller.signal);
  } catch {
    // onError already put the message on screen
    failed = true;
  }

  // Brief delay so the final frame renders before unmount
  setTimeout(() => ink?.unmount(), 100);
  await ink.waitUntilExit();
  if (failed) process.exit(1);
}

async function runPlain(opts: SetupOptions, formatter: OutputFormatter): Promise<void> {
  let runId: string | undefined;
  let reported = false;

  try {
    const config = await resolveConfig();
    const launch = prepare(opts, config);
    for (const warning of launch.warnings) formatter.renderWarning(warning);

    const controller = interruptOnSigint();
    const events = createCallbackEventBridge({
      onRunStart: (id, dryRun) => {
        runId = id;
        formatter.renderRunStart(id, dryRun);
      },
      onStepStart: (step) => formatter.renderStepStart(step),
      onStepFinish: (step, record) => formatter.renderStepFinish(step, record),
      onStepSkipped: (step) => formatter.renderStepSkipped(step),
      onStepFailed: (step, error) => formatter.renderStepFailed(step, error),
      onStepLog: (message) => formatter.renderStepLog(message),
      onCommandOutput: (line) => formatter.renderCommandOutput(line),
      onSummary: (summary) => formatter.renderSummary(summary),
      onComplete: (state) => formatter.renderComplete(state),
      onError: (error) => {
        reported = true;
        formatter.renderError(error, runId);
      },
    });

    const service = createTapSetupService(config, { events, signal: controller.signal });
    await launch.execute(service, controller.signal);
  } catch (err) {
    if (!reported) formatter.renderError(errorMessage(err), runId);
    process.exit(1);
  }
}

export function registerSetupCommand(program: Command): void {
  program
    .command('setup')
    .description('Create a Homebrew tap, its GitHub repository and a first formula')
    .option('--owner <owner>', 'GitHub owner or org for the tap repo')
    .option('--tap <name>', 'Tap short name (without the homebrew- prefix)')
    .option('--repo-name <name>', 'Override repo name (defaults to homebrew-<tap>)')
    .addOption(new Option('--visibility <visibility>', 'Repository visibility').choices(['public', 'private']))
    .option('--branch <name>', 'Branch to push (default: main)')
    .addOption(new Option('--formula-mode <mode>', 'How to add the formula').choices(['stub', 'brew-create']))
    .option('--formula-url <url>', 'Source URL for brew create (required for brew-create mode)')
    .option('--formula-name <name>', 'Formula name to use with brew create')
    .option('--dry-run', 'Check every step without applying anything')
    .option('--resume <run-id>', 'Resume a previous run by ID')
    .option('--reverify', 'Re-check steps an earlier invocation already completed')
    .option('--json', 'Print the final run state as JSON')
    .option('--quiet', 'Minimal output')
    .option('--verbose', 'Debug logging and command output')
    .action(async (opts: SetupOptions) => {
      setLogLevel(opts.verbose ? 'debug' : opts.json || opts.quiet ? 'error' : 'warn');

      if (opts.json) {
        await runPlain(opts, new JsonFormatter());
        return;
      }
      if (process.stdout.isTTY && !opts.quiet) {
        await runInteractive(opts);
        return;
      }
      await runPlain(opts, new PlainFormatter({ quiet: opts.quiet, showOutput: opts.verbose }));
    });
}
