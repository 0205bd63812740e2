import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { CommandResult, CommandSpec } from '../domain/command/command-spec.js';
import { formatCommand } from '../domain/command/command-spec.js';
import type { CommandRunner } from '../ports/command-runner.js';
import { CommandNotFoundError, TapsmithError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('command-runner');

const KILL_GRACE_MS = 3000;

export interface SpawnCommandRunnerOptions {
  /** Called for every line the child writes, as it arrives. */
  onOutput?: (line: string, stream: 'stdout' | 'stderr') => void;
  /** Default per-command timeout. No timeout when unset. */
  timeoutMs?: number;
  /** Aborting terminates the running child. */
  signal?: AbortSignal;
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly options: SpawnCommandRunnerOptions = {}) {}

  run(spec: CommandSpec): Promise<CommandResult> {
    const timeoutMs = spec.timeoutMs ?? this.options.timeoutMs;
    const display = formatCommand(spec);

    return new Promise((resolve, reject) => {
      log.debug(`run: ${display}${spec.cwd ? ` (cwd ${spec.cwd})` : ''}`);

      const stdout: string[] = [];
      const stderr: string[] = [];
      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: ['inherit', 'pipe', 'pipe'],
      });

      const terminate = () => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            log.warn(`run: ${display} ignored SIGTERM, sending SIGKILL`);
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS);
      };

      const timeout = timeoutMs
        ? setTimeout(() => {
            timedOut = true;
            log.warn(`run: ${display} timed out after ${timeoutMs}ms`);
            terminate();
          }, timeoutMs)
        : undefined;

      const onAbort = () => {
        log.info(`run: aborting ${display}`);
        terminate();
      };
      this.options.signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        if (timeout) clearTimeout(timeout);
        if (killTimer) clearTimeout(killTimer);
        this.options.signal?.removeEventListener('abort', onAbort);
      };

      if (child.stdout) {
        createInterface({ input: child.stdout }).on('line', (line) => {
          stdout.push(line);
          this.options.onOutput?.(line, 'stdout');
        });
      }
      if (child.stderr) {
        createInterface({ input: child.stderr }).on('line', (line) => {
          stderr.push(line);
          this.options.onOutput?.(line, 'stderr');
        });
      }

      child.on('error', (err: NodeJS.ErrnoException) => {
        cleanup();
        if (err.code === 'ENOENT') {
          reject(new CommandNotFoundError(spec.command, { cause: err }));
        } else {
          reject(new TapsmithError(`Failed to run ${display}: ${err.message}`, 'COMMAND_FAILED', { cause: err }));
        }
      });

      child.on('close', (code, signal) => {
        cleanup();
        log.debug(`run: ${display} exited with code ${code}${signal ? ` (${signal})` : ''}`);
        resolve({
          command: [spec.command, ...spec.args],
          exitCode: code,
          signal,
          stdout: stdout.join('\n'),
          stderr: stderr.join('\n'),
          timedOut,
        });
      });
    });
  }
}
