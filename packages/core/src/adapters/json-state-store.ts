import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunState, RunStateSchema } from '../domain/run/run-state.js';
import type { StateStore } from '../ports/state-store.js';
import { CorruptStateError, NotFoundError, StorageError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('json-state-store');

const STATE_FILE = 'state.json';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Stores each run as `<baseDir>/runs/<runId>/state.json`. Every write replaces
 * the whole document through a temporary file and a rename, so a crash leaves
 * either the previous snapshot or the new one.
 */
export class JsonStateStore<TInputs, TScratch extends object> implements StateStore<TInputs, TScratch> {
  constructor(
    private readonly baseDir: string,
    private readonly schema: RunStateSchema<TInputs, TScratch>,
  ) {}

  private get runsDir(): string {
    return join(this.baseDir, 'runs');
  }

  private runDir(runId: string): string {
    return join(this.runsDir, runId);
  }

  locate(runId: string): string {
    return join(this.runDir(runId), STATE_FILE);
  }

  async initRun(runId: string, state: RunState<TInputs, TScratch>): Promise<void> {
    const dir = this.runDir(runId);
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StorageError(`Failed to create run directory: ${dir}: ${errorMessage(err)}`, { cause: err });
    }
    log.debug(`initRun: created ${dir}`);
    await this.writeState(runId, state);
  }

  async readState(runId: string): Promise<RunState<TInputs, TScratch>> {
    const statePath = this.locate(runId);

    let data: string;
    try {
      data = await readFile(statePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new NotFoundError(runId, statePath);
      }
      throw new StorageError(`Failed to read state: ${statePath}: ${errorMessage(err)}`, { cause: err });
    }

    return this.decode(data, statePath);
  }

  async writeState(runId: string, state: RunState<TInputs, TScratch>): Promise<void> {
    const statePath = this.locate(runId);
    const tmpPath = `${statePath}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await writeFile(tmpPath, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
      await rename(tmpPath, statePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn(`writeState: could not remove ${tmpPath}:`, errorMessage(cleanupErr));
      });
      throw new StorageError(`Failed to write state: ${statePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async listRuns(): Promise<RunState<TInputs, TScratch>[]> {
    let entries: string[];
    try {
      entries = (await readdir(this.runsDir)).sort();
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw new StorageError(`Failed to list runs in ${this.runsDir}: ${errorMessage(err)}`, { cause: err });
    }

    const runs: RunState<TInputs, TScratch>[] = [];
    for (const entry of entries) {
      try {
        runs.push(await this.readState(entry));
      } catch (err) {
        log.warn(`listRuns: skipping ${entry}:`, errorMessage(err));
      }
    }

    runs.sort((a, b) => b.startedAt.localeCompare(a.startedAt));
    return runs;
  }

  private decode(data: string, statePath: string): RunState<TInputs, TScratch> {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (err) {
      throw new CorruptStateError(`Failed to parse state: ${statePath}: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new CorruptStateError(`Invalid state document: ${statePath}: ${issues}`, { cause: parsed.error });
    }
    return parsed.data;
  }
}
