import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { FORMULA_MODES, VISIBILITIES } from '../domain/tap/tap-inputs.js';
import type { ConfigStore, TapsmithPrefs } from '../ports/config-store.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('json-config-store');

const prefsSchema = z.object({
  stateDir: z.string().min(1).optional(),
  owner: z.string().min(1).optional(),
  branch: z.string().min(1).optional(),
  visibility: z.enum(VISIBILITIES).optional(),
  formulaMode: z.enum(FORMULA_MODES).optional(),
  commandTimeoutMs: z.number().int().positive().optional(),
});

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get location(): string {
    return join(this.configDir, 'preferences.json');
  }

  async getPrefs(): Promise<TapsmithPrefs> {
    let data: string;
    try {
      data = await readFile(this.location, 'utf-8');
    } catch (err) {
      log.debug(`getPrefs: no preferences at ${this.location}:`, errorMessage(err));
      return {};
    }

    try {
      const parsed = prefsSchema.safeParse(JSON.parse(data));
      if (parsed.success) return parsed.data;
      log.warn(`getPrefs: ignoring invalid preferences in ${this.location}:`, parsed.error.message);
    } catch (err) {
      log.warn(`getPrefs: ignoring unreadable preferences in ${this.location}:`, errorMessage(err));
    }
    return {};
  }

  async savePrefs(prefs: TapsmithPrefs): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.location, `${JSON.stringify(prefs, null, 2)}\n`, 'utf-8');
  }
}
