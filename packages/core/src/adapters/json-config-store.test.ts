import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonConfigStore } from './json-config-store.js';

describe('JsonConfigStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tapsmith-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return no preferences when the file does not exist', async () => {
    expect(await new JsonConfigStore(join(dir, 'missing')).getPrefs()).toEqual({});
  });

  it('should save and reload preferences, creating the directory', async () => {
    const store = new JsonConfigStore(join(dir, 'nested'));

    await store.savePrefs({ owner: 'octo', visibility: 'private' });

    expect(store.location).toBe(join(dir, 'nested', 'preferences.json'));
    expect(await store.getPrefs()).toEqual({ owner: 'octo', visibility: 'private' });
    expect(await readFile(store.location, 'utf-8')).toBe('{\n  "owner": "octo",\n  "visibility": "private"\n}\n');
  });

  it('should ignore a file with invalid values', async () => {
    const store = new JsonConfigStore(dir);
    await writeFile(store.location, JSON.stringify({ visibility: 'internal' }), 'utf-8');

    expect(await store.getPrefs()).toEqual({});
  });

  it('should ignore a file that is not JSON', async () => {
    const store = new JsonConfigStore(dir);
    await writeFile(store.location, 'owner = octo', 'utf-8');

    expect(await store.getPrefs()).toEqual({});
  });
});
