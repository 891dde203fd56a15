import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonConfigStore } from './json-config-store.js';

describe('JsonConfigStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'speedbench-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns empty preferences when the file is missing', async () => {
    const store = new JsonConfigStore(join(dir, 'nested'));
    expect(await store.getBenchmarkPrefs()).toEqual({});
  });

  it('round-trips preferences and keeps unrelated keys', async () => {
    await writeFile(join(dir, 'preferences.json'), JSON.stringify({ theme: 'dark' }), 'utf-8');
    const store = new JsonConfigStore(dir);

    await store.saveBenchmarkPrefs({ host: 'http://gpu-box:11434', runs: 5 });

    expect(await store.getBenchmarkPrefs()).toEqual({ host: 'http://gpu-box:11434', runs: 5 });
    const raw: unknown = JSON.parse(await readFile(store.prefsPath, 'utf-8'));
    expect(raw).toEqual({ theme: 'dark', benchmark: { host: 'http://gpu-box:11434', runs: 5 } });
  });

  it('drops invalid values read from disk', async () => {
    await writeFile(
      join(dir, 'preferences.json'),
      JSON.stringify({ benchmark: { host: 42, prompt: 'Count to ten', runs: 0, timeoutMs: 1.5 } }),
      'utf-8',
    );
    const store = new JsonConfigStore(dir);

    expect(await store.getBenchmarkPrefs()).toEqual({ prompt: 'Count to ten' });
  });

  it('treats a corrupt file as empty', async () => {
    await writeFile(join(dir, 'preferences.json'), '{not json', 'utf-8');
    expect(await new JsonConfigStore(dir).getBenchmarkPrefs()).toEqual({});
  });
});
