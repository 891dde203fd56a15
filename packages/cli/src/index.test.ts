import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { benchmark, setLogLevel, type FetchLike } from './index.js';

describe('benchmark', () => {
  let configHome: string;

  beforeEach(async () => {
    setLogLevel('error');
    configHome = await mkdtemp(join(tmpdir(), 'speedbench-config-'));
    vi.stubEnv('XDG_CONFIG_HOME', configHome);
  });

  afterEach(async () => {
    setLogLevel('warn');
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    await rm(configHome, { recursive: true, force: true });
  });

  it('runs the benchmark and reports progress through callbacks', async () => {
    const fetchMock = vi.fn<FetchLike>(async (url) => {
      if (url.endsWith('/api/tags')) {
        return new Response(JSON.stringify({ models: [{ name: 'qwen2:0.5b', size: 1 }] }));
      }
      return new Response('{"response":"Hi","done":false}\n{"response":"","done":true,"eval_count":1}\n');
    });
    vi.stubGlobal('fetch', fetchMock);
    const runs: number[] = [];

    const report = await benchmark({
      models: ['qwen2:0.5b'],
      host: 'localhost:11434',
      runs: 2,
      onProgress: { onRunComplete: (_model, run) => runs.push(run) },
    });

    expect(runs).toEqual([1, 2]);
    expect(report.host).toBe('http://localhost:11434');
    expect(report.models[0].completedRuns).toBe(2);
    expect(report.models[0].totalTokens).toBe(2);
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
  });
});
