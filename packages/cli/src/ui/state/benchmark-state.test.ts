import { describe, expect, it, vi } from 'vitest';
import { skippedSummary, summarizeSamples, type BenchmarkSample } from '@speedbench/core';
import { createCallbackEventBridge } from '../../adapters/callback-event-bridge.js';
import { benchmarkReducer, createBenchmarkHandlers, initialState, type Action } from './benchmark-state.js';

const sample: BenchmarkSample = {
  model: 'llama3',
  prompt: 'Why is the sky blue?',
  run: 1,
  startedAt: 0,
  firstTokenAt: 100,
  endedAt: 2000,
  tokenCount: 50,
  chunkCount: 50,
  server: null,
};

function reduce(actions: Action[]) {
  return actions.reduce(benchmarkReducer, initialState);
}

describe('benchmarkReducer', () => {
  it('queues every model on INIT', () => {
    const state = reduce([{ type: 'INIT', models: ['llama3', 'phi3'], runs: 3 }]);

    expect([...state.models.keys()]).toEqual(['llama3', 'phi3']);
    expect(state.models.get('phi3')).toEqual({
      model: 'phi3',
      status: 'queued',
      completedRuns: 0,
      totalRuns: 3,
      runningTps: null,
    });
  });

  it('tracks runs and the running mean while a model is measured', () => {
    const state = reduce([
      { type: 'INIT', models: ['llama3'], runs: 3 },
      { type: 'MODEL_START', model: 'llama3', runs: 3 },
      { type: 'RUN_COMPLETE', model: 'llama3', run: 1, runningTps: 25 },
      { type: 'RUN_COMPLETE', model: 'llama3', run: 2, runningTps: 27.5 },
    ]);

    expect(state.models.get('llama3')).toMatchObject({ status: 'running', completedRuns: 2, runningTps: 27.5 });
    expect(state.done).toBe(false);
  });

  it('stores the summary when a model completes', () => {
    const summary = summarizeSamples('llama3', 1, [sample]);
    const state = reduce([
      { type: 'INIT', models: ['llama3'], runs: 1 },
      { type: 'MODEL_START', model: 'llama3', runs: 1 },
      { type: 'MODEL_COMPLETE', summary },
    ]);

    expect(state.models.get('llama3')).toMatchObject({ status: 'done', completedRuns: 1, runningTps: 25, summary });
  });

  it('marks skipped models with their reason', () => {
    const state = reduce([
      { type: 'INIT', models: ['phi3'], runs: 1 },
      { type: 'MODEL_SKIPPED', model: 'phi3', reason: 'Model not installed' },
    ]);

    expect(state.models.get('phi3')).toMatchObject({ status: 'skipped', reason: 'Model not installed' });
  });

  it('ignores run updates for unknown models', () => {
    const before = reduce([{ type: 'INIT', models: ['llama3'], runs: 1 }]);
    const after = benchmarkReducer(before, { type: 'RUN_COMPLETE', model: 'phi3', run: 1, runningTps: 10 });

    expect([...after.models.keys()]).toEqual(['llama3']);
  });

  it('finishes on COMPLETE and on ERROR', () => {
    const report = {
      id: 'r1',
      createdAt: '2026-01-01T00:00:00.000Z',
      host: 'http://127.0.0.1:11434',
      prompt: 'Why is the sky blue?',
      runs: 1,
      models: [skippedSummary('phi3', 1, 'Model not installed')],
    };

    expect(reduce([{ type: 'COMPLETE', report }])).toMatchObject({ done: true, report, error: null });
    expect(reduce([{ type: 'ERROR', error: 'boom' }])).toMatchObject({ done: true, error: 'boom', report: null });
  });
});

describe('createBenchmarkHandlers', () => {
  it('dispatches an action for each benchmark event', () => {
    const dispatch = vi.fn<(action: Action) => void>();
    const events = createCallbackEventBridge(createBenchmarkHandlers(dispatch));

    events.onModelStart('llama3', 2);
    events.onRunComplete('llama3', 1, sample, 25);
    events.onError('boom');

    expect(dispatch.mock.calls.map(([action]) => action)).toEqual([
      { type: 'MODEL_START', model: 'llama3', runs: 2 },
      { type: 'RUN_COMPLETE', model: 'llama3', run: 1, runningTps: 25 },
      { type: 'ERROR', error: 'boom' },
    ]);
  });
});
