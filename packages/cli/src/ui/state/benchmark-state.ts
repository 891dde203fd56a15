import type { BenchmarkReport, ModelSummary } from '@speedbench/core';
import type { EventHandler } from '../../adapters/callback-event-bridge.js';

export type ModelProgressStatus = 'queued' | 'running' | 'done' | 'skipped';

export interface ModelProgressState {
  model: string;
  status: ModelProgressStatus;
  completedRuns: number;
  totalRuns: number;
  runningTps: number | null;
  startedAt?: number;
  reason?: string;
  summary?: ModelSummary;
}

export interface BenchmarkState {
  models: Map<string, ModelProgressState>;
  report: BenchmarkReport | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'INIT'; models: string[]; runs: number }
  | { type: 'MODEL_START'; model: string; runs: number }
  | { type: 'MODEL_SKIPPED'; model: string; reason: string }
  | { type: 'RUN_COMPLETE'; model: string; run: number; runningTps: number }
  | { type: 'MODEL_COMPLETE'; summary: ModelSummary }
  | { type: 'COMPLETE'; report: BenchmarkReport }
  | { type: 'ERROR'; error: string };

function queued(model: string, totalRuns: number): ModelProgressState {
  return { model, status: 'queued', completedRuns: 0, totalRuns, runningTps: null };
}

export function benchmarkReducer(state: BenchmarkState, action: Action): BenchmarkState {
  switch (action.type) {
    case 'INIT': {
      const models = new Map<string, ModelProgressState>();
      for (const model of action.models) models.set(model, queued(model, action.runs));
      return { ...state, models };
    }

    case 'MODEL_START': {
      const models = new Map(state.models);
      models.set(action.model, {
        ...queued(action.model, action.runs),
        status: 'running',
        startedAt: Date.now(),
      });
      return { ...state, models };
    }

    case 'MODEL_SKIPPED': {
      const models = new Map(state.models);
      const existing = models.get(action.model) ?? queued(action.model, 0);
      models.set(action.model, { ...existing, status: 'skipped', reason: action.reason });
      return { ...state, models };
    }

    case 'RUN_COMPLETE': {
      const models = new Map(state.models);
      const existing = models.get(action.model);
      if (existing) {
        models.set(action.model, { ...existing, completedRuns: action.run, runningTps: action.runningTps });
      }
      return { ...state, models };
    }

    case 'MODEL_COMPLETE': {
      const models = new Map(state.models);
      const { summary } = action;
      const existing = models.get(summary.model) ?? queued(summary.model, summary.requestedRuns);
      models.set(summary.model, {
        ...existing,
        status: 'done',
        completedRuns: summary.completedRuns,
        runningTps: summary.tokensPerSecond?.mean ?? null,
        summary,
      });
      return { ...state, models };
    }

    case 'COMPLETE':
      return { ...state, report: action.report, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export const initialState: BenchmarkState = {
  models: new Map(),
  report: null,
  error: null,
  done: false,
};

/** Benchmark events mapped onto reducer actions. */
export function createBenchmarkHandlers(dispatch: (action: Action) => void): EventHandler {
  return {
    onModelStart: (model, runs) => dispatch({ type: 'MODEL_START', model, runs }),
    onModelSkipped: (model, reason) => dispatch({ type: 'MODEL_SKIPPED', model, reason }),
    onRunComplete: (model, run, _sample, runningTps) => dispatch({ type: 'RUN_COMPLETE', model, run, runningTps }),
    onModelComplete: (summary) => dispatch({ type: 'MODEL_COMPLETE', summary }),
    onComplete: (report) => dispatch({ type: 'COMPLETE', report }),
    onError: (error) => dispatch({ type: 'ERROR', error }),
  };
}
