import { computeSampleMetrics, type BenchmarkSample, type SampleMetrics } from './sample.js';

export interface Stat {
  mean: number;
  min: number;
  max: number;
}

export type ModelStatus = 'completed' | 'skipped';

export interface ModelSummary {
  model: string;
  status: ModelStatus;
  requestedRuns: number;
  completedRuns: number;
  samples: Array<BenchmarkSample & { metrics: SampleMetrics }>;
  tokensPerSecond: Stat | null;
  serverTokensPerSecond: Stat | null;
  ttftMs: Stat | null;
  totalMs: Stat | null;
  totalTokens: number;
  reason?: string;
}

export function summarizeValues(values: number[]): Stat | null {
  if (values.length === 0) return null;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { mean: sum / values.length, min, max };
}

function present(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null);
}

export function summarizeSamples(model: string, requestedRuns: number, samples: BenchmarkSample[]): ModelSummary {
  const withMetrics = samples.map((s) => ({ ...s, metrics: computeSampleMetrics(s) }));
  const metrics = withMetrics.map((s) => s.metrics);

  return {
    model,
    status: 'completed',
    requestedRuns,
    completedRuns: samples.length,
    samples: withMetrics,
    tokensPerSecond: summarizeValues(metrics.map((m) => m.tokensPerSecond)),
    serverTokensPerSecond: summarizeValues(present(metrics.map((m) => m.serverTokensPerSecond))),
    ttftMs: summarizeValues(present(metrics.map((m) => m.ttftMs))),
    totalMs: summarizeValues(metrics.map((m) => m.totalMs)),
    totalTokens: samples.reduce((sum, s) => sum + Math.max(0, s.tokenCount), 0),
  };
}

export function skippedSummary(model: string, requestedRuns: number, reason: string): ModelSummary {
  return {
    model,
    status: 'skipped',
    requestedRuns,
    completedRuns: 0,
    samples: [],
    tokensPerSecond: null,
    serverTokensPerSecond: null,
    ttftMs: null,
    totalMs: null,
    totalTokens: 0,
    reason,
  };
}

/** Mean throughput the progress display shows while runs are still coming in. */
export function runningMeanTokensPerSecond(samples: BenchmarkSample[]): number {
  if (samples.length === 0) return 0;
  const total = samples.reduce((sum, s) => sum + computeSampleMetrics(s).tokensPerSecond, 0);
  return total / samples.length;
}
