import type { ServerTimings } from '../inference/generation.js';

/** One timed request. Timestamps are milliseconds on a monotonic clock. */
export interface BenchmarkSample {
  model: string;
  prompt: string;
  run: number;
  startedAt: number;
  firstTokenAt: number | null;
  endedAt: number;
  tokenCount: number;
  chunkCount: number;
  server: ServerTimings | null;
}

export interface SampleMetrics {
  ttftMs: number | null;
  totalMs: number;
  tokensPerSecond: number;
  serverTokensPerSecond: number | null;
}

function elapsed(from: number, to: number): number {
  return Math.max(0, to - from);
}

export function computeSampleMetrics(sample: BenchmarkSample): SampleMetrics {
  const totalMs = elapsed(sample.startedAt, sample.endedAt);
  const ttftMs = sample.firstTokenAt === null ? null : elapsed(sample.startedAt, sample.firstTokenAt);
  const tokens = Math.max(0, sample.tokenCount);
  const tokensPerSecond = totalMs > 0 ? tokens / (totalMs / 1000) : 0;

  const evalCount = sample.server?.evalCount;
  const evalDurationNs = sample.server?.evalDurationNs;
  const serverTokensPerSecond =
    evalCount !== undefined && evalDurationNs !== undefined && evalDurationNs > 0
      ? evalCount / (evalDurationNs / 1e9)
      : null;

  return { ttftMs, totalMs, tokensPerSecond, serverTokensPerSecond };
}
