import type { BenchmarkReport } from '../domain/benchmark/benchmark-report.js';
import type { BenchmarkSample } from '../domain/benchmark/sample.js';
import type { ModelSummary } from '../domain/benchmark/statistics.js';

export interface BenchmarkEvents {
  onModelStart(model: string, runs: number): void;
  onModelSkipped(model: string, reason: string): void;
  onRunComplete(model: string, run: number, sample: BenchmarkSample, runningMeanTps: number): void;
  onModelComplete(summary: ModelSummary): void;
  onComplete(report: BenchmarkReport): void;
  onError(error: string): void;
}
