import type { BenchmarkEvents, BenchmarkReport, BenchmarkSample, ModelSummary } from '@speedbench/core';

export type EventHandler = {
  onModelStart?: (model: string, runs: number) => void;
  onModelSkipped?: (model: string, reason: string) => void;
  onRunComplete?: (model: string, run: number, sample: BenchmarkSample, runningMeanTps: number) => void;
  onModelComplete?: (summary: ModelSummary) => void;
  onComplete?: (report: BenchmarkReport) => void;
  onError?: (error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): BenchmarkEvents {
  return {
    onModelStart: (model, runs) => handlers.onModelStart?.(model, runs),
    onModelSkipped: (model, reason) => handlers.onModelSkipped?.(model, reason),
    onRunComplete: (model, run, sample, runningMeanTps) => handlers.onRunComplete?.(model, run, sample, runningMeanTps),
    onModelComplete: (summary) => handlers.onModelComplete?.(summary),
    onComplete: (report) => handlers.onComplete?.(report),
    onError: (error) => handlers.onError?.(error),
  };
}
