import type { BenchmarkReport } from '@speedbench/core';

export interface OutputFormatter {
  renderComplete(report: BenchmarkReport): void;
  renderError(error: string): void;
}
