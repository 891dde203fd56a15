import type { BenchmarkReport } from '@speedbench/core';
import type { OutputFormatter } from './formatter.js';
import { consoleSink, type OutputSink } from '../adapters/output-sink.js';

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly sink: OutputSink = consoleSink) {}

  renderComplete(report: BenchmarkReport): void {
    this.sink.log(JSON.stringify(report, null, 2));
  }

  renderError(error: string): void {
    this.sink.error(JSON.stringify({ error }));
  }
}
