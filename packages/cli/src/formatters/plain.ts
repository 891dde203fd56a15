import type { BenchmarkReport, ModelSummary } from '@speedbench/core';
import type { OutputFormatter } from './formatter.js';
import { consoleSink, type OutputSink } from '../adapters/output-sink.js';
import { formatMs, formatRuns, formatTps } from '../ui/format.js';

export function statusIcon(summary: ModelSummary): string {
  if (summary.status === 'skipped') return '🚫';
  return summary.completedRuns > 0 ? '✅' : '⚠️';
}

/** One `icon | model | k/n runs | details` line per model. */
export function formatPlainLine(summary: ModelSummary, nameWidth: number, runsWidth: number): string {
  const runs = formatRuns(summary.completedRuns, summary.requestedRuns).padEnd(runsWidth);
  const prefix = `${statusIcon(summary)} | ${summary.model.padEnd(nameWidth)} | ${runs} | `;

  if (summary.status === 'skipped' || !summary.tokensPerSecond) {
    return prefix + (summary.reason ?? 'No successful runs completed');
  }
  return (
    prefix +
    `Average: ${formatTps(summary.tokensPerSecond.mean)} tokens/sec` +
    ` | TTFT: ${formatMs(summary.ttftMs?.mean)}` +
    ` | Total: ${formatMs(summary.totalMs?.mean)}`
  );
}

export class PlainFormatter implements OutputFormatter {
  constructor(private readonly sink: OutputSink = consoleSink) {}

  renderComplete(report: BenchmarkReport): void {
    const nameWidth = Math.max(0, ...report.models.map((m) => m.model.length));
    const runsWidth = formatRuns(report.runs, report.runs).length;
    for (const summary of report.models) {
      this.sink.log(formatPlainLine(summary, nameWidth, runsWidth));
    }
  }

  renderError(error: string): void {
    this.sink.error(`Error: ${error}`);
  }
}
