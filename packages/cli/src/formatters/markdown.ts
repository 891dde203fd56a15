import type { BenchmarkReport, ModelSummary, Stat } from '@speedbench/core';
import type { OutputFormatter } from './formatter.js';
import { consoleSink, type OutputSink } from '../adapters/output-sink.js';
import { formatMs, formatTps } from '../ui/format.js';

const HEADER = ['Model', 'Runs', 'Avg tok/s', 'Min tok/s', 'Max tok/s', 'Server tok/s', 'Avg TTFT', 'Avg total'];

function tps(stat: Stat | null, pick: keyof Stat): string {
  return stat ? formatTps(stat[pick]) : '-';
}

function row(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

function modelRow(m: ModelSummary): string {
  return row([
    m.model,
    `${m.completedRuns}/${m.requestedRuns}`,
    tps(m.tokensPerSecond, 'mean'),
    tps(m.tokensPerSecond, 'min'),
    tps(m.tokensPerSecond, 'max'),
    tps(m.serverTokensPerSecond, 'mean'),
    m.ttftMs ? formatMs(m.ttftMs.mean) : '-',
    m.totalMs ? formatMs(m.totalMs.mean) : '-',
  ]);
}

export class MarkdownFormatter implements OutputFormatter {
  constructor(private readonly sink: OutputSink = consoleSink) {}

  renderComplete(report: BenchmarkReport): void {
    const lines = [
      '# Benchmark results',
      '',
      `**Host:** ${report.host}`,
      `**Prompt:** ${report.prompt}`,
      `**Runs per model:** ${report.runs}`,
      `**Date:** ${report.createdAt}`,
      '',
      row(HEADER),
      row(HEADER.map(() => '---')),
      ...report.models.map(modelRow),
    ];

    const skipped = report.models.filter((m) => m.status === 'skipped');
    if (skipped.length > 0) {
      lines.push('', '## Skipped', '');
      for (const m of skipped) lines.push(`- **${m.model}**: ${m.reason ?? 'skipped'}`);
    }

    this.sink.log(lines.join('\n'));
  }

  renderError(error: string): void {
    this.sink.error(`## Error\n\n${error}`);
  }
}
