import React from 'react';
import { Text, Box } from 'ink';
import type { BenchmarkReport } from '@speedbench/core';
import { formatMs, formatTps } from '../format.js';

interface SummaryTableProps {
  report: BenchmarkReport;
}

export function SummaryTable({ report }: SummaryTableProps) {
  const completed = report.models.filter((m) => m.status === 'completed');
  if (completed.length === 0) return null;
  const nameWidth = Math.max(5, ...completed.map((m) => m.model.length));

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color="gray">{'─'.repeat(nameWidth + 44)}</Text>
      <Box>
        <Text bold>{'Model'.padEnd(nameWidth)}</Text>
        <Text bold>{'tok/s'.padStart(10)}</Text>
        <Text bold>{'min'.padStart(10)}</Text>
        <Text bold>{'max'.padStart(10)}</Text>
        <Text bold>{'TTFT'.padStart(14)}</Text>
      </Box>
      {completed.map((m) => (
        <Box key={m.model}>
          <Text>{m.model.padEnd(nameWidth)}</Text>
          <Text color="green">{(m.tokensPerSecond ? formatTps(m.tokensPerSecond.mean) : '-').padStart(10)}</Text>
          <Text color="gray">{(m.tokensPerSecond ? formatTps(m.tokensPerSecond.min) : '-').padStart(10)}</Text>
          <Text color="gray">{(m.tokensPerSecond ? formatTps(m.tokensPerSecond.max) : '-').padStart(10)}</Text>
          <Text color="gray">{formatMs(m.ttftMs?.mean).padStart(14)}</Text>
        </Box>
      ))}
      <Text color="gray">{'─'.repeat(nameWidth + 44)}</Text>
      <Text color="gray">  Host: {report.host}</Text>
    </Box>
  );
}
