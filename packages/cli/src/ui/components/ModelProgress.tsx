import React from 'react';
import { Text, Box } from 'ink';
import type { ModelProgressState } from '../state/benchmark-state.js';
import { formatRuns, formatTps } from '../format.js';
import { Spinner } from './Spinner.js';

interface ModelProgressProps {
  progress: ModelProgressState;
  nameWidth: number;
}

export function ModelProgress({ progress, nameWidth }: ModelProgressProps) {
  const { status } = progress;
  const icon = status === 'done' ? '✓' : status === 'skipped' ? '✗' : '○';
  const color = status === 'done' ? 'green' : status === 'skipped' ? 'red' : status === 'running' ? 'cyan' : 'gray';
  const detail =
    status === 'skipped'
      ? progress.reason ?? 'skipped'
      : progress.runningTps !== null
        ? `Average: ${formatTps(progress.runningTps)} tokens/sec`
        : status === 'running'
          ? 'Starting...'
          : 'queued';

  return (
    <Box>
      <Text color={color}>{icon}</Text>
      <Text> {progress.model.padEnd(nameWidth)} </Text>
      <Text color="gray">{formatRuns(progress.completedRuns, progress.totalRuns).padEnd(12)}</Text>
      {status === 'running' ? <Spinner label={detail} color={color} /> : <Text color={color}>{detail}</Text>}
    </Box>
  );
}
