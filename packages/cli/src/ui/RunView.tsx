import React from 'react';
import { Box, Text } from 'ink';
import type { BenchmarkState } from './state/benchmark-state.js';
import { ModelProgress } from './components/ModelProgress.js';
import { SummaryTable } from './components/SummaryTable.js';

interface RunViewProps {
  state: BenchmarkState;
}

export function RunView({ state }: RunViewProps) {
  const models = Array.from(state.models.values());
  const nameWidth = Math.max(0, ...models.map((m) => m.model.length));

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      {models.map((progress) => (
        <ModelProgress key={progress.model} progress={progress} nameWidth={nameWidth} />
      ))}

      {state.report && <SummaryTable report={state.report} />}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
