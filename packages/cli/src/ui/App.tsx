import React from 'react';
import { Box, Text } from 'ink';
import type { BenchmarkState } from './state/benchmark-state.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: BenchmarkState;
  prompt: string;
}

export function App({ state, prompt }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">speedbench</Text>
        <Text color="gray"> · {prompt.length > 60 ? `${prompt.slice(0, 57)}...` : prompt}</Text>
      </Box>
      <RunView state={state} />
    </Box>
  );
}
