import React from 'react';
import { Box, Text } from 'ink';
import type { SpeedtestState } from './speedtest-state.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: SpeedtestState;
}

export function App({ state }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">edgeprobe</Text>
        <Text color="gray"> · edge IP speed test</Text>
      </Box>
      <RunView state={state} />
    </Box>
  );
}
