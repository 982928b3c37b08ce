import React from 'react';
import { Box, Text } from 'ink';
import type { SpeedtestState } from './speedtest-state.js';
import { StageIndicator } from './components/StageIndicator.js';
import { ResultTable } from './components/ResultTable.js';
import { UploadSummary } from './components/UploadSummary.js';

interface RunViewProps {
  state: SpeedtestState;
}

export function RunView({ state }: RunViewProps) {
  const showRecords = state.completedStages.includes('read') || state.done;

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <StageIndicator
        currentStage={state.stage}
        completedStages={state.completedStages}
        summary={state.stageSummary}
        done={state.done}
      />

      {showRecords && !state.error && <ResultTable records={state.records} />}

      {state.upload && <UploadSummary outcome={state.upload} />}

      {state.report?.proxyListFile && (
        <Text>Proxy list written to {state.report.proxyListFile}</Text>
      )}

      {state.report && (
        <Box flexDirection="column">
          <Text color="gray">Re-run with:</Text>
          <Text>  {state.report.rerunCommand}</Text>
        </Box>
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
