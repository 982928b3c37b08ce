import React from 'react';
import { Text, Box } from 'ink';
import type { SpeedtestStage } from '@edgeprobe/core';
import { Spinner } from './Spinner.js';

interface StageIndicatorProps {
  currentStage: SpeedtestStage | null;
  completedStages: readonly SpeedtestStage[];
  summary: string;
  done: boolean;
}

const STAGES: Array<{ id: SpeedtestStage; label: string }> = [
  { id: 'prepare', label: 'Preparing' },
  { id: 'measure', label: 'Measuring' },
  { id: 'read', label: 'Reading' },
  { id: 'upload', label: 'Uploading' },
];

export function StageIndicator({ currentStage, completedStages, summary, done }: StageIndicatorProps) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        {STAGES.map((stage) => {
          const isDone = completedStages.includes(stage.id);
          const isActive = !isDone && stage.id === currentStage;
          const icon = isDone ? '✓' : isActive ? '▶' : '○';
          const color = isDone ? 'green' : isActive ? 'cyan' : 'gray';

          return (
            <Box key={stage.id} marginRight={2}>
              <Text color={color} bold={isActive}>
                {icon} {stage.label}
              </Text>
            </Box>
          );
        })}
      </Box>
      {currentStage && !done && (
        <Box marginTop={1}>
          <Spinner text={summary} />
        </Box>
      )}
    </Box>
  );
}
