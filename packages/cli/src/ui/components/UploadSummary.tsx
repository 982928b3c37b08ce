import React from 'react';
import { Text, Box } from 'ink';
import { describeUploadOutcome, isUploadSuccess, type UploadOutcome } from '@edgeprobe/core';

export function UploadSummary({ outcome }: { outcome: UploadOutcome }) {
  const ok = isUploadSuccess(outcome);
  return (
    <Box marginBottom={1}>
      <Text color={ok ? 'green' : 'red'}>
        {ok ? '✓' : '✗'} {describeUploadOutcome(outcome)}
      </Text>
    </Box>
  );
}
