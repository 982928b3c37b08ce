import React from 'react';
import { Text, Box } from 'ink';
import type { MeasurementRecord } from '@edgeprobe/core';
import { DISPLAY_LIMIT, formatEndpoint, formatLatency, formatThroughput } from '../format.js';

interface ResultTableProps {
  records: readonly MeasurementRecord[];
}

export function ResultTable({ records }: ResultTableProps) {
  if (records.length === 0) {
    return <Text color="yellow">No IPs met the thresholds.</Text>;
  }

  return (
    <Box flexDirection="column" marginY={1}>
      <Text bold color="yellow">Fastest IPs ({records.length}):</Text>
      {records.slice(0, DISPLAY_LIMIT).map((r, i) => {
        const medal = i === 0 ? '🥇' : i === 1 ? '🥈' : i === 2 ? '🥉' : `${i + 1}.`;
        return (
          <Box key={`${r.ip}:${r.port}`}>
            <Text>  {medal} </Text>
            <Text bold>{formatEndpoint(r).padEnd(24)}</Text>
            <Text color="green">{formatThroughput(r.throughputMBps).padStart(12)}</Text>
            <Text color="gray">  {formatLatency(r.latency).padStart(10)}  </Text>
            <Text>{r.regionName}</Text>
          </Box>
        );
      })}
    </Box>
  );
}
