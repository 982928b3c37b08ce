import { UNKNOWN_LATENCY, type MeasurementRecord } from '@edgeprobe/core';

/** Rows shown in result tables; the CSV keeps the rest. */
export const DISPLAY_LIMIT = 10;

export function formatThroughput(mbps: number): string {
  return `${mbps.toFixed(2)} MB/s`;
}

export function formatLatency(latency: string): string {
  if (latency === UNKNOWN_LATENCY || latency === '') return UNKNOWN_LATENCY;
  return /^[\d.]+$/.test(latency) ? `${latency} ms` : latency;
}

export function formatEndpoint(record: Pick<MeasurementRecord, 'ip' | 'port'>): string {
  return record.ip.includes(':') ? `[${record.ip}]:${record.port}` : `${record.ip}:${record.port}`;
}
