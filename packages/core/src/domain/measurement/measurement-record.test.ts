import { describe, expect, it } from 'vitest';
import {
  buildRepositoryContent,
  formatDisplayName,
  selectTop,
  toBatchEntry,
  type MeasurementRecord,
} from './measurement-record.js';

function record(ip: string, throughputMBps: number, regionName = '香港'): MeasurementRecord {
  return { ip, port: 443, throughputMBps, latency: '100', regionCode: 'HKG', regionName };
}

describe('formatDisplayName', () => {
  it('should join region and throughput with two decimals', () => {
    expect(formatDisplayName({ regionName: '香港', throughputMBps: 2.55 })).toBe('香港-2.55MB/s');
    expect(formatDisplayName({ regionName: 'XYZ', throughputMBps: 0 })).toBe('XYZ-0.00MB/s');
    expect(formatDisplayName({ regionName: '东京', throughputMBps: 12.345 })).toBe('东京-12.35MB/s');
  });
});

describe('buildRepositoryContent', () => {
  it('should write one ip:port#name line per entry without a trailing newline', () => {
    const entries = [record('1.1.1.1', 2.5), { ...record('2606:4700::1', 1), port: 2053 }].map(toBatchEntry);
    expect(buildRepositoryContent(entries)).toBe('1.1.1.1:443#香港-2.50MB/s\n2606:4700::1:2053#香港-1.00MB/s');
  });

  it('should round-trip through the line format', () => {
    const entries = [record('104.16.0.1', 3.21)].map(toBatchEntry);
    const [line] = buildRepositoryContent(entries).split('\n');
    const [endpoint, name] = line.split('#');
    const port = endpoint.slice(endpoint.lastIndexOf(':') + 1);

    expect({ ip: endpoint.slice(0, endpoint.lastIndexOf(':')), port: Number(port), name }).toEqual(entries[0]);
  });
});

describe('selectTop', () => {
  const records = [record('1.1.1.1', 3), record('1.1.1.2', 2), record('1.1.1.3', 1)];

  it('should keep the input order and cut at maxCount', () => {
    expect(selectTop(records, 2).map((r) => r.ip)).toEqual(['1.1.1.1', '1.1.1.2']);
  });

  it('should return everything when maxCount exceeds the list', () => {
    expect(selectTop(records, 99)).toHaveLength(3);
  });

  it('should return nothing for a non-positive maxCount', () => {
    expect(selectTop(records, 0)).toEqual([]);
    expect(selectTop(records, -1)).toEqual([]);
  });
});
