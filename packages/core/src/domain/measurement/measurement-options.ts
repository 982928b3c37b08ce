import { ConfigError } from '../../shared/errors.js';

export const DEFAULT_TEST_URL = 'https://speed.cloudflare.com/__down?bytes=999999999';
export const REGION_SCAN_URL = 'https://jhb.ovh';
export const DEFAULT_RESULT_FILE = 'result.csv';
export const REGION_SCAN_FILE = 'region_scan.csv';
export const MAX_THREADS = 1000;

export interface MeasurementOptions {
  ipFile: string;
  outputFile: string;
  /** Number of IPs that get a download test (`-dn`). */
  count: number;
  /** Minimum download speed in MB/s (`-sl`). */
  speedLimit: number;
  /** Maximum average latency in ms (`-tl`). */
  latencyLimit: number;
  /** Latency-test concurrency (`-n`). */
  threads: number;
  testUrl?: string;
  /** Skip the download test (`-dd`). */
  latencyOnly?: boolean;
  /** HTTPing mode, which also reports the colo of each IP. */
  httping?: boolean;
}

export interface Thresholds {
  count: number;
  speedLimit: number;
  latencyLimit: number;
  threads: number;
}

export const DEFAULT_THRESHOLDS: Thresholds = {
  count: 10,
  speedLimit: 1,
  latencyLimit: 1000,
  threads: 200,
};

export const PRESET_THRESHOLDS: Record<'quick' | 'standard' | 'quality', Thresholds> = {
  quick: { count: 10, speedLimit: 1, latencyLimit: 1000, threads: 200 },
  standard: { count: 20, speedLimit: 2, latencyLimit: 500, threads: 200 },
  quality: { count: 50, speedLimit: 5, latencyLimit: 200, threads: 200 },
};

export function validateThresholds(t: Thresholds): void {
  if (!Number.isInteger(t.threads) || t.threads < 1 || t.threads > MAX_THREADS) {
    throw new ConfigError(`threads must be between 1 and ${MAX_THREADS}, got ${t.threads}`);
  }
  if (!Number.isInteger(t.count) || t.count < 1) {
    throw new ConfigError(`count must be a positive integer, got ${t.count}`);
  }
  if (!(t.speedLimit >= 0)) {
    throw new ConfigError(`speed limit must be >= 0, got ${t.speedLimit}`);
  }
  if (!(t.latencyLimit > 0)) {
    throw new ConfigError(`latency limit must be > 0, got ${t.latencyLimit}`);
  }
}

export function buildMeasurementArgs(options: MeasurementOptions): string[] {
  const args = [
    '-f', options.ipFile,
    '-n', String(options.threads),
    '-dn', String(options.count),
    '-sl', String(options.speedLimit),
    '-tl', String(options.latencyLimit),
    '-url', options.testUrl ?? DEFAULT_TEST_URL,
    '-o', options.outputFile,
  ];
  if (options.latencyOnly) args.push('-dd');
  if (options.httping) args.push('-httping');
  return args;
}

export function regionScanOptions(ipFile: string, outputFile = REGION_SCAN_FILE): MeasurementOptions {
  return {
    ipFile,
    outputFile,
    count: DEFAULT_THRESHOLDS.count,
    speedLimit: 0,
    latencyLimit: 9999,
    threads: DEFAULT_THRESHOLDS.threads,
    testUrl: REGION_SCAN_URL,
    latencyOnly: true,
    httping: true,
  };
}
