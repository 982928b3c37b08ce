import { join } from 'node:path';
import type { MeasurementRunner } from '../ports/measurement-runner.js';
import type { ResultReader } from '../ports/result-reader.js';
import type { ColoTable } from '../domain/measurement/colo-table.js';
import { REGION_SCAN_FILE, regionScanOptions } from '../domain/measurement/measurement-options.js';
import { UNKNOWN_COLO } from '../domain/measurement/measurement-record.js';
import { ConfigError, MeasurementError } from '../shared/errors.js';
import { fileExists, writeFileAtomic } from '../shared/files.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('region-service');

export const REGION_SCAN_TIMEOUT_SECONDS = 120;
export const DEFAULT_REGION_CODES = ['HKG', 'SIN', 'NRT', 'ICN', 'LAX', 'FRA', 'LHR'];

export interface RegionSummary {
  code: string;
  label: string;
  ipCount: number;
}

export interface RegionScanOptions {
  rescan?: boolean;
  abortSignal?: AbortSignal;
  inheritOutput?: boolean;
}

export interface RegionServiceDeps {
  measurement: MeasurementRunner;
  reader: ResultReader;
  colos: ColoTable;
  workDir: string;
}

/** Finds which colos answer for the candidate IPs and splits the IPs per colo. */
export class RegionService {
  constructor(private readonly deps: RegionServiceDeps) {}

  get scanFile(): string {
    return join(this.deps.workDir, REGION_SCAN_FILE);
  }

  defaultRegions(): RegionSummary[] {
    return DEFAULT_REGION_CODES.map((code) => ({ code, label: this.deps.colos.describe(code), ipCount: 0 }));
  }

  /**
   * Runs an HTTPing latency-only scan unless a previous scan exists. Falls back
   * to the default region list when the scan fails.
   */
  async scan(ipFile: string, options: RegionScanOptions = {}): Promise<RegionSummary[]> {
    if (!options.rescan && (await fileExists(this.scanFile))) {
      log.info(`scan: using existing ${this.scanFile}`);
      return this.summarize();
    }

    try {
      await this.deps.measurement.measure(regionScanOptions(ipFile, this.scanFile), {
        timeoutSeconds: REGION_SCAN_TIMEOUT_SECONDS,
        abortSignal: options.abortSignal,
        inheritOutput: options.inheritOutput,
      });
    } catch (err) {
      if (!(err instanceof MeasurementError)) throw err;
      log.warn(`scan: ${err.message}; using default regions`);
      return this.defaultRegions();
    }
    return this.summarize();
  }

  /** IP count per colo in the scan file, most IPs first. */
  async summarize(): Promise<RegionSummary[]> {
    const records = await this.deps.reader.readRecords(this.scanFile);
    const counts = new Map<string, number>();
    for (const record of records) {
      const code = record.regionCode;
      if (!code || code === UNKNOWN_COLO) continue;
      counts.set(code, (counts.get(code) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .map(([code, ipCount]) => ({ code, label: this.deps.colos.describe(code), ipCount }));
  }

  /** Writes the scanned IPs of one colo to `<code>_ips.txt`. */
  async writeRegionIpFile(code: string): Promise<{ path: string; count: number }> {
    if (!(await fileExists(this.scanFile))) {
      throw new ConfigError(`No region scan found at ${this.scanFile}; run \`edgeprobe regions scan\` first`);
    }
    const wanted = code.toUpperCase();
    const ips = (await this.deps.reader.readRecords(this.scanFile))
      .filter((r) => r.regionCode.toUpperCase() === wanted)
      .map((r) => r.ip);
    if (ips.length === 0) {
      throw new ConfigError(`No IPs found for region ${wanted}`);
    }

    const path = join(this.deps.workDir, `${wanted.toLowerCase()}_ips.txt`);
    await writeFileAtomic(path, ips.map((ip) => `${ip}\n`).join(''));
    log.info(`writeRegionIpFile: ${ips.length} IPs for ${wanted}`);
    return { path, count: ips.length };
  }
}
