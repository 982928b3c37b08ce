export const DEFAULT_PORT = 443;
export const UNKNOWN_LATENCY = 'N/A';
/** Colo column value for IPs whose colo the HTTPing scan could not tell. */
export const UNKNOWN_COLO = 'N/A';
export const UNKNOWN_REGION_NAME = '未知地区';

export interface MeasurementRecord {
  readonly ip: string;
  readonly port: number;
  readonly throughputMBps: number;
  /** Raw latency column text, or `N/A` when the row had none. */
  readonly latency: string;
  readonly regionCode: string;
  readonly regionName: string;
}

export interface UploadBatchEntry {
  ip: string;
  port: number;
  name: string;
}

export function formatDisplayName(record: Pick<MeasurementRecord, 'regionName' | 'throughputMBps'>): string {
  return `${record.regionName}-${record.throughputMBps.toFixed(2)}MB/s`;
}

export function toBatchEntry(record: MeasurementRecord): UploadBatchEntry {
  return { ip: record.ip, port: record.port, name: formatDisplayName(record) };
}

/** `<ip>:<port>#<name>`, no whitespace around the separators. */
export function formatRepositoryLine(entry: UploadBatchEntry): string {
  return `${entry.ip}:${entry.port}#${entry.name}`;
}

export function buildRepositoryContent(entries: UploadBatchEntry[]): string {
  return entries.map(formatRepositoryLine).join('\n');
}

/**
 * Records arrive ordered by the measurement binary, best first.
 * A `maxCount` beyond the list length returns the whole list.
 */
export function selectTop(records: readonly MeasurementRecord[], maxCount: number): MeasurementRecord[] {
  return records.slice(0, Math.max(0, maxCount));
}
