import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { ResultReader } from '../ports/result-reader.js';
import type { ColoTable } from '../domain/measurement/colo-table.js';
import {
  DEFAULT_PORT,
  UNKNOWN_LATENCY,
  type MeasurementRecord,
} from '../domain/measurement/measurement-record.js';
import { isRecord } from '../domain/http/request-outcome.js';
import { LocalIoError } from '../shared/errors.js';
import { errorMessage } from '../shared/logger.js';

type Row = Record<string, string>;
type Field = 'ip' | 'port' | 'throughput' | 'latency' | 'region';

/**
 * Accepted header spellings per field. The measurement binary has changed
 * its column names between releases and locales.
 */
export const HEADER_SYNONYMS: Record<Field, readonly string[]> = {
  ip: ['IP 地址', 'IP地址', 'ip', 'IP Address'],
  port: ['端口', 'port'],
  throughput: ['下载速度(MB/s)', '下载速度 (MB/s)', '下载速度', 'Download Speed (MB/s)', 'Download Speed', 'speed'],
  latency: ['平均延迟', '延迟', 'latency', 'Average Latency'],
  region: ['地区码', 'colo', 'region'],
};

function normalizeHeader(header: string): string {
  return header.replace(/\s+/g, '').toLowerCase();
}

const NORMALIZED_SYNONYMS: Record<Field, string[]> = {
  ip: HEADER_SYNONYMS.ip.map(normalizeHeader),
  port: HEADER_SYNONYMS.port.map(normalizeHeader),
  throughput: HEADER_SYNONYMS.throughput.map(normalizeHeader),
  latency: HEADER_SYNONYMS.latency.map(normalizeHeader),
  region: HEADER_SYNONYMS.region.map(normalizeHeader),
};

function toRow(value: unknown): Row | null {
  if (!isRecord(value)) return null;
  const row: Row = {};
  for (const [key, cell] of Object.entries(value)) {
    if (typeof cell === 'string') row[normalizeHeader(key)] = cell;
  }
  return row;
}

/** First synonym column present in the row, trimmed. Empty string when none is. */
function pick(row: Row, field: Field): string {
  for (const name of NORMALIZED_SYNONYMS[field]) {
    if (name in row) return row[name].trim();
  }
  return '';
}

/** Splits `1.2.3.4:8443` and `[2606:4700::1]:8443`. Bare IPv6 literals are left alone. */
export function splitHostPort(raw: string): { ip: string; port?: string } {
  const bracketed = /^\[([^\]]+)\](?::(\d*))?$/.exec(raw);
  if (bracketed) return { ip: bracketed[1], port: bracketed[2] || undefined };

  const parts = raw.split(':');
  if (parts.length === 2) return { ip: parts[0], port: parts[1] || undefined };
  return { ip: raw };
}

function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : null;
}

function parseThroughput(value: string): number | null {
  if (!value) return 0;
  const speed = Number(value);
  return Number.isFinite(speed) && speed >= 0 ? speed : null;
}

export function rowToRecord(row: Row, colos: ColoTable): MeasurementRecord | null {
  const { ip, port: embeddedPort } = splitHostPort(pick(row, 'ip'));
  if (!ip) return null;

  const portColumn = pick(row, 'port');
  const port = portColumn ? parsePort(portColumn) : embeddedPort ? parsePort(embeddedPort) : DEFAULT_PORT;
  if (port === null) return null;

  const throughputMBps = parseThroughput(pick(row, 'throughput'));
  if (throughputMBps === null) return null;

  const regionCode = pick(row, 'region');
  return Object.freeze({
    ip,
    port,
    throughputMBps,
    latency: pick(row, 'latency') || UNKNOWN_LATENCY,
    regionCode,
    regionName: colos.resolveName(regionCode),
  });
}

export function parseResultCsv(text: string, colos: ColoTable): MeasurementRecord[] {
  const parsed: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(parsed)) return [];

  const records: MeasurementRecord[] = [];
  for (const entry of parsed) {
    const row = toRow(entry);
    const record = row ? rowToRecord(row, colos) : null;
    if (record) records.push(record);
  }
  return records;
}

export class CsvResultReader implements ResultReader {
  constructor(private readonly colos: ColoTable) {}

  async readRecords(path: string): Promise<MeasurementRecord[]> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      throw new LocalIoError(`Could not read result file ${path}: ${errorMessage(err)}`, path);
    }
    return parseResultCsv(text, this.colos);
  }
}
