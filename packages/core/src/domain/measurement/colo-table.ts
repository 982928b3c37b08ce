import { readFile } from 'node:fs/promises';
import { UNKNOWN_REGION_NAME } from './measurement-record.js';
import { isRecord } from '../http/request-outcome.js';
import { createLogger, errorMessage } from '../../shared/logger.js';

const log = createLogger('colo-table');

export interface ColoInfo {
  name: string;
  region: string;
  country: string;
}

export const REGION_ORDER = ['亚太', '北美', '欧洲', '中东', '南美', '非洲', '其他'];

const BUNDLED_TABLE_URL = new URL('../../../data/colo-codes.json', import.meta.url);

function isColoInfo(value: unknown): value is ColoInfo {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.region === 'string' &&
    typeof value.country === 'string'
  );
}

function parseEntries(raw: unknown): Array<[string, ColoInfo]> {
  if (!isRecord(raw)) return [];
  const entries: Array<[string, ColoInfo]> = [];
  for (const [code, info] of Object.entries(raw)) {
    if (isColoInfo(info)) entries.push([code.toUpperCase(), { ...info }]);
  }
  return entries;
}

export class ColoTable {
  private readonly entries: ReadonlyMap<string, Readonly<ColoInfo>>;

  constructor(entries: Iterable<[string, ColoInfo]>) {
    const map = new Map<string, Readonly<ColoInfo>>();
    for (const [code, info] of entries) map.set(code, Object.freeze({ ...info }));
    this.entries = map;
  }

  get size(): number {
    return this.entries.size;
  }

  get(code: string): Readonly<ColoInfo> | undefined {
    return this.entries.get(code.toUpperCase());
  }

  /** Display name for a colo code. Unknown codes are their own name. */
  resolveName(code: string): string {
    if (!code) return UNKNOWN_REGION_NAME;
    return this.get(code)?.name ?? code;
  }

  /** `name (country)` label used by region listings. */
  describe(code: string): string {
    const info = this.get(code);
    return info ? `${info.name} (${info.country})` : UNKNOWN_REGION_NAME;
  }

  groupByRegion(): Map<string, Array<[string, Readonly<ColoInfo>]>> {
    const groups = new Map<string, Array<[string, Readonly<ColoInfo>]>>();
    for (const [code, info] of this.entries) {
      const region = info.region || '其他';
      const list = groups.get(region) ?? [];
      list.push([code, info]);
      groups.set(region, list);
    }
    for (const list of groups.values()) list.sort((a, b) => a[0].localeCompare(b[0]));
    return groups;
  }

  /**
   * Finds codes by exact code, exact city name, then partial city or country
   * match. City matches sort ahead of country matches.
   */
  search(query: string): string[] {
    const trimmed = query.trim();
    if (!trimmed) return [];
    if (this.entries.has(trimmed.toUpperCase())) return [trimmed.toUpperCase()];

    const lowered = trimmed.toLowerCase();
    const cityMatches: string[] = [];
    const countryMatches: string[] = [];
    for (const [code, info] of this.entries) {
      const name = info.name.toLowerCase();
      if (name === lowered) return [code];
      if (name.includes(lowered) || lowered.includes(name)) {
        cityMatches.push(code);
      } else if (info.country.toLowerCase().includes(lowered)) {
        countryMatches.push(code);
      }
    }
    return [...cityMatches, ...countryMatches];
  }

  /** New table with `overrides` laid over this one. */
  overlay(overrides: Iterable<[string, ColoInfo]>): ColoTable {
    const merged = new Map<string, ColoInfo>(this.entries);
    for (const [code, info] of overrides) merged.set(code, info);
    return new ColoTable(merged);
  }
}

export function parseColoJson(text: string): Array<[string, ColoInfo]> {
  return parseEntries(JSON.parse(text));
}

/**
 * Loads the bundled table, then the optional override file on top.
 * A missing override file is not an error.
 */
export async function loadColoTable(overridePath?: string): Promise<ColoTable> {
  const bundled = new ColoTable(parseColoJson(await readFile(BUNDLED_TABLE_URL, 'utf-8')));
  if (!overridePath) return bundled;

  let text: string;
  try {
    text = await readFile(overridePath, 'utf-8');
  } catch {
    return bundled;
  }
  try {
    return bundled.overlay(parseColoJson(text));
  } catch (err) {
    log.warn(`loadColoTable: ignoring unreadable override ${overridePath}:`, errorMessage(err));
    return bundled;
  }
}
