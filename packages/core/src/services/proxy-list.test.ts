import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvResultReader } from '../adapters/csv-result-reader.js';
import { ColoTable } from '../domain/measurement/colo-table.js';
import { generateProxyList } from './proxy-list.js';

describe('generateProxyList', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edgeprobe-proxy-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one ip:port line per valid row', async () => {
    const csv = join(dir, 'result.csv');
    const out = join(dir, 'ips_ports.txt');
    await writeFile(csv, 'ip,port,speed\n1.1.1.1,,1\n2.2.2.2:8443,,1\n,443,1\n3.3.3.3,2053,1\n');

    const lines = await generateProxyList(new CsvResultReader(new ColoTable([])), csv, out);

    expect(lines).toEqual(['1.1.1.1:443', '2.2.2.2:8443', '3.3.3.3:2053']);
    expect(await readFile(out, 'utf-8')).toBe('1.1.1.1:443\n2.2.2.2:8443\n3.3.3.3:2053\n');
  });
});
