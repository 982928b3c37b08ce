import type { ResultReader } from '../ports/result-reader.js';
import { writeFileAtomic } from '../shared/files.js';

export const PROXY_LIST_FILE = 'ips_ports.txt';

/** Writes one `ip:port` line per result row. Returns the lines written. */
export async function generateProxyList(reader: ResultReader, csvFile: string, outputFile: string): Promise<string[]> {
  const records = await reader.readRecords(csvFile);
  const lines = records.map((r) => `${r.ip}:${r.port}`);
  await writeFileAtomic(outputFile, lines.map((l) => `${l}\n`).join(''));
  return lines;
}
