import { readFile } from 'node:fs/promises';

export type IpVersion = 'ipv4' | 'ipv6';

export const IPV4_LIST_URL = 'https://www.cloudflare.com/ips-v4/';
export const IPV4_LIST_FILE = 'Cloudflare.txt';
export const IPV6_LIST_FILE = 'Cloudflare_ipv6.txt';

const IPV6_RANGES_URL = new URL('../../../data/ipv6-ranges.json', import.meta.url);

export function ipListFile(version: IpVersion): string {
  return version === 'ipv6' ? IPV6_LIST_FILE : IPV4_LIST_FILE;
}

/** Bundled IPv6 ranges; upstream publishes no list the binary can consume directly. */
export async function loadIpv6Ranges(): Promise<string[]> {
  const parsed: unknown = JSON.parse(await readFile(IPV6_RANGES_URL, 'utf-8'));
  return Array.isArray(parsed) ? parsed.filter((r): r is string => typeof r === 'string') : [];
}
