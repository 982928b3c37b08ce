import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IPV4_LIST_URL } from '../domain/measurement/ip-source.js';
import { NetworkError } from '../shared/errors.js';
import { AssetFetcher, type DownloadStrategy } from './asset-fetcher.js';
import { IpListProvider } from './ip-list-provider.js';

class ListStrategy implements DownloadStrategy {
  readonly name = 'fake';
  readonly urls: string[] = [];

  constructor(private readonly body: string | null) {}

  supports(): boolean {
    return true;
  }

  async download(url: string, destination: string): Promise<boolean> {
    this.urls.push(url);
    if (this.body === null) return false;
    await writeFile(destination, this.body);
    return true;
  }
}

describe('IpListProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edgeprobe-iplist-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should download the IPv4 list', async () => {
    const strategy = new ListStrategy('104.16.0.0/13\n172.64.0.0/13\n');
    const provider = new IpListProvider(new AssetFetcher([strategy]), dir);

    const path = await provider.ensure('ipv4');

    expect(path).toBe(join(dir, 'Cloudflare.txt'));
    expect(strategy.urls).toEqual([IPV4_LIST_URL]);
    expect(await readFile(path, 'utf-8')).toBe('104.16.0.0/13\n172.64.0.0/13\n');
  });

  it('should reuse a non-empty list', async () => {
    await writeFile(join(dir, 'Cloudflare.txt'), '10.0.0.0/8\n');
    const strategy = new ListStrategy('104.16.0.0/13\n');
    const provider = new IpListProvider(new AssetFetcher([strategy]), dir);

    await provider.ensure('ipv4');

    expect(strategy.urls).toEqual([]);
    expect(await readFile(join(dir, 'Cloudflare.txt'), 'utf-8')).toBe('10.0.0.0/8\n');
  });

  it('should throw when the IPv4 list cannot be downloaded', async () => {
    const provider = new IpListProvider(new AssetFetcher([new ListStrategy(null)]), dir);

    await expect(provider.ensure('ipv4')).rejects.toBeInstanceOf(NetworkError);
  });

  it('should generate the IPv6 list from the bundled ranges', async () => {
    const strategy = new ListStrategy(null);
    const provider = new IpListProvider(new AssetFetcher([strategy]), dir);

    const path = await provider.ensure('ipv6');
    const lines = (await readFile(path, 'utf-8')).split('\n');

    expect(path).toBe(join(dir, 'Cloudflare_ipv6.txt'));
    expect(lines[0]).toBe('2400:cb00::/32');
    expect(lines[lines.length - 1]).toBe('');
    expect(strategy.urls).toEqual([]);
  });
});
