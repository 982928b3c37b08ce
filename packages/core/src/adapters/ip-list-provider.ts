import { join } from 'node:path';
import {
  IPV4_LIST_URL,
  ipListFile,
  loadIpv6Ranges,
  type IpVersion,
} from '../domain/measurement/ip-source.js';
import type { IpListSource } from '../ports/ip-list-source.js';
import { NetworkError } from '../shared/errors.js';
import { isNonEmptyFile, writeFileAtomic } from '../shared/files.js';
import { createLogger } from '../shared/logger.js';
import type { AssetFetcher } from './asset-fetcher.js';

const log = createLogger('ip-list');

/** Provides the candidate IP range file: downloaded for IPv4, generated for IPv6. */
export class IpListProvider implements IpListSource {
  constructor(
    private readonly fetcher: AssetFetcher,
    private readonly workDir: string,
  ) {}

  async ensure(version: IpVersion): Promise<string> {
    const path = join(this.workDir, ipListFile(version));
    if (await isNonEmptyFile(path)) {
      log.debug(`ensure: reusing ${path}`);
      return path;
    }

    if (version === 'ipv6') {
      const ranges = await loadIpv6Ranges();
      await writeFileAtomic(path, ranges.map((r) => `${r}\n`).join(''));
      log.info(`ensure: generated ${path} with ${ranges.length} ranges`);
      return path;
    }

    if (!(await this.fetcher.fetch(IPV4_LIST_URL, path)) || !(await isNonEmptyFile(path))) {
      throw new NetworkError(`Could not download the IPv4 range list from ${IPV4_LIST_URL}`);
    }
    return path;
  }
}
