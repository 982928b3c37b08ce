import { createWriteStream } from 'node:fs';
import { rename, rm } from 'node:fs/promises';
import type { ClientRequest, IncomingMessage } from 'node:http';
import { pipeline } from 'node:stream/promises';
import type { HttpTransport } from '../ports/http-transport.js';
import type { CommandSpec, ProcessRunner } from '../ports/process-runner.js';
import { CapabilityUnavailableError, NetworkError, UserCancelledError } from '../shared/errors.js';
import { isNonEmptyFile } from '../shared/files.js';
import { createLogger, errorMessage } from '../shared/logger.js';

const log = createLogger('asset-fetcher');

export const DOWNLOAD_TIMEOUT_SECONDS = 60;
const MAX_REDIRECTS = 5;

export interface DownloadStrategy {
  readonly name: string;
  supports(platform: NodeJS.Platform): boolean;
  /** Resolves true when the strategy reports success. Throws or resolves false otherwise. */
  download(url: string, destination: string, timeoutSeconds: number): Promise<boolean>;
}

/** In-process streaming GET through the fallback-aware HTTP client. */
export class HttpClientStrategy implements DownloadStrategy {
  readonly name = 'http-client';

  constructor(private readonly client: HttpTransport) {}

  supports(): boolean {
    return true;
  }

  async download(url: string, destination: string, timeoutSeconds: number): Promise<boolean> {
    const status = await this.client.download(url, destination, timeoutSeconds);
    return status >= 200 && status < 300;
  }
}

/** Any external download tool whose exit code 0 means success. */
export class CommandStrategy implements DownloadStrategy {
  constructor(
    readonly name: string,
    private readonly runner: ProcessRunner,
    private readonly buildSpec: (url: string, destination: string) => CommandSpec,
    private readonly platforms?: readonly NodeJS.Platform[],
  ) {}

  supports(platform: NodeJS.Platform): boolean {
    return !this.platforms || this.platforms.includes(platform);
  }

  async download(url: string, destination: string, timeoutSeconds: number): Promise<boolean> {
    const result = await this.runner.run(this.buildSpec(url, destination), { timeoutSeconds });
    if (result.exitCode !== 0) {
      log.debug(`${this.name}: exit ${result.exitCode}${result.timedOut ? ' (timed out)' : ''} ${result.stderr.trim()}`);
    }
    return result.exitCode === 0 && !result.timedOut;
  }
}

function powershellLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

type Get = (url: string, options: { timeout: number }, callback: (res: IncomingMessage) => void) => ClientRequest;

/** Loaded on first use: `node:https` throws on load when Node was built without OpenSSL. */
async function loadGet(url: string): Promise<Get> {
  const secure = url.startsWith('https:');
  try {
    return secure ? (await import('node:https')).get : (await import('node:http')).get;
  } catch (err) {
    throw new CapabilityUnavailableError(`node:${secure ? 'https' : 'http'} cannot be loaded: ${errorMessage(err)}`);
  }
}

async function requestOnce(url: string, timeoutSeconds: number): Promise<IncomingMessage> {
  const get = await loadGet(url);
  return new Promise((resolve, reject) => {
    const req = get(url, { timeout: timeoutSeconds * 1000 }, resolve);
    req.on('timeout', () => req.destroy(new NetworkError(`GET ${url} timed out`, true)));
    req.on('error', reject);
  });
}

/** Last in-process resort: plain `node:http(s)` with manual redirect handling. */
export class NodeHttpStrategy implements DownloadStrategy {
  readonly name = 'node-http';

  supports(): boolean {
    return true;
  }

  async download(url: string, destination: string, timeoutSeconds: number): Promise<boolean> {
    let current = url;
    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await requestOnce(current, timeoutSeconds);
      const status = response.statusCode ?? 0;
      const location = response.headers.location;
      if (status >= 300 && status < 400 && location) {
        response.resume();
        current = new URL(location, current).toString();
        continue;
      }
      if (status < 200 || status >= 300) {
        response.resume();
        return false;
      }
      await pipeline(response, createWriteStream(destination));
      return true;
    }
    throw new NetworkError(`Too many redirects for ${url}`);
  }
}

export function defaultDownloadStrategies(client: HttpTransport, runner: ProcessRunner): DownloadStrategy[] {
  return [
    new HttpClientStrategy(client),
    new CommandStrategy('wget', runner, (url, dest) => ({ command: 'wget', args: ['-q', '-O', dest, url] })),
    new CommandStrategy('curl', runner, (url, dest) => ({ command: 'curl', args: ['-L', '-f', '-s', '-S', '-o', dest, url] })),
    new CommandStrategy(
      'powershell',
      runner,
      (url, dest) => ({
        command: 'powershell',
        args: ['-NoProfile', '-Command', `Invoke-WebRequest -Uri ${powershellLiteral(url)} -OutFile ${powershellLiteral(dest)}`],
      }),
      ['win32'],
    ),
    new NodeHttpStrategy(),
  ];
}

export interface AssetFetcherOptions {
  platform?: NodeJS.Platform;
  timeoutSeconds?: number;
}

/**
 * Retrieves a remote file by trying each download strategy in turn. Every
 * attempt writes to `<destination>.part`; only a non-empty file from a
 * successful attempt is renamed into place.
 */
export class AssetFetcher {
  private readonly platform: NodeJS.Platform;
  private readonly timeoutSeconds: number;

  constructor(
    private readonly strategies: readonly DownloadStrategy[],
    options: AssetFetcherOptions = {},
  ) {
    this.platform = options.platform ?? process.platform;
    this.timeoutSeconds = options.timeoutSeconds ?? DOWNLOAD_TIMEOUT_SECONDS;
  }

  async fetch(url: string, destination: string): Promise<boolean> {
    log.info(`fetch: ${url} -> ${destination}`);
    if (await this.tryStrategies(url, destination)) return true;

    if (url.startsWith('https://')) {
      const plainUrl = `http://${url.slice('https://'.length)}`;
      log.warn(`fetch: all strategies failed over https, retrying ${plainUrl}`);
      if (await this.tryStrategies(plainUrl, destination)) return true;
    }

    log.error(`fetch: could not download ${url}`);
    return false;
  }

  private async tryStrategies(url: string, destination: string): Promise<boolean> {
    const partial = `${destination}.part`;
    try {
      for (const strategy of this.strategies) {
        if (!strategy.supports(this.platform)) continue;
        await rm(partial, { force: true });

        let reportedSuccess = false;
        try {
          reportedSuccess = await strategy.download(url, partial, this.timeoutSeconds);
        } catch (err) {
          if (err instanceof UserCancelledError) throw err;
          log.debug(`fetch: ${strategy.name} failed: ${errorMessage(err)}`);
          continue;
        }

        if (reportedSuccess && (await isNonEmptyFile(partial))) {
          await rename(partial, destination);
          log.info(`fetch: ${strategy.name} downloaded ${destination}`);
          return true;
        }
        log.debug(`fetch: ${strategy.name} produced no usable file`);
      }
      return false;
    } finally {
      await rm(partial, { force: true });
    }
  }
}
