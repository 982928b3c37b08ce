import type { HttpTransport } from '../ports/http-transport.js';
import type { ProcessRunner } from '../ports/process-runner.js';
import type { HttpMethod, RequestOptions, RequestOutcome } from '../domain/http/request-outcome.js';
import { CapabilityUnavailableError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ChildProcessRunner } from './child-process-runner.js';
import { CurlTransport } from './curl-transport.js';
import { FetchTransport } from './fetch-transport.js';

const log = createLogger('http-client');

/**
 * Tries the primary transport and re-issues the call through the fallback
 * transport only when the primary reports `CapabilityUnavailableError`.
 * Network failures (timeouts, refused connections) propagate unchanged.
 */
export class FallbackHttpClient implements HttpTransport {
  readonly name: string;

  constructor(
    private readonly primary: HttpTransport,
    private readonly fallback: HttpTransport,
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions): Promise<RequestOutcome> {
    try {
      return await this.primary.request(method, url, options);
    } catch (err) {
      if (!(err instanceof CapabilityUnavailableError)) throw err;
      log.debug(`request: ${this.primary.name} unavailable (${err.message}), using ${this.fallback.name}`);
      return this.fallback.request(method, url, options);
    }
  }

  async download(url: string, destination: string, timeoutSeconds: number): Promise<number> {
    try {
      return await this.primary.download(url, destination, timeoutSeconds);
    } catch (err) {
      if (!(err instanceof CapabilityUnavailableError)) throw err;
      log.debug(`download: ${this.primary.name} unavailable (${err.message}), using ${this.fallback.name}`);
      return this.fallback.download(url, destination, timeoutSeconds);
    }
  }
}

export function createHttpClient(runner: ProcessRunner = new ChildProcessRunner()): FallbackHttpClient {
  return new FallbackHttpClient(new FetchTransport(), new CurlTransport(runner));
}
