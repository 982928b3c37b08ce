import { open, type FileHandle } from 'node:fs/promises';
import type { HttpTransport } from '../ports/http-transport.js';
import { RequestOutcome, type HttpMethod, type RequestOptions } from '../domain/http/request-outcome.js';
import { CapabilityUnavailableError, LocalIoError, NetworkError } from '../shared/errors.js';
import { errorMessage } from '../shared/logger.js';

type FetchFn = typeof fetch;

export interface FetchTransportOptions {
  /** Defaults to the global `fetch`, when the runtime has one. */
  fetchImpl?: FetchFn;
  /** Defaults to whether this Node build was compiled with OpenSSL. */
  tlsAvailable?: boolean;
}

function isAbortLike(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

function toNetworkError(err: unknown, url: string, timeoutSeconds: number): NetworkError {
  if (isAbortLike(err)) {
    return new NetworkError(`Request to ${url} timed out after ${timeoutSeconds}s`, true);
  }
  const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : '';
  return new NetworkError(`Request to ${url} failed: ${errorMessage(err)}${cause}`);
}

/** Primary transport: the runtime's own `fetch`. */
export class FetchTransport implements HttpTransport {
  readonly name = 'fetch';
  private readonly fetchImpl: FetchFn | undefined;
  private readonly tlsAvailable: boolean;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? (typeof globalThis.fetch === 'function' ? globalThis.fetch : undefined);
    this.tlsAvailable = options.tlsAvailable ?? Boolean(process.versions.openssl);
  }

  private capableFetch(url: string): FetchFn {
    if (!this.fetchImpl) {
      throw new CapabilityUnavailableError('fetch is not available in this runtime');
    }
    if (url.startsWith('https:') && !this.tlsAvailable) {
      throw new CapabilityUnavailableError('TLS support is not available in this runtime');
    }
    return this.fetchImpl;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions): Promise<RequestOutcome> {
    const fetchImpl = this.capableFetch(url);
    const headers: Record<string, string> = { ...options.headers };
    let body: string | undefined;
    if (options.jsonBody !== undefined) {
      body = JSON.stringify(options.jsonBody);
      headers['Content-Type'] ??= 'application/json';
    }

    try {
      const response = await fetchImpl(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(options.timeoutSeconds * 1000),
      });
      const text = await response.text();
      return new RequestOutcome(response.status, text);
    } catch (err) {
      throw toNetworkError(err, url, options.timeoutSeconds);
    }
  }

  async download(url: string, destination: string, timeoutSeconds: number): Promise<number> {
    const fetchImpl = this.capableFetch(url);

    let response: Response;
    try {
      response = await fetchImpl(url, { redirect: 'follow', signal: AbortSignal.timeout(timeoutSeconds * 1000) });
    } catch (err) {
      throw toNetworkError(err, url, timeoutSeconds);
    }
    if (!response.ok || !response.body) {
      await response.body?.cancel();
      return response.status;
    }

    const reader = response.body.getReader();
    let file: FileHandle;
    try {
      file = await open(destination, 'w');
    } catch (err) {
      await reader.cancel();
      throw new LocalIoError(`Could not open ${destination}: ${errorMessage(err)}`, destination);
    }

    try {
      for (;;) {
        const { done, value } = await reader.read().catch((err: unknown) => {
          throw toNetworkError(err, url, timeoutSeconds);
        });
        if (done) break;
        try {
          await file.write(value);
        } catch (err) {
          await reader.cancel();
          throw new LocalIoError(`Could not write ${destination}: ${errorMessage(err)}`, destination);
        }
      }
    } finally {
      await file.close();
    }
    return response.status;
  }
}
