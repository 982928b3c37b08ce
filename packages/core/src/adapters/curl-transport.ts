import type { HttpTransport } from '../ports/http-transport.js';
import type { ProcessRunner } from '../ports/process-runner.js';
import { RequestOutcome, type HttpMethod, type RequestOptions } from '../domain/http/request-outcome.js';
import { NetworkError } from '../shared/errors.js';

const STATUS_MARKER = '\n%{http_code}';

/**
 * Splits `curl -w "\n%{http_code}"` output: the last line is the status code,
 * everything before it is the body.
 */
export function parseCurlOutput(stdout: string): { statusCode: number; body: string } {
  const trimmed = stdout.replace(/\s+$/, '');
  const newline = trimmed.lastIndexOf('\n');
  const statusLine = newline === -1 ? trimmed : trimmed.slice(newline + 1);
  const body = newline === -1 ? '' : trimmed.slice(0, newline);
  const statusCode = /^\d{3}$/.test(statusLine.trim()) ? Number(statusLine.trim()) : 0;
  return { statusCode, body };
}

export function buildCurlRequestArgs(method: HttpMethod, url: string, options: RequestOptions): string[] {
  const args = ['-s', '-w', STATUS_MARKER, '-X', method, '--connect-timeout', String(options.timeoutSeconds)];
  const headers: Record<string, string> = { ...options.headers };
  if (options.jsonBody !== undefined && !Object.keys(headers).some((h) => h.toLowerCase() === 'content-type')) {
    headers['Content-Type'] = 'application/json';
  }
  for (const [key, value] of Object.entries(headers)) {
    args.push('-H', `${key}: ${value}`);
  }
  if (options.jsonBody !== undefined) {
    args.push('-d', JSON.stringify(options.jsonBody));
  }
  args.push(url);
  return args;
}

/** External-tool transport used when the in-process stack cannot serve a request. */
export class CurlTransport implements HttpTransport {
  readonly name = 'curl';

  constructor(
    private readonly runner: ProcessRunner,
    private readonly command = 'curl',
  ) {}

  async request(method: HttpMethod, url: string, options: RequestOptions): Promise<RequestOutcome> {
    const result = await this.runner.run(
      { command: this.command, args: buildCurlRequestArgs(method, url, options) },
      { timeoutSeconds: options.timeoutSeconds },
    );
    if (result.timedOut) {
      throw new NetworkError(`Request to ${url} timed out after ${options.timeoutSeconds}s`, true);
    }

    const { statusCode, body } = parseCurlOutput(result.stdout);
    if (statusCode === 0) {
      const detail = result.stderr.trim() || `curl exited with code ${result.exitCode}`;
      throw new NetworkError(`Request to ${url} failed: ${detail}`);
    }
    return new RequestOutcome(statusCode, body);
  }

  async download(url: string, destination: string, timeoutSeconds: number): Promise<number> {
    const result = await this.runner.run(
      { command: this.command, args: ['-L', '-s', '-S', '-o', destination, '-w', '%{http_code}', url] },
      { timeoutSeconds },
    );
    if (result.timedOut) {
      throw new NetworkError(`Download of ${url} timed out after ${timeoutSeconds}s`, true);
    }
    const { statusCode } = parseCurlOutput(result.stdout);
    if (result.exitCode !== 0 || statusCode === 0) {
      throw new NetworkError(`Download of ${url} failed: ${result.stderr.trim() || `curl exited with code ${result.exitCode}`}`);
    }
    return statusCode;
  }
}
