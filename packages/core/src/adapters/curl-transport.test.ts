import { describe, expect, it } from 'vitest';
import type { CommandSpec, ProcessResult, ProcessRunner, ProcessRunOptions } from '../ports/process-runner.js';
import { NetworkError } from '../shared/errors.js';
import { CurlTransport, buildCurlRequestArgs, parseCurlOutput } from './curl-transport.js';

class RecordingRunner implements ProcessRunner {
  readonly calls: Array<{ spec: CommandSpec; options?: ProcessRunOptions }> = [];

  constructor(private readonly result: Partial<ProcessResult>) {}

  async run(spec: CommandSpec, options?: ProcessRunOptions): Promise<ProcessResult> {
    this.calls.push({ spec, options });
    return { exitCode: 0, signal: null, stdout: '', stderr: '', timedOut: false, ...this.result };
  }
}

describe('parseCurlOutput', () => {
  it('should split the status line off the body', () => {
    expect(parseCurlOutput('{"count":3}\n200')).toEqual({ statusCode: 200, body: '{"count":3}' });
  });

  it('should keep multi-line bodies intact', () => {
    expect(parseCurlOutput('line one\nline two\n404\n')).toEqual({ statusCode: 404, body: 'line one\nline two' });
  });

  it('should return status 0 when curl printed no code', () => {
    expect(parseCurlOutput('')).toEqual({ statusCode: 0, body: '' });
  });
});

describe('buildCurlRequestArgs', () => {
  it('should build a GET without a body', () => {
    expect(buildCurlRequestArgs('GET', 'https://example.test/a', { timeoutSeconds: 10 })).toEqual([
      '-s', '-w', '\n%{http_code}', '-X', 'GET', '--connect-timeout', '10', 'https://example.test/a',
    ]);
  });

  it('should add a JSON content type and the encoded body', () => {
    const args = buildCurlRequestArgs('POST', 'https://example.test/a', {
      jsonBody: [{ ip: '1.1.1.1', port: 443, name: 'x' }],
      timeoutSeconds: 30,
    });
    expect(args).toEqual([
      '-s', '-w', '\n%{http_code}', '-X', 'POST', '--connect-timeout', '30',
      '-H', 'Content-Type: application/json',
      '-d', '[{"ip":"1.1.1.1","port":443,"name":"x"}]',
      'https://example.test/a',
    ]);
  });

  it('should not duplicate a caller-supplied content type', () => {
    const args = buildCurlRequestArgs('DELETE', 'https://example.test/a', {
      jsonBody: { all: true },
      headers: { 'content-type': 'application/json' },
      timeoutSeconds: 10,
    });
    expect(args.filter((a) => a.toLowerCase().startsWith('content-type'))).toEqual(['content-type: application/json']);
  });
});

describe('CurlTransport', () => {
  it('should return the parsed outcome', async () => {
    const runner = new RecordingRunner({ stdout: '{"success":true}\n200' });
    const transport = new CurlTransport(runner);

    const outcome = await transport.request('GET', 'https://example.test/a', { timeoutSeconds: 10 });

    expect(outcome.statusCode).toBe(200);
    expect(outcome.json()).toEqual({ success: true });
    expect(runner.calls[0].spec.command).toBe('curl');
    expect(runner.calls[0].options?.timeoutSeconds).toBe(10);
  });

  it('should raise NetworkError when no status came back', async () => {
    const runner = new RecordingRunner({ stdout: '\n000', exitCode: 7, stderr: 'curl: (7) Failed to connect' });
    const transport = new CurlTransport(runner);

    await expect(transport.request('GET', 'https://example.test/a', { timeoutSeconds: 10 })).rejects.toThrow(
      'Request to https://example.test/a failed: curl: (7) Failed to connect',
    );
  });

  it('should flag timeouts', async () => {
    const runner = new RecordingRunner({ timedOut: true, exitCode: null });
    const transport = new CurlTransport(runner);

    const err = await transport.request('GET', 'https://example.test/a', { timeoutSeconds: 10 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err instanceof NetworkError && err.timedOut).toBe(true);
  });

  it('should download to a file and report the status', async () => {
    const runner = new RecordingRunner({ stdout: '200' });
    const transport = new CurlTransport(runner);

    expect(await transport.download('https://example.test/f.zip', '/tmp/f.zip', 60)).toBe(200);
    expect(runner.calls[0].spec.args).toEqual([
      '-L', '-s', '-S', '-o', '/tmp/f.zip', '-w', '%{http_code}', 'https://example.test/f.zip',
    ]);
  });
});
