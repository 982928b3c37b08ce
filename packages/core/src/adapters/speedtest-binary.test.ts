import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CommandSpec, ProcessResult, ProcessRunner, ProcessRunOptions } from '../ports/process-runner.js';
import { MeasurementError, ToolNotFoundError } from '../shared/errors.js';
import { fileExists } from '../shared/files.js';
import { AssetFetcher, type DownloadStrategy } from './asset-fetcher.js';
import { BinaryInstaller, SpeedtestBinary } from './speedtest-binary.js';

const LINUX_AMD64 = { os: 'linux', arch: 'amd64' } as const;

function result(exitCode: number | null, overrides: Partial<ProcessResult> = {}): ProcessResult {
  return { exitCode, signal: null, stdout: '', stderr: '', timedOut: false, ...overrides };
}

class ScriptedRunner implements ProcessRunner {
  readonly calls: Array<{ spec: CommandSpec; options?: ProcessRunOptions }> = [];

  constructor(private readonly handler: (spec: CommandSpec) => Promise<ProcessResult>) {}

  run(spec: CommandSpec, options?: ProcessRunOptions): Promise<ProcessResult> {
    this.calls.push({ spec, options });
    return this.handler(spec);
  }
}

class WritingStrategy implements DownloadStrategy {
  readonly name = 'fake';
  readonly urls: string[] = [];

  constructor(private readonly ok: boolean) {}

  supports(): boolean {
    return true;
  }

  async download(url: string, destination: string): Promise<boolean> {
    this.urls.push(url);
    if (!this.ok) return false;
    await writeFile(destination, 'archive-bytes');
    return true;
  }
}

/** Stands in for `tar -xf <archive> -C <dir>` by dropping the executable into a nested folder. */
const fakeTar = async (spec: CommandSpec): Promise<ProcessResult> => {
  const dir = spec.args[3];
  await mkdir(join(dir, 'release'), { recursive: true });
  await writeFile(join(dir, 'release', 'README.md'), 'readme');
  await writeFile(join(dir, 'release', 'CloudflareST_proxy_linux_amd64'), 'binary');
  return result(0);
};

describe('BinaryInstaller', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edgeprobe-binary-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should reuse an installed executable without downloading', async () => {
    await writeFile(join(dir, 'CloudflareST_proxy_linux_amd64'), 'binary');
    const strategy = new WritingStrategy(true);
    const installer = new BinaryInstaller(new AssetFetcher([strategy]), new ScriptedRunner(fakeTar), dir, LINUX_AMD64);

    expect(await installer.ensure()).toBe(join(dir, 'CloudflareST_proxy_linux_amd64'));
    expect(strategy.urls).toEqual([]);
  });

  it('should download, unpack and rename the executable', async () => {
    const runner = new ScriptedRunner(fakeTar);
    const installer = new BinaryInstaller(new AssetFetcher([new WritingStrategy(true)]), runner, dir, LINUX_AMD64);

    const path = await installer.ensure();

    expect(path).toBe(join(dir, 'CloudflareST_proxy_linux_amd64'));
    expect(await readFile(path, 'utf-8')).toBe('binary');
    expect((await stat(path)).mode & 0o777).toBe(0o755);
    expect(runner.calls[0].spec.command).toBe('tar');
    expect(runner.calls[0].spec.args.slice(0, 2)).toEqual(['-xf', join(dir, 'CloudflareST_proxy_linux_amd64.tar.gz')]);
    expect(await fileExists(join(dir, 'CloudflareST_proxy_linux_amd64.tar.gz'))).toBe(false);
  });

  it('should fail with a manual-download hint when the archive cannot be fetched', async () => {
    const installer = new BinaryInstaller(new AssetFetcher([new WritingStrategy(false)]), new ScriptedRunner(fakeTar), dir, LINUX_AMD64);

    await expect(installer.ensure()).rejects.toThrow(/Download it manually and place CloudflareST_proxy_linux_amd64/);
  });

  it('should report a missing tar as a measurement error', async () => {
    const runner = new ScriptedRunner(async () => {
      throw new ToolNotFoundError('tar');
    });
    const installer = new BinaryInstaller(new AssetFetcher([new WritingStrategy(true)]), runner, dir, LINUX_AMD64);

    await expect(installer.ensure()).rejects.toThrow('tar is not installed');
    expect(await fileExists(join(dir, 'CloudflareST_proxy_linux_amd64.tar.gz'))).toBe(false);
  });
});

describe('SpeedtestBinary', () => {
  const options = {
    ipFile: 'Cloudflare.txt',
    outputFile: 'result.csv',
    count: 10,
    speedLimit: 1,
    latencyLimit: 1000,
    threads: 200,
    testUrl: 'https://speed.example.test/down',
  };

  it('should run the executable with threshold arguments in the work directory', async () => {
    const runner = new ScriptedRunner(async () => result(0));
    const binary = new SpeedtestBinary(runner, async () => '/opt/bin/speedtest', '/work');

    await binary.measure(options, { timeoutSeconds: 30 });

    expect(runner.calls[0].spec).toEqual({
      command: '/opt/bin/speedtest',
      args: ['-f', 'Cloudflare.txt', '-n', '200', '-dn', '10', '-sl', '1', '-tl', '1000', '-url', 'https://speed.example.test/down', '-o', 'result.csv'],
    });
    expect(runner.calls[0].options).toMatchObject({ cwd: '/work', timeoutSeconds: 30 });
  });

  it('should reject a non-zero exit with its code', async () => {
    const binary = new SpeedtestBinary(new ScriptedRunner(async () => result(3)), async () => 'speedtest', '/work');

    const error = await binary.measure(options).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MeasurementError);
    expect(error).toMatchObject({ message: 'Measurement binary exited with code 3', exitCode: 3 });
  });

  it('should reject a timed out run', async () => {
    const binary = new SpeedtestBinary(
      new ScriptedRunner(async () => result(null, { timedOut: true, signal: 'SIGTERM' })),
      async () => 'speedtest',
      '/work',
    );

    await expect(binary.measure(options, { timeoutSeconds: 5 })).rejects.toThrow('Measurement timed out after 5s');
  });

  it('should turn a missing executable into a measurement error', async () => {
    const runner = new ScriptedRunner(async () => {
      throw new ToolNotFoundError('speedtest');
    });
    const binary = new SpeedtestBinary(runner, async () => 'speedtest', '/work');

    await expect(binary.measure(options)).rejects.toThrow('Measurement binary not found: speedtest');
  });
});
