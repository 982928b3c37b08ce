import { chmod, mkdtemp, readdir, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { MeasurementRunner, MeasureRunOptions } from '../ports/measurement-runner.js';
import type { ProcessResult, ProcessRunner } from '../ports/process-runner.js';
import { buildMeasurementArgs, type MeasurementOptions } from '../domain/measurement/measurement-options.js';
import { archiveName, archiveUrl, executableName, type PlatformInfo } from '../domain/platform/platform.js';
import { MeasurementError, ToolNotFoundError } from '../shared/errors.js';
import { fileExists } from '../shared/files.js';
import { createLogger } from '../shared/logger.js';
import type { AssetFetcher } from './asset-fetcher.js';

const log = createLogger('speedtest-binary');

const EXECUTABLE_PREFIX = 'CloudflareST_proxy_';
const ARCHIVE_SUFFIXES = ['.zip', '.tar.gz'];

async function findExecutable(dir: string): Promise<string | null> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = await findExecutable(full);
      if (nested) return nested;
    } else if (entry.name.startsWith(EXECUTABLE_PREFIX) && !ARCHIVE_SUFFIXES.some((s) => entry.name.endsWith(s))) {
      return full;
    }
  }
  return null;
}

/** Downloads and unpacks the measurement binary for this platform when it is missing. */
export class BinaryInstaller {
  constructor(
    private readonly fetcher: AssetFetcher,
    private readonly runner: ProcessRunner,
    private readonly workDir: string,
    private readonly platform: PlatformInfo,
  ) {}

  get executablePath(): string {
    return join(this.workDir, executableName(this.platform));
  }

  async ensure(): Promise<string> {
    const target = this.executablePath;
    if (await fileExists(target)) {
      log.debug(`ensure: using ${target}`);
      return target;
    }

    const url = archiveUrl(this.platform);
    const archive = join(this.workDir, archiveName(this.platform));
    if (!(await this.fetcher.fetch(url, archive))) {
      throw new MeasurementError(
        `Could not download ${url}. Download it manually and place ${executableName(this.platform)} in ${this.workDir}.`,
      );
    }

    const extractDir = await mkdtemp(join(this.workDir, '.edgeprobe-extract-'));
    try {
      await this.extract(archive, extractDir);
      const found = await findExecutable(extractDir);
      if (!found) throw new MeasurementError(`${archiveName(this.platform)} contains no ${EXECUTABLE_PREFIX}* executable`);
      await rename(found, target);
      if (this.platform.os !== 'win') await chmod(target, 0o755);
    } finally {
      await rm(extractDir, { recursive: true, force: true });
      await rm(archive, { force: true });
    }

    log.info(`ensure: installed ${target}`);
    return target;
  }

  /** System `tar` unpacks both .tar.gz and, as bsdtar on macOS and Windows, .zip. */
  private async extract(archive: string, dir: string): Promise<void> {
    let result: ProcessResult;
    try {
      result = await this.runner.run({ command: 'tar', args: ['-xf', archive, '-C', dir] }, { timeoutSeconds: 60 });
    } catch (err) {
      if (err instanceof ToolNotFoundError) {
        throw new MeasurementError(`Cannot unpack ${archive}: tar is not installed`);
      }
      throw err;
    }
    if (result.exitCode !== 0) {
      throw new MeasurementError(`Unpacking ${archive} failed: ${result.stderr.trim() || `tar exited with ${result.exitCode}`}`);
    }
  }
}

/** Runs the external measurement binary; its exit code decides whether the CSV is usable. */
export class SpeedtestBinary implements MeasurementRunner {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly resolveExecutable: () => Promise<string>,
    private readonly workDir: string,
  ) {}

  async measure(options: MeasurementOptions, runOptions: MeasureRunOptions = {}): Promise<void> {
    const executable = await this.resolveExecutable();
    const args = buildMeasurementArgs(options);
    log.info(`measure: ${executable} ${args.join(' ')}`);

    let result: ProcessResult;
    try {
      result = await this.runner.run(
        { command: executable, args },
        {
          cwd: this.workDir,
          timeoutSeconds: runOptions.timeoutSeconds,
          abortSignal: runOptions.abortSignal,
          inheritOutput: runOptions.inheritOutput,
        },
      );
    } catch (err) {
      if (err instanceof ToolNotFoundError) {
        throw new MeasurementError(`Measurement binary not found: ${executable}`);
      }
      throw err;
    }

    if (result.timedOut) {
      throw new MeasurementError(`Measurement timed out after ${runOptions.timeoutSeconds}s`, result.exitCode);
    }
    if (result.exitCode !== 0) {
      throw new MeasurementError(`Measurement binary exited with code ${result.exitCode}`, result.exitCode);
    }
  }
}
