import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DEFAULT_RESULT_FILE,
  DEFAULT_TEST_URL,
  validateThresholds,
  type MeasurementOptions,
} from '../domain/measurement/measurement-options.js';
import type { MeasurementRecord } from '../domain/measurement/measurement-record.js';
import type { RunSession } from '../domain/session/run-session.js';
import type { UploadOutcome } from '../domain/upload/upload-outcome.js';
import type { UploadTarget } from '../domain/upload/upload-target.js';
import type { IpListSource } from '../ports/ip-list-source.js';
import type { MeasurementRunner } from '../ports/measurement-runner.js';
import type { ResultReader } from '../ports/result-reader.js';
import type { SpeedtestEvents } from '../ports/speedtest-events.js';
import type { ApiUploader, RepositoryUploader } from '../ports/uploader.js';
import { ConfigError, MeasurementError } from '../shared/errors.js';
import { fileExists } from '../shared/files.js';
import { createLogger, errorMessage } from '../shared/logger.js';
import { PROXY_LIST_FILE, generateProxyList } from './proxy-list.js';
import type { RegionService } from './region-service.js';

const log = createLogger('speedtest-service');

export const MEASUREMENT_TIMEOUT_SECONDS = 1800;

export interface RunReport {
  session: RunSession;
  records: readonly MeasurementRecord[];
  resultFile?: string;
  upload?: UploadOutcome;
  proxyListFile?: string;
  rerunCommand: string;
}

export interface SpeedtestDeps {
  ipLists: IpListSource;
  measurement: MeasurementRunner;
  reader: ResultReader;
  regions: RegionService;
  apiUploader: ApiUploader;
  repositoryUploader: RepositoryUploader;
  events: SpeedtestEvents;
  workDir: string;
}

export interface SpeedtestRunOptions {
  abortSignal?: AbortSignal;
  /** Let the measurement binary draw its own progress on the terminal. */
  inheritOutput?: boolean;
  /** Measurement subprocess limit, `MEASUREMENT_TIMEOUT_SECONDS` when unset. */
  timeoutSeconds?: number;
}

export class SpeedtestService {
  constructor(private readonly deps: SpeedtestDeps) {}

  async run(session: RunSession, options: SpeedtestRunOptions = {}): Promise<RunReport> {
    const { settings } = session;
    log.info(`run: mode=${settings.mode} ip=${settings.ipVersion}`);

    try {
      const report = settings.mode === 'proxy'
        ? await this.runProxyList(session)
        : await this.runMeasurement(session, options);
      this.deps.events.onComplete(report);
      return report;
    } catch (err) {
      this.deps.events.onError(errorMessage(err));
      throw err;
    }
  }

  /** Reads an existing result CSV and uploads it. */
  async uploadResultFile(csvFile: string, target: UploadTarget): Promise<UploadOutcome> {
    if (!(await fileExists(csvFile))) {
      throw new ConfigError(`Result file not found: ${csvFile}`);
    }
    const records = await this.deps.reader.readRecords(csvFile);
    return this.upload(records, target);
  }

  async upload(records: readonly MeasurementRecord[], target: UploadTarget): Promise<UploadOutcome> {
    if (target.kind === 'api') {
      return { target: 'api', ...(await this.deps.apiUploader.upload(records, target)) };
    }
    return { target: 'repository', ...(await this.deps.repositoryUploader.upload(records, target)) };
  }

  private async runProxyList(session: RunSession): Promise<RunReport> {
    const csvFile = session.settings.csvFile ?? join(this.deps.workDir, DEFAULT_RESULT_FILE);
    if (!(await fileExists(csvFile))) {
      throw new ConfigError(`Result file not found: ${csvFile}`);
    }

    this.deps.events.onStageChange('read', `Reading ${csvFile}`);
    const proxyListFile = join(this.deps.workDir, PROXY_LIST_FILE);
    const lines = await generateProxyList(this.deps.reader, csvFile, proxyListFile);
    log.info(`runProxyList: wrote ${lines.length} entries to ${proxyListFile}`);

    const records = await this.deps.reader.readRecords(csvFile);
    this.deps.events.onRecords(records);
    return { session, records, resultFile: csvFile, proxyListFile, rerunCommand: session.rerunCommandLine() };
  }

  private async runMeasurement(session: RunSession, options: SpeedtestRunOptions): Promise<RunReport> {
    const { settings } = session;
    validateThresholds(settings.thresholds);
    if (settings.mode === 'normal' && !settings.region) {
      throw new ConfigError('normal mode needs a region code (--region)');
    }

    this.deps.events.onStageChange('prepare', 'Preparing IP list');
    const ipFile = await this.deps.ipLists.ensure(settings.ipVersion);

    let regionFile: string | undefined;
    if (settings.mode === 'normal' && settings.region) {
      if (!(await fileExists(this.deps.regions.scanFile))) {
        this.deps.events.onStageChange('prepare', 'Scanning regions');
        await this.deps.regions.scan(ipFile, { abortSignal: options.abortSignal });
      }
      regionFile = (await this.deps.regions.writeRegionIpFile(settings.region)).path;
    }

    const resultFile = join(this.deps.workDir, DEFAULT_RESULT_FILE);
    const measureOptions: MeasurementOptions = {
      ipFile: regionFile ?? ipFile,
      outputFile: resultFile,
      ...settings.thresholds,
      testUrl: DEFAULT_TEST_URL,
    };

    await rm(resultFile, { force: true });
    try {
      this.deps.events.onStageChange('measure', 'Measuring latency and throughput');
      await this.deps.measurement.measure(measureOptions, {
        abortSignal: options.abortSignal,
        inheritOutput: options.inheritOutput,
        timeoutSeconds: options.timeoutSeconds ?? MEASUREMENT_TIMEOUT_SECONDS,
      });
    } finally {
      if (regionFile) await rm(regionFile, { force: true });
    }

    if (!(await fileExists(resultFile))) {
      throw new MeasurementError(`Measurement finished without writing ${resultFile}`, 0);
    }

    this.deps.events.onStageChange('read', 'Reading results');
    const records = await this.deps.reader.readRecords(resultFile);
    this.deps.events.onRecords(records);

    let upload: UploadOutcome | undefined;
    if (settings.upload) {
      this.deps.events.onStageChange('upload', settings.upload.kind === 'api' ? 'Uploading to API' : 'Uploading to repository');
      upload = await this.upload(records, settings.upload);
      this.deps.events.onUploadComplete(upload);
    }

    return { session, records, resultFile, upload, rerunCommand: session.rerunCommandLine() };
  }
}
