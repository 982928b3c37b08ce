import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvResultReader } from '../adapters/csv-result-reader.js';
import { ColoTable } from '../domain/measurement/colo-table.js';
import { DEFAULT_THRESHOLDS, type MeasurementOptions } from '../domain/measurement/measurement-options.js';
import type { MeasurementRecord } from '../domain/measurement/measurement-record.js';
import { RunSession, type RunSettings } from '../domain/session/run-session.js';
import type { ApiUploadOutcome, RepositoryUploadOutcome } from '../domain/upload/upload-outcome.js';
import type { IpListSource } from '../ports/ip-list-source.js';
import type { MeasureRunOptions, MeasurementRunner } from '../ports/measurement-runner.js';
import type { SpeedtestEvents } from '../ports/speedtest-events.js';
import type { ApiUploader, RepositoryUploader } from '../ports/uploader.js';
import { ConfigError, MeasurementError } from '../shared/errors.js';
import { RegionService } from './region-service.js';
import { MEASUREMENT_TIMEOUT_SECONDS, SpeedtestService } from './speedtest-service.js';

const colos = new ColoTable([['HKG', { name: '香港', region: '亚太', country: '中国香港' }]]);
const RESULT_CSV = 'IP 地址,平均延迟,下载速度 (MB/s),地区码\n104.16.1.1,120,2.55,HKG\n104.16.1.2,130,1.10,HKG\n';

type Behavior = 'ok' | 'fail' | 'silent';

class FakeBinary implements MeasurementRunner {
  readonly runs: MeasurementOptions[] = [];
  readonly runOptions: Array<MeasureRunOptions | undefined> = [];
  ipFileContents: string[] = [];

  constructor(private readonly behavior: Behavior) {}

  async measure(options: MeasurementOptions, runOptions?: MeasureRunOptions): Promise<void> {
    this.runs.push(options);
    this.runOptions.push(runOptions);
    this.ipFileContents.push(await readFile(options.ipFile, 'utf-8').catch(() => ''));
    if (this.behavior === 'fail') throw new MeasurementError('Measurement binary exited with code 2', 2);
    if (this.behavior === 'silent') return;
    const output = options.httping
      ? 'ip,colo\n104.16.1.1,HKG\n104.16.9.9,LAX\n'
      : RESULT_CSV;
    await writeFile(options.outputFile, output);
  }
}

class FakeApiUploader implements ApiUploader {
  readonly uploads: Array<readonly MeasurementRecord[]> = [];

  async upload(records: readonly MeasurementRecord[]): Promise<ApiUploadOutcome> {
    this.uploads.push(records);
    return { kind: 'success', added: records.length, skipped: 0, failed: 0, uploaded: records.length };
  }
}

class FakeRepositoryUploader implements RepositoryUploader {
  readonly uploads: Array<readonly MeasurementRecord[]> = [];

  async upload(records: readonly MeasurementRecord[]): Promise<RepositoryUploadOutcome> {
    this.uploads.push(records);
    return { kind: 'unauthorized', statusCode: 401 };
  }
}

class EventLog implements SpeedtestEvents {
  readonly entries: string[] = [];
  onStageChange(stage: string): void {
    this.entries.push(`stage:${stage}`);
  }
  onRecords(records: readonly MeasurementRecord[]): void {
    this.entries.push(`records:${records.length}`);
  }
  onUploadComplete(): void {
    this.entries.push('upload');
  }
  onComplete(): void {
    this.entries.push('complete');
  }
  onError(error: string): void {
    this.entries.push(`error:${error}`);
  }
}

const API_TARGET = { kind: 'api', workerDomain: 'registry.example.test', uuid: 'test-uuid', maxCount: 10, clearFirst: false } as const;

describe('SpeedtestService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edgeprobe-service-'));
    await writeFile(join(dir, 'Cloudflare.txt'), '104.16.0.0/13\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(behavior: Behavior) {
    const binary = new FakeBinary(behavior);
    const reader = new CsvResultReader(colos);
    const ipLists: IpListSource = { ensure: async () => join(dir, 'Cloudflare.txt') };
    const apiUploader = new FakeApiUploader();
    const repositoryUploader = new FakeRepositoryUploader();
    const events = new EventLog();
    const service = new SpeedtestService({
      ipLists,
      measurement: binary,
      reader,
      regions: new RegionService({ measurement: binary, reader, colos, workDir: dir }),
      apiUploader,
      repositoryUploader,
      events,
      workDir: dir,
    });
    return { service, binary, apiUploader, repositoryUploader, events };
  }

  function session(settings: Partial<RunSettings> = {}): RunSession {
    return new RunSession({ mode: 'beginner', ipVersion: 'ipv4', thresholds: DEFAULT_THRESHOLDS, ...settings }, ['edgeprobe']);
  }

  it('should measure, read and upload in order', async () => {
    const { service, binary, apiUploader, events } = setup('ok');

    const report = await service.run(session({ upload: API_TARGET }));

    expect(binary.runs[0]).toMatchObject({ ipFile: join(dir, 'Cloudflare.txt'), outputFile: join(dir, 'result.csv'), count: 10 });
    expect(report.records.map((r) => r.ip)).toEqual(['104.16.1.1', '104.16.1.2']);
    expect(report.upload).toEqual({ target: 'api', kind: 'success', added: 2, skipped: 0, failed: 0, uploaded: 2 });
    expect(apiUploader.uploads).toHaveLength(1);
    expect(events.entries).toEqual([
      'stage:prepare',
      'stage:measure',
      'stage:read',
      'records:2',
      'stage:upload',
      'upload',
      'complete',
    ]);
    expect(report.rerunCommand).toBe(
      'edgeprobe run --mode beginner --count 10 --speed 1 --delay 1000 --thread 200 --upload api --worker-domain registry.example.test --uuid test-uuid --upload-count 10',
    );
  });

  it('should not read or upload when the binary fails', async () => {
    const { service, apiUploader, events } = setup('fail');

    await expect(service.run(session({ upload: API_TARGET }))).rejects.toBeInstanceOf(MeasurementError);

    expect(apiUploader.uploads).toHaveLength(0);
    expect(events.entries).toEqual(['stage:prepare', 'stage:measure', 'error:Measurement binary exited with code 2']);
  });

  it('should not reuse a result file left by an earlier run', async () => {
    const { service, apiUploader, events } = setup('silent');
    await writeFile(join(dir, 'result.csv'), 'IP 地址,下载速度 (MB/s)\n9.9.9.9,5.00\n');

    await expect(service.run(session({ upload: API_TARGET }))).rejects.toBeInstanceOf(MeasurementError);

    expect(apiUploader.uploads).toHaveLength(0);
    expect(events.entries.at(-1)).toBe(`error:Measurement finished without writing ${join(dir, 'result.csv')}`);
  });

  it('should bound the measurement with a default timeout', async () => {
    const { service, binary } = setup('ok');

    await service.run(session());
    await service.run(session(), { timeoutSeconds: 60 });

    expect(binary.runOptions.map((o) => o?.timeoutSeconds)).toEqual([MEASUREMENT_TIMEOUT_SECONDS, 60]);
  });

  it('should route repository targets to the repository uploader', async () => {
    const { service, repositoryUploader } = setup('ok');

    const report = await service.run(
      session({ upload: { kind: 'repository', owner: 'octo', repo: 'ips', filePath: 'a.txt', token: 'test-secret', maxCount: 5 } }),
    );

    expect(repositoryUploader.uploads).toHaveLength(1);
    expect(report.upload).toEqual({ target: 'repository', kind: 'unauthorized', statusCode: 401 });
  });

  it('should scan, filter to the region and remove the region file in normal mode', async () => {
    const { service, binary } = setup('ok');

    await service.run(session({ mode: 'normal', region: 'HKG' }));

    expect(binary.runs.map((r) => Boolean(r.httping))).toEqual([true, false]);
    expect(binary.runs[1].ipFile).toBe(join(dir, 'hkg_ips.txt'));
    expect(binary.ipFileContents[1]).toBe('104.16.1.1\n');
    await expect(readFile(join(dir, 'hkg_ips.txt'))).rejects.toThrow();
  });

  it('should require a region in normal mode', async () => {
    const { service } = setup('ok');
    await expect(service.run(session({ mode: 'normal' }))).rejects.toBeInstanceOf(ConfigError);
  });

  it('should only write the proxy list in proxy mode', async () => {
    const { service, binary } = setup('ok');
    const csv = join(dir, 'old.csv');
    await writeFile(csv, RESULT_CSV);

    const report = await service.run(session({ mode: 'proxy', csvFile: csv, upload: API_TARGET }));

    expect(binary.runs).toHaveLength(0);
    expect(report.proxyListFile).toBe(join(dir, 'ips_ports.txt'));
    expect(report.upload).toBeUndefined();
    expect(await readFile(join(dir, 'ips_ports.txt'), 'utf-8')).toBe('104.16.1.1:443\n104.16.1.2:443\n');
  });

  it('should upload an existing result file', async () => {
    const { service, apiUploader } = setup('ok');
    const csv = join(dir, 'result.csv');
    await writeFile(csv, RESULT_CSV);

    const outcome = await service.uploadResultFile(csv, API_TARGET);

    expect(outcome.kind).toBe('success');
    expect(apiUploader.uploads[0].map((r) => r.regionName)).toEqual(['香港', '香港']);
    await expect(service.uploadResultFile(join(dir, 'none.csv'), API_TARGET)).rejects.toBeInstanceOf(ConfigError);
  });
});
