import type { HttpTransport } from '../ports/http-transport.js';
import type { ApiUploader } from '../ports/uploader.js';
import { isRecord, type RequestOutcome } from '../domain/http/request-outcome.js';
import {
  selectTop,
  toBatchEntry,
  type MeasurementRecord,
  type UploadBatchEntry,
} from '../domain/measurement/measurement-record.js';
import { preferredIpsUrl, type ApiUploadTarget } from '../domain/upload/upload-target.js';
import type { ApiUploadOutcome } from '../domain/upload/upload-outcome.js';
import { EdgeprobeError, UserCancelledError } from '../shared/errors.js';
import { createLogger, errorMessage } from '../shared/logger.js';

const log = createLogger('api-uploader');

const PROBE_TIMEOUT_SECONDS = 10;
const UPLOAD_TIMEOUT_SECONDS = 30;
const JSON_HEADERS = { 'Content-Type': 'application/json' };

function count(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function remoteMessage(response: RequestOutcome, key: string): string | undefined {
  const body = response.tryJson();
  const value = isRecord(body) ? body[key] : undefined;
  return typeof value === 'string' ? value : undefined;
}

/** Posts measurement results to a preferred-IP registry (`/<uuid>/api/preferred-ips`). */
export class PreferredIpApiUploader implements ApiUploader {
  constructor(private readonly client: HttpTransport) {}

  async upload(records: readonly MeasurementRecord[], target: Omit<ApiUploadTarget, 'kind'>): Promise<ApiUploadOutcome> {
    const selected = selectTop(records, target.maxCount);
    if (selected.length === 0) return { kind: 'no-records' };

    const url = preferredIpsUrl(target);
    const existing = await this.probeCount(url);

    if (target.clearFirst && existing !== 0) {
      // An unknown registry state is cleared as well.
      await this.clear(url);
    } else if (existing !== null && existing > 0) {
      log.info(`upload: registry already holds ${existing} entries; new entries will be added to them`);
    }

    const batch: UploadBatchEntry[] = selected.map(toBatchEntry);
    log.info(`upload: posting ${batch.length} entries`);

    let response: RequestOutcome;
    try {
      response = await this.client.request('POST', url, {
        jsonBody: batch,
        headers: JSON_HEADERS,
        timeoutSeconds: UPLOAD_TIMEOUT_SECONDS,
      });
    } catch (err) {
      if (err instanceof UserCancelledError || !(err instanceof EdgeprobeError)) throw err;
      return { kind: 'network-error', message: err.message };
    }

    return this.interpret(response, batch.length);
  }

  /** Current registry size, or null when it could not be determined. */
  async probeCount(url: string): Promise<number | null> {
    try {
      const response = await this.client.request('GET', url, { timeoutSeconds: PROBE_TIMEOUT_SECONDS });
      if (response.statusCode !== 200) {
        log.warn(`probeCount: HTTP ${response.statusCode}, registry state unknown`);
        return null;
      }
      const body = response.json();
      return isRecord(body) ? count(body.count) : 0;
    } catch (err) {
      if (err instanceof UserCancelledError) throw err;
      log.warn(`probeCount: ${errorMessage(err)}`);
      return null;
    }
  }

  private async clear(url: string): Promise<void> {
    try {
      const response = await this.client.request('DELETE', url, {
        jsonBody: { all: true },
        headers: JSON_HEADERS,
        timeoutSeconds: PROBE_TIMEOUT_SECONDS,
      });
      if (response.statusCode === 200) {
        log.info('clear: existing entries removed');
      } else {
        log.warn(`clear: HTTP ${response.statusCode}, continuing with upload`);
      }
    } catch (err) {
      if (err instanceof UserCancelledError) throw err;
      log.warn(`clear: ${errorMessage(err)}, continuing with upload`);
    }
  }

  private interpret(response: RequestOutcome, uploaded: number): ApiUploadOutcome {
    if (response.statusCode === 403) return { kind: 'unauthorized', statusCode: 403 };

    if (response.statusCode === 200) {
      const body = response.tryJson();
      if (isRecord(body) && body.success === true) {
        return {
          kind: 'success',
          added: count(body.added),
          skipped: count(body.skipped),
          failed: count(body.failed),
          uploaded,
        };
      }
      return { kind: 'rejected', statusCode: 200, message: remoteMessage(response, 'error') ?? 'unknown error' };
    }

    return {
      kind: 'rejected',
      statusCode: response.statusCode,
      message: remoteMessage(response, 'error') ?? `HTTP ${response.statusCode}`,
    };
  }
}
