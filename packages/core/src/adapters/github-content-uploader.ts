import type { HttpTransport } from '../ports/http-transport.js';
import type { RepositoryUploader } from '../ports/uploader.js';
import { isRecord, type RequestOutcome } from '../domain/http/request-outcome.js';
import {
  buildRepositoryContent,
  selectTop,
  toBatchEntry,
  type MeasurementRecord,
} from '../domain/measurement/measurement-record.js';
import type { RepositoryUploadTarget } from '../domain/upload/upload-target.js';
import type { RepositoryUploadOutcome } from '../domain/upload/upload-outcome.js';
import { EdgeprobeError, UserCancelledError } from '../shared/errors.js';
import { createLogger, errorMessage } from '../shared/logger.js';

const log = createLogger('repository-uploader');

const PROBE_TIMEOUT_SECONDS = 10;
const UPLOAD_TIMEOUT_SECONDS = 30;
const DEFAULT_BRANCH = 'main';

export interface GitHubContentUploaderOptions {
  apiBaseUrl?: string;
  rawBaseUrl?: string;
  now?: () => Date;
}

function stringField(body: unknown, key: string): string | undefined {
  const value = isRecord(body) ? body[key] : undefined;
  return typeof value === 'string' && value ? value : undefined;
}

function encodePath(filePath: string): string {
  return filePath.split('/').filter(Boolean).map(encodeURIComponent).join('/');
}

/**
 * Creates or updates one file through the repository contents API. The
 * current blob sha is looked up first so an update never conflicts.
 */
export class GitHubContentUploader implements RepositoryUploader {
  private readonly apiBaseUrl: string;
  private readonly rawBaseUrl: string;
  private readonly now: () => Date;

  constructor(
    private readonly client: HttpTransport,
    options: GitHubContentUploaderOptions = {},
  ) {
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.github.com';
    this.rawBaseUrl = options.rawBaseUrl ?? 'https://raw.githubusercontent.com';
    this.now = options.now ?? (() => new Date());
  }

  async upload(records: readonly MeasurementRecord[], target: Omit<RepositoryUploadTarget, 'kind'>): Promise<RepositoryUploadOutcome> {
    const selected = selectTop(records, target.maxCount);
    if (selected.length === 0) return { kind: 'no-records' };

    const headers = this.headers(target.token);
    const repoUrl = `${this.apiBaseUrl}/repos/${target.owner}/${target.repo}`;
    const contentsUrl = `${repoUrl}/contents/${encodePath(target.filePath)}`;
    const content = buildRepositoryContent(selected.map(toBatchEntry));

    const sha = await this.probeSha(contentsUrl, headers);
    const payload: { message: string; content: string; sha?: string } = {
      message: `Update preferred IP list - ${this.now().toISOString()}`,
      content: Buffer.from(content, 'utf-8').toString('base64'),
    };
    if (sha) payload.sha = sha;

    let response: RequestOutcome;
    try {
      response = await this.client.request('PUT', contentsUrl, {
        jsonBody: payload,
        headers,
        timeoutSeconds: UPLOAD_TIMEOUT_SECONDS,
      });
    } catch (err) {
      if (err instanceof UserCancelledError || !(err instanceof EdgeprobeError)) throw err;
      return { kind: 'network-error', message: err.message };
    }

    if (response.statusCode === 200 || response.statusCode === 201) {
      const body = response.tryJson();
      const htmlUrl = isRecord(body) ? stringField(body.content, 'html_url') : undefined;
      const branch = await this.defaultBranch(repoUrl, headers);
      const rawContentUrl = `${this.rawBaseUrl}/${target.owner}/${target.repo}/${branch}/${encodePath(target.filePath)}`;
      log.info(`upload: ${sha ? 'updated' : 'created'} ${target.filePath} with ${selected.length} entries`);
      return { kind: 'success', rawContentUrl, htmlUrl, uploaded: selected.length };
    }
    if (response.statusCode === 401) return { kind: 'unauthorized', statusCode: 401 };
    if (response.statusCode === 404) return { kind: 'not-found', statusCode: 404 };

    return {
      kind: 'rejected',
      statusCode: response.statusCode,
      message: stringField(response.tryJson(), 'message') ?? `HTTP ${response.statusCode}`,
    };
  }

  private headers(token: string): Record<string, string> {
    return {
      Authorization: `Bearer ${token}`,
      Accept: 'application/vnd.github+json',
      'User-Agent': 'edgeprobe',
    };
  }

  /** sha of the existing file, or undefined when it does not exist or cannot be checked. */
  private async probeSha(contentsUrl: string, headers: Record<string, string>): Promise<string | undefined> {
    try {
      const response = await this.client.request('GET', contentsUrl, { headers, timeoutSeconds: PROBE_TIMEOUT_SECONDS });
      if (response.statusCode === 200) return stringField(response.tryJson(), 'sha');
      if (response.statusCode !== 404) {
        log.warn(`probeSha: HTTP ${response.statusCode}, attempting write without sha`);
      }
    } catch (err) {
      if (err instanceof UserCancelledError) throw err;
      log.warn(`probeSha: ${errorMessage(err)}, attempting write without sha`);
    }
    return undefined;
  }

  private async defaultBranch(repoUrl: string, headers: Record<string, string>): Promise<string> {
    try {
      const response = await this.client.request('GET', repoUrl, { headers, timeoutSeconds: PROBE_TIMEOUT_SECONDS });
      if (response.statusCode === 200) return stringField(response.tryJson(), 'default_branch') ?? DEFAULT_BRANCH;
    } catch (err) {
      if (err instanceof UserCancelledError) throw err;
      log.debug(`defaultBranch: ${errorMessage(err)}`);
    }
    return DEFAULT_BRANCH;
  }
}
