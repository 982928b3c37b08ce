import type { CredentialStore, SavedCredentialConfig } from '../ports/credential-store.js';
import {
  DEFAULT_REPOSITORY_FILE,
  DEFAULT_UPLOAD_COUNT,
  parseRepoInfo,
  type UploadTarget,
} from '../domain/upload/upload-target.js';
import { ConfigError } from '../shared/errors.js';

export type UploadMethod = 'api' | 'github' | 'none';

export interface UploadFlags {
  upload?: UploadMethod;
  workerDomain?: string;
  uuid?: string;
  repo?: string;
  token?: string;
  filePath?: string;
  uploadCount?: number;
  clear?: boolean;
}

export interface CredentialSummary {
  workerDomain: string;
  uuid: string;
  githubToken: string;
  repoInfo: string;
  filePath: string;
  apiLastUsed: string;
  githubLastUsed: string;
  location: string;
}

export function maskSecret(value?: string): string {
  return value ? '***' + value.slice(-4) : '(not set)';
}

export function isUploadMethod(value: string): value is UploadMethod {
  return value === 'api' || value === 'github' || value === 'none';
}

/**
 * Resolves upload settings. Flags win over environment variables, which win
 * over the saved credential file.
 */
export class ConfigService {
  constructor(
    private readonly store: CredentialStore,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async resolveUploadTarget(flags: UploadFlags): Promise<UploadTarget | undefined> {
    const method = flags.upload ?? 'none';
    if (method === 'none') return undefined;

    const maxCount = flags.uploadCount ?? DEFAULT_UPLOAD_COUNT;
    if (!Number.isInteger(maxCount) || maxCount < 1) {
      throw new ConfigError(`upload count must be a positive integer, got ${maxCount}`);
    }

    const saved = await this.store.load();

    if (method === 'api') {
      const workerDomain = flags.workerDomain || this.env.EDGEPROBE_WORKER_DOMAIN || saved.workerDomain;
      const uuid = flags.uuid || this.env.EDGEPROBE_UUID || saved.uuid;
      if (!workerDomain || !uuid) {
        throw new ConfigError('API upload needs --worker-domain and --uuid');
      }
      return { kind: 'api', workerDomain, uuid, maxCount, clearFirst: flags.clear ?? false };
    }

    const token = flags.token || this.env.EDGEPROBE_GITHUB_TOKEN || saved.githubToken;
    const repoInfo = flags.repo || this.env.EDGEPROBE_REPO || saved.repoInfo;
    if (!token || !repoInfo) {
      throw new ConfigError('Repository upload needs --repo and --token');
    }
    const filePath = flags.filePath || this.env.EDGEPROBE_FILE_PATH || saved.filePath || DEFAULT_REPOSITORY_FILE;
    const { owner, repo } = parseRepoInfo(repoInfo);
    return { kind: 'repository', owner, repo, filePath, token, maxCount };
  }

  /** Persists the credentials of a target that just worked. */
  async remember(target: UploadTarget): Promise<void> {
    if (target.kind === 'api') {
      await this.saveApiCredentials(target.workerDomain, target.uuid);
    } else {
      await this.saveRepositoryCredentials(target.token, `${target.owner}/${target.repo}`, target.filePath);
    }
  }

  async saveApiCredentials(workerDomain: string, uuid: string): Promise<void> {
    if (!workerDomain.trim() || !uuid.trim()) {
      throw new ConfigError('Both the worker domain and the UUID are required');
    }
    await this.store.saveApiTarget(workerDomain.trim(), uuid.trim());
  }

  async saveRepositoryCredentials(token: string, repoInfo: string, filePath?: string): Promise<void> {
    if (!token.trim()) throw new ConfigError('A repository token is required');
    const { owner, repo } = parseRepoInfo(repoInfo);
    await this.store.saveRepositoryTarget(token.trim(), `${owner}/${repo}`, filePath?.trim() || undefined);
  }

  /** Clears one field, or the whole file when `field` is omitted. */
  async clear(field?: keyof SavedCredentialConfig): Promise<boolean> {
    if (!field) return this.store.clear();
    await this.store.clearField(field);
    return true;
  }

  get location(): string {
    return this.store.location;
  }

  async describe(): Promise<CredentialSummary> {
    const saved: SavedCredentialConfig = await this.store.load();
    return {
      workerDomain: saved.workerDomain ?? '(not set)',
      uuid: maskSecret(saved.uuid),
      githubToken: maskSecret(saved.githubToken),
      repoInfo: saved.repoInfo ?? '(not set)',
      filePath: saved.filePath ?? DEFAULT_REPOSITORY_FILE,
      apiLastUsed: saved.apiLastUsed ?? '-',
      githubLastUsed: saved.githubLastUsed ?? '-',
      location: this.store.location,
    };
  }
}
