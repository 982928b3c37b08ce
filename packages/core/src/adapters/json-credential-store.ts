import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { CredentialStore, SavedCredentialConfig } from '../ports/credential-store.js';
import { isRecord } from '../domain/http/request-outcome.js';
import { fileExists, writeFileAtomic } from '../shared/files.js';
import { LocalIoError } from '../shared/errors.js';
import { createLogger, errorMessage } from '../shared/logger.js';

const log = createLogger('credential-store');

const FIELDS: ReadonlyArray<keyof SavedCredentialConfig> = [
  'workerDomain',
  'uuid',
  'githubToken',
  'repoInfo',
  'filePath',
  'apiLastUsed',
  'githubLastUsed',
];

function sanitize(raw: unknown): SavedCredentialConfig {
  if (!isRecord(raw)) return {};
  const config: SavedCredentialConfig = {};
  for (const field of FIELDS) {
    const value = raw[field];
    if (typeof value === 'string' && value) config[field] = value;
  }
  return config;
}

/**
 * Plaintext JSON file of upload credentials. NOT encrypted: the file is
 * created with mode 0600 and that is the only protection it gets.
 */
export class JsonCredentialStore implements CredentialStore {
  constructor(
    private readonly configDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get location(): string {
    return join(this.configDir, 'credentials.json');
  }

  async load(): Promise<SavedCredentialConfig> {
    let data: string;
    try {
      data = await readFile(this.location, 'utf-8');
    } catch {
      return {};
    }
    try {
      return sanitize(JSON.parse(data));
    } catch (err) {
      log.warn(`load: ignoring unreadable ${this.location}:`, errorMessage(err));
      return {};
    }
  }

  async saveApiTarget(workerDomain: string, uuid: string): Promise<void> {
    const config = await this.load();
    await this.write({ ...config, workerDomain, uuid, apiLastUsed: this.now().toISOString() });
  }

  async saveRepositoryTarget(githubToken: string, repoInfo: string, filePath?: string): Promise<void> {
    const config = await this.load();
    await this.write({
      ...config,
      githubToken,
      repoInfo,
      ...(filePath ? { filePath } : {}),
      githubLastUsed: this.now().toISOString(),
    });
  }

  async clearField(field: keyof SavedCredentialConfig): Promise<void> {
    const config = await this.load();
    delete config[field];
    await this.write(config);
  }

  async clear(): Promise<boolean> {
    if (!(await fileExists(this.location))) return false;
    try {
      await rm(this.location);
    } catch (err) {
      throw new LocalIoError(`Could not remove ${this.location}: ${errorMessage(err)}`, this.location);
    }
    return true;
  }

  private async write(config: SavedCredentialConfig): Promise<void> {
    await writeFileAtomic(this.location, JSON.stringify(config, null, 2), { mode: 0o600 });
  }
}
