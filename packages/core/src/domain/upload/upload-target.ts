import { ConfigError } from '../../shared/errors.js';

export const DEFAULT_UPLOAD_COUNT = 10;
export const DEFAULT_REPOSITORY_FILE = 'cloudflare_ips.txt';

export interface ApiUploadTarget {
  kind: 'api';
  workerDomain: string;
  /** Opaque path component that authorizes the caller. */
  uuid: string;
  maxCount: number;
  clearFirst: boolean;
}

export interface RepositoryUploadTarget {
  kind: 'repository';
  owner: string;
  repo: string;
  filePath: string;
  token: string;
  maxCount: number;
}

export type UploadTarget = ApiUploadTarget | RepositoryUploadTarget;

export function preferredIpsUrl(target: Pick<ApiUploadTarget, 'workerDomain' | 'uuid'>): string {
  const domain = target.workerDomain.replace(/^https?:\/\//, '').replace(/\/+$/, '');
  const id = target.uuid.replace(/^\/+|\/+$/g, '');
  return `https://${domain}/${id}/api/preferred-ips`;
}

export function parseRepoInfo(repoInfo: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = repoInfo.trim().split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`Repository must be given as owner/repo, got "${repoInfo}"`);
  }
  return { owner, repo };
}
