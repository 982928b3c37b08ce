export interface SavedCredentialConfig {
  workerDomain?: string;
  uuid?: string;
  githubToken?: string;
  repoInfo?: string;
  filePath?: string;
  apiLastUsed?: string;
  githubLastUsed?: string;
}

export interface CredentialStore {
  load(): Promise<SavedCredentialConfig>;
  saveApiTarget(workerDomain: string, uuid: string): Promise<void>;
  saveRepositoryTarget(githubToken: string, repoInfo: string, filePath?: string): Promise<void>;
  clearField(field: keyof SavedCredentialConfig): Promise<void>;
  clear(): Promise<boolean>;
  readonly location: string;
}
