import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonCredentialStore } from './json-credential-store.js';

const NOW = new Date('2024-05-01T08:00:00Z');

describe('JsonCredentialStore', () => {
  let dir: string;
  let store: JsonCredentialStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edgeprobe-creds-'));
    store = new JsonCredentialStore(join(dir, 'edgeprobe'), () => NOW);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return an empty config when nothing is saved', async () => {
    expect(await store.load()).toEqual({});
  });

  it('should save API and repository pairs side by side', async () => {
    await store.saveApiTarget('registry.example.test', 'test-uuid');
    await store.saveRepositoryTarget('test-secret', 'octo/ips', 'best.txt');

    expect(await store.load()).toEqual({
      workerDomain: 'registry.example.test',
      uuid: 'test-uuid',
      apiLastUsed: '2024-05-01T08:00:00.000Z',
      githubToken: 'test-secret',
      repoInfo: 'octo/ips',
      filePath: 'best.txt',
      githubLastUsed: '2024-05-01T08:00:00.000Z',
    });
  });

  it('should create the file readable by the owner only', async () => {
    await store.saveApiTarget('registry.example.test', 'test-uuid');
    const info = await stat(store.location);
    expect(info.mode & 0o777).toBe(0o600);
  });

  it('should keep the previous file path when none is given', async () => {
    await store.saveRepositoryTarget('test-secret', 'octo/ips', 'a.txt');
    await store.saveRepositoryTarget('test-secret', 'octo/other');

    const saved = await store.load();
    expect(saved.repoInfo).toBe('octo/other');
    expect(saved.filePath).toBe('a.txt');
  });

  it('should clear a single field', async () => {
    await store.saveApiTarget('registry.example.test', 'test-uuid');
    await store.clearField('uuid');

    const raw: unknown = JSON.parse(await readFile(store.location, 'utf-8'));
    expect(raw).toEqual({ workerDomain: 'registry.example.test', apiLastUsed: '2024-05-01T08:00:00.000Z' });
  });

  it('should delete the file and report whether there was one', async () => {
    expect(await store.clear()).toBe(false);
    await store.saveApiTarget('registry.example.test', 'test-uuid');
    expect(await store.clear()).toBe(true);
    expect(await store.load()).toEqual({});
  });

  it('should ignore malformed files and unknown fields', async () => {
    await store.saveApiTarget('registry.example.test', 'test-uuid');
    await writeFile(store.location, '{"uuid": 42, "workerDomain": "a.example.test", "extra": "x"}');
    expect(await store.load()).toEqual({ workerDomain: 'a.example.test' });

    await writeFile(store.location, 'not json');
    expect(await store.load()).toEqual({});
  });
});
