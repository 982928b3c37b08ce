import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LocalIoError } from './errors.js';
import { errorMessage } from './logger.js';

export async function isNonEmptyFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes through a sibling temp file and renames it over `path`, so readers
 * see either the old content or the complete new content.
 */
export async function writeFileAtomic(
  path: string,
  data: string,
  options: { mode?: number } = {},
): Promise<void> {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, data, { encoding: 'utf-8', mode: options.mode });
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw new LocalIoError(`Could not write ${path}: ${errorMessage(err)}`, path);
  }
}
