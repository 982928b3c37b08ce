import { resolve } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { isUploadMethod, setLogLevel, type UploadMethod } from '@edgeprobe/core';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

export function parseUploadMethod(value: string): UploadMethod {
  if (!isUploadMethod(value)) {
    throw new InvalidArgumentError('Expected one of: api, github, none.');
  }
  return value;
}

export interface CommonOptions {
  workDir?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function applyLogFlags(opts: CommonOptions): void {
  if (opts.verbose) setLogLevel('debug');
  if (opts.quiet) setLogLevel('error');
}

export function resolveWorkDir(opts: CommonOptions): string {
  return resolve(opts.workDir ?? process.cwd());
}

export function fail(err: unknown, json = false): never {
  const message = err instanceof Error ? err.message : String(err);
  if (json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}
