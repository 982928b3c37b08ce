import { resolve } from 'node:path';
import type { Command } from 'commander';
import { ConfigError, isUploadSuccess, type UploadMethod } from '@edgeprobe/core';
import { createServices } from '../adapters/service-factory.js';
import { JsonFormatter } from '../formatters/json.js';
import { PlainFormatter } from '../formatters/plain.js';
import {
  applyLogFlags,
  fail,
  parseInteger,
  parseUploadMethod,
  resolveWorkDir,
  type CommonOptions,
} from './options.js';

interface UploadOptions extends CommonOptions {
  upload: UploadMethod;
  workerDomain?: string;
  uuid?: string;
  clear?: boolean;
  token?: string;
  repo?: string;
  filePath?: string;
  uploadCount?: number;
  remember: boolean;
  json?: boolean;
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload the fastest IPs of an existing result CSV')
    .argument('<csv>', 'Result file written by the measurement binary')
    .option('-u, --upload <method>', 'Upload target: api or github', parseUploadMethod, 'api')
    .option('--worker-domain <domain>', 'Preferred-IP API domain')
    .option('--uuid <uuid>', 'Preferred-IP API path secret')
    .option('--clear', 'Clear the registry before uploading')
    .option('--token <token>', 'Repository access token')
    .option('--repo <owner/repo>', 'Target repository')
    .option('--file-path <path>', 'File path inside the repository')
    .option('--upload-count <n>', 'Number of IPs to upload', parseInteger)
    .option('--no-remember', "Don't save credentials after a successful upload")
    .option('--work-dir <path>', 'Directory used to resolve the CSV path')
    .option('--json', 'Output the outcome as JSON')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (csv: string, opts: UploadOptions) => {
      applyLogFlags(opts);
      const workDir = resolveWorkDir(opts);
      const formatter = opts.json ? new JsonFormatter() : new PlainFormatter();

      try {
        const services = await createServices(workDir);
        const target = await services.config.resolveUploadTarget(opts);
        if (!target) {
          throw new ConfigError('Choose an upload target with --upload api or --upload github');
        }

        const outcome = await services.speedtest.uploadResultFile(resolve(workDir, csv), target);
        formatter.renderUpload(outcome);
        if (!isUploadSuccess(outcome)) process.exit(1);
        if (opts.remember) await services.config.remember(target);
      } catch (err) {
        fail(err, opts.json);
      }
    });
}
