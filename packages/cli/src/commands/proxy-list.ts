import { join, resolve } from 'node:path';
import type { Command } from 'commander';
import { ConfigError, DEFAULT_RESULT_FILE, PROXY_LIST_FILE, fileExists, generateProxyList } from '@edgeprobe/core';
import { createServices } from '../adapters/service-factory.js';
import { applyLogFlags, fail, resolveWorkDir, type CommonOptions } from './options.js';

interface ProxyListOptions extends CommonOptions {
  csv?: string;
  output?: string;
}

export function registerProxyListCommand(program: Command): void {
  program
    .command('proxy-list')
    .description(`Convert a result CSV into ${PROXY_LIST_FILE} (one ip:port per line)`)
    .option('--csv <file>', `Result CSV (default: ${DEFAULT_RESULT_FILE} in the work dir)`)
    .option('-o, --output <file>', `Output file (default: ${PROXY_LIST_FILE} in the work dir)`)
    .option('--work-dir <path>', 'Directory used to resolve relative paths')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (opts: ProxyListOptions) => {
      applyLogFlags(opts);
      const workDir = resolveWorkDir(opts);
      const csvFile = resolve(workDir, opts.csv ?? DEFAULT_RESULT_FILE);
      const output = opts.output ? resolve(workDir, opts.output) : join(workDir, PROXY_LIST_FILE);

      try {
        if (!(await fileExists(csvFile))) {
          throw new ConfigError(`Result file not found: ${csvFile}`);
        }
        const services = await createServices(workDir);
        const lines = await generateProxyList(services.reader, csvFile, output);
        if (!opts.quiet) console.log(`Wrote ${lines.length} entries to ${output}`);
      } catch (err) {
        fail(err);
      }
    });
}
