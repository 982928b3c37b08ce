import type { Command } from 'commander';
import { REGION_ORDER, type RegionSummary } from '@edgeprobe/core';
import { createServices } from '../adapters/service-factory.js';
import { applyLogFlags, fail, resolveWorkDir, type CommonOptions } from './options.js';

interface RegionOptions extends CommonOptions {
  json?: boolean;
  ipv6?: boolean;
  rescan?: boolean;
}

function printSummaries(summaries: RegionSummary[], json?: boolean): void {
  if (json) {
    console.log(JSON.stringify(summaries, null, 2));
    return;
  }
  if (summaries.length === 0) {
    console.log('No regions found in the scan.');
    return;
  }
  console.log(`\n  Regions (${summaries.length}):`);
  for (const s of summaries) {
    const count = s.ipCount > 0 ? `${s.ipCount} IPs` : '';
    console.log(`  ${s.code.padEnd(5)} ${s.label.padEnd(28)} ${count}`);
  }
  console.log();
}

export function registerRegionsCommand(program: Command): void {
  const regions = program
    .command('regions')
    .description('Scan and list edge locations');

  regions
    .command('scan')
    .description('Run an HTTPing scan and count reachable IPs per colo')
    .option('--ipv6', 'Scan IPv6 ranges')
    .option('--rescan', 'Ignore a previous scan result')
    .option('--work-dir <path>', 'Directory holding the binary and scan file')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (opts: RegionOptions) => {
      applyLogFlags(opts);
      const workDir = resolveWorkDir(opts);
      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());

      try {
        const services = await createServices(workDir);
        const ipFile = await services.ipLists.ensure(opts.ipv6 ? 'ipv6' : 'ipv4');
        const summaries = await services.regions.scan(ipFile, {
          rescan: opts.rescan,
          abortSignal: controller.signal,
          inheritOutput: !opts.json && !opts.quiet,
        });
        printSummaries(summaries, opts.json);
      } catch (err) {
        fail(err, opts.json);
      }
    });

  regions
    .command('list')
    .description('List known colo codes grouped by region')
    .argument('[query]', 'Filter by code, name or country')
    .option('--json', 'Output as JSON')
    .action(async (query: string | undefined, opts: { json?: boolean }) => {
      try {
        const services = await createServices(process.cwd());
        const colos = services.colos;
        if (query) {
          const matches = colos.search(query).map((code) => ({ code, label: colos.describe(code) }));
          if (opts.json) {
            console.log(JSON.stringify(matches, null, 2));
            return;
          }
          if (matches.length === 0) console.log(`  No colo matches "${query}".`);
          for (const m of matches) console.log(`  ${m.code.padEnd(5)} ${m.label}`);
          return;
        }

        const groups = colos.groupByRegion();
        if (opts.json) {
          console.log(JSON.stringify(Object.fromEntries(groups), null, 2));
          return;
        }
        for (const region of REGION_ORDER) {
          const entries = groups.get(region);
          if (!entries?.length) continue;
          console.log(`\n  ${region} (${entries.length}):`);
          for (const [code, info] of entries) console.log(`    ${code.padEnd(5)} ${info.name} (${info.country})`);
        }
        console.log();
      } catch (err) {
        fail(err, opts.json);
      }
    });

  regions.action(async () => {
    await regions.commands.find((c) => c.name() === 'list')?.parseAsync([], { from: 'user' });
  });
}
