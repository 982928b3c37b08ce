import { createInterface } from 'node:readline';
import type { Command } from 'commander';
import { ConfigService, JsonCredentialStore, type SavedCredentialConfig } from '@edgeprobe/core';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { fail } from './options.js';

const CLEARABLE_FIELDS: Record<string, keyof SavedCredentialConfig> = {
  'worker-domain': 'workerDomain',
  uuid: 'uuid',
  token: 'githubToken',
  repo: 'repoInfo',
  'file-path': 'filePath',
};

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function createConfigService(): ConfigService {
  return new ConfigService(new JsonCredentialStore(getConfigDir()));
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage saved upload credentials');

  config
    .command('show')
    .description('Show saved credentials (secrets masked)')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      try {
        const display = await createConfigService().describe();

        if (opts.json) {
          console.log(JSON.stringify(display, null, 2));
        } else {
          console.log(`\n  Saved credentials:`);
          console.log(`  Worker domain:  ${display.workerDomain}`);
          console.log(`  UUID:           ${display.uuid}`);
          console.log(`  API last used:  ${display.apiLastUsed}`);
          console.log(`  Repository:     ${display.repoInfo}`);
          console.log(`  File path:      ${display.filePath}`);
          console.log(`  Token:          ${display.githubToken}`);
          console.log(`  Repo last used: ${display.githubLastUsed}`);
          console.log(`  File:           ${display.location}`);
          console.log();
        }
      } catch (err) {
        fail(err, opts.json);
      }
    });

  config
    .command('set')
    .description('Save credentials for an upload target')
    .argument('<target>', 'api or github')
    .argument('[values...]', 'api: <worker-domain> <uuid>; github: <owner/repo> <token> [file-path]')
    .action(async (target: string, values: string[]) => {
      const configService = createConfigService();
      try {
        switch (target) {
          case 'api': {
            const workerDomain = values[0] ?? await prompt('Worker domain: ');
            const uuid = values[1] ?? await prompt('UUID: ');
            await configService.saveApiCredentials(workerDomain, uuid);
            console.log('API credentials saved.');
            break;
          }
          case 'github': {
            const repoInfo = values[0] ?? await prompt('Repository (owner/repo): ');
            const token = values[1] ?? await prompt('Token: ');
            await configService.saveRepositoryCredentials(token, repoInfo, values[2]);
            console.log('Repository credentials saved.');
            break;
          }
          default:
            console.error(`Unknown target: ${target}. Valid targets: api, github`);
            process.exit(1);
        }
      } catch (err) {
        fail(err);
      }
    });

  config
    .command('clear')
    .description('Delete saved credentials, or a single field')
    .argument('[field]', `One of: ${Object.keys(CLEARABLE_FIELDS).join(', ')}`)
    .action(async (field?: string) => {
      const configService = createConfigService();
      try {
        if (!field) {
          const removed = await configService.clear();
          console.log(removed ? 'Saved credentials deleted.' : 'No saved credentials.');
          return;
        }
        const key = CLEARABLE_FIELDS[field];
        if (!key) {
          console.error(`Unknown field: ${field}. Valid fields: ${Object.keys(CLEARABLE_FIELDS).join(', ')}`);
          process.exit(1);
        }
        await configService.clear(key);
        console.log(`Cleared ${field}.`);
      } catch (err) {
        fail(err);
      }
    });

  config
    .command('path')
    .description('Print the credential file location')
    .action(() => {
      console.log(createConfigService().location);
    });

  // Default: show config when no subcommand
  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
