#!/usr/bin/env node
import { Command } from 'commander';

import { configOutput, loadConfig } from '../app/config.js';
import {
  createClient,
  deleteCommand,
  formatResult,
  getCommand,
  setCommand,
  type GlobalOptions,
} from '../app/commands.js';
import type { DatastoreClient } from '../client/client.js';
import type { StoredValue } from '../client/payload.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

type ProgramOptions = GlobalOptions & { config?: string };

async function run(fn: () => Promise<string>): Promise<void> {
  try {
    console.log(await fn());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

async function runWithClient(fn: (client: DatastoreClient) => Promise<StoredValue>): Promise<void> {
  await run(async () => {
    const opts = program.opts<ProgramOptions>();
    const { config } = await loadConfig(opts.config);
    const client = await createClient(config, opts);
    return formatResult(await fn(client));
  });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('datastore')
  .description('Read and write keys in the remote datastore')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file')
  .option('--api-key <key>', 'API key (default: VOIDS_DATASTORE_API_KEY or API_KEY)')
  .option('--base-url <url>', 'custom API base URL')
  .option('--poll-interval <duration>', 'initial wait between status checks, e.g. 5s')
  .option('--poll-timeout <duration>', 'give up polling after this long, e.g. 60s')
  .option('--fixed-delay', 'poll at a constant interval instead of backing off')
  .option('-v, --verbose', 'log each HTTP exchange to stderr');

program
  .command('get <namespace> <key>')
  .description('Get a key value')
  .action(async (namespace: string, key: string) => {
    await runWithClient((client) => getCommand(client, namespace, key));
  });

program
  .command('set <namespace> <key> <value>')
  .description('Set a key value (parsed as JSON when possible)')
  .action(async (namespace: string, key: string, value: string) => {
    await runWithClient((client) => setCommand(client, namespace, key, value));
  });

program
  .command('delete <namespace> <key>')
  .description('Delete a key')
  .action(async (namespace: string, key: string) => {
    await runWithClient((client) => deleteCommand(client, namespace, key));
  });

program
  .command('config')
  .description('Print the resolved configuration as JSON')
  .action(async () => {
    await run(async () => {
      const { configPath, config, exists } = await loadConfig(program.opts<ProgramOptions>().config);
      return JSON.stringify(configOutput(configPath, exists, config), null, 2);
    });
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
