/**
 * Status command
 *
 * Shows the shared directory and how many exchanges are pending.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { Command } from 'commander';

import { loadConfig } from '../../config.js';
import { ExchangeStore } from '../../store/exchange-store.js';

export interface StatusCommandOptions {
  sharedDir?: string;
  config?: string;
  json?: boolean;
}

export interface StatusReport {
  sharedDir: string;
  exists: boolean;
  requestsDir: string;
  responsesDir: string;
  pendingRequests: number;
  pendingResponses: number;
}

export async function collectStatus(store: ExchangeStore): Promise<StatusReport> {
  const stats = await store.stats();
  return {
    sharedDir: store.root,
    exists: existsSync(store.root),
    requestsDir: store.dir('requests'),
    responsesDir: store.dir('responses'),
    ...stats
  };
}

export function formatStatus(report: StatusReport): string[] {
  const lines = ['Relay status', '─'.repeat(40), `Shared directory: ${report.sharedDir}`, `Exists: ${report.exists}`];

  if (!report.exists) {
    lines.push('', 'Shared directory does not exist. Start the capture point or the forwarder to create it.');
    return lines;
  }

  lines.push(
    `Request directory: ${report.requestsDir}`,
    `  Pending requests: ${report.pendingRequests}`,
    `Response directory: ${report.responsesDir}`,
    `  Pending responses: ${report.pendingResponses}`
  );
  return lines;
}

async function showStatus(options: StatusCommandOptions): Promise<void> {
  const config = loadConfig({ path: options.config });
  const store = new ExchangeStore(options.sharedDir ? resolve(options.sharedDir) : config.shared_dir);
  const report = await collectStatus(store);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  for (const line of formatStatus(report)) {
    console.log(line);
  }
}

/**
 * Create the status command
 */
export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show the shared directory and pending exchanges')
    .option('--shared-dir <path>', 'Shared exchange directory')
    .option('-c, --config <path>', 'Configuration file')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: StatusCommandOptions) => {
      await showStatus(options);
    });
}
