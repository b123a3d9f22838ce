/**
 * Forward command
 *
 * Runs the forwarder loop against the shared directory until interrupted.
 */

import { join, resolve } from 'path';
import { Command } from 'commander';

import { ForwarderAgent } from '../../agents/forwarder.js';
import { loadConfig } from '../../config.js';
import { SecurityGate } from '../../gates/index.js';
import { createLogger } from '../../logger.js';
import { EventLog } from '../../store/event-log.js';
import { ExchangeStore } from '../../store/exchange-store.js';
import { HttpTransport } from '../../transport/http-transport.js';

export interface ForwardCommandOptions {
  sharedDir?: string;
  config?: string;
  blockDomain: string[];
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export async function runForwarder(options: ForwardCommandOptions): Promise<void> {
  const logger = createLogger({ name: 'ferry-forwarder', level: options.verbose ? 'debug' : undefined });
  const config = loadConfig({ path: options.config });
  const sharedDir = options.sharedDir ? resolve(options.sharedDir) : config.shared_dir;

  const store = new ExchangeStore(sharedDir, {
    readRetries: config.interceptor.read_retries,
    readBackoffMs: config.interceptor.read_backoff_ms
  });

  const gate = new SecurityGate(
    {
      blockedDomains: config.security.blocked_domains,
      blockedPatterns: config.security.blocked_patterns,
      maxRequestBytes: config.security.max_request_bytes,
      maxResponseBytes: config.security.max_response_bytes
    },
    logger
  );

  const transport = new HttpTransport({ logger });
  const forwarder = new ForwarderAgent(store, gate, transport, new EventLog(join(store.logDir, 'forwarder.log')), logger, {
    pollIntervalMs: config.forwarder.poll_interval_ms,
    outboundTimeoutMs: config.forwarder.outbound_timeout_seconds * 1000,
    maintenanceIntervalMs: config.forwarder.maintenance_interval_seconds * 1000,
    staleResponseMs: config.forwarder.stale_response_seconds * 1000
  });

  for (const domain of options.blockDomain) {
    forwarder.blockDomain(domain);
  }

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    forwarder.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await forwarder.start();
  } finally {
    await transport.close();
  }
}

/**
 * Create the forward command
 */
export function createForwardCommand(run: (options: ForwardCommandOptions) => Promise<void> = runForwarder): Command {
  return new Command('forward')
    .description('Pick up relayed requests and perform them on the connected side')
    .option('--shared-dir <path>', 'Shared exchange directory')
    .option('-c, --config <path>', 'Configuration file')
    .option('--block-domain <host>', 'Additional blocked domain (repeatable)', collect, [])
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (options: ForwardCommandOptions) => {
      await run(options);
    });
}
