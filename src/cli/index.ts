#!/usr/bin/env node
/**
 * Ferry CLI
 *
 * @example
 * ```bash
 * # Run the forwarder on the connected side
 * ferry forward --shared-dir /mnt/shared --block-domain tracker.example
 *
 * # Inspect the shared directory
 * ferry status
 * ```
 */

import { Command } from 'commander';
import { errorMessage } from '../errors.js';
import { PROTOCOL_VERSION } from '../types/index.js';
import { createForwardCommand, createStatusCommand } from './commands/index.js';

function createProgram(): Command {
  const program = new Command();

  program
    .name('ferry')
    .description('Store-and-forward HTTP relay over a shared directory')
    .version(PROTOCOL_VERSION, '-V, --version', 'Output the version number');

  program.addCommand(createForwardCommand());
  program.addCommand(createStatusCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
