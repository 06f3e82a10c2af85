#!/usr/bin/env node
import { getLogger } from '@levy/logger';
import { Command } from 'commander';

import { registerQuoteCommand } from './features/quote/quote.js';
import { registerSimulateCommand } from './features/simulate/simulate.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program.name('levy').description('Taxed fixed-supply token ledger simulator').version('0.1.0');

  registerSimulateCommand(program);
  registerQuoteCommand(program);

  await program.parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error({ err: error }, `Uncaught Exception: ${error.message}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
