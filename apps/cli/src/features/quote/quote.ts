import type { Command } from 'commander';
import type { z } from 'zod';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { QuoteCommandOptionsSchema } from '../shared/schemas.js';

import { buildQuote } from './quote-handler.js';

/**
 * Quote command options validated by Zod at CLI boundary
 */
export type QuoteCommandOptions = z.infer<typeof QuoteCommandOptionsSchema>;

export function registerQuoteCommand(program: Command): void {
  program
    .command('quote')
    .description('Show how a transfer amount splits into principal and fund cuts')
    .requiredOption('--amount <amount>', 'Gross transfer amount in whole tokens')
    .requiredOption('--tax-bps <bps>', 'Transfer tax in basis points (0-500)')
    .requiredOption('--wealth-bps <bps>', 'Share of the tax routed to the wealth fund, in basis points')
    .option('--decimals <n>', 'Token decimals', '18')
    .option('--json', 'Output results in JSON format')
    .addHelpText(
      'after',
      `
Examples:
  $ levy quote --amount 1000 --tax-bps 500 --wealth-bps 6000
  $ levy quote --amount 0.5 --tax-bps 250 --wealth-bps 5000 --decimals 6 --json
`
    )
    .action((rawOptions: unknown) => {
      executeQuoteCommand(rawOptions);
    });
}

function executeQuoteCommand(rawOptions: unknown): void {
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = QuoteCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    const field = firstError?.path.join('.');
    output.error(
      'quote',
      new Error(field ? `${field}: ${firstError?.message}` : (firstError?.message ?? 'Invalid options')),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = buildQuote({
    amount: options.amount,
    decimals: options.decimals,
    taxBps: options.taxBps,
    wealthBps: options.wealthBps,
  });
  if (result.isErr()) {
    output.error('quote', result.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const quote = result.value;
  if (output.isJsonMode()) {
    output.json('quote', quote);
    return;
  }

  output.note(
    [
      `gross      ${quote.grossAmount}`,
      `principal  ${quote.principal}`,
      `tax        ${quote.tax} (${quote.effectiveBps} bps effective)`,
      `  wealth   ${quote.wealthCut}`,
      `  charity  ${quote.charityCut}`,
    ].join('\n'),
    'Transfer quote'
  );
}
