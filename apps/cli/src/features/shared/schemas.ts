import { BpsSchema, TokenAmountSchema, TransferTaxBpsSchema } from '@levy/core';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Simulate command options
 */
export const SimulateCommandOptionsSchema = JsonFlagSchema.extend({
  strict: z.boolean().optional(),
});

/**
 * Quote command options. Commander hands every value over as a string.
 */
export const QuoteCommandOptionsSchema = JsonFlagSchema.extend({
  amount: TokenAmountSchema,
  decimals: z.coerce.number().int().min(0).max(36).default(18),
  taxBps: z.coerce.number().pipe(TransferTaxBpsSchema),
  wealthBps: z.coerce.number().pipe(BpsSchema),
});
