import { z } from 'zod';

import { AccountId } from '../account-id.js';
import { MAX_TRANSFER_TAX_BPS } from '../amounts.js';

// Account key - validated and normalised to lower case
export const AccountIdSchema = z
  .string()
  .refine((val) => AccountId.isValid(val), { message: 'Must be 0x followed by 40 hex digits and not the zero key' })
  .transform((val) => AccountId.of(val));

// Human-readable token amount, e.g. "1000000" or "0.5"; scaled by the token decimals later
export const TokenAmountSchema = z
  .union([z.string().trim().regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal string'), z.number().nonnegative()])
  .transform((val) => String(val));

export const BpsSchema = z.number().int().min(0).max(10_000);

export const TransferTaxBpsSchema = z
  .number()
  .int()
  .min(0)
  .max(MAX_TRANSFER_TAX_BPS, { message: `Transfer tax cannot exceed ${MAX_TRANSFER_TAX_BPS} bps` });

export const TaxSharesSchema = z
  .object({
    charityShareBps: BpsSchema,
    wealthShareBps: BpsSchema,
  })
  .refine((val) => val.wealthShareBps + val.charityShareBps === 10_000, {
    message: 'Wealth and charity shares must sum to 10000 bps',
  });

export const InitialPolicySchema = z.object({
  charityShareBps: BpsSchema.default(5_000),
  maxTxAmount: TokenAmountSchema.default('0'),
  maxWalletAmount: TokenAmountSchema.default('0'),
  tradingEnabled: z.boolean().default(false),
  transferTaxBps: TransferTaxBpsSchema.default(0),
  wealthShareBps: BpsSchema.default(5_000),
});

/**
 * Genesis configuration for a token: identity, fixed supply, owner, tax
 * recipients and the initial policy. Amounts are expressed in whole tokens.
 */
export const TokenConfigSchema = z
  .object({
    charityFund: AccountIdSchema,
    decimals: z.number().int().min(0).max(36).default(18),
    exempt: z
      .array(
        z.object({
          account: AccountIdSchema,
          feeExempt: z.boolean().default(true),
          limitExempt: z.boolean().default(true),
        })
      )
      .default([]),
    name: z.string().trim().min(1, { message: 'Token name must not be empty' }),
    owner: AccountIdSchema,
    policy: InitialPolicySchema.default({}),
    symbol: z.string().trim().min(1).max(11),
    totalSupply: TokenAmountSchema,
    wealthFund: AccountIdSchema,
  })
  .refine((val) => val.policy.wealthShareBps + val.policy.charityShareBps === 10_000, {
    message: 'Wealth and charity shares must sum to 10000 bps',
    path: ['policy'],
  });

export type TokenConfig = z.infer<typeof TokenConfigSchema>;
export type TokenConfigInput = z.input<typeof TokenConfigSchema>;
export type InitialPolicy = z.infer<typeof InitialPolicySchema>;
