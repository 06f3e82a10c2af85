import { AccountIdSchema, BpsSchema, TokenAmountSchema, TokenConfigSchema, TransferTaxBpsSchema } from '@levy/core';
import { z } from 'zod';

/** Whole-token amount, or "max" for an unlimited allowance */
const AllowanceAmountSchema = z.union([z.literal('max'), TokenAmountSchema]);

const PolicyActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('enableTrading') }),
  z.object({ action: z.literal('setTransferTax'), bps: TransferTaxBpsSchema }),
  z.object({ action: z.literal('setTaxShares'), wealthBps: BpsSchema, charityBps: BpsSchema }),
  z.object({ action: z.literal('setFunds'), wealthFund: AccountIdSchema, charityFund: AccountIdSchema }),
  z.object({ action: z.literal('setMaxTxAmount'), amount: TokenAmountSchema }),
  z.object({ action: z.literal('setMaxWalletAmount'), amount: TokenAmountSchema }),
  z.object({ action: z.literal('removeLimits') }),
  z.object({ action: z.literal('setFeeExempt'), account: AccountIdSchema, value: z.boolean() }),
  z.object({ action: z.literal('setLimitExempt'), account: AccountIdSchema, value: z.boolean() }),
  z.object({ action: z.literal('transferOwnership'), newOwner: AccountIdSchema }),
  z.object({ action: z.literal('renounceOwnership') }),
]);

export const ScenarioOperationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('transfer'), from: AccountIdSchema, to: AccountIdSchema, amount: TokenAmountSchema }),
  z.object({
    op: z.literal('transferFrom'),
    spender: AccountIdSchema,
    from: AccountIdSchema,
    to: AccountIdSchema,
    amount: TokenAmountSchema,
  }),
  z.object({ op: z.literal('approve'), owner: AccountIdSchema, spender: AccountIdSchema, amount: AllowanceAmountSchema }),
  z.object({ op: z.literal('burn'), holder: AccountIdSchema, amount: TokenAmountSchema }),
  z.object({ op: z.literal('policy'), caller: AccountIdSchema, change: PolicyActionSchema }),
]);

/**
 * A token configuration plus the operations to run against it, in order.
 * Amounts are in whole tokens and scaled by the token's decimals.
 */
export const ScenarioSchema = z.object({
  token: TokenConfigSchema,
  operations: z.array(ScenarioOperationSchema).default([]),
});

export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type ScenarioOperation = z.infer<typeof ScenarioOperationSchema>;
export type PolicyAction = z.infer<typeof PolicyActionSchema>;

export interface OperationOutcome {
  index: number;
  op: ScenarioOperation['op'];
  status: 'committed' | 'rejected';
  /** Error code of a rejected operation */
  code?: string | undefined;
  summary: string;
}

export interface SimulationReport {
  token: {
    name: string;
    symbol: string;
    decimals: number;
    totalSupply: string;
  };
  policyVersion: number;
  outcomes: OperationOutcome[];
  committed: number;
  rejected: number;
  holders: { account: string; balance: string }[];
}
