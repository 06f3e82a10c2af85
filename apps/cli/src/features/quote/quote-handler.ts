import { formatUnits, parseUnits } from '@levy/core';
import { computeTax, NO_EXEMPTIONS } from '@levy/ledger';
import type { Result } from 'neverthrow';

export interface QuoteParams {
  amount: string;
  decimals: number;
  taxBps: number;
  wealthBps: number;
}

export interface TransferQuote {
  grossAmount: string;
  principal: string;
  tax: string;
  wealthCut: string;
  charityCut: string;
  /** Effective tax rate after rounding, in bps of the gross amount */
  effectiveBps: number;
}

/**
 * Tax split of a single transfer between two non-exempt accounts, without a ledger.
 */
export function buildQuote(params: QuoteParams): Result<TransferQuote, Error> {
  return parseUnits(params.amount, params.decimals).map((amount) => {
    const split = computeTax(
      amount,
      { transferTaxBps: params.taxBps, wealthShareBps: params.wealthBps },
      NO_EXEMPTIONS,
      NO_EXEMPTIONS
    );
    return {
      grossAmount: formatUnits(amount, params.decimals),
      principal: formatUnits(split.principal, params.decimals),
      tax: formatUnits(split.tax, params.decimals),
      wealthCut: formatUnits(split.wealthCut, params.decimals),
      charityCut: formatUnits(split.charityCut, params.decimals),
      effectiveBps: amount === 0n ? 0 : Number((split.tax * 10_000n) / amount),
    };
  });
}
