import { applyBps } from '@levy/core';

import type { AccountFlags, PolicySnapshot } from './policy/policy-types.js';

export interface TaxSplit {
  /** Amount delivered to the recipient */
  principal: bigint;
  /** wealthCut + charityCut */
  tax: bigint;
  wealthCut: bigint;
  charityCut: bigint;
}

export function untaxed(amount: bigint): TaxSplit {
  return { principal: amount, tax: 0n, wealthCut: 0n, charityCut: 0n };
}

/**
 * Split a gross transfer amount into principal and the two fund cuts.
 *
 * Truncating division throughout. The charity cut is computed as the remainder
 * of the tax, so `wealthCut + charityCut === tax` holds exactly and rounding
 * never leaks value.
 */
export function computeTax(
  amount: bigint,
  snapshot: Pick<PolicySnapshot, 'transferTaxBps' | 'wealthShareBps'>,
  fromFlags: AccountFlags,
  toFlags: AccountFlags
): TaxSplit {
  if (snapshot.transferTaxBps === 0 || fromFlags.feeExempt || toFlags.feeExempt) {
    return untaxed(amount);
  }

  const tax = applyBps(amount, snapshot.transferTaxBps);
  const wealthCut = applyBps(tax, snapshot.wealthShareBps);
  return {
    principal: amount - tax,
    tax,
    wealthCut,
    charityCut: tax - wealthCut,
  };
}
