import type { AccountId } from '@levy/core';

/**
 * Immutable view of the transfer policy. A new snapshot object, with a higher
 * `version`, replaces the previous one on every configuration change; a
 * request holds the snapshot it started with until it finishes.
 */
export interface PolicySnapshot {
  readonly version: number;
  readonly tradingEnabled: boolean;
  /** 0 = unlimited */
  readonly maxTxAmount: bigint;
  /** 0 = unlimited */
  readonly maxWalletAmount: bigint;
  /** 0 to 500 */
  readonly transferTaxBps: number;
  readonly wealthShareBps: number;
  readonly charityShareBps: number;
  readonly wealthFund: AccountId;
  readonly charityFund: AccountId;
}

export interface AccountFlags {
  readonly feeExempt: boolean;
  readonly limitExempt: boolean;
}

export const NO_EXEMPTIONS: AccountFlags = Object.freeze({ feeExempt: false, limitExempt: false });

/**
 * Read side of the configuration collaborator, as seen by the transfer core.
 */
export interface PolicyProvider {
  getPolicySnapshot(): PolicySnapshot;
  getAccountFlags(account: AccountId): AccountFlags;
}
