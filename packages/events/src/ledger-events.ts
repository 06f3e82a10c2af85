import type { AccountId, Counterparty } from '@levy/core';

/**
 * Summary of one committed transfer request. Mint and burn requests carry a
 * `null` side and zero cuts.
 */
export interface TransferCommittedEvent {
  type: 'transfer.committed';
  sequence: number;
  from: Counterparty;
  to: Counterparty;
  grossAmount: bigint;
  principal: bigint;
  wealthCut: bigint;
  charityCut: bigint;
  /** null for mint and burn */
  policyVersion: number | null;
}

export interface ApprovalEvent {
  type: 'approval';
  owner: AccountId;
  spender: AccountId;
  amount: bigint;
}

export interface OwnershipTransferredEvent {
  type: 'ownership.transferred';
  previousOwner: AccountId | null;
  newOwner: AccountId | null;
}

export type PolicyField =
  | 'tradingEnabled'
  | 'transferTaxBps'
  | 'taxShares'
  | 'funds'
  | 'maxTxAmount'
  | 'maxWalletAmount'
  /** both ceilings at once, as `maxTxAmount/maxWalletAmount` */
  | 'limits';

export interface PolicyUpdatedEvent {
  type: 'policy.updated';
  field: PolicyField;
  previous: string;
  next: string;
  version: number;
}

export interface AccountFlagsUpdatedEvent {
  type: 'account.flags-updated';
  account: AccountId;
  flag: 'feeExempt' | 'limitExempt';
  value: boolean;
  version: number;
}

export type LedgerEvent =
  | TransferCommittedEvent
  | ApprovalEvent
  | OwnershipTransferredEvent
  | PolicyUpdatedEvent
  | AccountFlagsUpdatedEvent;
