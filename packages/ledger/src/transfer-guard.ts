import {
  MaxTxExceededError,
  MaxWalletExceededError,
  TradingDisabledError,
  type AccountId,
  type TransferError,
} from '@levy/core';
import { err, ok, type Result } from 'neverthrow';

import type { AccountFlags, PolicySnapshot } from './policy/policy-types.js';

/**
 * Trading gate: while trading is disabled only transfers touching a
 * limit-exempt account go through.
 */
export function checkTradingGate(
  snapshot: Pick<PolicySnapshot, 'tradingEnabled'>,
  fromFlags: AccountFlags,
  toFlags: AccountFlags
): Result<void, TransferError> {
  if (snapshot.tradingEnabled || fromFlags.limitExempt || toFlags.limitExempt) {
    return ok(undefined);
  }
  return err(new TradingDisabledError());
}

/**
 * Per-transaction ceiling, checked against the gross amount.
 */
export function checkTransactionCeiling(
  amount: bigint,
  snapshot: Pick<PolicySnapshot, 'maxTxAmount'>,
  fromFlags: AccountFlags,
  toFlags: AccountFlags
): Result<void, TransferError> {
  if (snapshot.maxTxAmount === 0n || fromFlags.limitExempt || toFlags.limitExempt) {
    return ok(undefined);
  }
  if (amount > snapshot.maxTxAmount) {
    return err(new MaxTxExceededError(amount, snapshot.maxTxAmount));
  }
  return ok(undefined);
}

/**
 * Per-wallet ceiling on the balance the recipient would hold after receiving
 * the principal (not the gross amount). Only the recipient's exemption counts.
 */
export function checkWalletCeiling(
  to: AccountId,
  projectedBalance: bigint,
  snapshot: Pick<PolicySnapshot, 'maxWalletAmount'>,
  toFlags: AccountFlags
): Result<void, TransferError> {
  if (snapshot.maxWalletAmount === 0n || toFlags.limitExempt) {
    return ok(undefined);
  }
  if (projectedBalance > snapshot.maxWalletAmount) {
    return err(new MaxWalletExceededError(to, projectedBalance, snapshot.maxWalletAmount));
  }
  return ok(undefined);
}

/**
 * Checks that run before any tax is computed: trading gate, then the
 * transaction ceiling.
 */
export function checkPreconditions(
  amount: bigint,
  snapshot: Pick<PolicySnapshot, 'tradingEnabled' | 'maxTxAmount'>,
  fromFlags: AccountFlags,
  toFlags: AccountFlags
): Result<void, TransferError> {
  return checkTradingGate(snapshot, fromFlags, toFlags).andThen(() =>
    checkTransactionCeiling(amount, snapshot, fromFlags, toFlags)
  );
}
