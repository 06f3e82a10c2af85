import { MAX_UINT256, type AccountId, type PolicyError, type TransferError } from '@levy/core';
import type { PolicyStore, Token, TransferReceipt } from '@levy/ledger';
import { ok, type Result } from 'neverthrow';

import type { PolicyAction, ScenarioOperation } from './simulate-types.js';

export class InvalidAmountError extends Error {
  readonly code = 'INVALID_AMOUNT' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidAmountError';
  }
}

export type OperationError = TransferError | PolicyError | InvalidAmountError;

function parseAmount(token: Token, value: string): Result<bigint, InvalidAmountError> {
  return token.parse(value).mapErr((error) => new InvalidAmountError(error.message));
}

export function describeReceipt(token: Token, receipt: TransferReceipt): string {
  if (receipt.kind === 'burn') {
    return `burned ${token.format(receipt.grossAmount)}`;
  }
  const moved = `sent ${token.format(receipt.grossAmount)}, received ${token.format(receipt.principal)}`;
  if (receipt.tax === 0n) {
    return moved;
  }
  return `${moved} (wealth ${token.format(receipt.wealthCut)}, charity ${token.format(receipt.charityCut)})`;
}

function parseAllowance(token: Token, value: string): Result<bigint, InvalidAmountError> {
  return value === 'max' ? ok(MAX_UINT256) : parseAmount(token, value);
}

function describeAllowance(token: Token, allowance: bigint): string {
  return allowance === MAX_UINT256 ? 'allowance unlimited' : `allowance ${token.format(allowance)}`;
}

/**
 * Run one scenario operation against the token and summarise what it did.
 */
export function applyOperation(token: Token, operation: ScenarioOperation): Result<string, OperationError> {
  switch (operation.op) {
    case 'transfer':
      return parseAmount(token, operation.amount)
        .andThen((amount) => token.transfer(operation.from, operation.to, amount))
        .map((receipt) => describeReceipt(token, receipt));
    case 'transferFrom':
      return parseAmount(token, operation.amount)
        .andThen((amount) => token.transferFrom(operation.spender, operation.from, operation.to, amount))
        .map((receipt) => describeReceipt(token, receipt));
    case 'approve':
      return parseAllowance(token, operation.amount)
        .andThen((amount) => token.approve(operation.owner, operation.spender, amount))
        .map((granted) => describeAllowance(token, granted));
    case 'burn':
      return parseAmount(token, operation.amount)
        .andThen((amount) => token.burn(operation.holder, amount))
        .map((receipt) => describeReceipt(token, receipt));
    case 'policy':
      return applyPolicyChange(token, token.policy, operation.caller, operation.change);
  }
}

function applyPolicyChange(
  token: Token,
  policy: PolicyStore,
  caller: AccountId,
  change: PolicyAction
): Result<string, PolicyError | InvalidAmountError> {
  const versioned = (label: string) => (snapshot: { version: number }) => `${label} (policy v${snapshot.version})`;

  switch (change.action) {
    case 'enableTrading':
      return policy.enableTrading(caller).map(versioned('trading enabled'));
    case 'setTransferTax':
      return policy.setTransferTax(caller, change.bps).map(versioned(`transfer tax ${change.bps} bps`));
    case 'setTaxShares':
      return policy
        .setTaxShares(caller, change.wealthBps, change.charityBps)
        .map(versioned(`tax shares ${change.wealthBps}/${change.charityBps} bps`));
    case 'setFunds':
      return policy.setFunds(caller, change.wealthFund, change.charityFund).map(versioned('funds replaced'));
    case 'setMaxTxAmount':
      return parseAmount(token, change.amount)
        .andThen((amount) => policy.setMaxTxAmount(caller, amount))
        .map(versioned(`max tx ${change.amount}`));
    case 'setMaxWalletAmount':
      return parseAmount(token, change.amount)
        .andThen((amount) => policy.setMaxWalletAmount(caller, amount))
        .map(versioned(`max wallet ${change.amount}`));
    case 'removeLimits':
      return policy.removeLimits(caller).map(versioned('limits removed'));
    case 'setFeeExempt':
      return policy
        .setFeeExempt(caller, change.account, change.value)
        .map(() => `${change.account} feeExempt=${change.value}`);
    case 'setLimitExempt':
      return policy
        .setLimitExempt(caller, change.account, change.value)
        .map(() => `${change.account} limitExempt=${change.value}`);
    case 'transferOwnership':
      return policy.transferOwnership(caller, change.newOwner).map(() => `owner is now ${change.newOwner}`);
    case 'renounceOwnership':
      return policy.renounceOwnership(caller).map(() => 'ownership renounced');
  }
}
