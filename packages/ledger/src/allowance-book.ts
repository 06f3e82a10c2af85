import {
  InsufficientAllowanceError,
  isUint256,
  MAX_UINT256,
  OverflowError,
  type AccountId,
  type TransferError,
} from '@levy/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Spending allowances granted by holders to third-party spenders.
 * An allowance of MAX_UINT256 is unlimited and is never drawn down.
 */
export class AllowanceBook {
  private readonly allowances = new Map<string, bigint>();

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.allowances.get(key(owner, spender)) ?? 0n;
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): Result<bigint, TransferError> {
    if (!isUint256(amount)) {
      return err(new OverflowError(`Allowance ${amount} is outside the unsigned 256-bit range`));
    }
    this.write(owner, spender, amount);
    return ok(amount);
  }

  increase(owner: AccountId, spender: AccountId, added: bigint): Result<bigint, TransferError> {
    const current = this.allowance(owner, spender);
    if (added < 0n || current > MAX_UINT256 - added) {
      return err(
        new OverflowError(`Increasing the allowance of ${spender} by ${added} overflows`, {
          added: added.toString(),
          current: current.toString(),
        })
      );
    }
    return this.approve(owner, spender, current + added);
  }

  decrease(owner: AccountId, spender: AccountId, subtracted: bigint): Result<bigint, TransferError> {
    const current = this.allowance(owner, spender);
    if (subtracted < 0n || subtracted > current) {
      return err(new InsufficientAllowanceError(owner, spender, current, subtracted));
    }
    return this.approve(owner, spender, current - subtracted);
  }

  /**
   * Check that `spender` may move `amount` from `owner`, without consuming anything.
   */
  checkSpend(owner: AccountId, spender: AccountId, amount: bigint): Result<void, TransferError> {
    const current = this.allowance(owner, spender);
    if (current < amount) {
      return err(new InsufficientAllowanceError(owner, spender, current, amount));
    }
    return ok(undefined);
  }

  spend(owner: AccountId, spender: AccountId, amount: bigint): Result<void, TransferError> {
    return this.checkSpend(owner, spender, amount).map(() => {
      const current = this.allowance(owner, spender);
      if (current !== MAX_UINT256) {
        this.write(owner, spender, current - amount);
      }
    });
  }

  private write(owner: AccountId, spender: AccountId, amount: bigint): void {
    if (amount === 0n) {
      this.allowances.delete(key(owner, spender));
      return;
    }
    this.allowances.set(key(owner, spender), amount);
  }
}

function key(owner: AccountId, spender: AccountId): string {
  return `${owner}:${spender}`;
}
