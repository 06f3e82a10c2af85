import {
  InsufficientBalanceError,
  InvalidAccountError,
  isUint256,
  isZeroAccount,
  MAX_UINT256,
  OverflowError,
  type AccountId,
  type TransferError,
} from '@levy/core';
import { getLogger } from '@levy/logger';
import { err, ok, type Result } from 'neverthrow';

import { InMemoryBalanceStore, type BalanceStore } from './balance-store.js';

const logger = getLogger('Ledger');

export interface LedgerReader {
  balanceOf(account: AccountId): bigint;
  totalSupply(): bigint;
}

/**
 * Balance mutations. Every method either applies completely or returns an
 * Err and leaves the balances it would have touched unchanged.
 */
export interface LedgerWriter extends LedgerReader {
  debit(account: AccountId, amount: bigint): Result<void, TransferError>;
  credit(account: AccountId, amount: bigint): Result<void, TransferError>;
  transfer(from: AccountId, to: AccountId, amount: bigint): Result<void, TransferError>;
  /** Credit with no counterpart; grows the total supply. */
  mint(to: AccountId, amount: bigint): Result<void, TransferError>;
  /** Debit with no counterpart; shrinks the total supply. */
  burn(from: AccountId, amount: bigint): Result<void, TransferError>;
}

function validateAccount(account: AccountId): Result<void, TransferError> {
  if (isZeroAccount(account)) {
    return err(new InvalidAccountError(account, 'the zero key cannot hold a balance'));
  }
  return ok(undefined);
}

function validateAmount(amount: bigint): Result<void, TransferError> {
  if (!isUint256(amount)) {
    return err(new OverflowError(`Amount ${amount} is outside the unsigned 256-bit range`, { amount: amount.toString() }));
  }
  return ok(undefined);
}

/**
 * Write buffer over a BalanceStore. Reads fall through to the store for
 * accounts not yet touched; nothing reaches the store until commit().
 */
class PendingLedger implements LedgerWriter {
  private readonly balances = new Map<AccountId, bigint>();
  private supply: bigint | undefined;

  constructor(private readonly store: BalanceStore) {}

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? this.store.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply ?? this.store.getTotalSupply();
  }

  debit(account: AccountId, amount: bigint): Result<void, TransferError> {
    return validateAccount(account)
      .andThen(() => validateAmount(amount))
      .andThen(() => {
        const balance = this.balanceOf(account);
        if (balance < amount) {
          return err(new InsufficientBalanceError(account, balance, amount));
        }
        this.balances.set(account, balance - amount);
        return ok(undefined);
      });
  }

  credit(account: AccountId, amount: bigint): Result<void, TransferError> {
    return validateAccount(account)
      .andThen(() => validateAmount(amount))
      .andThen(() => {
        const balance = this.balanceOf(account);
        if (balance > MAX_UINT256 - amount) {
          return err(
            new OverflowError(`Crediting ${amount} to ${account} overflows its balance`, {
              account,
              amount: amount.toString(),
              balance: balance.toString(),
            })
          );
        }
        this.balances.set(account, balance + amount);
        return ok(undefined);
      });
  }

  transfer(from: AccountId, to: AccountId, amount: bigint): Result<void, TransferError> {
    // Both sides are checked before either is written
    const fromBalance = this.balanceOf(from);
    return validateAccount(from)
      .andThen(() => validateAccount(to))
      .andThen(() => validateAmount(amount))
      .andThen(() => {
        if (fromBalance < amount) {
          return err(new InsufficientBalanceError(from, fromBalance, amount));
        }
        // A self-transfer nets to zero and cannot overflow
        if (from !== to && this.balanceOf(to) > MAX_UINT256 - amount) {
          return err(
            new OverflowError(`Crediting ${amount} to ${to} overflows its balance`, {
              account: to,
              amount: amount.toString(),
            })
          );
        }
        return this.debit(from, amount).andThen(() => this.credit(to, amount));
      });
  }

  mint(to: AccountId, amount: bigint): Result<void, TransferError> {
    return validateAmount(amount)
      .andThen(() => {
        const supply = this.totalSupply();
        if (supply > MAX_UINT256 - amount) {
          return err(
            new OverflowError(`Minting ${amount} overflows the total supply`, {
              amount: amount.toString(),
              totalSupply: supply.toString(),
            })
          );
        }
        return ok(supply);
      })
      .andThen((supply) =>
        this.credit(to, amount).map(() => {
          this.supply = supply + amount;
        })
      );
  }

  burn(from: AccountId, amount: bigint): Result<void, TransferError> {
    const supply = this.totalSupply();
    return this.debit(from, amount).map(() => {
      this.supply = supply - amount;
    });
  }

  get touchedAccounts(): number {
    return this.balances.size;
  }

  commit(): void {
    for (const [account, balance] of this.balances) {
      this.store.set(account, balance);
    }
    if (this.supply !== undefined) {
      this.store.setTotalSupply(this.supply);
    }
  }
}

/**
 * Account balances with atomic mutation primitives.
 *
 * Single writer: one unit of work at a time. Each direct mutation runs in its
 * own unit of work; callers composing several mutations use unitOfWork() so the
 * whole group commits or none of it does.
 */
export class Ledger implements LedgerWriter {
  private inFlight = false;

  constructor(private readonly store: BalanceStore = new InMemoryBalanceStore()) {}

  balanceOf(account: AccountId): bigint {
    return this.store.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.store.getTotalSupply();
  }

  /**
   * Non-zero balances, largest first.
   */
  holders(): { account: AccountId; balance: bigint }[] {
    return [...this.store.entries()]
      .filter(([, balance]) => balance > 0n)
      .map(([account, balance]) => ({ account, balance }))
      .sort((a, b) => (a.balance === b.balance ? a.account.localeCompare(b.account) : a.balance > b.balance ? -1 : 1));
  }

  /**
   * Run `work` against a buffered view of the ledger. The buffer is written to
   * the store only when `work` returns Ok; an Err or a thrown exception leaves
   * the store exactly as it was.
   *
   * @throws Error when called while another unit of work is in flight
   */
  unitOfWork<T, E>(work: (tx: LedgerWriter) => Result<T, E>): Result<T, E> {
    if (this.inFlight) {
      throw new Error('Ledger unit of work already in flight: requests must not be submitted re-entrantly');
    }

    this.inFlight = true;
    try {
      const pending = new PendingLedger(this.store);
      const result = work(pending);
      if (result.isOk()) {
        pending.commit();
      } else {
        logger.debug({ discardedAccounts: pending.touchedAccounts }, 'Unit of work rolled back');
      }
      return result;
    } finally {
      this.inFlight = false;
    }
  }

  debit(account: AccountId, amount: bigint): Result<void, TransferError> {
    return this.unitOfWork((tx) => tx.debit(account, amount));
  }

  credit(account: AccountId, amount: bigint): Result<void, TransferError> {
    return this.unitOfWork((tx) => tx.credit(account, amount));
  }

  transfer(from: AccountId, to: AccountId, amount: bigint): Result<void, TransferError> {
    return this.unitOfWork((tx) => tx.transfer(from, to, amount));
  }

  mint(to: AccountId, amount: bigint): Result<void, TransferError> {
    return this.unitOfWork((tx) => tx.mint(to, amount));
  }

  burn(from: AccountId, amount: bigint): Result<void, TransferError> {
    return this.unitOfWork((tx) => tx.burn(from, amount));
  }
}
