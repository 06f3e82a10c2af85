import type { AccountId } from '@levy/core';

/**
 * Key-value backing store for balances and the total supply.
 *
 * Implementations only persist what they are given; range checks and
 * atomicity belong to the Ledger that writes through them.
 */
export interface BalanceStore {
  get(account: AccountId): bigint | undefined;
  /** Setting a zero balance removes the entry. */
  set(account: AccountId, balance: bigint): void;
  entries(): Iterable<[AccountId, bigint]>;
  getTotalSupply(): bigint;
  setTotalSupply(supply: bigint): void;
}

export class InMemoryBalanceStore implements BalanceStore {
  private readonly balances = new Map<AccountId, bigint>();
  private supply = 0n;

  get(account: AccountId): bigint | undefined {
    return this.balances.get(account);
  }

  set(account: AccountId, balance: bigint): void {
    if (balance === 0n) {
      this.balances.delete(account);
      return;
    }
    this.balances.set(account, balance);
  }

  entries(): Iterable<[AccountId, bigint]> {
    return this.balances.entries();
  }

  getTotalSupply(): bigint {
    return this.supply;
  }

  setTotalSupply(supply: bigint): void {
    this.supply = supply;
  }
}
