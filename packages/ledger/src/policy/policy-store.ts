import {
  fromZod,
  InvalidPolicyError,
  isUint256,
  TaxSharesSchema,
  TradingAlreadyEnabledError,
  TransferTaxBpsSchema,
  UnauthorizedError,
  type AccountId,
  type PolicyError,
} from '@levy/core';
import type { EventBus, LedgerEvent, PolicyField } from '@levy/events';
import { getLogger } from '@levy/logger';
import { err, ok, type Result } from 'neverthrow';

import { NO_EXEMPTIONS, type AccountFlags, type PolicyProvider, type PolicySnapshot } from './policy-types.js';

const logger = getLogger('PolicyStore');

export type PolicySettings = Omit<PolicySnapshot, 'version'>;

export interface PolicyStoreOptions {
  owner: AccountId;
  settings: PolicySettings;
  exemptions?: Iterable<[AccountId, AccountFlags]> | undefined;
  events?: EventBus<LedgerEvent> | undefined;
}

/**
 * Owner-administered transfer policy.
 *
 * Holds the current PolicySnapshot and per-account exemption flags. Every
 * setter checks the caller against the owner, validates its input, publishes a
 * new frozen snapshot with a bumped version and emits a policy event. Readers
 * that captured an older snapshot keep seeing it unchanged.
 */
export class PolicyStore implements PolicyProvider {
  private currentOwner: AccountId | null;
  private snapshot: PolicySnapshot;
  private readonly flags = new Map<AccountId, AccountFlags>();
  private readonly events: EventBus<LedgerEvent> | undefined;

  private constructor(options: PolicyStoreOptions) {
    this.currentOwner = options.owner;
    this.snapshot = Object.freeze({ ...options.settings, version: 1 });
    this.events = options.events;
    for (const [account, flags] of options.exemptions ?? []) {
      this.flags.set(account, Object.freeze({ ...flags }));
    }
  }

  static create(options: PolicyStoreOptions): Result<PolicyStore, PolicyError> {
    const { settings } = options;
    return validateTransferTax(settings.transferTaxBps)
      .andThen(() => validateTaxShares(settings.wealthShareBps, settings.charityShareBps))
      .andThen(() => validateCeiling('maxTxAmount', settings.maxTxAmount))
      .andThen(() => validateCeiling('maxWalletAmount', settings.maxWalletAmount))
      .map(() => new PolicyStore(options));
  }

  owner(): AccountId | null {
    return this.currentOwner;
  }

  getPolicySnapshot(): PolicySnapshot {
    return this.snapshot;
  }

  getAccountFlags(account: AccountId): AccountFlags {
    return this.flags.get(account) ?? NO_EXEMPTIONS;
  }

  transferOwnership(caller: AccountId, newOwner: AccountId): Result<void, PolicyError> {
    return this.requireOwner(caller, 'transferOwnership').map(() => {
      this.changeOwner(newOwner);
    });
  }

  /**
   * Give up ownership for good; every setter is rejected afterwards.
   */
  renounceOwnership(caller: AccountId): Result<void, PolicyError> {
    return this.requireOwner(caller, 'renounceOwnership').map(() => {
      this.changeOwner(null);
    });
  }

  /**
   * Open trading. One-way: there is no setter that closes it again.
   */
  enableTrading(caller: AccountId): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'enableTrading').andThen(() => {
      if (this.snapshot.tradingEnabled) {
        return err(new TradingAlreadyEnabledError());
      }
      return ok(this.publish('tradingEnabled', { tradingEnabled: true }, 'false', 'true'));
    });
  }

  setTransferTax(caller: AccountId, transferTaxBps: number): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'setTransferTax')
      .andThen(() => validateTransferTax(transferTaxBps))
      .map(() =>
        this.publish(
          'transferTaxBps',
          { transferTaxBps },
          String(this.snapshot.transferTaxBps),
          String(transferTaxBps)
        )
      );
  }

  setTaxShares(caller: AccountId, wealthShareBps: number, charityShareBps: number): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'setTaxShares')
      .andThen(() => validateTaxShares(wealthShareBps, charityShareBps))
      .map(() =>
        this.publish(
          'taxShares',
          { wealthShareBps, charityShareBps },
          `${this.snapshot.wealthShareBps}/${this.snapshot.charityShareBps}`,
          `${wealthShareBps}/${charityShareBps}`
        )
      );
  }

  setFunds(caller: AccountId, wealthFund: AccountId, charityFund: AccountId): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'setFunds').map(() =>
      this.publish(
        'funds',
        { wealthFund, charityFund },
        `${this.snapshot.wealthFund}/${this.snapshot.charityFund}`,
        `${wealthFund}/${charityFund}`
      )
    );
  }

  setMaxTxAmount(caller: AccountId, maxTxAmount: bigint): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'setMaxTxAmount')
      .andThen(() => validateCeiling('maxTxAmount', maxTxAmount))
      .map(() =>
        this.publish('maxTxAmount', { maxTxAmount }, this.snapshot.maxTxAmount.toString(), maxTxAmount.toString())
      );
  }

  setMaxWalletAmount(caller: AccountId, maxWalletAmount: bigint): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'setMaxWalletAmount')
      .andThen(() => validateCeiling('maxWalletAmount', maxWalletAmount))
      .map(() =>
        this.publish(
          'maxWalletAmount',
          { maxWalletAmount },
          this.snapshot.maxWalletAmount.toString(),
          maxWalletAmount.toString()
        )
      );
  }

  /**
   * Lift both ceilings.
   */
  removeLimits(caller: AccountId): Result<PolicySnapshot, PolicyError> {
    return this.requireOwner(caller, 'removeLimits').map(() =>
      this.publish(
        'limits',
        { maxTxAmount: 0n, maxWalletAmount: 0n },
        `${this.snapshot.maxTxAmount}/${this.snapshot.maxWalletAmount}`,
        '0/0'
      )
    );
  }

  setFeeExempt(caller: AccountId, account: AccountId, feeExempt: boolean): Result<AccountFlags, PolicyError> {
    return this.requireOwner(caller, 'setFeeExempt').map(() => this.updateFlags(account, 'feeExempt', feeExempt));
  }

  setLimitExempt(caller: AccountId, account: AccountId, limitExempt: boolean): Result<AccountFlags, PolicyError> {
    return this.requireOwner(caller, 'setLimitExempt').map(() =>
      this.updateFlags(account, 'limitExempt', limitExempt)
    );
  }

  private requireOwner(caller: AccountId, operation: string): Result<void, PolicyError> {
    if (this.currentOwner === null || caller !== this.currentOwner) {
      logger.warn({ caller, operation }, 'Rejected policy change from non-owner');
      return err(new UnauthorizedError(caller, operation));
    }
    return ok(undefined);
  }

  private publish(field: PolicyField, patch: Partial<PolicySettings>, previous: string, next: string): PolicySnapshot {
    const version = this.snapshot.version + 1;
    this.snapshot = Object.freeze({ ...this.snapshot, ...patch, version });
    logger.info({ field, next, previous, version }, 'Policy updated');
    this.events?.emit({ type: 'policy.updated', field, previous, next, version });
    return this.snapshot;
  }

  private updateFlags(account: AccountId, flag: keyof AccountFlags, value: boolean): AccountFlags {
    const flags = Object.freeze({ ...this.getAccountFlags(account), [flag]: value });
    this.flags.set(account, flags);

    // Flags are part of the configuration a request reads, so they version it too
    const version = this.snapshot.version + 1;
    this.snapshot = Object.freeze({ ...this.snapshot, version });
    logger.info({ account, flag, value, version }, 'Account flags updated');
    this.events?.emit({ type: 'account.flags-updated', account, flag, value, version });
    return flags;
  }

  private changeOwner(newOwner: AccountId | null): void {
    const previousOwner = this.currentOwner;
    this.currentOwner = newOwner;
    logger.info({ newOwner, previousOwner }, 'Ownership transferred');
    this.events?.emit({ type: 'ownership.transferred', previousOwner, newOwner });
  }
}

function validateTransferTax(transferTaxBps: number): Result<void, PolicyError> {
  return fromZod(TransferTaxBpsSchema, transferTaxBps)
    .map(() => undefined)
    .mapErr(
      (error) =>
        new InvalidPolicyError(error.issues[0]?.message ?? 'Invalid transfer tax', {
          transferTaxBps,
        })
    );
}

function validateTaxShares(wealthShareBps: number, charityShareBps: number): Result<void, PolicyError> {
  return fromZod(TaxSharesSchema, { wealthShareBps, charityShareBps })
    .map(() => undefined)
    .mapErr(
      (error) =>
        new InvalidPolicyError(error.issues[0]?.message ?? 'Invalid tax shares', {
          charityShareBps,
          wealthShareBps,
        })
    );
}

function validateCeiling(field: 'maxTxAmount' | 'maxWalletAmount', value: bigint): Result<void, PolicyError> {
  if (!isUint256(value)) {
    return err(new InvalidPolicyError(`${field} must be an unsigned 256-bit amount`, { [field]: value.toString() }));
  }
  return ok(undefined);
}
