import {
  formatUnits,
  InvalidPolicyError,
  parseUnits,
  type AccountId,
  type PolicyError,
  type TokenConfig,
  type TransferError,
} from '@levy/core';
import { EventBus, type LedgerEvent } from '@levy/events';
import { getLogger } from '@levy/logger';
import { err, Result } from 'neverthrow';

import { AllowanceBook } from './allowance-book.js';
import type { BalanceStore } from './balance-store.js';
import { Ledger } from './ledger.js';
import { PolicyStore } from './policy/policy-store.js';
import type { AccountFlags } from './policy/policy-types.js';
import { TransferOrchestrator, type TransferReceipt } from './transfer-orchestrator.js';

const logger = getLogger('Token');

export interface TokenOptions {
  store?: BalanceStore | undefined;
  events?: EventBus<LedgerEvent> | undefined;
}

/**
 * Fungible token with a fixed supply minted once to the owner at creation.
 *
 * Thin facade: transfers go through the TransferOrchestrator, configuration
 * through the PolicyStore exposed as `policy`, and third-party spending through
 * an AllowanceBook.
 */
export class Token {
  readonly events: EventBus<LedgerEvent>;

  private readonly allowances = new AllowanceBook();

  private constructor(
    readonly name: string,
    readonly symbol: string,
    readonly decimals: number,
    readonly policy: PolicyStore,
    private readonly ledger: Ledger,
    private readonly orchestrator: TransferOrchestrator,
    events: EventBus<LedgerEvent>
  ) {
    this.events = events;
  }

  /**
   * Build a token from a validated configuration and mint its supply to the owner.
   * The owner and both funds start fee- and limit-exempt, as do the accounts
   * listed under `exempt`.
   */
  static create(config: TokenConfig, options: TokenOptions = {}): Result<Token, PolicyError | TransferError> {
    const events =
      options.events ??
      new EventBus<LedgerEvent>({
        onError: (error) => logger.error({ error }, 'Event listener failed'),
      });

    const amounts = Result.combine([
      parseUnits(config.totalSupply, config.decimals),
      parseUnits(config.policy.maxTxAmount, config.decimals),
      parseUnits(config.policy.maxWalletAmount, config.decimals),
    ]).mapErr((error) => new InvalidPolicyError(error.message));
    if (amounts.isErr()) {
      return err(amounts.error);
    }
    const [supply, maxTxAmount, maxWalletAmount] = amounts.value;

    const exemptions = new Map<AccountId, AccountFlags>();
    for (const account of [config.owner, config.wealthFund, config.charityFund]) {
      exemptions.set(account, { feeExempt: true, limitExempt: true });
    }
    for (const entry of config.exempt) {
      exemptions.set(entry.account, { feeExempt: entry.feeExempt, limitExempt: entry.limitExempt });
    }

    const policy = PolicyStore.create({
      owner: config.owner,
      settings: {
        tradingEnabled: config.policy.tradingEnabled,
        maxTxAmount,
        maxWalletAmount,
        transferTaxBps: config.policy.transferTaxBps,
        wealthShareBps: config.policy.wealthShareBps,
        charityShareBps: config.policy.charityShareBps,
        wealthFund: config.wealthFund,
        charityFund: config.charityFund,
      },
      exemptions,
      events,
    });
    if (policy.isErr()) {
      return err(policy.error);
    }

    const ledger = new Ledger(options.store);
    const orchestrator = new TransferOrchestrator(ledger, policy.value, events);
    const token = new Token(
      config.name,
      config.symbol,
      config.decimals,
      policy.value,
      ledger,
      orchestrator,
      events
    );

    return orchestrator.submitTransfer(null, config.owner, supply).map((receipt) => {
      logger.info(
        { owner: config.owner, supply: receipt.grossAmount.toString(), symbol: config.symbol },
        'Token created'
      );
      return token;
    });
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  balanceOf(account: AccountId): bigint {
    return this.orchestrator.balanceOf(account);
  }

  holders(): { account: AccountId; balance: bigint }[] {
    return this.ledger.holders();
  }

  transfer(sender: AccountId, to: AccountId, amount: bigint): Result<TransferReceipt, TransferError> {
    return this.orchestrator.submitTransfer(sender, to, amount);
  }

  /**
   * Move `amount` from `from` on behalf of `spender`. The allowance is checked
   * up front and drawn down only once the transfer has committed.
   */
  transferFrom(spender: AccountId, from: AccountId, to: AccountId, amount: bigint): Result<TransferReceipt, TransferError> {
    return this.allowances
      .checkSpend(from, spender, amount)
      .andThen(() => this.orchestrator.submitTransfer(from, to, amount))
      .andThen((receipt) => this.allowances.spend(from, spender, amount).map(() => receipt));
  }

  /**
   * Destroy `amount` of the holder's own tokens.
   */
  burn(holder: AccountId, amount: bigint): Result<TransferReceipt, TransferError> {
    return this.orchestrator.submitTransfer(holder, null, amount);
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.allowances.allowance(owner, spender);
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): Result<bigint, TransferError> {
    return this.allowances.approve(owner, spender, amount).map((allowance) => this.emitApproval(owner, spender, allowance));
  }

  increaseAllowance(owner: AccountId, spender: AccountId, added: bigint): Result<bigint, TransferError> {
    return this.allowances.increase(owner, spender, added).map((allowance) => this.emitApproval(owner, spender, allowance));
  }

  decreaseAllowance(owner: AccountId, spender: AccountId, subtracted: bigint): Result<bigint, TransferError> {
    return this.allowances
      .decrease(owner, spender, subtracted)
      .map((allowance) => this.emitApproval(owner, spender, allowance));
  }

  /** Base units → decimal string, e.g. 1500000000000000000n → "1.5" at 18 decimals */
  format(units: bigint): string {
    return formatUnits(units, this.decimals);
  }

  parse(value: string): Result<bigint, Error> {
    return parseUnits(value, this.decimals);
  }

  private emitApproval(owner: AccountId, spender: AccountId, amount: bigint): bigint {
    this.events.emit({ type: 'approval', owner, spender, amount });
    return amount;
  }
}
