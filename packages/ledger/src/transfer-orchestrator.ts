import {
  formatCounterparty,
  InvalidAccountError,
  isUint256,
  isZeroAccount,
  OverflowError,
  type AccountId,
  type Counterparty,
  type TransferError,
} from '@levy/core';
import type { EventBus, LedgerEvent } from '@levy/events';
import { getLogger } from '@levy/logger';
import { err, ok, type Result } from 'neverthrow';

import type { Ledger, LedgerWriter } from './ledger.js';
import type { AccountFlags, PolicyProvider, PolicySnapshot } from './policy/policy-types.js';
import { computeTax, untaxed, type TaxSplit } from './tax-policy.js';
import { checkPreconditions, checkWalletCeiling } from './transfer-guard.js';

const logger = getLogger('TransferOrchestrator');

export interface TransferRequest {
  from: Counterparty;
  to: Counterparty;
  amount: bigint;
}

export type TransferKind = 'transfer' | 'mint' | 'burn';

/**
 * Stages a request moves through. `committed` and `rejected` are terminal.
 * Tax splitting is pure, so failures are only ever reported from validating or settling.
 */
export type TransferStage = 'validating' | 'tax-splitting' | 'settling' | 'committed' | 'rejected';

export interface TransferReceipt extends TaxSplit {
  sequence: number;
  kind: TransferKind;
  from: Counterparty;
  to: Counterparty;
  grossAmount: bigint;
  /** Snapshot version the request ran against; null for mint and burn, which read no policy */
  policyVersion: number | null;
}

interface StageFailure {
  stage: Exclude<TransferStage, 'tax-splitting' | 'committed' | 'rejected'>;
  error: TransferError;
}

function failAt(stage: StageFailure['stage']) {
  return (error: TransferError): StageFailure => ({ stage, error });
}

/**
 * Runs each transfer request as one atomic unit against the Ledger.
 *
 * Regular transfers: trading gate and transaction ceiling on the gross amount,
 * tax split, tax legs to the two funds, wallet ceiling on the recipient's
 * projected balance, principal leg. Any failure discards every mutation of the
 * request. Requests with a `null` side take the mint/burn path, which skips
 * policy entirely.
 */
export class TransferOrchestrator {
  private sequence = 0;

  constructor(
    private readonly ledger: Ledger,
    private readonly policy: PolicyProvider,
    private readonly events?: EventBus<LedgerEvent> | undefined
  ) {}

  balanceOf(account: AccountId): bigint {
    return this.ledger.balanceOf(account);
  }

  submitTransfer(from: Counterparty, to: Counterparty, amount: bigint): Result<TransferReceipt, TransferError> {
    const request: TransferRequest = { from, to, amount };

    const validation = validateRequest(request);
    if (validation.isErr()) {
      return this.reject(request, { stage: 'validating', error: validation.error });
    }

    const outcome =
      from === null || to === null
        ? this.ledger.unitOfWork((tx) => settleSupplyChange(tx, from, to, amount))
        : this.settleTransfer(from, to, amount);

    if (outcome.isErr()) {
      return this.reject(request, outcome.error);
    }
    return ok(this.commit(outcome.value));
  }

  /**
   * Apply requests in order. Each is its own atomic unit: a rejection does not
   * undo earlier requests or stop later ones.
   */
  submitBatch(requests: readonly TransferRequest[]): Result<TransferReceipt, TransferError>[] {
    return requests.map((request) => this.submitTransfer(request.from, request.to, request.amount));
  }

  private settleTransfer(
    from: AccountId,
    to: AccountId,
    amount: bigint
  ): Result<Omit<TransferReceipt, 'sequence'>, StageFailure> {
    return this.ledger.unitOfWork((tx) => {
      // One consistent view of the configuration for the whole request
      const snapshot = this.policy.getPolicySnapshot();
      const fromFlags = this.policy.getAccountFlags(from);
      const toFlags = this.policy.getAccountFlags(to);

      return settleTaxedTransfer(tx, from, to, amount, snapshot, fromFlags, toFlags).map((split) => ({
        ...split,
        kind: 'transfer' as const,
        from,
        to,
        grossAmount: amount,
        policyVersion: snapshot.version,
      }));
    });
  }

  private commit(settled: Omit<TransferReceipt, 'sequence'>): TransferReceipt {
    this.sequence += 1;
    const receipt: TransferReceipt = { ...settled, sequence: this.sequence };

    logger.audit(
      {
        charityCut: receipt.charityCut.toString(),
        from: formatCounterparty(receipt.from),
        grossAmount: receipt.grossAmount.toString(),
        kind: receipt.kind,
        policyVersion: receipt.policyVersion,
        principal: receipt.principal.toString(),
        sequence: receipt.sequence,
        to: formatCounterparty(receipt.to),
        wealthCut: receipt.wealthCut.toString(),
      },
      'Transfer committed'
    );

    this.events?.emit({
      type: 'transfer.committed',
      sequence: receipt.sequence,
      from: receipt.from,
      to: receipt.to,
      grossAmount: receipt.grossAmount,
      principal: receipt.principal,
      wealthCut: receipt.wealthCut,
      charityCut: receipt.charityCut,
      policyVersion: receipt.policyVersion,
    });

    return receipt;
  }

  private reject(request: TransferRequest, failure: StageFailure): Result<never, TransferError> {
    logger.debug(
      {
        amount: request.amount.toString(),
        code: failure.error.code,
        from: formatCounterparty(request.from),
        stage: failure.stage,
        to: formatCounterparty(request.to),
      },
      `Transfer rejected: ${failure.error.message}`
    );
    return err(failure.error);
  }
}

function validateRequest(request: TransferRequest): Result<void, TransferError> {
  if (!isUint256(request.amount)) {
    return err(
      new OverflowError(`Amount ${request.amount} is outside the unsigned 256-bit range`, {
        amount: request.amount.toString(),
      })
    );
  }
  if (request.from === null && request.to === null) {
    return err(new InvalidAccountError(formatCounterparty(null), 'a request needs at least one real account'));
  }
  for (const party of [request.from, request.to]) {
    if (party !== null && isZeroAccount(party)) {
      return err(new InvalidAccountError(party, 'the zero key is reserved'));
    }
  }
  return ok(undefined);
}

/**
 * Mint (null sender) or burn (null recipient): a raw ledger operation with no
 * guard and no tax.
 */
function settleSupplyChange(
  tx: LedgerWriter,
  from: Counterparty,
  to: Counterparty,
  amount: bigint
): Result<Omit<TransferReceipt, 'sequence'>, StageFailure> {
  const base = { ...untaxed(amount), from, to, grossAmount: amount, policyVersion: null };
  if (from === null && to !== null) {
    return tx
      .mint(to, amount)
      .map(() => ({ ...base, kind: 'mint' as const }))
      .mapErr(failAt('settling'));
  }
  if (from !== null && to === null) {
    return tx
      .burn(from, amount)
      .map(() => ({ ...base, kind: 'burn' as const }))
      .mapErr(failAt('settling'));
  }
  return err(failAt('validating')(new InvalidAccountError(formatCounterparty(null), 'no real account')));
}

function settleTaxedTransfer(
  tx: LedgerWriter,
  from: AccountId,
  to: AccountId,
  amount: bigint,
  snapshot: PolicySnapshot,
  fromFlags: AccountFlags,
  toFlags: AccountFlags
): Result<TaxSplit, StageFailure> {
  const preconditions = checkPreconditions(amount, snapshot, fromFlags, toFlags);
  if (preconditions.isErr()) {
    return err(failAt('validating')(preconditions.error));
  }

  if (amount === 0n) {
    return ok(untaxed(0n));
  }

  const split = computeTax(amount, snapshot, fromFlags, toFlags);

  if (split.wealthCut > 0n) {
    const leg = tx.transfer(from, snapshot.wealthFund, split.wealthCut);
    if (leg.isErr()) return err(failAt('settling')(leg.error));
  }
  if (split.charityCut > 0n) {
    const leg = tx.transfer(from, snapshot.charityFund, split.charityCut);
    if (leg.isErr()) return err(failAt('settling')(leg.error));
  }

  // Read through the buffer: a fund recipient already holds its cut here
  const projected = tx.balanceOf(to) + split.principal;
  const ceiling = checkWalletCeiling(to, projected, snapshot, toFlags);
  if (ceiling.isErr()) {
    return err(failAt('settling')(ceiling.error));
  }

  const principal = tx.transfer(from, to, split.principal);
  if (principal.isErr()) {
    return err(failAt('settling')(principal.error));
  }

  return ok(split);
}
