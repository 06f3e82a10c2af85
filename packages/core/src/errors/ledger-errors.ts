/**
 * Error hierarchy for transfer and policy administration failures.
 *
 * Every error carries a stable machine-readable `code` so callers can branch
 * on the rejection reason without string matching on messages. All of them are
 * terminal for the request that produced them: nothing retries internally.
 */

export type TransferErrorCode =
  | 'TRADING_DISABLED'
  | 'MAX_TX_EXCEEDED'
  | 'MAX_WALLET_EXCEEDED'
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_ALLOWANCE'
  | 'OVERFLOW'
  | 'INVALID_ACCOUNT';

export type PolicyErrorCode = 'UNAUTHORIZED' | 'INVALID_POLICY' | 'TRADING_ALREADY_ENABLED';

/**
 * Base class shared by every ledger-domain error
 */
abstract class LedgerDomainError<TCode extends string> extends Error {
  abstract readonly code: TCode;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Rejection of a transfer request. The ledger is unchanged when one of these is returned.
 */
export abstract class TransferError extends LedgerDomainError<TransferErrorCode> {}

export class TradingDisabledError extends TransferError {
  readonly code = 'TRADING_DISABLED' as const;

  constructor(context?: Record<string, unknown>) {
    super('Trading is not enabled and neither party is limit-exempt', context);
  }
}

export class MaxTxExceededError extends TransferError {
  readonly code = 'MAX_TX_EXCEEDED' as const;

  constructor(
    readonly amount: bigint,
    readonly maxTxAmount: bigint
  ) {
    super(`Transfer amount ${amount} exceeds the transaction ceiling of ${maxTxAmount}`, {
      amount: amount.toString(),
      maxTxAmount: maxTxAmount.toString(),
    });
  }
}

export class MaxWalletExceededError extends TransferError {
  readonly code = 'MAX_WALLET_EXCEEDED' as const;

  constructor(
    readonly account: string,
    readonly projectedBalance: bigint,
    readonly maxWalletAmount: bigint
  ) {
    super(`Balance of ${account} would reach ${projectedBalance}, above the wallet ceiling of ${maxWalletAmount}`, {
      account,
      maxWalletAmount: maxWalletAmount.toString(),
      projectedBalance: projectedBalance.toString(),
    });
  }
}

export class InsufficientBalanceError extends TransferError {
  readonly code = 'INSUFFICIENT_BALANCE' as const;

  constructor(
    readonly account: string,
    readonly balance: bigint,
    readonly required: bigint
  ) {
    super(`Account ${account} holds ${balance}, ${required} required`, {
      account,
      balance: balance.toString(),
      required: required.toString(),
    });
  }
}

export class InsufficientAllowanceError extends TransferError {
  readonly code = 'INSUFFICIENT_ALLOWANCE' as const;

  constructor(
    readonly owner: string,
    readonly spender: string,
    readonly allowance: bigint,
    readonly required: bigint
  ) {
    super(`Spender ${spender} may move ${allowance} from ${owner}, ${required} required`, {
      allowance: allowance.toString(),
      owner,
      required: required.toString(),
      spender,
    });
  }
}

export class OverflowError extends TransferError {
  readonly code = 'OVERFLOW' as const;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

export class InvalidAccountError extends TransferError {
  readonly code = 'INVALID_ACCOUNT' as const;

  constructor(
    readonly value: string,
    reason: string
  ) {
    super(`Invalid account "${value}": ${reason}`, { value });
  }
}

/**
 * Rejection of a policy administration call
 */
export abstract class PolicyError extends LedgerDomainError<PolicyErrorCode> {}

export class UnauthorizedError extends PolicyError {
  readonly code = 'UNAUTHORIZED' as const;

  constructor(
    readonly caller: string,
    readonly operation: string
  ) {
    super(`${caller} is not allowed to call ${operation}`, { caller, operation });
  }
}

export class InvalidPolicyError extends PolicyError {
  readonly code = 'INVALID_POLICY' as const;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

export class TradingAlreadyEnabledError extends PolicyError {
  readonly code = 'TRADING_ALREADY_ENABLED' as const;

  constructor() {
    super('Trading has already been enabled');
  }
}
