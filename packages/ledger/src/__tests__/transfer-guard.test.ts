import { describe, expect, it } from 'vitest';

import { NO_EXEMPTIONS } from '../policy/policy-types.js';
import { checkPreconditions, checkTradingGate, checkTransactionCeiling, checkWalletCeiling } from '../transfer-guard.js';

import { BOB } from './test-utils.js';

const LIMIT_EXEMPT = { feeExempt: false, limitExempt: true };
const FEE_EXEMPT = { feeExempt: true, limitExempt: false };

describe('checkTradingGate', () => {
  it('passes everything once trading is enabled', () => {
    expect(checkTradingGate({ tradingEnabled: true }, NO_EXEMPTIONS, NO_EXEMPTIONS).isOk()).toBe(true);
  });

  it('rejects transfers between ordinary accounts while trading is disabled', () => {
    const result = checkTradingGate({ tradingEnabled: false }, NO_EXEMPTIONS, NO_EXEMPTIONS);

    expect(result._unsafeUnwrapErr().code).toBe('TRADING_DISABLED');
  });

  it('lets a limit-exempt sender or recipient through while trading is disabled', () => {
    expect(checkTradingGate({ tradingEnabled: false }, LIMIT_EXEMPT, NO_EXEMPTIONS).isOk()).toBe(true);
    expect(checkTradingGate({ tradingEnabled: false }, NO_EXEMPTIONS, LIMIT_EXEMPT).isOk()).toBe(true);
  });

  it('does not treat fee exemption as a limit exemption', () => {
    expect(checkTradingGate({ tradingEnabled: false }, FEE_EXEMPT, FEE_EXEMPT).isErr()).toBe(true);
  });
});

describe('checkTransactionCeiling', () => {
  it('treats a zero ceiling as unlimited', () => {
    expect(checkTransactionCeiling(10n ** 30n, { maxTxAmount: 0n }, NO_EXEMPTIONS, NO_EXEMPTIONS).isOk()).toBe(true);
  });

  it('accepts the ceiling itself and rejects one unit more', () => {
    expect(checkTransactionCeiling(100n, { maxTxAmount: 100n }, NO_EXEMPTIONS, NO_EXEMPTIONS).isOk()).toBe(true);

    const error = checkTransactionCeiling(101n, { maxTxAmount: 100n }, NO_EXEMPTIONS, NO_EXEMPTIONS)._unsafeUnwrapErr();
    expect(error.code).toBe('MAX_TX_EXCEEDED');
    expect(error.context).toEqual({ amount: '101', maxTxAmount: '100' });
  });

  it('skips the ceiling when either side is limit-exempt', () => {
    expect(checkTransactionCeiling(101n, { maxTxAmount: 100n }, LIMIT_EXEMPT, NO_EXEMPTIONS).isOk()).toBe(true);
    expect(checkTransactionCeiling(101n, { maxTxAmount: 100n }, NO_EXEMPTIONS, LIMIT_EXEMPT).isOk()).toBe(true);
  });
});

describe('checkWalletCeiling', () => {
  it('accepts a projected balance equal to the ceiling', () => {
    expect(checkWalletCeiling(BOB, 1_000n, { maxWalletAmount: 1_000n }, NO_EXEMPTIONS).isOk()).toBe(true);
  });

  it('rejects a projected balance above the ceiling', () => {
    const error = checkWalletCeiling(BOB, 1_001n, { maxWalletAmount: 1_000n }, NO_EXEMPTIONS)._unsafeUnwrapErr();

    expect(error.code).toBe('MAX_WALLET_EXCEEDED');
    expect(error.context).toEqual({ account: BOB, maxWalletAmount: '1000', projectedBalance: '1001' });
  });

  it('only honours the recipient exemption', () => {
    expect(checkWalletCeiling(BOB, 5_000n, { maxWalletAmount: 1_000n }, LIMIT_EXEMPT).isOk()).toBe(true);
    expect(checkWalletCeiling(BOB, 5_000n, { maxWalletAmount: 0n }, NO_EXEMPTIONS).isOk()).toBe(true);
  });
});

describe('checkPreconditions', () => {
  it('reports the trading gate before the transaction ceiling', () => {
    const result = checkPreconditions(
      500n,
      { tradingEnabled: false, maxTxAmount: 100n },
      NO_EXEMPTIONS,
      NO_EXEMPTIONS
    );

    expect(result._unsafeUnwrapErr().code).toBe('TRADING_DISABLED');
  });

  it('checks the ceiling once the gate is open', () => {
    const result = checkPreconditions(500n, { tradingEnabled: true, maxTxAmount: 100n }, NO_EXEMPTIONS, NO_EXEMPTIONS);

    expect(result._unsafeUnwrapErr().code).toBe('MAX_TX_EXCEEDED');
  });
});
