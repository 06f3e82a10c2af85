import { MAX_UINT256, type AccountId } from '@levy/core';
import { assertErr, assertOk } from '@levy/core/test-utils';
import { describe, expect, it, vi } from 'vitest';

import { Ledger } from '../ledger.js';
import { NO_EXEMPTIONS, type PolicyProvider, type PolicySnapshot } from '../policy/policy-types.js';
import { TransferOrchestrator } from '../transfer-orchestrator.js';

import {
  ALICE,
  BOB,
  CAROL,
  CHARITY_FUND,
  createHarness,
  DEFAULT_SETTINGS,
  flushEvents,
  OWNER,
  WEALTH_FUND,
} from './test-utils.js';

const LIMIT_EXEMPT = { feeExempt: false, limitExempt: true };

describe('TransferOrchestrator', () => {
  describe('submitTransfer', () => {
    it('moves the full amount when no tax is configured', () => {
      const { fund, orchestrator } = createHarness();
      fund(ALICE, 1_000n);

      const receipt = assertOk(orchestrator.submitTransfer(ALICE, BOB, 100n));

      expect(receipt).toMatchObject({ kind: 'transfer', grossAmount: 100n, principal: 100n, tax: 0n });
      expect(orchestrator.balanceOf(ALICE)).toBe(900n);
      expect(orchestrator.balanceOf(BOB)).toBe(100n);
      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(0n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(0n);
    });

    it('routes the tax to both funds and delivers the principal', () => {
      const { fund, orchestrator } = createHarness({ transferTaxBps: 500 });
      fund(ALICE, 1_000n);

      const receipt = assertOk(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(receipt).toEqual({
        sequence: 2,
        kind: 'transfer',
        from: ALICE,
        to: BOB,
        grossAmount: 1_000n,
        principal: 950n,
        tax: 50n,
        wealthCut: 30n,
        charityCut: 20n,
        policyVersion: 1,
      });
      expect(orchestrator.balanceOf(ALICE)).toBe(0n);
      expect(orchestrator.balanceOf(BOB)).toBe(950n);
      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(30n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(20n);
    });

    it('rejects transfers between ordinary accounts while trading is disabled', () => {
      const { fund, orchestrator } = createHarness({ tradingEnabled: false });
      fund(ALICE, 1_000n);

      const error = assertErr(orchestrator.submitTransfer(ALICE, BOB, 100n));

      expect(error.code).toBe('TRADING_DISABLED');
      expect(orchestrator.balanceOf(ALICE)).toBe(1_000n);
      expect(orchestrator.balanceOf(BOB)).toBe(0n);
    });

    it('lets a limit-exempt sender trade before trading opens', () => {
      const { fund, orchestrator } = createHarness({ tradingEnabled: false }, [[OWNER, LIMIT_EXEMPT]]);
      fund(OWNER, 1_000n);

      assertOk(orchestrator.submitTransfer(OWNER, BOB, 100n));

      expect(orchestrator.balanceOf(BOB)).toBe(100n);
    });

    it('rejects a transfer that would lift the recipient above the wallet ceiling', () => {
      const { fund, orchestrator } = createHarness({ maxWalletAmount: 1_000n });
      fund(ALICE, 500n);
      fund(BOB, 950n);

      const error = assertErr(orchestrator.submitTransfer(ALICE, BOB, 100n));

      expect(error.code).toBe('MAX_WALLET_EXCEEDED');
      expect(error.context).toEqual({ account: BOB, maxWalletAmount: '1000', projectedBalance: '1050' });
      expect(orchestrator.balanceOf(ALICE)).toBe(500n);
      expect(orchestrator.balanceOf(BOB)).toBe(950n);
    });

    it('checks the wallet ceiling against the principal, not the gross amount', () => {
      const { fund, orchestrator } = createHarness({ maxWalletAmount: 1_000n, transferTaxBps: 500 });
      fund(ALICE, 1_000n);
      fund(BOB, 50n);

      assertOk(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(orchestrator.balanceOf(BOB)).toBe(1_000n);
    });

    it('checks the transaction ceiling against the gross amount', () => {
      const { fund, orchestrator } = createHarness({ maxTxAmount: 960n, transferTaxBps: 500 });
      fund(ALICE, 1_000n);

      const error = assertErr(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(error.code).toBe('MAX_TX_EXCEEDED');
    });

    it('skips both ceilings for a limit-exempt recipient', () => {
      const { fund, orchestrator } = createHarness({ maxTxAmount: 10n, maxWalletAmount: 10n }, [[BOB, LIMIT_EXEMPT]]);
      fund(ALICE, 1_000n);

      assertOk(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(orchestrator.balanceOf(BOB)).toBe(1_000n);
    });

    it('does not apply the wallet ceiling to the funds receiving tax', () => {
      const { fund, orchestrator } = createHarness({ maxWalletAmount: 10n, transferTaxBps: 500 }, [[BOB, LIMIT_EXEMPT]]);
      fund(ALICE, 1_000n);

      assertOk(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(30n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(20n);
    });

    it('counts the cut a fund recipient already received against its wallet ceiling', () => {
      // principal 950 fits under 970, but the fund also holds its 30 cut by then
      const { fund, orchestrator } = createHarness({ maxWalletAmount: 970n, transferTaxBps: 500 });
      fund(ALICE, 1_000n);

      const error = assertErr(orchestrator.submitTransfer(ALICE, WEALTH_FUND, 1_000n));

      expect(error.code).toBe('MAX_WALLET_EXCEEDED');
      expect(error.context).toEqual({ account: WEALTH_FUND, maxWalletAmount: '970', projectedBalance: '980' });
      expect(orchestrator.balanceOf(ALICE)).toBe(1_000n);
      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(0n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(0n);
    });

    it('lets a fund recipient reach its ceiling with cut and principal together', () => {
      const { fund, orchestrator } = createHarness({ maxWalletAmount: 980n, transferTaxBps: 500 });
      fund(ALICE, 1_000n);

      assertOk(orchestrator.submitTransfer(ALICE, WEALTH_FUND, 1_000n));

      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(980n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(20n);
    });

    it('rolls back the tax legs when the wallet ceiling rejects the principal', () => {
      const { fund, ledger, orchestrator } = createHarness({ maxWalletAmount: 100n, transferTaxBps: 500 });
      fund(ALICE, 1_000n);

      const error = assertErr(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(error.code).toBe('MAX_WALLET_EXCEEDED');
      expect(orchestrator.balanceOf(ALICE)).toBe(1_000n);
      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(0n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(0n);
      expect(ledger.totalSupply()).toBe(1_000n);
    });

    it('rolls back the tax legs when the sender cannot cover the principal', () => {
      const { fund, orchestrator } = createHarness({ transferTaxBps: 500 });
      fund(ALICE, 990n);

      const error = assertErr(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(error.code).toBe('INSUFFICIENT_BALANCE');
      expect(error.context).toEqual({ account: ALICE, balance: '940', required: '950' });
      expect(orchestrator.balanceOf(ALICE)).toBe(990n);
      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(0n);
      expect(orchestrator.balanceOf(CHARITY_FUND)).toBe(0n);
    });

    it('charges no tax when either side is fee-exempt', () => {
      const { fund, orchestrator } = createHarness({ transferTaxBps: 500 }, [
        [CAROL, { feeExempt: true, limitExempt: false }],
      ]);
      fund(ALICE, 1_000n);

      assertOk(orchestrator.submitTransfer(ALICE, CAROL, 400n));

      expect(orchestrator.balanceOf(CAROL)).toBe(400n);
      expect(orchestrator.balanceOf(WEALTH_FUND)).toBe(0n);
    });

    it('accepts a zero amount without moving anything', () => {
      const { fund, orchestrator } = createHarness({ maxWalletAmount: 1_000n, transferTaxBps: 500 });
      fund(BOB, 2_000n);

      const receipt = assertOk(orchestrator.submitTransfer(ALICE, BOB, 0n));

      expect(receipt).toMatchObject({ grossAmount: 0n, principal: 0n, tax: 0n, wealthCut: 0n, charityCut: 0n });
      expect(orchestrator.balanceOf(BOB)).toBe(2_000n);
    });

    it('still applies the trading gate to a zero amount', () => {
      const { orchestrator } = createHarness({ tradingEnabled: false });

      expect(assertErr(orchestrator.submitTransfer(ALICE, BOB, 0n)).code).toBe('TRADING_DISABLED');
    });

    it('rejects amounts outside the 256-bit range', () => {
      const { fund, orchestrator } = createHarness();
      fund(ALICE, 10n);

      expect(assertErr(orchestrator.submitTransfer(ALICE, BOB, -1n)).code).toBe('OVERFLOW');
      expect(assertErr(orchestrator.submitTransfer(null, BOB, MAX_UINT256 + 1n)).code).toBe('OVERFLOW');
      expect(orchestrator.balanceOf(ALICE)).toBe(10n);
    });

    it('rejects a request with no real account on either side', () => {
      const { orchestrator } = createHarness();

      expect(assertErr(orchestrator.submitTransfer(null, null, 1n)).code).toBe('INVALID_ACCOUNT');
    });

    it('runs every request against the snapshot it started with', () => {
      const { fund, ledger, policy } = createHarness({ transferTaxBps: 500 });
      let changed = false;
      const provider: PolicyProvider = {
        getPolicySnapshot: () => policy.getPolicySnapshot(),
        getAccountFlags: (account: AccountId) => {
          if (!changed) {
            changed = true;
            assertOk(policy.setTransferTax(OWNER, 0));
          }
          return policy.getAccountFlags(account);
        },
      };
      const orchestrator = new TransferOrchestrator(ledger, provider);
      fund(ALICE, 1_000n);

      const receipt = assertOk(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(receipt.wealthCut).toBe(30n);
      expect(receipt.policyVersion).toBe(1);
      expect(policy.getPolicySnapshot().version).toBe(2);
    });

    it('throws on a submission made while another request is in flight', () => {
      const { fund, ledger, policy } = createHarness();
      let orchestrator: TransferOrchestrator | undefined;
      const provider: PolicyProvider = {
        getPolicySnapshot: () => {
          orchestrator?.submitTransfer(ALICE, CAROL, 1n);
          return policy.getPolicySnapshot();
        },
        getAccountFlags: (account: AccountId) => policy.getAccountFlags(account),
      };
      orchestrator = new TransferOrchestrator(ledger, provider);
      fund(ALICE, 100n);

      expect(() => orchestrator?.submitTransfer(ALICE, BOB, 10n)).toThrow(/already in flight/);
      expect(ledger.balanceOf(ALICE)).toBe(100n);
      expect(ledger.balanceOf(CAROL)).toBe(0n);
    });
  });

  describe('mint and burn', () => {
    function lockedPolicy() {
      const snapshot: PolicySnapshot = {
        ...DEFAULT_SETTINGS,
        version: 1,
        tradingEnabled: false,
        maxTxAmount: 1n,
        maxWalletAmount: 1n,
        transferTaxBps: 500,
      };
      return {
        getPolicySnapshot: vi.fn(() => snapshot),
        getAccountFlags: vi.fn(() => NO_EXEMPTIONS),
      };
    }

    it('bypasses the guard and the tax entirely', () => {
      const provider = lockedPolicy();
      const ledger = new Ledger();
      const orchestrator = new TransferOrchestrator(ledger, provider);

      const minted = assertOk(orchestrator.submitTransfer(null, ALICE, 1_000n));
      const burned = assertOk(orchestrator.submitTransfer(ALICE, null, 400n));

      expect(minted).toMatchObject({ kind: 'mint', principal: 1_000n, tax: 0n, policyVersion: null });
      expect(burned).toMatchObject({ kind: 'burn', principal: 400n, tax: 0n, policyVersion: null });
      expect(ledger.balanceOf(ALICE)).toBe(600n);
      expect(ledger.totalSupply()).toBe(600n);
      expect(provider.getPolicySnapshot).not.toHaveBeenCalled();
      expect(provider.getAccountFlags).not.toHaveBeenCalled();
    });

    it('rejects a burn above the holder balance', () => {
      const { fund, ledger, orchestrator } = createHarness();
      fund(ALICE, 10n);

      expect(assertErr(orchestrator.submitTransfer(ALICE, null, 11n)).code).toBe('INSUFFICIENT_BALANCE');
      expect(ledger.totalSupply()).toBe(10n);
    });
  });

  it('keeps the sum of balances equal to the total supply', () => {
    const { fund, ledger, orchestrator } = createHarness({ maxWalletAmount: 4_000n, transferTaxBps: 350 });
    const accounts = [ALICE, BOB, CAROL, WEALTH_FUND, CHARITY_FUND];
    fund(ALICE, 3_000n);
    fund(BOB, 2_000n);
    fund(CAROL, 1_000n);

    // Deterministic pseudo-random walk; some requests fail on balance or ceiling
    let seed = 7;
    const next = (bound: number) => {
      seed = (seed * 48_271) % 2_147_483_647;
      return seed % bound;
    };

    for (let i = 0; i < 300; i++) {
      const from = accounts[next(accounts.length)] ?? ALICE;
      const to = accounts[next(accounts.length)] ?? BOB;
      orchestrator.submitTransfer(from, to, BigInt(next(1_500)));

      const held = ledger.holders().reduce((sum, holder) => sum + holder.balance, 0n);
      expect(held).toBe(ledger.totalSupply());
    }
    expect(ledger.totalSupply()).toBe(6_000n);
  });

  describe('submitBatch', () => {
    it('applies requests in order, each one atomically', () => {
      const { fund, orchestrator } = createHarness();
      fund(ALICE, 100n);

      const results = orchestrator.submitBatch([
        { from: ALICE, to: BOB, amount: 60n },
        { from: ALICE, to: CAROL, amount: 60n },
        { from: BOB, to: CAROL, amount: 10n },
      ]);

      expect(results.map((result) => result.isOk())).toEqual([true, false, true]);
      expect(orchestrator.balanceOf(ALICE)).toBe(40n);
      expect(orchestrator.balanceOf(BOB)).toBe(50n);
      expect(orchestrator.balanceOf(CAROL)).toBe(10n);
    });
  });

  describe('events', () => {
    it('emits one transfer.committed event per committed request, after the commit', async () => {
      const { emitted, fund, orchestrator } = createHarness({ transferTaxBps: 500 });
      fund(ALICE, 1_000n);
      assertErr(orchestrator.submitTransfer(BOB, ALICE, 5n));
      assertOk(orchestrator.submitTransfer(ALICE, BOB, 1_000n));

      expect(emitted).toEqual([]);
      await flushEvents();

      expect(emitted).toEqual([
        {
          type: 'transfer.committed',
          sequence: 1,
          from: null,
          to: ALICE,
          grossAmount: 1_000n,
          principal: 1_000n,
          wealthCut: 0n,
          charityCut: 0n,
          policyVersion: null,
        },
        {
          type: 'transfer.committed',
          sequence: 2,
          from: ALICE,
          to: BOB,
          grossAmount: 1_000n,
          principal: 950n,
          wealthCut: 30n,
          charityCut: 20n,
          policyVersion: 1,
        },
      ]);
    });

    it('emits an event for every request of a large batch', async () => {
      const { emitted, fund, orchestrator } = createHarness();
      fund(ALICE, 5_000n);

      const requests = Array.from({ length: 1_500 }, () => ({ from: ALICE, to: BOB, amount: 1n }));

      const results = orchestrator.submitBatch(requests);
      await flushEvents();

      expect(results.every((result) => result.isOk())).toBe(true);
      const committed = emitted.filter((event) => event.type === 'transfer.committed');
      expect(committed).toHaveLength(1_501);
      expect(committed.at(-1)).toMatchObject({ sequence: 1_501, from: ALICE, to: BOB, grossAmount: 1n });
    });
  });
});
