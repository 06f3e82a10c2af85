import { describe, expect, it } from 'vitest';

import { TokenConfigSchema } from '../schemas/token-config.js';

const OWNER = '0x00000000000000000000000000000000000000AA';
const WEALTH = '0x0000000000000000000000000000000000003ea1';
const CHARITY = '0x000000000000000000000000000000000000c4a1';

const minimal = {
  name: 'Test Levy',
  symbol: 'TLV',
  totalSupply: '1000000',
  owner: OWNER,
  wealthFund: WEALTH,
  charityFund: CHARITY,
};

describe('TokenConfigSchema', () => {
  it('fills in defaults and normalises accounts', () => {
    const config = TokenConfigSchema.parse(minimal);

    expect(config).toEqual({
      ...minimal,
      owner: OWNER.toLowerCase(),
      decimals: 18,
      exempt: [],
      policy: {
        charityShareBps: 5_000,
        maxTxAmount: '0',
        maxWalletAmount: '0',
        tradingEnabled: false,
        transferTaxBps: 0,
        wealthShareBps: 5_000,
      },
    });
  });

  it('accepts numeric amounts as strings', () => {
    const config = TokenConfigSchema.parse({ ...minimal, totalSupply: 2500, policy: { maxTxAmount: 10.5 } });

    expect(config.totalSupply).toBe('2500');
    expect(config.policy.maxTxAmount).toBe('10.5');
  });

  it('rejects a transfer tax above 500 bps', () => {
    const result = TokenConfigSchema.safeParse({ ...minimal, policy: { transferTaxBps: 501 } });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Transfer tax cannot exceed 500 bps');
  });

  it('rejects tax shares that do not sum to 10000 bps', () => {
    const result = TokenConfigSchema.safeParse({ ...minimal, policy: { wealthShareBps: 6_000 } });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['policy']);
  });

  it('rejects the zero key and malformed accounts', () => {
    expect(TokenConfigSchema.safeParse({ ...minimal, owner: `0x${'0'.repeat(40)}` }).success).toBe(false);
    expect(TokenConfigSchema.safeParse({ ...minimal, wealthFund: 'treasury' }).success).toBe(false);
  });

  it('rejects negative or malformed amounts', () => {
    expect(TokenConfigSchema.safeParse({ ...minimal, totalSupply: '-5' }).success).toBe(false);
    expect(TokenConfigSchema.safeParse({ ...minimal, totalSupply: '1e6' }).success).toBe(false);
  });
});
