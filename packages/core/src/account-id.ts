import { err, ok, type Result } from 'neverthrow';

import { InvalidAccountError } from './errors/ledger-errors.js';

const ACCOUNT_ID_PATTERN = /^0x[0-9a-f]{40}$/;
const ZERO_ACCOUNT = `0x${'0'.repeat(40)}`;

/**
 * Fixed-width account key: `0x` followed by 40 lower-case hex digits.
 * The all-zero key is reserved and never a valid AccountId; the absent side of a
 * mint or burn is `null` instead (see Counterparty).
 */
export type AccountId = string & { readonly __brand: 'AccountId' };

/**
 * One side of a transfer request. `null` marks the supply boundary: a `null`
 * sender is a mint, a `null` recipient is a burn.
 */
export type Counterparty = AccountId | null;

export const AccountId = {
  parse(value: string): Result<AccountId, InvalidAccountError> {
    const normalized = value.trim().toLowerCase();
    if (!ACCOUNT_ID_PATTERN.test(normalized)) {
      return err(new InvalidAccountError(value, 'expected 0x followed by 40 hex digits'));
    }
    if (normalized === ZERO_ACCOUNT) {
      return err(new InvalidAccountError(value, 'the zero key is reserved'));
    }
    return ok(normalized as AccountId);
  },

  /**
   * Parse or throw. Intended for fixtures and configuration already validated upstream.
   */
  of(value: string): AccountId {
    const result = AccountId.parse(value);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  },

  isValid(value: string): boolean {
    return AccountId.parse(value).isOk();
  },
};

/**
 * True when a raw key is the reserved zero key. Guards ledger entry points
 * against keys that bypassed AccountId.parse.
 */
export function isZeroAccount(value: string): boolean {
  return value.toLowerCase() === ZERO_ACCOUNT;
}

export function formatCounterparty(party: Counterparty): string {
  return party ?? '(supply)';
}
