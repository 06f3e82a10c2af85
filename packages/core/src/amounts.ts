import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

/** Largest representable balance, allowance or supply: 2^256 - 1 */
export const MAX_UINT256 = (1n << 256n) - 1n;

/** 10000 basis points = 100% */
export const BPS_DENOMINATOR = 10_000n;

/** Upper bound accepted for the transfer tax rate (5%) */
export const MAX_TRANSFER_TAX_BPS = 500;

// uint256 needs 78 significant digits plus the fractional part
const UnitDecimal = Decimal.clone({
  precision: 120,
  rounding: Decimal.ROUND_DOWN,
  toExpNeg: -120,
  toExpPos: 120,
});

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

/**
 * Floor of `amount * bps / 10000`. bigint keeps the widened product exact, so
 * no intermediate overflow is possible for uint256 inputs.
 */
export function applyBps(amount: bigint, bps: number | bigint): bigint {
  return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

/**
 * Convert a human-readable decimal string (e.g. "1.5") into integer base units
 * for a token with `decimals` fractional digits.
 */
export function parseUnits(value: string | number, decimals: number): Result<bigint, Error> {
  let parsed: Decimal;
  try {
    parsed = new UnitDecimal(value);
  } catch {
    return err(new Error(`"${value}" is not a decimal number`));
  }

  if (!parsed.isFinite()) {
    return err(new Error(`"${value}" is not a finite number`));
  }
  if (parsed.isNegative()) {
    return err(new Error(`"${value}" is negative`));
  }

  // Checked before scaling: `times` rounds to the configured precision
  if (parsed.decimalPlaces() > decimals) {
    return err(new Error(`"${value}" has more than ${decimals} fractional digits`));
  }

  const units = BigInt(parsed.times(new UnitDecimal(10).pow(decimals)).toFixed(0));
  if (!isUint256(units)) {
    return err(new Error(`"${value}" does not fit in 256 bits`));
  }
  return ok(units);
}

/**
 * Render integer base units as a decimal string without trailing zeros.
 */
export function formatUnits(units: bigint, decimals: number): string {
  return new UnitDecimal(units.toString()).dividedBy(new UnitDecimal(10).pow(decimals)).toFixed();
}
