import Decimal from 'decimal.js';

// Configure Decimal.js globally for price precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * No rounding: a stored positive amount never reads back as zero.
 */
export function toNumber(value: Decimal): number {
  return value.toNumber();
}

/** True for finite amounts strictly above zero. */
export function isPositiveAmount(value: Decimal): boolean {
  return value.isFinite() && value.greaterThan(0);
}
