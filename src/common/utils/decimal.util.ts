import Decimal from 'decimal.js';

// Configure Decimal.js globally for ledger sums.
// Only plus/minus run on the aggregation path; at the maximum precision no
// sum of accepted values is ever rounded.
Decimal.set({
  precision: 1e9,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

// Plain base-10 literal: sign, digits, optional fraction, optional exponent
// of at most four digits. Keeps out NaN, Infinity, the hex/binary/octal forms
// Decimal.js accepts, and exponents that overflow or print as huge strings.
const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d{1,4})?$/;

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Parses a string-encoded decimal coming from the exchange.
 * Returns undefined for anything that is not a finite base-10 string.
 */
export function parseDecimal(value: unknown): Decimal | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return undefined;
  }

  const parsed = new Decimal(trimmed);
  if (!parsed.isFinite()) {
    return undefined;
  }
  // underflow: nonzero digits that came out as zero
  const mantissa = trimmed.split(/[eE]/)[0];
  if (parsed.isZero() && /[1-9]/.test(mantissa)) {
    return undefined;
  }
  return parsed;
}

/**
 * Converts Decimal to its exact plain string for JSON responses.
 */
export function toPlainString(value: Decimal): string {
  return value.toFixed();
}

/**
 * Safe addition of Decimal values.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), ZERO);
}

/**
 * Safe subtraction.
 */
export function subtract(a: Decimal, b: Decimal): Decimal {
  return a.minus(b);
}
