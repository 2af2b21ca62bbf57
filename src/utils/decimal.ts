import { Decimal } from 'decimal.js';

Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
});

export { Decimal };

export type DecimalInput = string | number | Decimal;

export const ZERO = new Decimal(0);

export function toDecimal(value: DecimalInput): Decimal {
  return new Decimal(value);
}

/**
 * Parse a venue-encoded decimal string. Returns null for blank, malformed
 * or non-finite input instead of throwing.
 */
export function tryParseDecimal(value: string): Decimal | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;

  let parsed: Decimal;
  try {
    parsed = new Decimal(trimmed);
  } catch {
    return null;
  }

  return parsed.isFinite() ? parsed : null;
}

export function formatUsd(value: Decimal): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Direction of a signed quantity. Unlike Decimal#isPositive, zero (and -0)
 * maps to 0.
 */
export function signOf(value: Decimal): -1 | 0 | 1 {
  if (value.greaterThan(0)) return 1;
  if (value.lessThan(0)) return -1;
  return 0;
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, val) => acc.plus(val), ZERO);
}
