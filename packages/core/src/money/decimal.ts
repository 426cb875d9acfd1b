/**
 * Decimal helpers for weights and money
 * Amounts are rounded half-up to 2 places only where they are persisted.
 */
import { Decimal } from 'decimal.js';
import { amountSchema, LEDGER_RULES } from '@weighbill/shared';
import type { DecimalInput } from '@weighbill/shared';

export { Decimal };

export const zero = () => new Decimal(0);

export function dec(value: DecimalInput = 0): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

/**
 * Parse a value that may come straight from a form field.
 * Returns null for anything that is not a finite number.
 */
export function parseDecimal(value: DecimalInput): Decimal | null {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null;
  }
  const parsed = amountSchema.safeParse(value);
  return parsed.success ? new Decimal(parsed.data) : null;
}

export function add(a: DecimalInput, b: DecimalInput): Decimal {
  return dec(a).add(dec(b));
}

export function sub(a: DecimalInput, b: DecimalInput): Decimal {
  return dec(a).sub(dec(b));
}

export function mul(a: DecimalInput, b: DecimalInput): Decimal {
  return dec(a).mul(dec(b));
}

export function div(a: DecimalInput, b: DecimalInput): Decimal {
  return dec(a).div(dec(b));
}

export function sum(values: DecimalInput[]): Decimal {
  return values.reduce<Decimal>((total, value) => total.add(dec(value)), zero());
}

export function round2(value: DecimalInput): Decimal {
  return dec(value).toDecimalPlaces(LEDGER_RULES.AMOUNT_DECIMALS, Decimal.ROUND_HALF_UP);
}

export function max(a: DecimalInput, b: DecimalInput): Decimal {
  return Decimal.max(dec(a), dec(b));
}

export function min(a: DecimalInput, b: DecimalInput): Decimal {
  return Decimal.min(dec(a), dec(b));
}

export function eq(a: DecimalInput, b: DecimalInput): boolean {
  return dec(a).equals(dec(b));
}

export function gt(a: DecimalInput, b: DecimalInput): boolean {
  return dec(a).greaterThan(dec(b));
}

export function gte(a: DecimalInput, b: DecimalInput): boolean {
  return dec(a).greaterThanOrEqualTo(dec(b));
}

export function lt(a: DecimalInput, b: DecimalInput): boolean {
  return dec(a).lessThan(dec(b));
}

export function lte(a: DecimalInput, b: DecimalInput): boolean {
  return dec(a).lessThanOrEqualTo(dec(b));
}

/** |a - b| <= tolerance */
export function approxEq(a: DecimalInput, b: DecimalInput, tolerance: DecimalInput = '0.01'): boolean {
  return dec(a).sub(dec(b)).abs().lessThanOrEqualTo(dec(tolerance));
}

export function toString2(value: DecimalInput): string {
  return round2(value).toFixed(2);
}
