/**
 * Decimal helpers. Every balance, price and amount in the ledger is a Decimal.
 */

import Decimal from 'decimal.js';

export type Amount = Decimal;
export type AmountInput = Decimal | number | string;

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);

/**
 * Parses user or storage input. Returns null for anything that is not a
 * finite number (NaN, Infinity, '', '1e', ...).
 */
export function toAmount(value: AmountInput): Amount | null {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return null;
  }
  try {
    const parsed = new Decimal(typeof value === 'string' ? value.trim() : value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
}

export function isPositive(value: Amount): boolean {
  return value.isFinite() && value.greaterThan(0);
}

export function formatAmount(value: Amount, decimals: number = 4): string {
  return value.toFixed(decimals);
}
