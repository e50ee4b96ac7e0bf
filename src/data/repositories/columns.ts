/**
 * Column codecs shared by the repositories. Decimals are stored as their exact
 * string form, timestamps as ISO-8601 with milliseconds.
 */

import type Decimal from 'decimal.js';
import { parseCurrencyCode, type CurrencyCode } from '@/core/currencies';
import { toAmount } from '@/core/money';
import { parseTimestamp } from '@/core/time';

export class CorruptRowError extends Error {
  constructor(table: string, column: string, value: unknown) {
    super(`Corrupt value in ${table}.${column}: ${JSON.stringify(value)}`);
    this.name = 'CorruptRowError';
  }
}

export function encodeDate(date: Date): string {
  return date.toISOString();
}

export function decodeDate(table: string, column: string, value: string): Date {
  const parsed = parseTimestamp(value);
  if (!parsed) throw new CorruptRowError(table, column, value);
  return parsed;
}

export function decodeDecimal(table: string, column: string, value: string): Decimal {
  const parsed = toAmount(value);
  if (!parsed) throw new CorruptRowError(table, column, value);
  return parsed;
}

export function decodeCurrency(table: string, column: string, value: string): CurrencyCode {
  const parsed = parseCurrencyCode(value);
  if (!parsed) throw new CorruptRowError(table, column, value);
  return parsed;
}
