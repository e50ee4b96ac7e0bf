/**
 * Versioned, immutable exchange-rate snapshots.
 *
 * Every price is expressed in the table's base currency. A table is frozen on
 * construction; refreshes build a new table and the cache swaps the reference.
 */

import { err, ok, type Result } from 'neverthrow';
import type Decimal from 'decimal.js';
import type { CurrencyCode } from '@/core/currencies';
import { ConversionError, type RateSourceName } from '@/core/errors';
import { ONE, type Amount, type AmountInput, toAmount } from '@/core/money';
import { EPOCH } from '@/core/time';

export type RateEntrySource = RateSourceName | 'base';

export interface RateEntry {
  readonly currency: CurrencyCode;
  readonly priceInBase: Decimal;
  readonly fetchedAt: Date;
  readonly source: RateEntrySource;
}

export interface RateTable {
  readonly version: number;
  readonly baseCurrency: CurrencyCode;
  readonly entries: ReadonlyMap<CurrencyCode, RateEntry>;
  /** Oldest fetchedAt among fetched entries; epoch for a base-only table. */
  readonly asOf: Date;
  readonly createdAt: Date;
}

export interface CrossRate {
  from: CurrencyCode;
  to: CurrencyCode;
  rate: Decimal;
  inverse: Decimal;
  updatedAt: Date;
}

function baseEntry(baseCurrency: CurrencyCode, createdAt: Date): RateEntry {
  return Object.freeze({
    currency: baseCurrency,
    priceInBase: ONE,
    fetchedAt: createdAt,
    source: 'base' as const,
  });
}

function computeAsOf(entries: Iterable<RateEntry>): Date {
  let oldest: Date | null = null;
  for (const entry of entries) {
    if (entry.source === 'base') continue;
    if (!oldest || entry.fetchedAt.getTime() < oldest.getTime()) {
      oldest = entry.fetchedAt;
    }
  }
  return oldest ?? EPOCH;
}

/**
 * Builds a frozen table. The base entry is always re-synthesized at exactly 1,
 * whatever the input carries for it.
 */
export function buildRateTable(params: {
  version: number;
  baseCurrency: CurrencyCode;
  entries: Iterable<RateEntry>;
  createdAt: Date;
}): RateTable {
  const map = new Map<CurrencyCode, RateEntry>();
  map.set(params.baseCurrency, baseEntry(params.baseCurrency, params.createdAt));

  for (const entry of params.entries) {
    if (entry.currency === params.baseCurrency) continue;
    if (!entry.priceInBase.isFinite() || entry.priceInBase.lessThanOrEqualTo(0)) {
      throw new Error(`Invalid price for ${entry.currency}: ${entry.priceInBase.toString()}`);
    }
    map.set(entry.currency, Object.freeze({ ...entry }));
  }

  return Object.freeze({
    version: params.version,
    baseCurrency: params.baseCurrency,
    entries: map,
    asOf: computeAsOf(map.values()),
    createdAt: params.createdAt,
  });
}

export function createBaseTable(baseCurrency: CurrencyCode, createdAt: Date = new Date()): RateTable {
  return buildRateTable({ version: 0, baseCurrency, entries: [], createdAt });
}

/**
 * Overlays freshly fetched entries onto the previous table. Currencies not
 * present in `fetched` keep their previous entry, including its fetchedAt.
 */
export function mergeRateTable(
  previous: RateTable,
  fetched: readonly RateEntry[],
  createdAt: Date
): RateTable {
  const merged = new Map<CurrencyCode, RateEntry>(previous.entries);
  for (const entry of fetched) {
    merged.set(entry.currency, entry);
  }
  return buildRateTable({
    version: previous.version + 1,
    baseCurrency: previous.baseCurrency,
    entries: merged.values(),
    createdAt,
  });
}

export function getPrice(table: RateTable, currency: CurrencyCode): Decimal | null {
  return table.entries.get(currency)?.priceInBase ?? null;
}

/** Units of `to` per one unit of `from`. */
export function crossRate(
  table: RateTable,
  from: CurrencyCode,
  to: CurrencyCode
): Result<CrossRate, ConversionError> {
  const fromEntry = table.entries.get(from);
  if (!fromEntry) return err(new ConversionError(from));
  const toEntry = table.entries.get(to);
  if (!toEntry) return err(new ConversionError(to));

  const updatedAt =
    fromEntry.fetchedAt.getTime() <= toEntry.fetchedAt.getTime()
      ? fromEntry.fetchedAt
      : toEntry.fetchedAt;

  return ok({
    from,
    to,
    rate: fromEntry.priceInBase.div(toEntry.priceInBase),
    inverse: toEntry.priceInBase.div(fromEntry.priceInBase),
    updatedAt,
  });
}

/**
 * amount * price(from) / price(to), evaluated against a single table.
 */
export function convertWithTable(
  table: RateTable,
  amount: AmountInput,
  from: CurrencyCode,
  to: CurrencyCode
): Result<Amount, ConversionError> {
  const value = toAmount(amount);
  if (!value) {
    throw new Error(`Cannot convert non-numeric amount '${String(amount)}'`);
  }
  const fromPrice = getPrice(table, from);
  if (!fromPrice) return err(new ConversionError(from));
  const toPrice = getPrice(table, to);
  if (!toPrice) return err(new ConversionError(to));
  if (from === to) return ok(value);

  return ok(value.mul(fromPrice).div(toPrice));
}

export function countEntriesBySource(table: RateTable): Record<RateEntrySource, number> {
  const counts: Record<RateEntrySource, number> = {
    base: 0,
    'exchangerate-api': 0,
    coingecko: 0,
  };
  for (const entry of table.entries.values()) {
    counts[entry.source] += 1;
  }
  return counts;
}
