import { describe, expect, it } from 'vitest';
import Decimal from 'decimal.js';
import { EPOCH } from '@/core/time';
import {
  buildRateTable,
  convertWithTable,
  countEntriesBySource,
  createBaseTable,
  crossRate,
  mergeRateTable,
} from '@/rates/rate_table';
import { T0, at, entry, usdTable } from '../helpers/fakes';

describe('createBaseTable', () => {
  it('holds only the base currency at exactly 1, stale by construction', () => {
    const table = createBaseTable('USD', T0);
    expect(table.version).toBe(0);
    expect([...table.entries.keys()]).toEqual(['USD']);
    expect(table.entries.get('USD')?.priceInBase.toString()).toBe('1');
    expect(table.entries.get('USD')?.source).toBe('base');
    expect(table.asOf).toBe(EPOCH);
    expect(Object.isFrozen(table)).toBe(true);
  });
});

describe('buildRateTable', () => {
  it('ignores a fetched base entry and keeps the base at 1', () => {
    const table = buildRateTable({
      version: 3,
      baseCurrency: 'USD',
      entries: [entry('USD', '2'), entry('EUR', '1.1')],
      createdAt: T0,
    });
    expect(table.entries.get('USD')?.priceInBase.toString()).toBe('1');
    expect(table.entries.get('EUR')?.priceInBase.toString()).toBe('1.1');
  });

  it('rejects non-positive prices', () => {
    expect(() =>
      buildRateTable({ version: 1, baseCurrency: 'USD', entries: [entry('EUR', 0)], createdAt: T0 })
    ).toThrow('Invalid price for EUR');
  });

  it('uses the oldest fetched entry as asOf', () => {
    const table = buildRateTable({
      version: 1,
      baseCurrency: 'USD',
      entries: [entry('EUR', '1.1', at(5_000)), entry('BTC', '60000', at(1_000))],
      createdAt: at(10_000),
    });
    expect(table.asOf).toEqual(at(1_000));
  });
});

describe('convertWithTable', () => {
  const table = usdTable({ EUR: '1.1', GBP: '1.25', BTC: '60000' });

  it('returns the amount unchanged for same-currency conversion', () => {
    const result = convertWithTable(table, '123.45', 'EUR', 'EUR');
    expect(result._unsafeUnwrap().toString()).toBe('123.45');
  });

  it('converts through base prices', () => {
    expect(convertWithTable(table, 100, 'EUR', 'USD')._unsafeUnwrap().toString()).toBe('110');
    expect(convertWithTable(table, 110, 'EUR', 'GBP')._unsafeUnwrap().toString()).toBe('96.8');
    expect(convertWithTable(table, '0.5', 'BTC', 'USD')._unsafeUnwrap().toString()).toBe('30000');
  });

  it('round-trips within decimal precision', () => {
    const there = convertWithTable(table, 250, 'GBP', 'EUR')._unsafeUnwrap();
    const back = convertWithTable(table, there, 'EUR', 'GBP')._unsafeUnwrap();
    expect(back.minus(250).abs().lessThan(new Decimal('1e-15'))).toBe(true);
  });

  it('fails with UnknownCurrency when a side has no entry', () => {
    const result = convertWithTable(table, 1, 'JPY', 'USD');
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().kind).toBe('UnknownCurrency');
    expect(result._unsafeUnwrapErr().currency).toBe('JPY');
  });
});

describe('crossRate', () => {
  it('reports rate, inverse and the older fetch time', () => {
    const table = buildRateTable({
      version: 1,
      baseCurrency: 'USD',
      entries: [entry('EUR', '1.1', at(2_000)), entry('GBP', '1.25', at(1_000))],
      createdAt: at(3_000),
    });
    const rate = crossRate(table, 'GBP', 'EUR')._unsafeUnwrap();
    expect(rate.rate.toString()).toBe(new Decimal('1.25').div('1.1').toString());
    expect(rate.inverse.toString()).toBe('0.88');
    expect(rate.updatedAt).toEqual(at(1_000));
  });
});

describe('mergeRateTable', () => {
  it('overlays fetched entries and keeps the rest untouched', () => {
    const previous = buildRateTable({
      version: 4,
      baseCurrency: 'USD',
      entries: [entry('EUR', '1.1', at(0)), entry('BTC', '60000', at(0))],
      createdAt: at(0),
    });
    const next = mergeRateTable(previous, [entry('BTC', '61000', at(60_000))], at(60_000));

    expect(next.version).toBe(5);
    expect(next.entries.get('EUR')).toEqual(previous.entries.get('EUR'));
    expect(next.entries.get('BTC')?.priceInBase.toString()).toBe('61000');
    expect(next.asOf).toEqual(at(0));
    expect(previous.entries.get('BTC')?.priceInBase.toString()).toBe('60000');
  });

  it('counts entries per source', () => {
    const table = usdTable({ EUR: '1.1', GBP: '1.25', BTC: '60000' });
    expect(countEntriesBySource(table)).toEqual({ base: 1, 'exchangerate-api': 2, coingecko: 1 });
  });
});
