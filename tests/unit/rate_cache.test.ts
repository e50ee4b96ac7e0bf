import { describe, expect, it } from 'vitest';
import { EPOCH } from '@/core/time';
import { RateCache } from '@/rates/rate_cache';
import { FakeSource, at, entry, manualClock } from '../helpers/fakes';

function makeCache(historyLimit = 5) {
  const clock = manualClock();
  const cache = new RateCache({ baseCurrency: 'USD', historyLimit, clock });
  return { cache, clock };
}

const fiatEntries = (fetchedAt: Date, eur = '1.1') => [
  entry('EUR', eur, fetchedAt),
  entry('GBP', '1.25', fetchedAt),
];
const cryptoEntries = (fetchedAt: Date, btc = '60000') => [entry('BTC', btc, fetchedAt)];

describe('RateCache', () => {
  it('starts with a stale base-only table', () => {
    const { cache } = makeCache();
    const table = cache.current();
    expect(table.version).toBe(0);
    expect(table.entries.size).toBe(1);
    expect(table.asOf).toBe(EPOCH);
    expect(cache.isStale(60 * 60 * 1000)).toBe(true);
  });

  it('asks each source only for its own kind, minus the base currency', async () => {
    const { cache } = makeCache();
    const fiat = FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0)));
    const crypto = FakeSource.succeeding('coingecko', 'crypto', cryptoEntries(at(0)));

    await cache.refresh([fiat, crypto]);

    expect([...(fiat.requested[0] ?? [])]).toEqual(['EUR', 'GBP', 'RUB', 'CNY', 'JPY', 'AED']);
    expect([...(crypto.requested[0] ?? [])]).toEqual(['BTC', 'ETH', 'SOL']);
  });

  it('publishes a merged table and pushes the previous one to history', async () => {
    const { cache, clock } = makeCache();
    const initial = cache.current();
    const result = await cache.refresh([
      FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0))),
      FakeSource.succeeding('coingecko', 'crypto', cryptoEntries(at(0))),
    ]);

    const table = result._unsafeUnwrap();
    expect(cache.current()).toBe(table);
    expect(table.version).toBe(1);
    expect(table.entries.size).toBe(4);
    expect(cache.history()).toEqual([initial]);
    expect(cache.isStale(60_000)).toBe(false);

    clock.advance(60_001);
    expect(cache.isStale(60_000)).toBe(true);
  });

  it('keeps old entries and asOf for a failing source', async () => {
    const { cache, clock } = makeCache();
    await cache.refresh([
      FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0))),
      FakeSource.succeeding('coingecko', 'crypto', cryptoEntries(at(0))),
    ]);
    const before = cache.current();

    clock.advance(60_000);
    const result = await cache.refresh([
      FakeSource.failing('exchangerate-api', 'fiat', 'Timeout'),
      FakeSource.succeeding('coingecko', 'crypto', cryptoEntries(at(60_000), '61000')),
    ]);

    const table = result._unsafeUnwrap();
    expect(table.version).toBe(2);
    expect(table.entries.get('EUR')).toEqual(before.entries.get('EUR'));
    expect(table.entries.get('EUR')?.fetchedAt).toEqual(at(0));
    expect(table.entries.get('BTC')?.priceInBase.toString()).toBe('61000');
    expect(table.asOf).toEqual(at(0));
  });

  it('returns AllSourcesFailed and the identical table when every source fails', async () => {
    const { cache } = makeCache();
    await cache.refresh([FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0)))]);
    const before = cache.current();

    const result = await cache.refresh([
      FakeSource.failing('exchangerate-api', 'fiat', 'RateLimited'),
      FakeSource.failing('coingecko', 'crypto', 'BadResponse'),
    ]);

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error.kind).toBe('AllSourcesFailed');
    expect(error.failures.map((f) => f.kind)).toEqual(['RateLimited', 'BadResponse']);
    expect(cache.current()).toBe(before);
    expect(cache.history()).toHaveLength(1);
  });

  it('treats an empty source list as a total failure', async () => {
    const { cache } = makeCache();
    const result = await cache.refresh([]);
    expect(result._unsafeUnwrapErr().message).toBe('Rate refresh failed: no rate sources configured');
    expect(cache.current().version).toBe(0);
  });

  it('isolates a source that throws', async () => {
    const { cache } = makeCache();
    const throwing = new FakeSource('coingecko', 'crypto', [new Error('socket hang up')]);
    const result = await cache.refresh([
      FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0))),
      throwing,
    ]);
    expect(result._unsafeUnwrap().entries.has('EUR')).toBe(true);
    expect(result._unsafeUnwrap().entries.has('BTC')).toBe(false);
  });

  it('drops entries that were not requested or have bad prices', async () => {
    const { cache } = makeCache();
    const result = await cache.refresh([
      FakeSource.succeeding('exchangerate-api', 'fiat', [
        entry('EUR', '1.1', at(0)),
        entry('BTC', '60000', at(0), 'exchangerate-api'),
        entry('GBP', '-1', at(0)),
      ]),
    ]);
    const table = result._unsafeUnwrap();
    expect([...table.entries.keys()].sort()).toEqual(['EUR', 'USD']);
  });

  it('bounds the history', async () => {
    const { cache, clock } = makeCache(2);
    const source = FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0)));
    for (let i = 0; i < 4; i++) {
      clock.advance(1_000);
      await cache.refresh([source]);
    }
    expect(cache.current().version).toBe(4);
    expect(cache.history().map((t) => t.version)).toEqual([3, 2]);
  });

  it('converts and quotes against the current table', async () => {
    const { cache } = makeCache();
    await cache.refresh([FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0)))]);
    expect(cache.convert(100, 'EUR', 'USD')._unsafeUnwrap().toString()).toBe('110');
    expect(cache.rate('USD', 'EUR')._unsafeUnwrap().inverse.toString()).toBe('1.1');
    expect(cache.convert(1, 'BTC', 'USD')._unsafeUnwrapErr().kind).toBe('UnknownCurrency');
  });

  it('rolls back to the previous table as a new version', async () => {
    const { cache } = makeCache();
    await cache.refresh([FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0), '1.1'))]);
    await cache.refresh([FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0), '9.9'))]);

    const restored = cache.rollback();
    expect(restored?.version).toBe(3);
    expect(cache.current().entries.get('EUR')?.priceInBase.toString()).toBe('1.1');
    expect(cache.history()[0]?.entries.get('EUR')?.priceInBase.toString()).toBe('9.9');
  });

  it('has nothing to roll back before the first refresh', () => {
    const { cache } = makeCache();
    expect(cache.rollback()).toBeNull();
  });

  it('summarizes entries by source', async () => {
    const { cache } = makeCache();
    await cache.refresh([
      FakeSource.succeeding('exchangerate-api', 'fiat', fiatEntries(at(0))),
      FakeSource.succeeding('coingecko', 'crypto', cryptoEntries(at(0))),
    ]);
    expect(cache.summary()).toMatchObject({
      version: 1,
      baseCurrency: 'USD',
      entryCount: 4,
      bySource: { base: 1, 'exchangerate-api': 2, coingecko: 1 },
    });
  });
});
