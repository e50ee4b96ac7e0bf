import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateCache } from '@/rates/rate_cache';
import { RateRefresher } from '@/rates/rate_refresher';
import { RateScheduler } from '@/rates/scheduler';
import { FakeSource, MemoryLedgerStore, entry, manualClock } from '../helpers/fakes';

const INTERVAL_MS = 15 * 60 * 1000;

function setup(source: FakeSource = FakeSource.succeeding('exchangerate-api', 'fiat', [entry('EUR', '1.1')])) {
  const cache = new RateCache({ baseCurrency: 'USD', historyLimit: 10, clock: manualClock() });
  const store = new MemoryLedgerStore();
  const refreshed: number[] = [];
  const refresher = new RateRefresher({
    cache,
    sources: [source],
    store,
    onRefreshed: async (table) => {
      refreshed.push(table.version);
    },
  });
  return { cache, store, source, refresher, refreshed };
}

describe('RateRefresher', () => {
  it('shares one fetch cycle between concurrent refresh requests', async () => {
    const { source, refresher, cache } = setup();
    source.hold();

    const first = refresher.refresh();
    const second = refresher.refresh();
    expect(second).toBe(first);
    expect(refresher.isRefreshing()).toBe(true);

    source.release();
    const [a, b] = await Promise.all([first, second]);

    expect(source.getRequestCount()).toBe(1);
    expect(a._unsafeUnwrap().table).toBe(b._unsafeUnwrap().table);
    expect(cache.current().version).toBe(1);
    expect(refresher.isRefreshing()).toBe(false);
    expect(refresher.completedRefreshes).toBe(1);
  });

  it('starts a new cycle once the previous one finished', async () => {
    const { source, refresher } = setup();
    await refresher.refresh();
    await refresher.refresh();
    expect(source.getRequestCount()).toBe(2);
  });

  it('persists the published table and notifies the listener', async () => {
    const { refresher, store, refreshed } = setup();
    const outcome = (await refresher.refresh())._unsafeUnwrap();

    expect(outcome.persistError).toBeNull();
    expect(store.tables).toEqual([outcome.table]);
    expect(refreshed).toEqual([1]);
  });

  it('reports a failed save but keeps the new table', async () => {
    const { refresher, store, cache } = setup();
    store.failWrites = true;

    const outcome = (await refresher.refresh())._unsafeUnwrap();

    expect(outcome.persistError?.message).toBe('disk full');
    expect(cache.current()).toBe(outcome.table);
  });

  it('saves nothing when every source fails', async () => {
    const { refresher, store, refreshed } = setup(FakeSource.failing('exchangerate-api', 'fiat'));
    const result = await refresher.refresh();

    expect(result._unsafeUnwrapErr().kind).toBe('AllSourcesFailed');
    expect(store.tables).toEqual([]);
    expect(refreshed).toEqual([]);
  });
});

describe('RateScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('refreshes immediately on start and then on every interval', async () => {
    const { source, refresher, cache } = setup();
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    scheduler.start();
    expect(source.getRequestCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(INTERVAL_MS);
    expect(source.getRequestCount()).toBe(2);

    await vi.advanceTimersByTimeAsync(INTERVAL_MS);
    expect(source.getRequestCount()).toBe(3);
    expect(cache.current().version).toBe(3);

    scheduler.stop();
  });

  it('skips a tick while a refresh is still running', async () => {
    const { source, refresher } = setup();
    source.hold();
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(INTERVAL_MS);

    expect(source.getRequestCount()).toBe(1);
    expect(scheduler.getStats()).toEqual({ ticks: 2, skipped: 1, failed: 0 });

    const inFlight = refresher.refresh();
    source.release();
    await inFlight;

    await vi.advanceTimersByTimeAsync(INTERVAL_MS);
    expect(source.getRequestCount()).toBe(2);
    scheduler.stop();
  });

  it('lets a manual refresh join the scheduled one', async () => {
    const { source, refresher, cache } = setup();
    source.hold();
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    scheduler.start();
    const manual = [refresher.refresh(), refresher.refresh()];
    source.release();
    const results = await Promise.all(manual);

    expect(source.getRequestCount()).toBe(1);
    expect(results.map((r) => r._unsafeUnwrap().table.version)).toEqual([1, 1]);
    expect(cache.current().version).toBe(1);
    scheduler.stop();
  });

  it('counts failed ticks without throwing', async () => {
    const { refresher } = setup(FakeSource.failing('coingecko', 'crypto', 'RateLimited'));
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    await expect(scheduler.tick()).resolves.toBe('failed');
    expect(scheduler.getStats()).toEqual({ ticks: 1, skipped: 0, failed: 1 });
  });

  it('stops ticking after stop()', async () => {
    const { source, refresher } = setup();
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    scheduler.stop();
    expect(scheduler.running).toBe(false);

    await vi.advanceTimersByTimeAsync(INTERVAL_MS * 3);
    expect(source.getRequestCount()).toBe(1);
  });

  it('waits for the running refresh on shutdown', async () => {
    const { source, refresher, store } = setup();
    source.hold();
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    scheduler.start();
    const done = scheduler.shutdown();
    expect(scheduler.running).toBe(false);
    expect(store.tables).toEqual([]);

    source.release();
    await done;

    expect(store.tables.map((t) => t.version)).toEqual([1]);
    expect(refresher.isRefreshing()).toBe(false);
  });

  it('shuts down at once when nothing is running', async () => {
    const { source, refresher } = setup();
    const scheduler = new RateScheduler(refresher, INTERVAL_MS);

    await scheduler.shutdown();
    expect(source.getRequestCount()).toBe(0);
  });

  it('rejects a non-positive interval', () => {
    const { refresher } = setup();
    expect(() => new RateScheduler(refresher, 0)).toThrow('Refresh interval must be positive');
  });
});
