/**
 * Holds the current RateTable and a bounded history of superseded tables.
 *
 * The current table is a single frozen object; a refresh builds the next one
 * off to the side and publishes it with one assignment, so readers see either
 * the old or the new table, never a mix. Refresh is not re-entrant: callers go
 * through RateRefresher, which keeps one refresh in flight.
 */

import { err, ok, type Result } from 'neverthrow';
import type { CurrencyCode } from '@/core/currencies';
import { currenciesOfKind } from '@/core/currencies';
import { ConversionError, FetchError, RefreshError, toError } from '@/core/errors';
import type { Amount, AmountInput } from '@/core/money';
import { isOlderThan, systemClock, type Clock } from '@/core/time';
import type { RateSource } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';
import {
  convertWithTable,
  countEntriesBySource,
  createBaseTable,
  crossRate,
  mergeRateTable,
  buildRateTable,
  type CrossRate,
  type RateEntry,
  type RateEntrySource,
  type RateTable,
} from './rate_table';

const logger = createChildLogger('rate_cache');

export interface RateCacheOptions {
  baseCurrency: CurrencyCode;
  historyLimit: number;
  clock?: Clock;
}

export interface RateSummary {
  version: number;
  baseCurrency: CurrencyCode;
  asOf: Date;
  createdAt: Date;
  entryCount: number;
  bySource: Record<RateEntrySource, number>;
}

interface SourceOutcome {
  source: RateSource;
  result: Result<RateEntry[], FetchError>;
}

export class RateCache {
  private snapshot: RateTable;
  private past: RateTable[] = [];
  private readonly clock: Clock;

  constructor(private readonly options: RateCacheOptions) {
    this.clock = options.clock ?? systemClock;
    this.snapshot = createBaseTable(options.baseCurrency, this.clock());
  }

  get baseCurrency(): CurrencyCode {
    return this.options.baseCurrency;
  }

  current(): RateTable {
    return this.snapshot;
  }

  /** Superseded tables, newest first. */
  history(): readonly RateTable[] {
    return this.past;
  }

  isStale(maxAgeMs: number): boolean {
    return isOlderThan(this.snapshot.asOf, maxAgeMs, this.clock());
  }

  convert(amount: AmountInput, from: CurrencyCode, to: CurrencyCode): Result<Amount, ConversionError> {
    return convertWithTable(this.snapshot, amount, from, to);
  }

  rate(from: CurrencyCode, to: CurrencyCode): Result<CrossRate, ConversionError> {
    return crossRate(this.snapshot, from, to);
  }

  summary(): RateSummary {
    const table = this.snapshot;
    return {
      version: table.version,
      baseCurrency: table.baseCurrency,
      asOf: table.asOf,
      createdAt: table.createdAt,
      entryCount: table.entries.size,
      bySource: countEntriesBySource(table),
    };
  }

  /**
   * Queries every source for its currencies, overlays what came back onto the
   * current table and publishes the result. When no source succeeds the
   * current table stays exactly as it was.
   */
  async refresh(sources: readonly RateSource[]): Promise<Result<RateTable, RefreshError>> {
    const previous = this.snapshot;
    const outcomes = await Promise.all(sources.map((source) => this.fetchFrom(source, previous)));

    const failures: FetchError[] = [];
    const fetched: RateEntry[] = [];
    for (const { source, result } of outcomes) {
      if (result.isErr()) {
        logger.warn(
          { source: source.name, kind: result.error.kind, error: result.error.message },
          'Rate source failed; keeping previous entries for its currencies'
        );
        failures.push(result.error);
        continue;
      }
      fetched.push(...this.acceptedEntries(source, previous, result.value));
    }

    if (failures.length === outcomes.length) {
      logger.error({ failures: failures.length }, 'All rate sources failed; current table retained');
      return err(new RefreshError(failures));
    }

    const next = mergeRateTable(previous, fetched, this.clock());
    this.publish(next);

    logger.info(
      { version: next.version, updated: fetched.length, failedSources: failures.length },
      'Rate table refreshed'
    );
    return ok(next);
  }

  /**
   * Re-publishes the most recent superseded table as a new version.
   */
  rollback(): RateTable | null {
    const [target, ...rest] = this.past;
    if (!target) {
      return null;
    }

    const restored = buildRateTable({
      version: this.snapshot.version + 1,
      baseCurrency: target.baseCurrency,
      entries: target.entries.values(),
      createdAt: this.clock(),
    });
    this.past = [this.snapshot, ...rest].slice(0, this.options.historyLimit);
    this.snapshot = restored;

    logger.warn({ version: restored.version, from: target.version }, 'Rate table rolled back');
    return restored;
  }

  /**
   * Installs persisted state at start-up. Tables for another base currency are
   * ignored.
   */
  restore(latest: RateTable, history: readonly RateTable[] = []): boolean {
    if (latest.baseCurrency !== this.options.baseCurrency) {
      logger.warn(
        { stored: latest.baseCurrency, configured: this.options.baseCurrency },
        'Stored rate table uses a different base currency; ignoring it'
      );
      return false;
    }

    this.snapshot = latest;
    this.past = history
      .filter((table) => table.baseCurrency === latest.baseCurrency && table.version < latest.version)
      .slice(0, this.options.historyLimit);
    return true;
  }

  private publish(next: RateTable): void {
    this.past = [this.snapshot, ...this.past].slice(0, this.options.historyLimit);
    this.snapshot = next;
  }

  private async fetchFrom(source: RateSource, table: RateTable): Promise<SourceOutcome> {
    const wanted = new Set(
      currenciesOfKind(source.kind).filter((currency) => currency !== table.baseCurrency)
    );

    try {
      return { source, result: await source.fetch(wanted) };
    } catch (error) {
      // Sources are not supposed to throw; treat it like any other failure
      const cause = toError(error);
      return {
        source,
        result: err(new FetchError('BadResponse', source.name, cause.message, cause)),
      };
    }
  }

  private acceptedEntries(source: RateSource, table: RateTable, entries: RateEntry[]): RateEntry[] {
    const wanted = new Set(currenciesOfKind(source.kind));
    return entries.filter((entry) => {
      const valid =
        wanted.has(entry.currency) &&
        entry.currency !== table.baseCurrency &&
        entry.priceInBase.isFinite() &&
        entry.priceInBase.greaterThan(0);
      if (!valid) {
        logger.warn(
          { source: source.name, currency: entry.currency, price: entry.priceInBase.toString() },
          'Dropping rate entry'
        );
      }
      return valid;
    });
  }
}
