/**
 * Single-flight wrapper around RateCache.refresh.
 *
 * At most one refresh runs at a time. A refresh requested while one is running
 * gets the running promise back, so concurrent callers share one fetch cycle
 * and one result.
 */

import { err, ok, type Result } from 'neverthrow';
import type { RefreshError } from '@/core/errors';
import { toError } from '@/core/errors';
import type { LedgerStore } from '@/data/store';
import type { RateSource } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';
import type { RateCache } from './rate_cache';
import type { RateTable } from './rate_table';

const logger = createChildLogger('rate_refresher');

export interface RefreshOutcome {
  table: RateTable;
  /** Set when the table was published but could not be saved. */
  persistError: Error | null;
}

export type RefreshListener = (table: RateTable) => Promise<void>;

export interface RateRefresherOptions {
  cache: RateCache;
  sources: readonly RateSource[];
  store?: Pick<LedgerStore, 'saveRateTable'> | null;
  /** Called after every published refresh; failures are logged only. */
  onRefreshed?: RefreshListener;
}

export class RateRefresher {
  private inFlight: Promise<Result<RefreshOutcome, RefreshError>> | null = null;
  private completed = 0;

  constructor(private readonly options: RateRefresherOptions) {}

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  /** Number of refresh cycles that have run to completion. */
  get completedRefreshes(): number {
    return this.completed;
  }

  refresh(): Promise<Result<RefreshOutcome, RefreshError>> {
    if (this.inFlight) {
      logger.debug('Refresh already in flight; reusing it');
      return this.inFlight;
    }

    const run = this.runOnce().finally(() => {
      this.inFlight = null;
      this.completed += 1;
    });
    this.inFlight = run;
    return run;
  }

  private async runOnce(): Promise<Result<RefreshOutcome, RefreshError>> {
    const { cache, sources, store, onRefreshed } = this.options;
    const result = await cache.refresh(sources);
    if (result.isErr()) {
      return err(result.error);
    }

    const table = result.value;
    let persistError: Error | null = null;
    if (store) {
      try {
        await store.saveRateTable(table);
      } catch (error) {
        persistError = toError(error);
        logger.error(
          { version: table.version, error: persistError.message },
          'Failed to persist rate table; in-memory table stays published'
        );
      }
    }

    if (onRefreshed) {
      try {
        await onRefreshed(table);
      } catch (error) {
        logger.warn({ version: table.version, error: toError(error).message }, 'Refresh listener failed');
      }
    }

    return ok({ table, persistError });
  }
}
