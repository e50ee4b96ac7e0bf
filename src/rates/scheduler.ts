/**
 * Periodic rate refresh.
 *
 * Ticks at a fixed interval. A tick that finds a refresh already running is
 * skipped rather than queued, so slow providers never build up a backlog.
 */

import { toError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import type { RateRefresher } from './rate_refresher';

const logger = createChildLogger('scheduler');

export type TickOutcome = 'refreshed' | 'failed' | 'skipped';

export interface SchedulerStats {
  ticks: number;
  skipped: number;
  failed: number;
}

export class RateScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly stats: SchedulerStats = { ticks: 0, skipped: 0, failed: 0 };

  constructor(
    private readonly refresher: RateRefresher,
    private readonly intervalMs: number
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Refresh interval must be positive, got ${intervalMs}`);
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  getStats(): SchedulerStats {
    return { ...this.stats };
  }

  /** Runs one tick immediately, then one every interval. */
  start(): void {
    if (this.timer) return;

    logger.info({ intervalMs: this.intervalMs }, 'Rate scheduler started');
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info(this.getStats(), 'Rate scheduler stopped');
  }

  /** Stops ticking and waits for a refresh that is still running to settle. */
  async shutdown(): Promise<void> {
    this.stop();
    if (this.refresher.isRefreshing()) {
      logger.info('Waiting for the running refresh before shutdown');
      await this.refresher.refresh();
    }
  }

  async tick(): Promise<TickOutcome> {
    this.stats.ticks += 1;

    if (this.refresher.isRefreshing()) {
      this.stats.skipped += 1;
      logger.debug({ skipped: this.stats.skipped }, 'Refresh in flight; skipping tick');
      return 'skipped';
    }

    try {
      const result = await this.refresher.refresh();
      if (result.isErr()) {
        this.stats.failed += 1;
        logger.warn({ error: result.error.message }, 'Scheduled refresh failed');
        return 'failed';
      }
      return 'refreshed';
    } catch (error) {
      this.stats.failed += 1;
      logger.error({ error: toError(error).message }, 'Scheduled refresh threw');
      return 'failed';
    }
  }
}
