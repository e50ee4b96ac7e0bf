/**
 * Per-source request budget: at most N requests in any rolling minute and
 * a bounded number in flight. Free API tiers count calls per minute.
 */

import { createChildLogger } from '@/utils/logger';
import type { RateSourceName } from '@/core/errors';

const logger = createChildLogger('rate_limiter');

const WINDOW_MS = 60_000;

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private startedAt: number[] = [];
  private inFlight = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(
    private readonly source: RateSourceName,
    config: Partial<RateLimiterConfig> = {},
    private readonly now: () => number = () => Date.now()
  ) {
    this.config = {
      maxRequestsPerMinute: config.maxRequestsPerMinute ?? 30,
      maxConcurrent: config.maxConcurrent ?? 2,
    };
  }

  /** Runs `task` once the window and concurrency budget allow it. */
  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Requests started within the last minute. */
  windowCount(): number {
    this.prune();
    return this.startedAt.length;
  }

  private prune(): void {
    const cutoff = this.now() - WINDOW_MS;
    this.startedAt = this.startedAt.filter((t) => t > cutoff);
  }

  private async acquire(): Promise<void> {
    while (this.inFlight >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }
    this.inFlight++;

    this.prune();
    while (this.startedAt.length >= this.config.maxRequestsPerMinute) {
      const oldest = this.startedAt[0] ?? this.now();
      const waitMs = oldest + WINDOW_MS - this.now();
      logger.debug({ source: this.source, waitMs }, 'Request budget used up, waiting');
      await new Promise((resolve) => setTimeout(resolve, Math.max(waitMs, 1)));
      this.prune();
    }
    this.startedAt.push(this.now());
  }

  private release(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.waiting.shift()?.();
  }
}
