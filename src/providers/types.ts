/**
 * Shared types for exchange-rate sources.
 *
 * A source talks to exactly one provider and returns entries priced in the
 * requested base currency. Failures come back as a FetchError value; sources
 * never throw to the cache.
 */
import type { Result } from 'neverthrow';
import type { CurrencyCode, CurrencyKind } from '@/core/currencies';
import type { FetchError, RateSourceName } from '@/core/errors';
import type { RateEntry } from '@/rates/rate_table';

export interface RateSource {
  readonly name: RateSourceName;
  /** Kind of currency this source quotes; the cache only asks for these. */
  readonly kind: CurrencyKind;
  fetch(currencies: ReadonlySet<CurrencyCode>): Promise<Result<RateEntry[], FetchError>>;
  getRequestCount(): number;
}

export interface RequestOptions {
  timeoutMs: number;
  maxRetries: number;
  initialBackoffMs: number;
}

export const DEFAULT_REQUEST_OPTIONS: RequestOptions = {
  timeoutMs: 10_000,
  maxRetries: 3,
  initialBackoffMs: 1_000,
};
