/**
 * Fiat rates from ExchangeRate-API v6.
 *
 * `latest/{BASE}` returns units of each currency per one base unit, so the
 * price of a currency in base is the reciprocal.
 */

import Decimal from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { isFiatCurrency, type CurrencyCode, type FiatCurrency } from '@/core/currencies';
import { FetchError } from '@/core/errors';
import { systemClock, type Clock } from '@/core/time';
import type { RateEntry } from '@/rates/rate_table';
import { createChildLogger } from '@/utils/logger';
import { fetchJson } from '../http';
import { RateLimiter } from '../rate_limiter';
import { DEFAULT_REQUEST_OPTIONS, type RateSource, type RequestOptions } from '../types';
import type { ExchangeRateApiLatest } from './types';

const logger = createChildLogger('exchangerate_api');

export const EXCHANGERATE_API_URL = 'https://v6.exchangerate-api.com/v6';

export interface FiatSourceOptions {
  apiKey: string;
  baseCurrency: FiatCurrency;
  baseUrl?: string;
  request?: Partial<RequestOptions>;
  maxRequestsPerMinute?: number;
  clock?: Clock;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseLatest(body: unknown): ExchangeRateApiLatest | null {
  if (!isRecord(body)) return null;
  if (body.result === 'error') {
    const errorType = body['error-type'];
    return { result: 'error', 'error-type': typeof errorType === 'string' ? errorType : 'unknown' };
  }
  if (body.result !== 'success' || !isRecord(body.conversion_rates)) return null;

  const rates: Record<string, number> = {};
  for (const [code, value] of Object.entries(body.conversion_rates)) {
    if (typeof value === 'number') rates[code] = value;
  }
  return {
    result: 'success',
    base_code: typeof body.base_code === 'string' ? body.base_code : '',
    conversion_rates: rates,
  };
}

export class FiatSource implements RateSource {
  readonly name = 'exchangerate-api' as const;
  readonly kind = 'fiat' as const;

  private readonly baseUrl: string;
  private readonly request: RequestOptions;
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private requestCount = 0;

  constructor(private readonly options: FiatSourceOptions) {
    if (!options.apiKey) {
      throw new Error('ExchangeRate-API key is required for the fiat rate source');
    }
    this.baseUrl = options.baseUrl ?? EXCHANGERATE_API_URL;
    this.request = { ...DEFAULT_REQUEST_OPTIONS, ...options.request };
    this.limiter = new RateLimiter(this.name, {
      maxRequestsPerMinute: options.maxRequestsPerMinute ?? 30,
      maxConcurrent: 1,
    });
    this.clock = options.clock ?? systemClock;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async fetch(currencies: ReadonlySet<CurrencyCode>): Promise<Result<RateEntry[], FetchError>> {
    const base = this.options.baseCurrency;
    const url = `${this.baseUrl}/${encodeURIComponent(this.options.apiKey)}/latest/${base}`;

    this.requestCount++;
    const response = await fetchJson(this.name, url, this.request, this.limiter);
    if (response.isErr()) {
      return err(response.error);
    }

    const latest = parseLatest(response.value);
    if (!latest) {
      return err(new FetchError('BadResponse', this.name, 'Unexpected response shape'));
    }
    if (latest.result === 'error') {
      const errorType = latest['error-type'];
      const kind = errorType === 'quota-reached' ? 'RateLimited' : 'BadResponse';
      return err(new FetchError(kind, this.name, `Provider error: ${errorType}`));
    }
    if (latest.base_code && latest.base_code !== base) {
      return err(
        new FetchError('BadResponse', this.name, `Expected base ${base}, got ${latest.base_code}`)
      );
    }

    const fetchedAt = this.clock();
    const entries: RateEntry[] = [];
    for (const currency of currencies) {
      if (!isFiatCurrency(currency) || currency === base) continue;
      const unitsPerBase = latest.conversion_rates[currency];
      if (unitsPerBase === undefined || !Number.isFinite(unitsPerBase) || unitsPerBase <= 0) {
        logger.warn({ currency }, 'Currency missing from ExchangeRate-API response');
        continue;
      }
      entries.push({
        currency,
        priceInBase: new Decimal(1).div(unitsPerBase),
        fetchedAt,
        source: this.name,
      });
    }

    if (entries.length === 0 && currencies.size > 0) {
      return err(new FetchError('BadResponse', this.name, 'Response contained none of the requested currencies'));
    }

    logger.debug({ count: entries.length }, 'Fetched fiat rates');
    return ok(entries);
  }
}
