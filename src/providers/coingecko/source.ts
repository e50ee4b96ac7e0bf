/**
 * Crypto prices from CoinGecko's keyless `/simple/price` endpoint.
 */

import Decimal from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import {
  getCurrencyInfo,
  isCryptoCurrency,
  type CryptoCurrency,
  type CurrencyCode,
  type FiatCurrency,
} from '@/core/currencies';
import { FetchError } from '@/core/errors';
import { systemClock, type Clock } from '@/core/time';
import type { RateEntry } from '@/rates/rate_table';
import { createChildLogger } from '@/utils/logger';
import { fetchJson } from '../http';
import { RateLimiter } from '../rate_limiter';
import { DEFAULT_REQUEST_OPTIONS, type RateSource, type RequestOptions } from '../types';
import type { CoinGeckoSimplePrice } from './types';

const logger = createChildLogger('coingecko');

export const COINGECKO_SIMPLE_PRICE_URL = 'https://api.coingecko.com/api/v3/simple/price';

export interface CryptoSourceOptions {
  baseCurrency: FiatCurrency;
  baseUrl?: string;
  request?: Partial<RequestOptions>;
  maxRequestsPerMinute?: number;
  clock?: Clock;
}

function coingeckoId(code: CryptoCurrency): string {
  const info = getCurrencyInfo(code);
  return info.kind === 'crypto' ? info.coingeckoId : code.toLowerCase();
}

function isSimplePrice(body: unknown): body is CoinGeckoSimplePrice {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

export class CryptoSource implements RateSource {
  readonly name = 'coingecko' as const;
  readonly kind = 'crypto' as const;

  private readonly baseUrl: string;
  private readonly request: RequestOptions;
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private requestCount = 0;

  constructor(private readonly options: CryptoSourceOptions) {
    this.baseUrl = options.baseUrl ?? COINGECKO_SIMPLE_PRICE_URL;
    this.request = { ...DEFAULT_REQUEST_OPTIONS, ...options.request };
    // Public API allows roughly 10-30 calls per minute without a key
    this.limiter = new RateLimiter(this.name, {
      maxRequestsPerMinute: options.maxRequestsPerMinute ?? 10,
      maxConcurrent: 1,
    });
    this.clock = options.clock ?? systemClock;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async fetch(currencies: ReadonlySet<CurrencyCode>): Promise<Result<RateEntry[], FetchError>> {
    const wanted = [...currencies].filter(isCryptoCurrency);
    if (wanted.length === 0) {
      return ok([]);
    }

    const vsCurrency = this.options.baseCurrency.toLowerCase();
    const url = new URL(this.baseUrl);
    url.searchParams.set('ids', wanted.map(coingeckoId).join(','));
    url.searchParams.set('vs_currencies', vsCurrency);

    this.requestCount++;
    const response = await fetchJson(this.name, url.toString(), this.request, this.limiter);
    if (response.isErr()) {
      return err(response.error);
    }
    if (!isSimplePrice(response.value)) {
      return err(new FetchError('BadResponse', this.name, 'Unexpected response shape'));
    }

    const body = response.value;
    const fetchedAt = this.clock();
    const entries: RateEntry[] = [];
    for (const currency of wanted) {
      const price = body[coingeckoId(currency)]?.[vsCurrency];
      if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
        logger.warn({ currency }, 'Currency missing from CoinGecko response');
        continue;
      }
      entries.push({
        currency,
        priceInBase: new Decimal(price),
        fetchedAt,
        source: this.name,
      });
    }

    if (entries.length === 0) {
      return err(new FetchError('BadResponse', this.name, 'Response contained none of the requested coins'));
    }

    logger.debug({ count: entries.length }, 'Fetched crypto prices');
    return ok(entries);
  }
}
