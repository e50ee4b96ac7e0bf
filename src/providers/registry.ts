import type { LedgerConfig } from '@/core/config';
import { getEnvConfig, requireExchangeRateApiKey, type EnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';
import { CryptoSource } from './coingecko/source';
import { FiatSource } from './exchangerate_api/source';
import type { RateSource } from './types';

const logger = createChildLogger('registry');

/**
 * Create the enabled rate sources from configuration.
 *
 * Adding a provider means adding a RateSource implementation and a case here;
 * the cache only sees the interface.
 */
export function createRateSources(
  config: LedgerConfig,
  env: EnvConfig = getEnvConfig()
): RateSource[] {
  const sources: RateSource[] = [];
  const { exchangeRateApi, coinGecko } = config.sources;

  if (exchangeRateApi.enabled) {
    sources.push(
      new FiatSource({
        apiKey: requireExchangeRateApiKey(env),
        baseCurrency: config.baseCurrency,
        baseUrl: exchangeRateApi.baseUrl ?? undefined,
        maxRequestsPerMinute: exchangeRateApi.maxRequestsPerMinute ?? undefined,
        request: config.request,
      })
    );
  }

  if (coinGecko.enabled) {
    sources.push(
      new CryptoSource({
        baseCurrency: config.baseCurrency,
        baseUrl: coinGecko.baseUrl ?? undefined,
        maxRequestsPerMinute: coinGecko.maxRequestsPerMinute ?? undefined,
        request: config.request,
      })
    );
  }

  if (sources.length === 0) {
    logger.warn('No rate sources enabled; refreshes will always fail');
  }

  return sources;
}
