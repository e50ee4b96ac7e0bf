/**
 * Application configuration loaded from config/ledger.json
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { FiatCurrency } from './currencies';
import { minutesToMs, secondsToMs } from './time';
import { createChildLogger } from '@/utils/logger';
import { validateLedgerConfig } from '@/validation/ajv_instance';

const logger = createChildLogger('config');

interface RawSourceConfig {
  enabled: boolean;
  base_url?: string;
  max_requests_per_minute?: number;
}

/** Shape of config/ledger.json, see schemas/ledger_config.v1.schema.json */
export interface RawLedgerConfig {
  base_currency: FiatCurrency;
  refresh_interval_minutes: number;
  rate_history_limit?: number;
  stale_rate_policy?: {
    mode: 'off' | 'reject';
    max_age_seconds?: number;
  };
  request?: {
    timeout_ms?: number;
    max_retries?: number;
    initial_backoff_ms?: number;
  };
  sources: {
    exchangerate_api?: RawSourceConfig;
    coingecko?: RawSourceConfig;
  };
  database_path?: string;
}

export type StaleRatePolicy = { mode: 'off' } | { mode: 'reject'; maxAgeMs: number };

export interface SourceConfig {
  enabled: boolean;
  baseUrl: string | null;
  maxRequestsPerMinute: number | null;
}

export interface LedgerConfig {
  baseCurrency: FiatCurrency;
  refreshIntervalMs: number;
  rateHistoryLimit: number;
  staleRatePolicy: StaleRatePolicy;
  request: {
    timeoutMs: number;
    maxRetries: number;
    initialBackoffMs: number;
  };
  sources: {
    exchangeRateApi: SourceConfig;
    coinGecko: SourceConfig;
  };
  databasePath: string;
  projectRoot: string;
}

export const DEFAULT_RATE_HISTORY_LIMIT = 50;

let cachedConfig: LedgerConfig | null = null;

function resolveConfigPath(projectRoot: string): string {
  const envPath = process.env.LEDGER_CONFIG;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'ledger.json');
}

function normalizeSource(raw: RawSourceConfig | undefined): SourceConfig {
  return {
    enabled: raw?.enabled ?? false,
    baseUrl: raw?.base_url ?? null,
    maxRequestsPerMinute: raw?.max_requests_per_minute ?? null,
  };
}

function normalizeStalePolicy(raw: RawLedgerConfig['stale_rate_policy']): StaleRatePolicy {
  if (!raw || raw.mode === 'off') {
    return { mode: 'off' };
  }
  if (raw.max_age_seconds === undefined) {
    throw new Error('stale_rate_policy.max_age_seconds is required when mode is "reject"');
  }
  return { mode: 'reject', maxAgeMs: secondsToMs(raw.max_age_seconds) };
}

export function normalizeConfig(raw: RawLedgerConfig, projectRoot: string): LedgerConfig {
  const databasePath = process.env.LEDGER_DB_PATH || raw.database_path || join('data', 'ledger.db');
  const refreshIntervalMs = minutesToMs(raw.refresh_interval_minutes);
  const staleRatePolicy = normalizeStalePolicy(raw.stale_rate_policy);

  // Rates age past the limit before the next scheduled refresh lands
  if (staleRatePolicy.mode === 'reject' && staleRatePolicy.maxAgeMs <= refreshIntervalMs) {
    logger.warn(
      { maxAgeMs: staleRatePolicy.maxAgeMs, refreshIntervalMs },
      'stale_rate_policy.max_age_seconds does not exceed the refresh interval; trades will be rejected between refreshes'
    );
  }

  return {
    baseCurrency: raw.base_currency,
    refreshIntervalMs,
    rateHistoryLimit: raw.rate_history_limit ?? DEFAULT_RATE_HISTORY_LIMIT,
    staleRatePolicy,
    request: {
      timeoutMs: raw.request?.timeout_ms ?? 10_000,
      maxRetries: raw.request?.max_retries ?? 3,
      initialBackoffMs: raw.request?.initial_backoff_ms ?? 1_000,
    },
    sources: {
      exchangeRateApi: normalizeSource(raw.sources.exchangerate_api),
      coinGecko: normalizeSource(raw.sources.coingecko),
    },
    databasePath:
      databasePath === ':memory:' || isAbsolute(databasePath)
        ? databasePath
        : join(projectRoot, databasePath),
    projectRoot,
  };
}

export function loadConfig(projectRoot: string = process.cwd()): LedgerConfig {
  const configPath = resolveConfigPath(projectRoot);
  if (!existsSync(configPath)) {
    throw new Error(`Ledger config not found: ${configPath}`);
  }

  const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
  const result = validateLedgerConfig(parsed);
  if (!result.valid || !result.data) {
    throw new Error(`Invalid ledger config ${configPath}:\n  ${(result.errors ?? []).join('\n  ')}`);
  }

  return normalizeConfig(result.data, projectRoot);
}

export function getConfig(): LedgerConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
