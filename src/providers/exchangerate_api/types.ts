/**
 * ExchangeRate-API v6 `latest` response
 */

export interface ExchangeRateApiLatestSuccess {
  result: 'success';
  base_code: string;
  time_last_update_unix?: number;
  time_next_update_unix?: number;
  conversion_rates: Record<string, number>;
}

export interface ExchangeRateApiLatestFailure {
  result: 'error';
  'error-type': string;
}

export type ExchangeRateApiLatest = ExchangeRateApiLatestSuccess | ExchangeRateApiLatestFailure;
