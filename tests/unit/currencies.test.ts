import { describe, expect, it } from 'vitest';
import {
  SUPPORTED_CURRENCIES,
  currenciesOfKind,
  formatCurrencyInfo,
  getCurrencyInfo,
  getCurrencyKind,
  parseCurrencyCode,
} from '@/core/currencies';

describe('currency registry', () => {
  it('supports exactly the ten ledger currencies', () => {
    expect([...SUPPORTED_CURRENCIES]).toEqual([
      'USD', 'EUR', 'GBP', 'RUB', 'CNY', 'JPY', 'AED', 'BTC', 'ETH', 'SOL',
    ]);
  });

  it('partitions codes into fiat and crypto', () => {
    expect(currenciesOfKind('crypto')).toEqual(['BTC', 'ETH', 'SOL']);
    expect(currenciesOfKind('fiat')).toHaveLength(7);
    expect(getCurrencyKind('AED')).toBe('fiat');
    expect(getCurrencyKind('SOL')).toBe('crypto');
  });

  it('normalizes input before lookup', () => {
    expect(parseCurrencyCode(' eur ')).toBe('EUR');
    expect(parseCurrencyCode('btc')).toBe('BTC');
    expect(parseCurrencyCode('XYZ')).toBeNull();
    expect(parseCurrencyCode('')).toBeNull();
  });

  it('formats display lines per kind', () => {
    expect(formatCurrencyInfo('EUR')).toBe('[FIAT] EUR — Euro (Issuing: Eurozone)');
    expect(formatCurrencyInfo('BTC')).toBe('[CRYPTO] BTC — Bitcoin (Algo: SHA-256)');
  });

  it('carries CoinGecko ids for crypto', () => {
    const info = getCurrencyInfo('ETH');
    expect(info.kind === 'crypto' ? info.coingeckoId : null).toBe('ethereum');
  });
});
