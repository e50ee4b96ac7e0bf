/**
 * Supported currencies. The set is closed: every code entering the ledger is
 * checked against it.
 */

export const FIAT_CURRENCIES = ['USD', 'EUR', 'GBP', 'RUB', 'CNY', 'JPY', 'AED'] as const;
export const CRYPTO_CURRENCIES = ['BTC', 'ETH', 'SOL'] as const;
export const SUPPORTED_CURRENCIES = [...FIAT_CURRENCIES, ...CRYPTO_CURRENCIES] as const;

export type FiatCurrency = (typeof FIAT_CURRENCIES)[number];
export type CryptoCurrency = (typeof CRYPTO_CURRENCIES)[number];
export type CurrencyCode = FiatCurrency | CryptoCurrency;
export type CurrencyKind = 'fiat' | 'crypto';

interface FiatInfo {
  kind: 'fiat';
  code: FiatCurrency;
  name: string;
  issuingCountry: string;
}

interface CryptoInfo {
  kind: 'crypto';
  code: CryptoCurrency;
  name: string;
  algorithm: string;
  coingeckoId: string;
}

export type CurrencyInfo = FiatInfo | CryptoInfo;

const FIAT_INFO: Record<FiatCurrency, FiatInfo> = {
  USD: { kind: 'fiat', code: 'USD', name: 'US Dollar', issuingCountry: 'United States' },
  EUR: { kind: 'fiat', code: 'EUR', name: 'Euro', issuingCountry: 'Eurozone' },
  GBP: { kind: 'fiat', code: 'GBP', name: 'British Pound', issuingCountry: 'United Kingdom' },
  RUB: { kind: 'fiat', code: 'RUB', name: 'Russian Ruble', issuingCountry: 'Russia' },
  CNY: { kind: 'fiat', code: 'CNY', name: 'Chinese Yuan', issuingCountry: 'China' },
  JPY: { kind: 'fiat', code: 'JPY', name: 'Japanese Yen', issuingCountry: 'Japan' },
  AED: { kind: 'fiat', code: 'AED', name: 'UAE Dirham', issuingCountry: 'United Arab Emirates' },
};

const CRYPTO_INFO: Record<CryptoCurrency, CryptoInfo> = {
  BTC: { kind: 'crypto', code: 'BTC', name: 'Bitcoin', algorithm: 'SHA-256', coingeckoId: 'bitcoin' },
  ETH: { kind: 'crypto', code: 'ETH', name: 'Ethereum', algorithm: 'Proof of Stake', coingeckoId: 'ethereum' },
  SOL: { kind: 'crypto', code: 'SOL', name: 'Solana', algorithm: 'Proof of History', coingeckoId: 'solana' },
};

export function isFiatCurrency(code: string): code is FiatCurrency {
  return FIAT_CURRENCIES.some((candidate) => candidate === code);
}

export function isCryptoCurrency(code: string): code is CryptoCurrency {
  return CRYPTO_CURRENCIES.some((candidate) => candidate === code);
}

export function isCurrencyCode(code: string): code is CurrencyCode {
  return isFiatCurrency(code) || isCryptoCurrency(code);
}

/**
 * Normalizes user input (" eur " -> "EUR") and returns the code when supported.
 */
export function parseCurrencyCode(raw: string): CurrencyCode | null {
  const normalized = raw.trim().toUpperCase();
  return isCurrencyCode(normalized) ? normalized : null;
}

export function getCurrencyInfo(code: CurrencyCode): CurrencyInfo {
  return isFiatCurrency(code) ? FIAT_INFO[code] : CRYPTO_INFO[code];
}

export function getCurrencyKind(code: CurrencyCode): CurrencyKind {
  return getCurrencyInfo(code).kind;
}

export function currenciesOfKind(kind: CurrencyKind): readonly CurrencyCode[] {
  return kind === 'fiat' ? FIAT_CURRENCIES : CRYPTO_CURRENCIES;
}

export function formatCurrencyInfo(code: CurrencyCode): string {
  const info = getCurrencyInfo(code);
  if (info.kind === 'fiat') {
    return `[FIAT] ${info.code} — ${info.name} (Issuing: ${info.issuingCountry})`;
  }
  return `[CRYPTO] ${info.code} — ${info.name} (Algo: ${info.algorithm})`;
}
