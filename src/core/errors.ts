/**
 * Error taxonomy for the ledger core.
 *
 * Operations return these inside a neverthrow `Result`; `kind` is the
 * discriminator callers switch on, `message` is safe to show to a user.
 */

import type { CurrencyCode } from './currencies';

export type RateSourceName = 'exchangerate-api' | 'coingecko';

export abstract class LedgerError extends Error {
  abstract readonly kind: string;
}

export type FetchErrorKind = 'Timeout' | 'BadResponse' | 'RateLimited';

export class FetchError extends LedgerError {
  constructor(
    public readonly kind: FetchErrorKind,
    public readonly source: RateSourceName,
    message: string,
    public readonly cause?: Error
  ) {
    super(`${source}: ${message}`);
    this.name = 'FetchError';
  }
}

export class RefreshError extends LedgerError {
  readonly kind = 'AllSourcesFailed' as const;

  constructor(public readonly failures: readonly FetchError[]) {
    super(
      failures.length === 0
        ? 'Rate refresh failed: no rate sources configured'
        : `Rate refresh failed: ${failures.map((f) => f.message).join('; ')}`
    );
    this.name = 'RefreshError';
  }
}

export class ConversionError extends LedgerError {
  readonly kind = 'UnknownCurrency' as const;

  constructor(public readonly currency: string) {
    super(`No exchange rate available for '${currency}'`);
    this.name = 'ConversionError';
  }
}

export type TradeErrorKind =
  | 'InvalidAmount'
  | 'InsufficientFunds'
  | 'UnknownCurrency'
  | 'StaleRates'
  | 'SameCurrency';

export class TradeError extends LedgerError {
  private constructor(
    public readonly kind: TradeErrorKind,
    message: string,
    public readonly details: Record<string, string> = {}
  ) {
    super(message);
    this.name = 'TradeError';
  }

  static invalidAmount(amount: string): TradeError {
    return new TradeError('InvalidAmount', `Amount must be a positive number, got '${amount}'`, {
      amount,
    });
  }

  static insufficientFunds(currency: CurrencyCode, available: string, required: string): TradeError {
    return new TradeError(
      'InsufficientFunds',
      `Insufficient funds: available ${available} ${currency}, required ${required} ${currency}`,
      { currency, available, required }
    );
  }

  static unknownCurrency(currency: string): TradeError {
    return new TradeError('UnknownCurrency', `Unknown or unpriced currency '${currency}'`, {
      currency,
    });
  }

  static staleRates(asOf: string, maxAgeSeconds: number): TradeError {
    return new TradeError(
      'StaleRates',
      `Exchange rates as of ${asOf} are older than ${maxAgeSeconds}s; refresh rates and retry`,
      { asOf, maxAgeSeconds: String(maxAgeSeconds) }
    );
  }

  static sameCurrency(currency: CurrencyCode): TradeError {
    return new TradeError(
      'SameCurrency',
      `${currency} is the portfolio base currency and cannot be traded against itself`,
      { currency }
    );
  }
}

export type PortfolioErrorKind = 'PortfolioNotFound' | 'PortfolioExists';

export class PortfolioError extends LedgerError {
  constructor(
    public readonly kind: PortfolioErrorKind,
    public readonly userId: string
  ) {
    super(
      kind === 'PortfolioNotFound'
        ? `No portfolio for user '${userId}'`
        : `User '${userId}' already has a portfolio`
    );
    this.name = 'PortfolioError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
