/**
 * Buy / sell / deposit against a portfolio.
 *
 * The engine keeps no state: each call receives the portfolio and the one
 * RateTable snapshot it must price against, and either applies a single
 * wallet swap or returns a TradeError with nothing changed.
 */

import { randomUUID } from 'crypto';
import { err, ok, type Result } from 'neverthrow';
import type Decimal from 'decimal.js';
import type { StaleRatePolicy } from '@/core/config';
import { parseCurrencyCode, type CurrencyCode } from '@/core/currencies';
import { TradeError } from '@/core/errors';
import { ONE, ZERO, isPositive, toAmount, type AmountInput } from '@/core/money';
import { isOlderThan, systemClock, toIsoString, type Clock } from '@/core/time';
import { convertWithTable, crossRate, type RateTable } from '@/rates/rate_table';
import type { BalanceChange, Portfolio, TradeDirection, TradeReceipt } from './portfolio';

export interface TradeEngineOptions {
  staleRatePolicy?: StaleRatePolicy;
  clock?: Clock;
  newId?: () => string;
}

interface PricedTrade {
  currency: CurrencyCode;
  amount: Decimal;
  rate: Decimal;
  baseValue: Decimal;
}

export class TradeEngine {
  private readonly staleRatePolicy: StaleRatePolicy;
  private readonly clock: Clock;
  private readonly newId: () => string;

  constructor(options: TradeEngineOptions = {}) {
    this.staleRatePolicy = options.staleRatePolicy ?? { mode: 'off' };
    this.clock = options.clock ?? systemClock;
    this.newId = options.newId ?? randomUUID;
  }

  buy(
    portfolio: Portfolio,
    currency: string,
    amount: AmountInput,
    table: RateTable
  ): Result<TradeReceipt, TradeError> {
    return this.price(portfolio, currency, amount, table).andThen((trade) => {
      const base = portfolio.baseCurrency;
      const available = portfolio.balance(base);
      if (trade.baseValue.greaterThan(available)) {
        return err(
          TradeError.insufficientFunds(base, available.toString(), trade.baseValue.toString())
        );
      }

      return this.apply(portfolio, 'buy', trade, table, [
        { currency: base, delta: trade.baseValue.negated() },
        { currency: trade.currency, delta: trade.amount },
      ]);
    });
  }

  sell(
    portfolio: Portfolio,
    currency: string,
    amount: AmountInput,
    table: RateTable
  ): Result<TradeReceipt, TradeError> {
    return this.price(portfolio, currency, amount, table).andThen((trade) => {
      const available = portfolio.balance(trade.currency);
      if (trade.amount.greaterThan(available)) {
        return err(
          TradeError.insufficientFunds(trade.currency, available.toString(), trade.amount.toString())
        );
      }

      return this.apply(portfolio, 'sell', trade, table, [
        { currency: trade.currency, delta: trade.amount.negated() },
        { currency: portfolio.baseCurrency, delta: trade.baseValue },
      ]);
    });
  }

  /**
   * Credits a balance without touching the base currency. The receipt records
   * the rate at deposit time when one is available.
   */
  deposit(
    portfolio: Portfolio,
    currency: string,
    amount: AmountInput,
    table: RateTable
  ): Result<TradeReceipt, TradeError> {
    const code = parseCurrencyCode(currency);
    if (!code) return err(TradeError.unknownCurrency(currency));
    const value = toAmount(amount);
    if (!value || !isPositive(value)) return err(TradeError.invalidAmount(String(amount)));

    const rate = crossRate(table, code, portfolio.baseCurrency);
    const trade: PricedTrade = {
      currency: code,
      amount: value,
      rate: code === portfolio.baseCurrency ? ONE : rate.isOk() ? rate.value.rate : ZERO,
      baseValue: ZERO,
    };
    return this.apply(portfolio, 'deposit', trade, table, [{ currency: code, delta: value }]);
  }

  /**
   * Validation shared by buy and sell, all against `table`:
   * amount, currency, base-vs-base, staleness, then the conversion.
   */
  private price(
    portfolio: Portfolio,
    currency: string,
    amount: AmountInput,
    table: RateTable
  ): Result<PricedTrade, TradeError> {
    const value = toAmount(amount);
    if (!value || !isPositive(value)) {
      return err(TradeError.invalidAmount(String(amount)));
    }

    const code = parseCurrencyCode(currency);
    if (!code) {
      return err(TradeError.unknownCurrency(currency));
    }
    if (code === portfolio.baseCurrency) {
      return err(TradeError.sameCurrency(code));
    }

    const policy = this.staleRatePolicy;
    if (policy.mode === 'reject' && isOlderThan(table.asOf, policy.maxAgeMs, this.clock())) {
      return err(TradeError.staleRates(toIsoString(table.asOf), policy.maxAgeMs / 1000));
    }

    const rate = crossRate(table, code, portfolio.baseCurrency);
    const baseValue = convertWithTable(table, value, code, portfolio.baseCurrency);
    if (rate.isErr()) return err(TradeError.unknownCurrency(rate.error.currency));
    if (baseValue.isErr()) return err(TradeError.unknownCurrency(baseValue.error.currency));

    return ok({ currency: code, amount: value, rate: rate.value.rate, baseValue: baseValue.value });
  }

  private apply(
    portfolio: Portfolio,
    direction: TradeDirection,
    trade: PricedTrade,
    table: RateTable,
    changes: BalanceChange[]
  ): Result<TradeReceipt, TradeError> {
    const delta =
      direction === 'buy'
        ? trade.baseValue.negated()
        : direction === 'sell'
          ? trade.baseValue
          : ZERO;

    const receipt: TradeReceipt = Object.freeze({
      id: this.newId(),
      userId: portfolio.userId,
      currency: trade.currency,
      direction,
      amount: trade.amount,
      rateUsed: trade.rate,
      baseCurrency: portfolio.baseCurrency,
      baseCurrencyDelta: delta,
      rateTableVersion: table.version,
      timestamp: this.clock(),
    });

    return portfolio
      .applyTrade(changes, receipt)
      .map(() => receipt)
      .mapErr((shortfall) =>
        TradeError.insufficientFunds(
          shortfall.currency,
          shortfall.available.toString(),
          shortfall.required.toString()
        )
      );
  }
}
