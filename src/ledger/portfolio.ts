/**
 * Per-user balances and their valuation.
 *
 * The wallet is a frozen map replaced as a whole by `applyTrade`, which checks
 * every debit before anything is written; a reader holding the old map never
 * sees half of a trade.
 */

import { err, ok, type Result } from 'neverthrow';
import type Decimal from 'decimal.js';
import type { CurrencyCode } from '@/core/currencies';
import type { ConversionError } from '@/core/errors';
import { ZERO, type Amount } from '@/core/money';
import { convertWithTable, crossRate, type RateTable } from '@/rates/rate_table';

export type TradeDirection = 'buy' | 'sell' | 'deposit';

export interface TradeReceipt {
  readonly id: string;
  readonly userId: string;
  readonly currency: CurrencyCode;
  readonly direction: TradeDirection;
  readonly amount: Decimal;
  /** Units of base currency per one unit of `currency`. */
  readonly rateUsed: Decimal;
  readonly baseCurrency: CurrencyCode;
  /** Signed change of the base-currency balance. */
  readonly baseCurrencyDelta: Decimal;
  readonly rateTableVersion: number;
  readonly timestamp: Date;
}

export type Wallet = ReadonlyMap<CurrencyCode, Decimal>;

export interface BalanceChange {
  currency: CurrencyCode;
  /** Positive credits, negative debits. */
  delta: Decimal;
}

export interface ValuationLine {
  currency: CurrencyCode;
  balance: Decimal;
  rate: Decimal;
  value: Decimal;
}

export interface Valuation {
  baseCurrency: CurrencyCode;
  total: Decimal;
  lines: ValuationLine[];
  rateTableVersion: number;
  asOf: Date;
}

export interface PortfolioState {
  userId: string;
  baseCurrency: CurrencyCode;
  balances: Iterable<[CurrencyCode, Decimal]>;
  trades?: readonly TradeReceipt[];
  createdAt: Date;
  updatedAt: Date;
}

function freezeWallet(balances: Iterable<[CurrencyCode, Decimal]>): Wallet {
  const wallet = new Map<CurrencyCode, Decimal>();
  for (const [currency, balance] of balances) {
    if (balance.isNegative()) {
      throw new Error(`Negative balance for ${currency}: ${balance.toString()}`);
    }
    if (!balance.isZero()) {
      wallet.set(currency, balance);
    }
  }
  return wallet;
}

export class Portfolio {
  readonly userId: string;
  readonly baseCurrency: CurrencyCode;
  readonly createdAt: Date;
  private wallet: Wallet;
  private trades: readonly TradeReceipt[];
  private lastUpdated: Date;

  constructor(state: PortfolioState) {
    this.userId = state.userId;
    this.baseCurrency = state.baseCurrency;
    this.createdAt = state.createdAt;
    this.wallet = freezeWallet(state.balances);
    this.trades = Object.freeze([...(state.trades ?? [])]);
    this.lastUpdated = state.updatedAt;
  }

  static create(userId: string, baseCurrency: CurrencyCode, seed: Amount = ZERO, now: Date = new Date()): Portfolio {
    return new Portfolio({
      userId,
      baseCurrency,
      balances: seed.isZero() ? [] : [[baseCurrency, seed]],
      createdAt: now,
      updatedAt: now,
    });
  }

  get updatedAt(): Date {
    return this.lastUpdated;
  }

  balance(currency: CurrencyCode): Decimal {
    return this.wallet.get(currency) ?? ZERO;
  }

  /** Current wallet snapshot; only currencies with a non-zero balance. */
  balances(): Wallet {
    return this.wallet;
  }

  tradeHistory(): readonly TradeReceipt[] {
    return this.trades;
  }

  /**
   * Applies all balance changes and appends the receipt in one step. Returns
   * the currency that would go negative instead of changing anything.
   */
  applyTrade(
    changes: readonly BalanceChange[],
    receipt: TradeReceipt
  ): Result<void, { currency: CurrencyCode; available: Decimal; required: Decimal }> {
    const next = new Map<CurrencyCode, Decimal>(this.wallet);
    for (const { currency, delta } of changes) {
      const updated = (next.get(currency) ?? ZERO).plus(delta);
      if (updated.isNegative()) {
        return err({ currency, available: this.balance(currency), required: delta.negated() });
      }
      next.set(currency, updated);
    }

    this.wallet = freezeWallet(next);
    this.trades = Object.freeze([...this.trades, receipt]);
    this.lastUpdated = receipt.timestamp;
    return ok(undefined);
  }

  /**
   * Per-currency value lines in `baseCurrency` against one table. The first
   * currency without a rate fails the whole valuation.
   */
  valuationBreakdown(
    table: RateTable,
    baseCurrency: CurrencyCode = this.baseCurrency
  ): Result<Valuation, ConversionError> {
    const lines: ValuationLine[] = [];
    let total: Decimal = ZERO;

    const held = [...this.wallet.entries()].sort(([a], [b]) => a.localeCompare(b));
    for (const [currency, balance] of held) {
      if (balance.isZero()) continue;
      const value = convertWithTable(table, balance, currency, baseCurrency);
      if (value.isErr()) return err(value.error);
      const rate = crossRate(table, currency, baseCurrency);
      if (rate.isErr()) return err(rate.error);

      lines.push({ currency, balance, rate: rate.value.rate, value: value.value });
      total = total.plus(value.value);
    }

    return ok({
      baseCurrency,
      total,
      lines,
      rateTableVersion: table.version,
      asOf: table.asOf,
    });
  }

  valuate(table: RateTable, baseCurrency: CurrencyCode = this.baseCurrency): Result<Decimal, ConversionError> {
    return this.valuationBreakdown(table, baseCurrency).map((valuation) => valuation.total);
  }
}
