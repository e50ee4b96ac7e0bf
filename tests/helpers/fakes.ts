import Decimal from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { isCryptoCurrency, parseCurrencyCode, type CurrencyCode, type CurrencyKind } from '@/core/currencies';
import { FetchError, type RateSourceName } from '@/core/errors';
import type { Clock } from '@/core/time';
import type { LedgerStore, TradeCommit, ValuationSnapshot } from '@/data/store';
import { Portfolio, type TradeReceipt, type Valuation } from '@/ledger/portfolio';
import type { RateSource } from '@/providers/types';
import { buildRateTable, type RateEntry, type RateTable } from '@/rates/rate_table';

export const T0 = new Date('2026-01-01T00:00:00.000Z');

export function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

/** Clock that only moves when told to. */
export function manualClock(start: Date = T0): Clock & { advance(ms: number): void; set(date: Date): void } {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    advance(ms: number) {
      now = new Date(now.getTime() + ms);
    },
    set(date: Date) {
      now = date;
    },
  });
}

export function entry(
  currency: CurrencyCode,
  price: Decimal.Value,
  fetchedAt: Date = T0,
  source: RateSourceName = isCryptoCurrency(currency) ? 'coingecko' : 'exchangerate-api'
): RateEntry {
  return { currency, priceInBase: new Decimal(price), fetchedAt, source };
}

export function usdTable(prices: Partial<Record<CurrencyCode, Decimal.Value>>, fetchedAt: Date = T0, version = 1): RateTable {
  const entries: RateEntry[] = [];
  for (const [currency, price] of Object.entries(prices)) {
    const code = parseCurrencyCode(currency);
    if (code && price !== undefined) entries.push(entry(code, price, fetchedAt));
  }
  return buildRateTable({ version, baseCurrency: 'USD', entries, createdAt: fetchedAt });
}

type FakeResponse = Result<RateEntry[], FetchError> | Error;

/**
 * RateSource whose answers are scripted per call. Once the script runs out the
 * last answer repeats.
 */
export class FakeSource implements RateSource {
  readonly requested: Array<ReadonlySet<CurrencyCode>> = [];
  private calls = 0;
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  constructor(
    readonly name: RateSourceName,
    readonly kind: CurrencyKind,
    private readonly script: FakeResponse[]
  ) {}

  static succeeding(name: RateSourceName, kind: CurrencyKind, entries: RateEntry[]): FakeSource {
    return new FakeSource(name, kind, [ok(entries)]);
  }

  static failing(
    name: RateSourceName,
    kind: CurrencyKind,
    errorKind: FetchError['kind'] = 'Timeout'
  ): FakeSource {
    return new FakeSource(name, kind, [err(new FetchError(errorKind, name, 'scripted failure'))]);
  }

  /** Holds every fetch until `release()` is called. */
  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  getRequestCount(): number {
    return this.calls;
  }

  async fetch(currencies: ReadonlySet<CurrencyCode>): Promise<Result<RateEntry[], FetchError>> {
    this.requested.push(currencies);
    const index = Math.min(this.calls, this.script.length - 1);
    this.calls += 1;
    if (this.gate) await this.gate;

    const answer = this.script[index];
    if (answer === undefined) throw new Error('FakeSource has an empty script');
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

// Stored copies keep later in-memory changes out of the store
function copyPortfolio(portfolio: Portfolio): Portfolio {
  return new Portfolio({
    userId: portfolio.userId,
    baseCurrency: portfolio.baseCurrency,
    balances: portfolio.balances(),
    trades: portfolio.tradeHistory(),
    createdAt: portfolio.createdAt,
    updatedAt: portfolio.updatedAt,
  });
}

/** LedgerStore kept in memory; `failWrites` makes every write reject. */
export class MemoryLedgerStore implements LedgerStore {
  tables: RateTable[] = [];
  portfolios = new Map<string, Portfolio>();
  receipts: TradeReceipt[] = [];
  valuations: ValuationSnapshot[] = [];
  failWrites = false;

  private checkWrite(): void {
    if (this.failWrites) throw new Error('disk full');
  }

  async loadRateTable(): Promise<RateTable | null> {
    return this.tables[this.tables.length - 1] ?? null;
  }

  async loadRateHistory(limit: number): Promise<RateTable[]> {
    return this.tables.slice(0, -1).reverse().slice(0, limit);
  }

  async saveRateTable(table: RateTable): Promise<void> {
    this.checkWrite();
    this.tables.push(table);
  }

  async loadPortfolio(userId: string): Promise<Portfolio | null> {
    return this.portfolios.get(userId) ?? null;
  }

  async listPortfolioIds(): Promise<string[]> {
    return [...this.portfolios.keys()].sort();
  }

  async savePortfolio(portfolio: Portfolio): Promise<void> {
    this.checkWrite();
    this.portfolios.set(portfolio.userId, copyPortfolio(portfolio));
  }

  async commitTrade<E>(
    userId: string,
    apply: (portfolio: Portfolio) => Result<TradeReceipt, E>
  ): Promise<TradeCommit<E> | null> {
    const stored = this.portfolios.get(userId);
    if (!stored) return null;

    const working = copyPortfolio(stored);
    const applied = apply(working);
    if (applied.isErr()) return err(applied.error);

    this.checkWrite();
    this.portfolios.set(userId, copyPortfolio(working));
    this.receipts.push(applied.value);
    return ok({ portfolio: working, receipt: applied.value });
  }

  async appendReceipt(receipt: TradeReceipt): Promise<void> {
    this.checkWrite();
    this.receipts.push(receipt);
  }

  async listReceipts(userId: string): Promise<TradeReceipt[]> {
    return this.receipts.filter((receipt) => receipt.userId === userId);
  }

  async saveValuation(userId: string, valuation: Valuation): Promise<void> {
    this.checkWrite();
    this.valuations.push({
      userId,
      baseCurrency: valuation.baseCurrency,
      total: valuation.total.toString(),
      rateTableVersion: valuation.rateTableVersion,
      asOf: valuation.asOf,
      recordedAt: valuation.asOf,
    });
  }

  async listValuations(userId: string, limit = 100): Promise<ValuationSnapshot[]> {
    return this.valuations.filter((v) => v.userId === userId).reverse().slice(0, limit);
  }

  close(): void {}
}
