/**
 * Command surface of the ledger.
 *
 * Owns the rate cache, the single-flight refresher and the portfolios loaded so
 * far. A trade runs inside the store against the latest stored balances, so
 * several processes sharing one database never lose each other's trades. When
 * the store cannot take the write, the trade is applied to the in-memory copy
 * and the failure is reported on the confirmation. Commands for one user are
 * serialized in-process; different users run concurrently.
 */

import { err, ok, type Result } from 'neverthrow';
import type { LedgerConfig } from '@/core/config';
import { parseCurrencyCode, type CurrencyCode } from '@/core/currencies';
import {
  ConversionError,
  PortfolioError,
  TradeError,
  toError,
  type RefreshError,
} from '@/core/errors';
import { ZERO, toAmount, type AmountInput } from '@/core/money';
import { systemClock, type Clock } from '@/core/time';
import type { LedgerStore, TradeCommit, ValuationSnapshot } from '@/data/store';
import { Portfolio, type TradeReceipt, type Valuation, type Wallet } from '@/ledger/portfolio';
import { TradeEngine } from '@/ledger/trade_engine';
import type { RateSource } from '@/providers/types';
import { RateCache, type RateSummary } from '@/rates/rate_cache';
import { RateRefresher, type RefreshOutcome } from '@/rates/rate_refresher';
import type { CrossRate, RateTable } from '@/rates/rate_table';
import { withActionLog } from '@/utils/action_log';
import { KeyedMutex } from '@/utils/keyed_mutex';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('ledger_service');

export type LedgerServiceConfig = Pick<
  LedgerConfig,
  'baseCurrency' | 'rateHistoryLimit' | 'staleRatePolicy'
>;

export interface LedgerServiceOptions {
  config: LedgerServiceConfig;
  sources: readonly RateSource[];
  store: LedgerStore;
  clock?: Clock;
  newId?: () => string;
}

export interface TradeConfirmation {
  receipt: TradeReceipt;
  balances: Wallet;
  persistError: Error | null;
}

export interface CreatePortfolioOptions {
  baseCurrency?: string;
  seedAmount?: AmountInput;
}

type TradeKind = TradeReceipt['direction'];
type TradeResult = Result<TradeConfirmation, TradeError | PortfolioError>;
type ApplyTrade = (portfolio: Portfolio) => Result<TradeReceipt, TradeError>;

export class LedgerService {
  readonly cache: RateCache;
  readonly refresher: RateRefresher;
  private readonly engine: TradeEngine;
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly portfolios = new Map<string, Portfolio>();
  private readonly locks = new KeyedMutex();

  constructor(private readonly options: LedgerServiceOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.cache = new RateCache({
      baseCurrency: options.config.baseCurrency,
      historyLimit: options.config.rateHistoryLimit,
      clock: this.clock,
    });
    this.refresher = new RateRefresher({
      cache: this.cache,
      sources: options.sources,
      store: this.store,
      onRefreshed: (table) => this.recordValuations(table),
    });
    this.engine = new TradeEngine({
      staleRatePolicy: options.config.staleRatePolicy,
      clock: this.clock,
      newId: options.newId,
    });
  }

  /** Creates the service and installs the last persisted rate tables. */
  static async open(options: LedgerServiceOptions): Promise<LedgerService> {
    const service = new LedgerService(options);
    await service.restoreRates();
    return service;
  }

  async restoreRates(): Promise<boolean> {
    const latest = await this.store.loadRateTable();
    if (!latest) {
      logger.info('No persisted rate table; starting from base-only table');
      return false;
    }
    const history = await this.store.loadRateHistory(this.options.config.rateHistoryLimit);
    const restored = this.cache.restore(latest, history);
    if (restored) {
      logger.info({ version: latest.version, history: history.length }, 'Restored rate table');
    }
    return restored;
  }

  refreshRates(): Promise<Result<RefreshOutcome, RefreshError>> {
    return withActionLog('refresh', {}, () => this.refresher.refresh());
  }

  /** Re-publishes the previous rate table and persists it. */
  async rollbackRates(): Promise<RefreshOutcome | null> {
    const table = this.cache.rollback();
    if (!table) return null;
    return { table, persistError: await this.persist(() => this.store.saveRateTable(table)) };
  }

  rateSummary(): RateSummary {
    return this.cache.summary();
  }

  getRate(from: string, to: string): Result<CrossRate, ConversionError> {
    const fromCode = parseCurrencyCode(from);
    if (!fromCode) return err(new ConversionError(from));
    const toCode = parseCurrencyCode(to);
    if (!toCode) return err(new ConversionError(to));
    return this.cache.rate(fromCode, toCode);
  }

  createPortfolio(
    userId: string,
    options: CreatePortfolioOptions = {}
  ): Promise<Result<Portfolio, PortfolioError | TradeError>> {
    return withActionLog('create', { userId }, () =>
      this.locks.runExclusive(userId, async (): Promise<Result<Portfolio, PortfolioError | TradeError>> => {
        const rawBase = options.baseCurrency ?? this.cache.baseCurrency;
        const baseCurrency = parseCurrencyCode(rawBase);
        if (!baseCurrency) return err(TradeError.unknownCurrency(rawBase));

        const seed = toAmount(options.seedAmount ?? ZERO);
        if (!seed || seed.isNegative()) {
          return err(TradeError.invalidAmount(String(options.seedAmount)));
        }

        if (await this.findPortfolio(userId)) {
          return err(new PortfolioError('PortfolioExists', userId));
        }

        const portfolio = Portfolio.create(userId, baseCurrency, seed, this.clock());
        this.portfolios.set(userId, portfolio);
        await this.persist(() => this.store.savePortfolio(portfolio));
        return ok(portfolio);
      })
    );
  }

  async getPortfolio(userId: string): Promise<Result<Portfolio, PortfolioError>> {
    const portfolio = await this.findPortfolio(userId);
    return portfolio ? ok(portfolio) : err(new PortfolioError('PortfolioNotFound', userId));
  }

  async listTrades(userId: string): Promise<Result<readonly TradeReceipt[], PortfolioError>> {
    const portfolio = await this.getPortfolio(userId);
    return portfolio.map((p) => p.tradeHistory());
  }

  /** Values the whole wallet against the current table in one pass. */
  async getPortfolioValue(
    userId: string,
    baseCurrency?: string
  ): Promise<Result<Valuation, PortfolioError | ConversionError>> {
    const found = await this.getPortfolio(userId);
    if (found.isErr()) return err(found.error);
    const portfolio = found.value;

    let base: CurrencyCode = portfolio.baseCurrency;
    if (baseCurrency !== undefined) {
      const parsed = parseCurrencyCode(baseCurrency);
      if (!parsed) return err(new ConversionError(baseCurrency));
      base = parsed;
    }

    return portfolio.valuationBreakdown(this.cache.current(), base);
  }

  /** Valuation snapshots recorded after refreshes, newest first. */
  async listValuations(
    userId: string,
    limit?: number
  ): Promise<Result<ValuationSnapshot[], PortfolioError>> {
    const found = await this.getPortfolio(userId);
    if (found.isErr()) return err(found.error);
    return ok(await this.store.listValuations(userId, limit));
  }

  buy(userId: string, currency: string, amount: AmountInput): Promise<TradeResult> {
    return this.trade('buy', userId, currency, amount);
  }

  sell(userId: string, currency: string, amount: AmountInput): Promise<TradeResult> {
    return this.trade('sell', userId, currency, amount);
  }

  deposit(userId: string, currency: string, amount: AmountInput): Promise<TradeResult> {
    return this.trade('deposit', userId, currency, amount);
  }

  private trade(
    kind: TradeKind,
    userId: string,
    currency: string,
    amount: AmountInput
  ): Promise<TradeResult> {
    return withActionLog(kind, { userId, currency, amount: String(amount) }, () =>
      this.locks.runExclusive(userId, async (): Promise<TradeResult> => {
        // One snapshot for the whole trade
        const table = this.cache.current();
        const apply: ApplyTrade = (portfolio) => this.execute(kind, portfolio, currency, amount, table);

        let committed: TradeCommit<TradeError> | null;
        try {
          committed = await this.store.commitTrade(userId, apply);
        } catch (error) {
          const cause = toError(error);
          logger.error({ userId, error: cause.message }, 'Trade not stored; applying to in-memory portfolio');
          return this.tradeInMemory(userId, apply, cause);
        }

        if (!committed) {
          // Known here but never stored, e.g. its creation could not be saved
          return this.tradeInMemory(userId, apply, null);
        }
        if (committed.isErr()) return err(committed.error);

        const { portfolio, receipt } = committed.value;
        this.portfolios.set(userId, portfolio);
        return ok({ receipt, balances: portfolio.balances(), persistError: null });
      })
    );
  }

  private async tradeInMemory(userId: string, apply: ApplyTrade, storeError: Error | null): Promise<TradeResult> {
    const portfolio = this.portfolios.get(userId);
    if (!portfolio) {
      if (storeError) throw storeError;
      return err(new PortfolioError('PortfolioNotFound', userId));
    }

    const result = apply(portfolio);
    if (result.isErr()) return err(result.error);

    const receipt = result.value;
    const persistError =
      storeError ??
      (await this.persist(async () => {
        await this.store.savePortfolio(portfolio);
        await this.store.appendReceipt(receipt);
      }));
    return ok({ receipt, balances: portfolio.balances(), persistError });
  }

  private execute(
    kind: TradeKind,
    portfolio: Portfolio,
    currency: string,
    amount: AmountInput,
    table: RateTable
  ): Result<TradeReceipt, TradeError> {
    switch (kind) {
      case 'buy':
        return this.engine.buy(portfolio, currency, amount, table);
      case 'sell':
        return this.engine.sell(portfolio, currency, amount, table);
      case 'deposit':
        return this.engine.deposit(portfolio, currency, amount, table);
    }
  }

  private async findPortfolio(userId: string): Promise<Portfolio | null> {
    const cached = this.portfolios.get(userId);
    if (cached) return cached;

    const loaded = await this.store.loadPortfolio(userId);
    if (loaded) {
      this.portfolios.set(userId, loaded);
    }
    return loaded;
  }

  private async persist(write: () => Promise<void>): Promise<Error | null> {
    try {
      await write();
      return null;
    } catch (error) {
      const cause = toError(error);
      logger.error({ error: cause.message }, 'Persistence failed; in-memory state kept');
      return cause;
    }
  }

  /** Snapshots every stored portfolio, plus any only held in memory. */
  private async recordValuations(table: RateTable): Promise<void> {
    const userIds = new Set([...(await this.store.listPortfolioIds()), ...this.portfolios.keys()]);
    for (const userId of userIds) {
      const portfolio = (await this.store.loadPortfolio(userId)) ?? this.portfolios.get(userId);
      if (!portfolio) continue;

      const valuation = portfolio.valuationBreakdown(table);
      if (valuation.isErr()) {
        logger.warn(
          { userId: portfolio.userId, currency: valuation.error.currency },
          'Skipping valuation snapshot'
        );
        continue;
      }
      await this.persist(() => this.store.saveValuation(portfolio.userId, valuation.value));
    }
  }
}
