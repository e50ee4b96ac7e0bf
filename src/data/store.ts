/**
 * Persistence boundary of the ledger.
 *
 * The service only talks to `LedgerStore`; `SqliteLedgerStore` implements it on
 * top of the better-sqlite3 repositories. Methods are async so another backend
 * can slot in without touching callers.
 */

import type Database from 'better-sqlite3';
import type { Result } from 'neverthrow';
import { DEFAULT_RATE_HISTORY_LIMIT } from '@/core/config';
import type { Portfolio, TradeReceipt, Valuation } from '@/ledger/portfolio';
import type { RateTable } from '@/rates/rate_table';
import { initializeDatabase } from './db';
import {
  commitTrade,
  listPortfolioIds,
  loadPortfolio,
  savePortfolio,
  type TradeCommit,
} from './repositories/portfolio_repo';
import { loadLatestRateTable, loadRateHistory, saveRateTable } from './repositories/rate_repo';
import {
  insertReceipt,
  listReceipts,
  listValuations,
  saveValuation,
  type ValuationSnapshot,
} from './repositories/trade_repo';

export type { TradeCommit, ValuationSnapshot };

export interface LedgerStore {
  loadRateTable(): Promise<RateTable | null>;
  /** Tables older than the latest one, newest first. */
  loadRateHistory(limit: number): Promise<RateTable[]>;
  saveRateTable(table: RateTable): Promise<void>;
  loadPortfolio(userId: string): Promise<Portfolio | null>;
  listPortfolioIds(): Promise<string[]>;
  savePortfolio(portfolio: Portfolio): Promise<void>;
  /**
   * Applies a trade to the stored portfolio and saves it with its receipt as
   * one unit. `apply` sees the latest stored balances; null means no portfolio.
   */
  commitTrade<E>(
    userId: string,
    apply: (portfolio: Portfolio) => Result<TradeReceipt, E>
  ): Promise<TradeCommit<E> | null>;
  appendReceipt(receipt: TradeReceipt): Promise<void>;
  listReceipts(userId: string): Promise<TradeReceipt[]>;
  saveValuation(userId: string, valuation: Valuation): Promise<void>;
  /** Most recent first. */
  listValuations(userId: string, limit?: number): Promise<ValuationSnapshot[]>;
  close(): void;
}

export interface SqliteLedgerStoreOptions {
  /** Rate table versions kept on disk, the latest included. */
  keepRateTables?: number;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly keepRateTables: number;

  /** `dbPath` may be `':memory:'`. */
  constructor(dbPath: string, options: SqliteLedgerStoreOptions = {}) {
    this.db = initializeDatabase(dbPath);
    this.keepRateTables = options.keepRateTables ?? DEFAULT_RATE_HISTORY_LIMIT + 1;
  }

  async loadRateTable(): Promise<RateTable | null> {
    return loadLatestRateTable(this.db);
  }

  async loadRateHistory(limit: number): Promise<RateTable[]> {
    return loadRateHistory(this.db, limit);
  }

  async saveRateTable(table: RateTable): Promise<void> {
    saveRateTable(this.db, table, this.keepRateTables);
  }

  async loadPortfolio(userId: string): Promise<Portfolio | null> {
    return loadPortfolio(this.db, userId);
  }

  async listPortfolioIds(): Promise<string[]> {
    return listPortfolioIds(this.db);
  }

  async savePortfolio(portfolio: Portfolio): Promise<void> {
    savePortfolio(this.db, portfolio);
  }

  async commitTrade<E>(
    userId: string,
    apply: (portfolio: Portfolio) => Result<TradeReceipt, E>
  ): Promise<TradeCommit<E> | null> {
    return commitTrade(this.db, userId, apply);
  }

  async appendReceipt(receipt: TradeReceipt): Promise<void> {
    insertReceipt(this.db, receipt);
  }

  async listReceipts(userId: string): Promise<TradeReceipt[]> {
    return listReceipts(this.db, userId);
  }

  async saveValuation(userId: string, valuation: Valuation): Promise<void> {
    saveValuation(this.db, userId, valuation);
  }

  async listValuations(userId: string, limit?: number): Promise<ValuationSnapshot[]> {
    return listValuations(this.db, userId, limit);
  }

  close(): void {
    this.db.close();
  }
}
