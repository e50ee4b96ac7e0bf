/**
 * Portfolio repository: the portfolio row plus one row per non-zero balance.
 */

import type Database from 'better-sqlite3';
import type Decimal from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import type { CurrencyCode } from '@/core/currencies';
import { Portfolio, type TradeReceipt } from '@/ledger/portfolio';
import { createChildLogger } from '@/utils/logger';
import { decodeCurrency, decodeDate, decodeDecimal, encodeDate } from './columns';
import { insertReceipt, listReceipts } from './trade_repo';

const logger = createChildLogger('portfolio_repo');

interface PortfolioRow {
  user_id: string;
  base_currency: string;
  created_at: string;
  updated_at: string;
}

interface BalanceRow {
  currency: string;
  balance: string;
}

export type TradeCommit<E> = Result<{ portfolio: Portfolio; receipt: TradeReceipt }, E>;

export function savePortfolio(db: Database.Database, portfolio: Portfolio): void {
  const upsert = db.prepare(`
    INSERT INTO portfolios (user_id, base_currency, created_at, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(user_id) DO UPDATE SET
      base_currency = excluded.base_currency,
      updated_at = excluded.updated_at
  `);
  const clearBalances = db.prepare('DELETE FROM wallet_balances WHERE user_id = ?');
  const insertBalance = db.prepare(
    'INSERT INTO wallet_balances (user_id, currency, balance) VALUES (?, ?, ?)'
  );

  const tx = db.transaction((p: Portfolio) => {
    upsert.run(p.userId, p.baseCurrency, encodeDate(p.createdAt), encodeDate(p.updatedAt));
    clearBalances.run(p.userId);
    for (const [currency, balance] of p.balances()) {
      insertBalance.run(p.userId, currency, balance.toString());
    }
  });

  tx(portfolio);
  logger.debug({ userId: portfolio.userId, balances: portfolio.balances().size }, 'Saved portfolio');
}

export function loadPortfolio(db: Database.Database, userId: string): Portfolio | null {
  const row = db
    .prepare('SELECT * FROM portfolios WHERE user_id = ?')
    .get(userId) as PortfolioRow | undefined;
  if (!row) return null;

  const balanceRows = db
    .prepare('SELECT currency, balance FROM wallet_balances WHERE user_id = ? ORDER BY currency')
    .all(userId) as BalanceRow[];
  const balances: Array<[CurrencyCode, Decimal]> = balanceRows.map((b) => [
    decodeCurrency('wallet_balances', 'currency', b.currency),
    decodeDecimal('wallet_balances', 'balance', b.balance),
  ]);

  return new Portfolio({
    userId: row.user_id,
    baseCurrency: decodeCurrency('portfolios', 'base_currency', row.base_currency),
    balances,
    trades: listReceipts(db, userId),
    createdAt: decodeDate('portfolios', 'created_at', row.created_at),
    updatedAt: decodeDate('portfolios', 'updated_at', row.updated_at),
  });
}

export function listPortfolioIds(db: Database.Database): string[] {
  const rows = db.prepare('SELECT user_id FROM portfolios ORDER BY user_id').all() as Array<{ user_id: string }>;
  return rows.map((row) => row.user_id);
}

/**
 * Reloads the stored portfolio, runs `apply` on it and writes the balances and
 * the receipt in one IMMEDIATE transaction. Writers in other processes queue
 * behind the write lock, so each trade starts from the balances the previous
 * one left. Returns null when the user has no portfolio; a rejected trade
 * writes nothing.
 */
export function commitTrade<E>(
  db: Database.Database,
  userId: string,
  apply: (portfolio: Portfolio) => Result<TradeReceipt, E>
): TradeCommit<E> | null {
  const tx = db.transaction((): TradeCommit<E> | null => {
    const portfolio = loadPortfolio(db, userId);
    if (!portfolio) return null;

    const applied = apply(portfolio);
    if (applied.isErr()) return err(applied.error);

    savePortfolio(db, portfolio);
    insertReceipt(db, applied.value);
    return ok({ portfolio, receipt: applied.value });
  });
  return tx.immediate();
}
