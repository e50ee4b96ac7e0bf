/**
 * Trade receipts (append-only) and valuation snapshots.
 */

import type Database from 'better-sqlite3';
import type { TradeDirection, TradeReceipt, Valuation } from '@/ledger/portfolio';
import { decodeCurrency, decodeDate, decodeDecimal, encodeDate, CorruptRowError } from './columns';

interface ReceiptRow {
  id: string;
  user_id: string;
  currency: string;
  direction: string;
  amount: string;
  rate_used: string;
  base_currency: string;
  base_currency_delta: string;
  rate_table_version: number;
  timestamp: string;
}

export interface ValuationSnapshot {
  userId: string;
  baseCurrency: string;
  total: string;
  rateTableVersion: number;
  asOf: Date;
  recordedAt: Date;
}

interface ValuationRow {
  user_id: string;
  base_currency: string;
  total: string;
  rate_table_version: number;
  as_of: string;
  recorded_at: string;
}

const DIRECTIONS: readonly TradeDirection[] = ['buy', 'sell', 'deposit'];

function decodeDirection(value: string): TradeDirection {
  const direction = DIRECTIONS.find((candidate) => candidate === value);
  if (!direction) throw new CorruptRowError('trade_receipts', 'direction', value);
  return direction;
}

function toReceipt(row: ReceiptRow): TradeReceipt {
  return Object.freeze({
    id: row.id,
    userId: row.user_id,
    currency: decodeCurrency('trade_receipts', 'currency', row.currency),
    direction: decodeDirection(row.direction),
    amount: decodeDecimal('trade_receipts', 'amount', row.amount),
    rateUsed: decodeDecimal('trade_receipts', 'rate_used', row.rate_used),
    baseCurrency: decodeCurrency('trade_receipts', 'base_currency', row.base_currency),
    baseCurrencyDelta: decodeDecimal('trade_receipts', 'base_currency_delta', row.base_currency_delta),
    rateTableVersion: row.rate_table_version,
    timestamp: decodeDate('trade_receipts', 'timestamp', row.timestamp),
  });
}

export function insertReceipt(db: Database.Database, receipt: TradeReceipt): void {
  db.prepare(`
    INSERT INTO trade_receipts (
      id, user_id, currency, direction, amount, rate_used, base_currency,
      base_currency_delta, rate_table_version, timestamp, seq
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?,
      (SELECT COALESCE(MAX(seq), 0) + 1 FROM trade_receipts WHERE user_id = ?))
  `).run(
    receipt.id,
    receipt.userId,
    receipt.currency,
    receipt.direction,
    receipt.amount.toString(),
    receipt.rateUsed.toString(),
    receipt.baseCurrency,
    receipt.baseCurrencyDelta.toString(),
    receipt.rateTableVersion,
    encodeDate(receipt.timestamp),
    receipt.userId
  );
}

/** Receipts in the order they were appended. */
export function listReceipts(db: Database.Database, userId: string): TradeReceipt[] {
  const rows = db
    .prepare('SELECT * FROM trade_receipts WHERE user_id = ? ORDER BY seq ASC')
    .all(userId) as ReceiptRow[];
  return rows.map(toReceipt);
}

export function saveValuation(
  db: Database.Database,
  userId: string,
  valuation: Valuation,
  recordedAt: Date = new Date()
): void {
  db.prepare(`
    INSERT INTO valuation_snapshots (user_id, base_currency, total, rate_table_version, as_of, recorded_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    userId,
    valuation.baseCurrency,
    valuation.total.toString(),
    valuation.rateTableVersion,
    encodeDate(valuation.asOf),
    encodeDate(recordedAt)
  );
}

export function listValuations(db: Database.Database, userId: string, limit: number = 100): ValuationSnapshot[] {
  const rows = db
    .prepare(
      'SELECT user_id, base_currency, total, rate_table_version, as_of, recorded_at FROM valuation_snapshots WHERE user_id = ? ORDER BY id DESC LIMIT ?'
    )
    .all(userId, limit) as ValuationRow[];

  return rows.map((row) => ({
    userId: row.user_id,
    baseCurrency: row.base_currency,
    total: row.total,
    rateTableVersion: row.rate_table_version,
    asOf: decodeDate('valuation_snapshots', 'as_of', row.as_of),
    recordedAt: decodeDate('valuation_snapshots', 'recorded_at', row.recorded_at),
  }));
}
