/**
 * Rate table repository: one row per table version plus its entries.
 */

import type Database from 'better-sqlite3';
import { buildRateTable, type RateEntry, type RateEntrySource, type RateTable } from '@/rates/rate_table';
import { createChildLogger } from '@/utils/logger';
import { decodeCurrency, decodeDate, decodeDecimal, encodeDate, CorruptRowError } from './columns';

const logger = createChildLogger('rate_repo');

interface RateTableRow {
  version: number;
  base_currency: string;
  as_of: string;
  created_at: string;
}

interface RateEntryRow {
  currency: string;
  price_in_base: string;
  fetched_at: string;
  source: string;
}

const ENTRY_SOURCES: readonly RateEntrySource[] = ['base', 'exchangerate-api', 'coingecko'];

function decodeSource(value: string): RateEntrySource {
  const source = ENTRY_SOURCES.find((candidate) => candidate === value);
  if (!source) throw new CorruptRowError('rate_entries', 'source', value);
  return source;
}

/** Raised when another writer already stored a table under the same version. */
export class RateVersionConflictError extends Error {
  constructor(readonly version: number) {
    super(`Rate table v${version} is already stored; another process published it first`);
    this.name = 'RateVersionConflictError';
  }
}

/**
 * Inserts `table` and keeps only the newest `keep` versions. Versions are never
 * overwritten: a version that is already stored raises RateVersionConflictError.
 */
export function saveRateTable(db: Database.Database, table: RateTable, keep: number): void {
  const exists = db.prepare('SELECT 1 FROM rate_tables WHERE version = ?');
  const insertTable = db.prepare(`
    INSERT INTO rate_tables (version, base_currency, as_of, created_at)
    VALUES (?, ?, ?, ?)
  `);
  const insertEntry = db.prepare(`
    INSERT INTO rate_entries (version, currency, price_in_base, fetched_at, source)
    VALUES (?, ?, ?, ?, ?)
  `);
  // Entries go with their table through ON DELETE CASCADE
  const prune = db.prepare(`
    DELETE FROM rate_tables
    WHERE version NOT IN (SELECT version FROM rate_tables ORDER BY version DESC LIMIT ?)
  `);

  const tx = db.transaction((t: RateTable): number => {
    if (exists.get(t.version)) {
      throw new RateVersionConflictError(t.version);
    }
    insertTable.run(t.version, t.baseCurrency, encodeDate(t.asOf), encodeDate(t.createdAt));
    for (const entry of t.entries.values()) {
      insertEntry.run(
        t.version,
        entry.currency,
        entry.priceInBase.toString(),
        encodeDate(entry.fetchedAt),
        entry.source
      );
    }
    return prune.run(Math.max(1, keep)).changes;
  });

  const pruned = tx.immediate(table);
  logger.debug({ version: table.version, entries: table.entries.size, pruned }, 'Saved rate table');
}

function hydrate(db: Database.Database, row: RateTableRow): RateTable {
  const rows = db
    .prepare(
      'SELECT currency, price_in_base, fetched_at, source FROM rate_entries WHERE version = ? ORDER BY currency'
    )
    .all(row.version) as RateEntryRow[];

  const entries: RateEntry[] = rows.map((entry) => ({
    currency: decodeCurrency('rate_entries', 'currency', entry.currency),
    priceInBase: decodeDecimal('rate_entries', 'price_in_base', entry.price_in_base),
    fetchedAt: decodeDate('rate_entries', 'fetched_at', entry.fetched_at),
    source: decodeSource(entry.source),
  }));

  return buildRateTable({
    version: row.version,
    baseCurrency: decodeCurrency('rate_tables', 'base_currency', row.base_currency),
    entries,
    createdAt: decodeDate('rate_tables', 'created_at', row.created_at),
  });
}

export function loadLatestRateTable(db: Database.Database): RateTable | null {
  const row = db
    .prepare('SELECT * FROM rate_tables ORDER BY version DESC LIMIT 1')
    .get() as RateTableRow | undefined;
  return row ? hydrate(db, row) : null;
}

/** Every stored table except the latest, newest first. */
export function loadRateHistory(db: Database.Database, limit: number): RateTable[] {
  const rows = db
    .prepare('SELECT * FROM rate_tables ORDER BY version DESC LIMIT ? OFFSET 1')
    .all(limit) as RateTableRow[];
  return rows.map((row) => hydrate(db, row));
}
