/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export const MEMORY_DB = ':memory:';

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

/**
 * Opens (creating if needed) the ledger database at `dbPath` and applies the
 * migrations. `':memory:'` gives a private in-memory database.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === MEMORY_DB;
  const isNew = inMemory || !existsSync(dbPath);

  if (!inMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  logger.info({ dbPath, isNew }, 'Initializing database');

  const db = new Database(dbPath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  runMigrations(db);
  return db;
}

function runMigrations(database: Database.Database, migrationsDir: string = MIGRATIONS_DIR): void {
  if (!existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }

  logger.debug('Database migrations complete');
}
