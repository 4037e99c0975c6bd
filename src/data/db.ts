/**
 * SQLite price cache initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export type SqliteDatabase = Database.Database;

let db: SqliteDatabase | null = null;

export function getDefaultDbPath(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'data', 'price_cache.db');
}

function ensureSchema(database: SqliteDatabase): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS cache_meta (
      key TEXT PRIMARY KEY,
      last_updated INTEGER NOT NULL,
      ttl_seconds INTEGER NOT NULL,
      hit_count INTEGER DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS prices_eod (
      symbol TEXT NOT NULL,
      date TEXT NOT NULL,
      open REAL NOT NULL,
      high REAL NOT NULL,
      low REAL NOT NULL,
      close REAL NOT NULL,
      volume REAL NOT NULL,
      fetched_at INTEGER NOT NULL,
      PRIMARY KEY (symbol, date)
    );
  `);
}

/** Opens a standalone connection; ':memory:' is accepted. */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(dbPath);
  if (dbPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  ensureSchema(database);
  return database;
}

export function initializeDatabase(dbPath: string = getDefaultDbPath()): SqliteDatabase {
  if (db) {
    return db;
  }

  logger.info({ dbPath, isNew: dbPath === ':memory:' || !existsSync(dbPath) }, 'Initializing price cache');
  db = openDatabase(dbPath);
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.debug('Price cache connection closed');
  }
}
