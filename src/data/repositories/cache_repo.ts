/**
 * Cache metadata repository (freshness of cached price series)
 */

import type { SqliteDatabase } from '../db';

export interface CacheEntry {
  key: string;
  lastUpdated: number;
  ttlSeconds: number;
  hitCount: number;
}

export function getCacheEntry(db: SqliteDatabase, key: string): CacheEntry | null {
  const row = db
    .prepare(
      `SELECT key, last_updated as lastUpdated, ttl_seconds as ttlSeconds, hit_count as hitCount
       FROM cache_meta
       WHERE key = ?`
    )
    .get(key) as CacheEntry | undefined;
  return row ?? null;
}

export function setCacheEntry(
  db: SqliteDatabase,
  key: string,
  ttlSeconds: number,
  now: number = Date.now()
): void {
  db.prepare(
    `INSERT INTO cache_meta (key, last_updated, ttl_seconds, hit_count)
     VALUES (?, ?, ?, 0)
     ON CONFLICT(key) DO UPDATE SET
       last_updated = excluded.last_updated,
       ttl_seconds = excluded.ttl_seconds`
  ).run(key, now, ttlSeconds);
}

export function isCacheValid(db: SqliteDatabase, key: string, now: number = Date.now()): boolean {
  const entry = getCacheEntry(db, key);
  if (!entry) {
    return false;
  }

  const valid = now < entry.lastUpdated + entry.ttlSeconds * 1000;
  if (valid) {
    db.prepare('UPDATE cache_meta SET hit_count = hit_count + 1 WHERE key = ?').run(key);
  }
  return valid;
}
