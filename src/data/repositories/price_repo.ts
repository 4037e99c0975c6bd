/**
 * Price repository for cached EOD bars
 */

import type { SqliteDatabase } from '../db';
import type { PriceBar } from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('price_repo');

interface PriceRow {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export function savePrices(
  db: SqliteDatabase,
  symbol: string,
  bars: readonly PriceBar[],
  fetchedAt: number = Date.now()
): number {
  if (bars.length === 0) return 0;

  const stmt = db.prepare(`
    INSERT INTO prices_eod (symbol, date, open, high, low, close, volume, fetched_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(symbol, date) DO UPDATE SET
      open = excluded.open,
      high = excluded.high,
      low = excluded.low,
      close = excluded.close,
      volume = excluded.volume,
      fetched_at = excluded.fetched_at
  `);

  const insertMany = db.transaction((records: readonly PriceBar[]) => {
    for (const bar of records) {
      stmt.run(symbol, bar.date, bar.open, bar.high, bar.low, bar.close, bar.volume, fetchedAt);
    }
  });

  insertMany(bars);
  logger.debug({ count: bars.length, symbol }, 'Saved prices');

  return bars.length;
}

/** Bars for `symbol` in ascending date order, optionally from `fromDate` (inclusive). */
export function getPrices(db: SqliteDatabase, symbol: string, fromDate?: string): PriceBar[] {
  let sql = `
    SELECT date, open, high, low, close, volume
    FROM prices_eod
    WHERE symbol = ?
  `;
  const params: string[] = [symbol];

  if (fromDate) {
    sql += ' AND date >= ?';
    params.push(fromDate);
  }

  sql += ' ORDER BY date ASC';

  return db.prepare(sql).all(...params) as PriceRow[];
}
