/**
 * SQLite-backed cache in front of any price-series provider.
 * Only raw bars are cached; indicator values and scores are always recomputed.
 */

import { subDays } from 'date-fns';
import { formatDate, hoursToSeconds } from '@/core/time';
import type { SqliteDatabase } from '@/data/db';
import { isCacheValid, setCacheEntry } from '@/data/repositories/cache_repo';
import { getPrices, savePrices } from '@/data/repositories/price_repo';
import { createChildLogger } from '@/utils/logger';
import type { PriceSeriesProvider, SeriesFetchResult, SeriesRequest } from './types';

const logger = createChildLogger('price_cache');

export interface CacheStats {
  hits: number;
  misses: number;
}

export class CachedSeriesProvider implements PriceSeriesProvider {
  readonly name: string;
  private readonly stats: CacheStats = { hits: 0, misses: 0 };

  constructor(
    private readonly inner: PriceSeriesProvider,
    private readonly db: SqliteDatabase,
    private readonly ttlHours: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.name = `${inner.name}+cache`;
  }

  static cacheKey(symbol: string, lookbackDays: number): string {
    return `series:${symbol}:${lookbackDays}`;
  }

  getRequestCount(): number {
    return this.inner.getRequestCount();
  }

  getCacheStats(): CacheStats {
    return { ...this.stats };
  }

  close(): void {
    this.inner.close();
  }

  async getDailySeries(symbol: string, request: SeriesRequest): Promise<SeriesFetchResult> {
    const now = this.now();
    const key = CachedSeriesProvider.cacheKey(symbol, request.lookbackDays);

    if (isCacheValid(this.db, key, now.getTime())) {
      const bars = getPrices(this.db, symbol, formatDate(subDays(now, request.lookbackDays)));
      if (bars.length > 0) {
        this.stats.hits += 1;
        logger.debug({ symbol, bars: bars.length }, 'Using cached price series');
        return { ok: true, series: { symbol, bars }, fromCache: true };
      }
    }

    this.stats.misses += 1;
    const result = await this.inner.getDailySeries(symbol, request);
    if (result.ok) {
      savePrices(this.db, symbol, result.series.bars, now.getTime());
      setCacheEntry(this.db, key, hoursToSeconds(this.ttlHours), now.getTime());
    }
    return result;
  }
}
