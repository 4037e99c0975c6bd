import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '@/data/db';
import { getCacheEntry } from '@/data/repositories/cache_repo';
import { getPrices } from '@/data/repositories/price_repo';
import { CachedSeriesProvider } from '@/providers/cached_provider';
import { FakeProvider, linear } from '../helpers/series';

const REQUEST = { lookbackDays: 365 };

describe('CachedSeriesProvider', () => {
  let db: SqliteDatabase;
  let now: Date;
  const clock = () => now;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = new Date('2024-07-01T00:00:00Z');
  });

  afterEach(() => {
    db.close();
  });

  it('serves the second request from the cache', async () => {
    const inner = new FakeProvider({ AAA: { type: 'series', closes: linear(25, 10, 1) } });
    const cached = new CachedSeriesProvider(inner, db, 12, clock);

    const first = await cached.getDailySeries('AAA', REQUEST);
    const second = await cached.getDailySeries('AAA', REQUEST);

    expect(first.ok && first.fromCache).toBe(false);
    expect(second.ok).toBe(true);
    if (second.ok) {
      expect(second.fromCache).toBe(true);
      expect(second.series.bars).toHaveLength(25);
      expect(second.series.bars[24].close).toBe(34);
    }
    expect(inner.calls).toEqual(['AAA']);
    expect(cached.getCacheStats()).toEqual({ hits: 1, misses: 1 });
    expect(cached.name).toBe('fake+cache');
  });

  it('stores bars and a cache entry keyed by symbol and lookback', async () => {
    const inner = new FakeProvider({ AAA: { type: 'series', closes: linear(3, 10, 1) } });
    const cached = new CachedSeriesProvider(inner, db, 2, clock);

    await cached.getDailySeries('AAA', REQUEST);

    expect(getPrices(db, 'AAA').map((b) => b.close)).toEqual([10, 11, 12]);
    expect(getCacheEntry(db, CachedSeriesProvider.cacheKey('AAA', 365))).toEqual({
      key: 'series:AAA:365',
      lastUpdated: now.getTime(),
      ttlSeconds: 7200,
      hitCount: 0,
    });
  });

  it('refetches once the entry has expired', async () => {
    const inner = new FakeProvider({ AAA: { type: 'series', closes: linear(25, 10, 1) } });
    const cached = new CachedSeriesProvider(inner, db, 12, clock);

    await cached.getDailySeries('AAA', REQUEST);
    now = new Date('2024-07-01T12:00:00Z');
    const result = await cached.getDailySeries('AAA', REQUEST);

    expect(result.ok && result.fromCache).toBe(false);
    expect(inner.calls).toEqual(['AAA', 'AAA']);
  });

  it('does not cache failures', async () => {
    const inner = new FakeProvider({ BAD: { type: 'unavailable' } });
    const cached = new CachedSeriesProvider(inner, db, 12, clock);

    await cached.getDailySeries('BAD', REQUEST);
    const second = await cached.getDailySeries('BAD', REQUEST);

    expect(second).toEqual({ ok: false, reason: 'not_found' });
    expect(inner.calls).toEqual(['BAD', 'BAD']);
    expect(getCacheEntry(db, CachedSeriesProvider.cacheKey('BAD', 365))).toBeNull();
  });

  it('delegates the request count to the wrapped provider', async () => {
    const inner = new FakeProvider({ AAA: { type: 'series', closes: linear(3, 10, 1) } });
    const cached = new CachedSeriesProvider(inner, db, 12, clock);

    await cached.getDailySeries('AAA', REQUEST);
    await cached.getDailySeries('AAA', REQUEST);

    expect(cached.getRequestCount()).toBe(1);
  });
});
