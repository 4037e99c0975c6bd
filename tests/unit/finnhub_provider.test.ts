import { afterEach, describe, expect, it, vi } from 'vitest';
import { FinnhubClient, FinnhubHttpError } from '@/providers/finnhub/client';
import { FinnhubCandleProvider, mapCandlesToBars } from '@/providers/finnhub/provider';
import { RateLimiter } from '@/providers/finnhub/rate_limiter';
import type { FinnhubCandle } from '@/providers/finnhub/types';

const NOW = new Date('2024-07-01T00:00:00Z');

const OK_CANDLE: FinnhubCandle = {
  s: 'ok',
  t: [1704205800, 1704292200],
  o: [10, 11],
  h: [11, 12],
  l: [9, 10],
  c: [10.5, 11.5],
  v: [1000, 2000],
};

function jsonResponse(body: unknown, status = 200, statusText = ''): Response {
  return new Response(JSON.stringify(body), { status, statusText });
}

function makeClient(): FinnhubClient {
  return new FinnhubClient('test-key', new RateLimiter(), { maxRetries: 1, initialBackoffMs: 0 });
}

describe('mapCandlesToBars', () => {
  it('zips the parallel arrays into dated bars', () => {
    expect(mapCandlesToBars(OK_CANDLE)).toEqual([
      { date: '2024-01-02', open: 10, high: 11, low: 9, close: 10.5, volume: 1000 },
      { date: '2024-01-03', open: 11, high: 12, low: 10, close: 11.5, volume: 2000 },
    ]);
  });

  it('returns nothing for a no_data response', () => {
    expect(mapCandlesToBars({ s: 'no_data' })).toEqual([]);
  });
});

describe('FinnhubClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the token and candle parameters', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse(OK_CANDLE));
    vi.stubGlobal('fetch', fetchMock);

    await makeClient().fetchCandles('AAPL', 100, 200);

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/api/v1/stock/candle');
    expect(url.searchParams.get('token')).toBe('test-key');
    expect(url.searchParams.get('symbol')).toBe('AAPL');
    expect(url.searchParams.get('resolution')).toBe('D');
    expect(url.searchParams.get('from')).toBe('100');
    expect(url.searchParams.get('to')).toBe('200');
  });

  it('retries after a 429 and returns the next success', async () => {
    const fetchMock = vi
      .fn(async (_input: string | URL | Request) => jsonResponse(OK_CANDLE))
      .mockResolvedValueOnce(jsonResponse({}, 429, 'Too Many Requests'));
    vi.stubGlobal('fetch', fetchMock);

    const client = makeClient();
    const candle = await client.fetchCandles('AAPL', 100, 200);

    expect(candle.s).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(client.getRequestCount()).toBe(2);
  });

  it('gives up after the retry budget on server errors', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 500, 'Internal Server Error'));
    vi.stubGlobal('fetch', fetchMock);

    await expect(makeClient().fetchCandles('AAPL', 100, 200)).rejects.toBeInstanceOf(FinnhubHttpError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 401, 'Unauthorized'));
    vi.stubGlobal('fetch', fetchMock);

    await expect(makeClient().fetchCandles('AAPL', 100, 200)).rejects.toThrow(
      'Finnhub API error: 401 Unauthorized'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('FinnhubCandleProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns a normalized series', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(OK_CANDLE)));

    const result = await new FinnhubCandleProvider(makeClient(), () => NOW).getDailySeries('AAPL', {
      lookbackDays: 182,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.series.bars.map((b) => b.date)).toEqual(['2024-01-02', '2024-01-03']);
    }
  });

  it('maps a no_data status to not found', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ s: 'no_data' })));

    const result = await new FinnhubCandleProvider(makeClient(), () => NOW).getDailySeries('ZZZZ', {
      lookbackDays: 182,
    });

    expect(result).toEqual({ ok: false, reason: 'not_found' });
  });

  it('maps a rejected request to an HTTP failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 403, 'Forbidden')));

    const result = await new FinnhubCandleProvider(makeClient(), () => NOW).getDailySeries('AAPL', {
      lookbackDays: 182,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('http_error');
      expect(result.error?.provider).toBe('finnhub');
    }
  });
});

describe('RateLimiter', () => {
  it('releases its slot when the wrapped call rejects', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 1 });

    await expect(
      limiter.run(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(limiter.getStats()).toEqual({ requestsInWindow: 1, activeRequests: 0 });
  });

  it('never runs more calls at once than allowed', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 2 });
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        limiter.run(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active -= 1;
        })
      )
    );

    expect(peak).toBe(2);
    expect(limiter.getStats().activeRequests).toBe(0);
  });
});
