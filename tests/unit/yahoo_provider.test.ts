import { afterEach, describe, expect, it, vi } from 'vitest';
import { mapChartToBars, YahooChartProvider, type ChartResponse } from '@/providers/yahoo_provider';

const NOW = new Date('2024-07-01T00:00:00Z');

function chartBody(): ChartResponse {
  return {
    chart: {
      result: [
        {
          timestamp: [1704205800, 1704292200, 1704378600],
          indicators: {
            quote: [
              {
                open: [10, 11, 12],
                high: [11, 12, 13],
                low: [9, 10, 11],
                close: [10.5, null, 12.5],
                volume: [1000, 2000, 3000],
              },
            ],
          },
        },
      ],
      error: null,
    },
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('mapChartToBars', () => {
  it('drops bars with a missing field and converts timestamps to UTC dates', () => {
    expect(mapChartToBars(chartBody())).toEqual([
      { date: '2024-01-02', open: 10, high: 11, low: 9, close: 10.5, volume: 1000 },
      { date: '2024-01-04', open: 12, high: 13, low: 11, close: 12.5, volume: 3000 },
    ]);
  });

  it('returns nothing without a quote block', () => {
    expect(mapChartToBars({ chart: { result: [{ timestamp: [1704205800] }] } })).toEqual([]);
    expect(mapChartToBars({})).toEqual([]);
  });
});

describe('YahooChartProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests the daily chart for the lookback window', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse(chartBody()));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new YahooChartProvider(() => NOW);
    const result = await provider.getDailySeries('BRK-B', { lookbackDays: 182 });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.fromCache).toBe(false);
      expect(result.series.symbol).toBe('BRK-B');
      expect(result.series.bars.map((b) => b.close)).toEqual([10.5, 12.5]);
    }

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/v8/finance/chart/BRK-B');
    expect(url.searchParams.get('interval')).toBe('1d');
    expect(url.searchParams.get('period2')).toBe('1719792000');
    expect(provider.getRequestCount()).toBe(1);
  });

  it('reports an unknown symbol as not found', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 404)));

    const result = await new YahooChartProvider(() => NOW).getDailySeries('NOPE', {
      lookbackDays: 182,
    });

    expect(result).toMatchObject({ ok: false, reason: 'not_found' });
  });

  it('reports a chart error body as not found', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({ chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } })
      )
    );

    const result = await new YahooChartProvider(() => NOW).getDailySeries('GONE', {
      lookbackDays: 182,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('not_found');
      expect(result.error?.message).toBe('Chart error: No data found');
    }
  });

  it('reports a server error as an HTTP failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 503)));

    const result = await new YahooChartProvider(() => NOW).getDailySeries('AAPL', {
      lookbackDays: 182,
    });

    expect(result).toMatchObject({ ok: false, reason: 'http_error' });
  });

  it('reports a malformed body as an HTTP failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>', { status: 200 })));

    const result = await new YahooChartProvider(() => NOW).getDailySeries('AAPL', {
      lookbackDays: 182,
    });

    expect(result).toMatchObject({ ok: false, reason: 'http_error' });
  });

  it('reports a network failure without throwing', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const result = await new YahooChartProvider(() => NOW).getDailySeries('AAPL', {
      lookbackDays: 182,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('network');
      expect(result.error?.message).toBe('Chart request failed: fetch failed');
    }
  });

  it('reports a response without complete bars as empty', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ chart: { result: [{ timestamp: [] }], error: null } }))
    );

    const result = await new YahooChartProvider(() => NOW).getDailySeries('AAPL', {
      lookbackDays: 182,
    });

    expect(result).toEqual({ ok: false, reason: 'empty' });
  });
});
