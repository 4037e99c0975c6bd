import { lookbackWindow, unixToDate } from '@/core/time';
import { toTimeSeries } from '@/scoring/series';
import type { PriceBar } from '@/scoring/types';
import {
  ProviderError,
  unavailable,
  type PriceSeriesProvider,
  type SeriesFetchResult,
  type SeriesRequest,
} from '../types';
import { FinnhubHttpError, type FinnhubClient } from './client';
import type { FinnhubCandle } from './types';

export function mapCandlesToBars(candle: FinnhubCandle): PriceBar[] {
  const { t = [], o = [], h = [], l = [], c = [], v = [] } = candle;
  const bars: PriceBar[] = [];
  t.forEach((ts, i) => {
    if (i >= c.length) return;
    bars.push({
      date: unixToDate(ts),
      open: o[i],
      high: h[i],
      low: l[i],
      close: c[i],
      volume: v[i],
    });
  });
  return bars;
}

export class FinnhubCandleProvider implements PriceSeriesProvider {
  readonly name = 'finnhub';

  constructor(
    private readonly client: FinnhubClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  close(): void {
    // Finnhub client has no persistent resources to dispose
  }

  async getDailySeries(symbol: string, request: SeriesRequest): Promise<SeriesFetchResult> {
    const { from, to } = lookbackWindow(request.lookbackDays, this.now());

    let candle: FinnhubCandle;
    try {
      candle = await this.client.fetchCandles(symbol, from, to, { signal: request.signal });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      const reason =
        cause.name === 'AbortError' || cause.name === 'TimeoutError'
          ? 'timeout'
          : cause instanceof FinnhubHttpError
            ? 'http_error'
            : 'network';
      return unavailable(
        reason,
        new ProviderError(cause.message, this.name, symbol, 'candles', cause)
      );
    }

    if (candle.s !== 'ok') {
      return unavailable('not_found');
    }

    // Incomplete bars (missing arrays or entries) are dropped during normalization
    const series = toTimeSeries(symbol, mapCandlesToBars(candle));
    if (series.bars.length === 0) {
      return unavailable('empty');
    }

    return { ok: true, series, fromCache: false };
  }
}
