/**
 * Yahoo Finance chart API provider
 * Daily bars from the public v8 chart endpoint (no API key).
 */

import { lookbackWindow, unixToDate } from '@/core/time';
import { toTimeSeries } from '@/scoring/series';
import type { PriceBar } from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';
import {
  ProviderError,
  unavailable,
  type PriceSeriesProvider,
  type SeriesFetchResult,
  type SeriesRequest,
} from './types';

const logger = createChildLogger('yahoo');

const BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

type NullableSeries = Array<number | null> | undefined;

export interface ChartResponse {
  chart?: {
    result?: Array<{
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          open?: NullableSeries;
          high?: NullableSeries;
          low?: NullableSeries;
          close?: NullableSeries;
          volume?: NullableSeries;
        }>;
      };
    }> | null;
    error?: { code?: string; description?: string } | null;
  };
}

function valueAt(values: NullableSeries, index: number): number | null {
  const v = values?.[index];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

/** Bars with any missing field are dropped rather than patched. */
export function mapChartToBars(response: ChartResponse): PriceBar[] {
  const result = response.chart?.result?.[0];
  const timestamps = result?.timestamp ?? [];
  const quote = result?.indicators?.quote?.[0];
  if (!quote) return [];

  const bars: PriceBar[] = [];
  timestamps.forEach((ts, i) => {
    const open = valueAt(quote.open, i);
    const high = valueAt(quote.high, i);
    const low = valueAt(quote.low, i);
    const close = valueAt(quote.close, i);
    const volume = valueAt(quote.volume, i);
    if (open === null || high === null || low === null || close === null || volume === null) {
      return;
    }
    bars.push({ date: unixToDate(ts), open, high, low, close, volume });
  });
  return bars;
}

export class YahooChartProvider implements PriceSeriesProvider {
  readonly name = 'yahoo';
  private requestCount = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  getRequestCount(): number {
    return this.requestCount;
  }

  close(): void {
    // No persistent resources to clean up
  }

  async getDailySeries(symbol: string, request: SeriesRequest): Promise<SeriesFetchResult> {
    const { from, to } = lookbackWindow(request.lookbackDays, this.now());
    const url = new URL(`${BASE_URL}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('period1', String(from));
    url.searchParams.set('period2', String(to));
    url.searchParams.set('interval', '1d');
    url.searchParams.set('events', 'history');

    let response: Response;
    try {
      this.requestCount += 1;
      response = await fetch(url.toString(), {
        headers: {
          Accept: 'application/json',
          'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        },
        signal: request.signal,
      });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      const reason = cause.name === 'AbortError' || cause.name === 'TimeoutError' ? 'timeout' : 'network';
      return unavailable(
        reason,
        new ProviderError(`Chart request failed: ${cause.message}`, this.name, symbol, 'chart', cause)
      );
    }

    if (response.status === 404) {
      return unavailable(
        'not_found',
        new ProviderError('Unknown symbol', this.name, symbol, 'chart')
      );
    }
    if (!response.ok) {
      return unavailable(
        'http_error',
        new ProviderError(`Chart request failed (${response.status})`, this.name, symbol, 'chart')
      );
    }

    let body: ChartResponse;
    try {
      body = (await response.json()) as ChartResponse;
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      return unavailable(
        'http_error',
        new ProviderError('Malformed chart response', this.name, symbol, 'chart', cause)
      );
    }

    if (body.chart?.error) {
      const description = body.chart.error.description ?? body.chart.error.code ?? 'unknown error';
      return unavailable(
        'not_found',
        new ProviderError(`Chart error: ${description}`, this.name, symbol, 'chart')
      );
    }

    const series = toTimeSeries(symbol, mapChartToBars(body));
    if (series.bars.length === 0) {
      logger.debug({ symbol }, 'Chart response contained no complete bars');
      return unavailable('empty');
    }

    return { ok: true, series, fromCache: false };
  }
}
