import type { IndicatorRecord, PriceBar, TimeSeries } from '@/scoring/types';
import type {
  PriceSeriesProvider,
  SeriesFetchResult,
  SeriesRequest,
} from '@/providers/types';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 0, 1);

export function dateAt(index: number): string {
  return new Date(START + index * DAY_MS).toISOString().slice(0, 10);
}

export function makeBars(closes: number[], volumes?: number[]): PriceBar[] {
  return closes.map((close, i) => ({
    date: dateAt(i),
    open: close,
    high: close,
    low: close,
    close,
    volume: volumes?.[i] ?? 1000,
  }));
}

export function makeSeries(symbol: string, closes: number[], volumes?: number[]): TimeSeries {
  return { symbol, bars: makeBars(closes, volumes) };
}

export function linear(count: number, start: number, step: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i * step);
}

export function makeIndicators(overrides: Partial<IndicatorRecord> = {}): IndicatorRecord {
  return {
    ticker: 'TEST',
    currentPrice: 100,
    returns1w: 0,
    returns1m: 0,
    returns3m: 0,
    rsi: 50,
    sma20: 100,
    sma50: 100,
    volumeRatio: 1,
    volatility: 10,
    priceVsSma20: 0,
    priceVsSma50: 0,
    ...overrides,
  };
}

type FakeEntry =
  | { type: 'series'; closes: number[] }
  | { type: 'unavailable' }
  | { type: 'throw'; message: string }
  | { type: 'hang' };

/** In-process provider keyed by symbol. */
export class FakeProvider implements PriceSeriesProvider {
  readonly name = 'fake';
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly entries: Record<string, FakeEntry>,
    private readonly delayMs = 0
  ) {}

  getRequestCount(): number {
    return this.calls.length;
  }

  close(): void {}

  async getDailySeries(symbol: string, request: SeriesRequest): Promise<SeriesFetchResult> {
    this.calls.push(symbol);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      const entry = this.entries[symbol];
      if (!entry || entry.type === 'unavailable') {
        return { ok: false, reason: 'not_found' };
      }
      if (entry.type === 'throw') {
        throw new Error(entry.message);
      }
      if (entry.type === 'hang') {
        // Settles only when the caller aborts
        return await new Promise<SeriesFetchResult>((_, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')), {
            once: true,
          });
        });
      }
      return { ok: true, series: makeSeries(symbol, entry.closes), fromCache: false };
    } finally {
      this.inFlight -= 1;
    }
  }
}
