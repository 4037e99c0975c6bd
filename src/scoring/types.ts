export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Daily bars for one ticker, ascending by date with no duplicate dates. */
export interface TimeSeries {
  symbol: string;
  bars: PriceBar[];
}

export interface IndicatorRecord {
  readonly ticker: string;
  readonly currentPrice: number;
  readonly returns1w: number;
  readonly returns1m: number;
  readonly returns3m: number;
  readonly rsi: number;
  readonly sma20: number;
  readonly sma50: number;
  readonly volumeRatio: number;
  readonly volatility: number;
  readonly priceVsSma20: number;
  readonly priceVsSma50: number;
}

export type NoRecordReason = 'missing_series' | 'insufficient_history' | 'invalid_price';

export type IndicatorOutcome =
  | { ok: true; record: IndicatorRecord }
  | { ok: false; reason: NoRecordReason; barCount: number };

export interface MomentumComponents {
  return1w: number;
  return1m: number;
  return3m: number;
  rsiZone: number;
  volume: number;
  trendSma20: number;
  trendSma50: number;
}

export interface ScoredRecord extends IndicatorRecord {
  readonly momentumScore: number;
  readonly components: Readonly<MomentumComponents>;
}
