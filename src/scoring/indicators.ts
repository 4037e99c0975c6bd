/**
 * Indicator Calculation
 * Derives the momentum indicator set from one ticker's daily bars.
 *
 * Returns are measured against the first close of the trailing N-bar window
 * (N = 5, 20, 60); shorter series fall back to the oldest close.
 */

import { closes, volumes } from './series';
import { dailyReturns, mean, percentChange, sampleStdDev, trailingMean } from './stats';
import type { IndicatorOutcome, IndicatorRecord, TimeSeries } from './types';

export const MIN_BARS = 20;
export const RSI_PERIOD = 14;
export const NEUTRAL_RSI = 50;

export const RETURN_WINDOWS = {
  week: 5,
  month: 20,
  quarter: 60,
} as const;

const SMA_SHORT = 20;
const SMA_LONG = 50;
const VOLUME_RECENT = 5;
const VOLUME_BASELINE = 20;
const VOLATILITY_WINDOW = 20;

export function referenceClose(values: readonly number[], window: number): number {
  return values.length >= window ? values[values.length - window] : values[0];
}

/**
 * RSI over the trailing `period` close deltas. When fewer deltas exist the
 * window shrinks to what is available.
 */
export function relativeStrengthIndex(values: readonly number[], period: number = RSI_PERIOD): number {
  const deltas: number[] = [];
  for (let i = 1; i < values.length; i++) {
    deltas.push(values[i] - values[i - 1]);
  }
  const window = deltas.slice(-period);
  if (window.length === 0) return NEUTRAL_RSI;

  const avgGain = mean(window.map((d) => (d > 0 ? d : 0)));
  const avgLoss = mean(window.map((d) => (d < 0 ? -d : 0)));

  if (avgLoss === 0) {
    return avgGain === 0 ? NEUTRAL_RSI : 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Rolling volatility: sample std-dev of the trailing `window` daily % returns,
 * in percent. NaN until a full window of returns exists, which keeps the
 * ticker out of the risk screen.
 */
export function rollingVolatility(values: readonly number[], window: number = VOLATILITY_WINDOW): number {
  const returns = dailyReturns(values);
  if (returns.length < window) return Number.NaN;
  return sampleStdDev(returns.slice(-window)) * 100;
}

export function volumeRatio(values: readonly number[]): number {
  const baseline = trailingMean(values, VOLUME_BASELINE);
  if (!(baseline > 0)) return 1;
  return trailingMean(values, VOLUME_RECENT) / baseline;
}

export function computeIndicators(
  ticker: string,
  series: TimeSeries | null | undefined
): IndicatorOutcome {
  if (!series) {
    return { ok: false, reason: 'missing_series', barCount: 0 };
  }

  const barCount = series.bars.length;
  if (barCount < MIN_BARS) {
    return { ok: false, reason: 'insufficient_history', barCount };
  }

  const closeValues = closes(series);
  const currentPrice = closeValues[barCount - 1];
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
    return { ok: false, reason: 'invalid_price', barCount };
  }

  const sma20 = trailingMean(closeValues, SMA_SHORT);
  const sma50 = barCount >= SMA_LONG ? trailingMean(closeValues, SMA_LONG) : sma20;

  const record: IndicatorRecord = {
    ticker,
    currentPrice,
    returns1w: percentChange(currentPrice, referenceClose(closeValues, RETURN_WINDOWS.week)),
    returns1m: percentChange(currentPrice, referenceClose(closeValues, RETURN_WINDOWS.month)),
    returns3m: percentChange(currentPrice, referenceClose(closeValues, RETURN_WINDOWS.quarter)),
    rsi: relativeStrengthIndex(closeValues),
    sma20,
    sma50,
    volumeRatio: volumeRatio(volumes(series)),
    volatility: rollingVolatility(closeValues),
    priceVsSma20: percentChange(currentPrice, sma20),
    priceVsSma50: percentChange(currentPrice, sma50),
  };

  return { ok: true, record: Object.freeze(record) };
}
