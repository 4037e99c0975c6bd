/**
 * Momentum Score Calculation
 * Sum of independently capped contributions: price returns over three
 * horizons, RSI zone, volume confirmation and position against the SMAs.
 */

import type { IndicatorRecord, MomentumComponents, ScoredRecord } from './types';

export interface ReturnRule {
  weight: number;
  cap: number;
}

export const MOMENTUM_RULES = {
  return1w: { weight: 2, cap: 20 },
  return1m: { weight: 1.5, cap: 15 },
  return3m: { weight: 1, cap: 10 },
  rsi: {
    neutralLow: 30,
    neutralHigh: 70,
    overbought: 80,
    oversold: 20,
    neutralPoints: 5,
    overboughtPoints: -10,
    oversoldPoints: 10,
  },
  volume: { high: 1.2, low: 0.8, points: 5 },
  trend: { sma20Points: 3, sma50Points: 2 },
} as const;

export interface MomentumScoreResult {
  total: number;
  components: MomentumComponents;
}

/**
 * Weighted return, capped symmetrically around zero: a positive value is
 * never pulled to the negative bound or vice versa.
 */
export function cappedReturn(value: number, rule: ReturnRule): number {
  const weighted = value * rule.weight;
  return weighted > 0 ? Math.min(weighted, rule.cap) : Math.max(weighted, -rule.cap);
}

export function rsiZonePoints(rsi: number): number {
  const r = MOMENTUM_RULES.rsi;
  if (rsi >= r.neutralLow && rsi <= r.neutralHigh) return r.neutralPoints;
  if (rsi > r.overbought) return r.overboughtPoints;
  if (rsi < r.oversold) return r.oversoldPoints;
  return 0;
}

export function volumePoints(volumeRatio: number): number {
  const v = MOMENTUM_RULES.volume;
  if (volumeRatio > v.high) return v.points;
  if (volumeRatio < v.low) return -v.points;
  return 0;
}

export function calculateMomentumScore(indicators: IndicatorRecord): MomentumScoreResult {
  const { trend } = MOMENTUM_RULES;

  const components: MomentumComponents = {
    return1w: cappedReturn(indicators.returns1w, MOMENTUM_RULES.return1w),
    return1m: cappedReturn(indicators.returns1m, MOMENTUM_RULES.return1m),
    return3m: cappedReturn(indicators.returns3m, MOMENTUM_RULES.return3m),
    rsiZone: rsiZonePoints(indicators.rsi),
    volume: volumePoints(indicators.volumeRatio),
    trendSma20: indicators.priceVsSma20 > 0 ? trend.sma20Points : 0,
    trendSma50: indicators.priceVsSma50 > 0 ? trend.sma50Points : 0,
  };

  const total =
    components.return1w +
    components.return1m +
    components.return3m +
    components.rsiZone +
    components.volume +
    components.trendSma20 +
    components.trendSma50;

  return { total, components };
}

export function scoreRecord(indicators: IndicatorRecord): ScoredRecord {
  const { total, components } = calculateMomentumScore(indicators);
  return Object.freeze({
    ...indicators,
    momentumScore: total,
    components: Object.freeze(components),
  });
}
