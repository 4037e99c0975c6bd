/**
 * Recommendation selection
 * Applies the risk screen, then ranks by momentum score.
 */

import type { ScoredRecord } from './types';

export interface RankingOptions {
  topN: number;
  maxVolatility: number; // percent, exclusive
  minPrice: number; // currency units, exclusive
}

export const DEFAULT_RANKING_OPTIONS: RankingOptions = {
  topN: 5,
  maxVolatility: 50,
  minPrice: 5,
};

export interface RiskScreenResult {
  eligible: ScoredRecord[];
  removedByReason: {
    volatility: string[];
    price: string[];
  };
}

export interface Recommendations {
  buys: ScoredRecord[];
  sells: ScoredRecord[];
  screen: {
    inputCount: number;
    eligibleCount: number;
    removedByReason: RiskScreenResult['removedByReason'];
  };
}

/**
 * Keeps records with volatility below the ceiling and price above the floor.
 * Removed records are reported once, under the first failing check.
 */
export function applyRiskScreen(
  records: readonly ScoredRecord[],
  options: Pick<RankingOptions, 'maxVolatility' | 'minPrice'> = DEFAULT_RANKING_OPTIONS
): RiskScreenResult {
  const removedByReason = {
    volatility: [] as string[],
    price: [] as string[],
  };

  const eligible = records.filter((record) => {
    if (!(record.volatility < options.maxVolatility)) {
      removedByReason.volatility.push(record.ticker);
      return false;
    }
    if (!(record.currentPrice > options.minPrice)) {
      removedByReason.price.push(record.ticker);
      return false;
    }
    return true;
  });

  return { eligible, removedByReason };
}

/** Descending by score. Array#sort is stable, so equal scores keep input order. */
export function rankByMomentum(records: readonly ScoredRecord[]): ScoredRecord[] {
  return records.slice().sort((a, b) => b.momentumScore - a.momentumScore);
}

/**
 * Buys are the head of the descending ranking and sells its tail, in the
 * same order (highest of the tail first). With fewer than 2 * topN eligible
 * records the two lists can overlap.
 */
export function selectRecommendations(
  records: readonly ScoredRecord[],
  options: Partial<RankingOptions> = {}
): Recommendations {
  const cfg: RankingOptions = { ...DEFAULT_RANKING_OPTIONS, ...options };
  const { eligible, removedByReason } = applyRiskScreen(records, cfg);
  const screen = {
    inputCount: records.length,
    eligibleCount: eligible.length,
    removedByReason,
  };

  if (!Number.isInteger(cfg.topN) || cfg.topN <= 0) {
    return { buys: [], sells: [], screen };
  }

  const ranked = rankByMomentum(eligible);
  return {
    buys: ranked.slice(0, cfg.topN),
    sells: ranked.slice(-cfg.topN),
    screen,
  };
}
