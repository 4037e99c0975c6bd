/**
 * Plain-text report of a momentum run.
 */

import { formatTimestamp } from '@/core/time';
import type { AnalysisMetadata } from '@/scoring/engine';
import type { Recommendations } from '@/scoring/ranking';
import type { ScoredRecord } from '@/scoring/types';

export const NO_DATA_MESSAGE = 'No data available for analysis.';

const RULE = '='.repeat(80);

const DISCLAIMER = [
  'This analysis is for educational purposes only.',
  'Past performance does not guarantee future results.',
  'Always do your own research before making investment decisions.',
  'Consider consulting with a financial advisor.',
];

export function formatEntry(rank: number, record: ScoredRecord): string[] {
  return [
    `${rank}. ${record.ticker}`,
    `   Price: $${record.currentPrice.toFixed(2)}`,
    `   Momentum Score: ${record.momentumScore.toFixed(1)}`,
    `   1W Return: ${record.returns1w.toFixed(1)}%`,
    `   1M Return: ${record.returns1m.toFixed(1)}%`,
    `   3M Return: ${record.returns3m.toFixed(1)}%`,
    `   RSI: ${record.rsi.toFixed(1)}`,
    `   Volume Ratio: ${record.volumeRatio.toFixed(1)}x`,
    '',
  ];
}

function section(title: string, records: ScoredRecord[]): string[] {
  const lines = ['', title, '-'.repeat(50)];
  if (records.length === 0) {
    lines.push('   (none passed the risk screen)', '');
  }
  records.forEach((record, i) => lines.push(...formatEntry(i + 1, record)));
  return lines;
}

export function formatReport(
  recommendations: Recommendations,
  metadata: AnalysisMetadata,
  topN: number
): string {
  if (metadata.tickersAnalyzed === 0) {
    return NO_DATA_MESSAGE;
  }

  const lines = [
    RULE,
    'STOCK MOMENTUM ANALYSIS - RECOMMENDATIONS',
    RULE,
    `Analysis Date: ${formatTimestamp(metadata.startedAt)}`,
    `Data Period: ${metadata.period}`,
    `Stocks Analyzed: ${metadata.tickersAnalyzed} of ${metadata.tickersRequested}`,
  ];
  if (metadata.aborted) {
    lines.push('Note: run was interrupted, results are partial');
  }

  lines.push(...section(`🔥 TOP ${topN} BUY RECOMMENDATIONS 🔥`, recommendations.buys));
  lines.push(...section(`❌ TOP ${topN} SELL RECOMMENDATIONS ❌`, recommendations.sells));
  lines.push('', '⚠️  DISCLAIMER ⚠️', '-'.repeat(30), ...DISCLAIMER);

  return lines.join('\n');
}
