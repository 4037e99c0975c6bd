import type { PriceBar, TimeSeries } from './types';

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isCompleteBar(bar: PriceBar): boolean {
  return (
    isFiniteNumber(bar.open) &&
    isFiniteNumber(bar.high) &&
    isFiniteNumber(bar.low) &&
    isFiniteNumber(bar.close) &&
    isFiniteNumber(bar.volume) &&
    bar.close > 0 &&
    bar.volume >= 0
  );
}

/**
 * Sorts bars ascending by date and drops incomplete bars.
 * When a date repeats, the later bar in the input wins.
 */
export function normalizeBars(bars: readonly PriceBar[]): PriceBar[] {
  const byDate = new Map<string, PriceBar>();
  for (const bar of bars) {
    if (!bar.date || !isCompleteBar(bar)) continue;
    byDate.set(bar.date, bar);
  }
  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

export function toTimeSeries(symbol: string, bars: readonly PriceBar[]): TimeSeries {
  return { symbol, bars: normalizeBars(bars) };
}

export function closes(series: TimeSeries): number[] {
  return series.bars.map((bar) => bar.close);
}

/** Volumes with negative or non-finite entries read as zero. */
export function volumes(series: TimeSeries): number[] {
  return series.bars.map((bar) => (isFiniteNumber(bar.volume) && bar.volume > 0 ? bar.volume : 0));
}
