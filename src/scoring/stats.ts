/**
 * Arithmetic helpers shared by the indicator calculations.
 * Callers guarantee non-empty input unless noted.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Mean of the trailing `window` values (or all of them when fewer exist). */
export function trailingMean(values: readonly number[], window: number): number {
  return mean(values.slice(-window));
}

/** Sample standard deviation (n - 1). Returns 0 for fewer than two values. */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - avg) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

/** (current - reference) / reference * 100, or 0 when the reference is not positive. */
export function percentChange(current: number, reference: number): number {
  if (!(reference > 0)) return 0;
  return ((current - reference) / reference) * 100;
}

/** Day-over-day fractional returns; pairs with a non-positive previous value are skipped. */
export function dailyReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    if (prev > 0) {
      returns.push(values[i] / prev - 1);
    }
  }
  return returns;
}
