/**
 * Shared types and interfaces for price-series providers.
 *
 * Providers hand the indicator engine a complete daily series or an explicit
 * "unavailable" result; a failed fetch never yields a partial series.
 */
import type { TimeSeries } from '@/scoring/types';
import type { ProviderType } from '@/core/env';

export type { ProviderType };

export interface SeriesRequest {
  lookbackDays: number;
  signal?: AbortSignal;
}

export type UnavailableReason = 'not_found' | 'empty' | 'http_error' | 'network' | 'timeout';

export type SeriesFetchResult =
  | { ok: true; series: TimeSeries; fromCache: boolean }
  | { ok: false; reason: UnavailableReason; error?: ProviderError };

export interface PriceSeriesProvider {
  readonly name: string;
  getDailySeries(symbol: string, request: SeriesRequest): Promise<SeriesFetchResult>;
  getRequestCount(): number;
  close(): void;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function unavailable(
  reason: UnavailableReason,
  error?: ProviderError
): SeriesFetchResult {
  return error ? { ok: false, reason, error } : { ok: false, reason };
}
