/**
 * Momentum Analysis Engine
 * Fans fetch -> indicators -> score out over the universe with a bounded
 * worker pool, then merges per-ticker outcomes back in universe order.
 */

import { normalizeSymbols, type AppConfig } from '@/core/config';
import { describeLookback } from '@/core/time';
import { applySymbolLimit } from '@/core/universe';
import {
  ProviderError,
  unavailable,
  type PriceSeriesProvider,
  type SeriesFetchResult,
  type SeriesRequest,
} from '@/providers/types';
import { createChildLogger } from '@/utils/logger';
import { RequestThrottler, runWithConcurrency } from '@/utils/throttler';
import { computeIndicators } from './indicators';
import { scoreRecord } from './momentum';
import { selectRecommendations, type Recommendations } from './ranking';
import type { NoRecordReason, ScoredRecord } from './types';

const logger = createChildLogger('momentum_engine');

export type SkipReason = 'fetch_failed' | NoRecordReason;

export interface SkippedTicker {
  ticker: string;
  reason: SkipReason;
  detail?: string;
}

export interface AnalysisMetadata {
  startedAt: Date;
  finishedAt: Date;
  period: string;
  lookbackDays: number;
  provider: string;
  tickersRequested: number;
  tickersAnalyzed: number;
  requestsMade: number;
  aborted: boolean;
}

export interface AnalysisRun {
  results: ScoredRecord[];
  skipped: SkippedTicker[];
  metadata: AnalysisMetadata;
}

export interface AnalyzeOptions {
  provider: PriceSeriesProvider;
  lookbackDays: number;
  concurrency?: number;
  fetchTimeoutMs?: number;
  throttleMs?: number;
  progressEvery?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

type TickerOutcome = { kind: 'scored'; record: ScoredRecord } | { kind: 'skipped'; skip: SkippedTicker };

/**
 * Bounds one provider call by `timeoutMs`. Rejections and timeouts come back
 * as an unavailable result so a single ticker never fails the run.
 */
export async function fetchSeriesWithTimeout(
  provider: PriceSeriesProvider,
  symbol: string,
  request: SeriesRequest,
  timeoutMs: number
): Promise<SeriesFetchResult> {
  const controller = new AbortController();
  const parent = request.signal;
  const forwardAbort = () => controller.abort();
  parent?.addEventListener('abort', forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<SeriesFetchResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(
        unavailable(
          'timeout',
          new ProviderError(`Fetch timed out after ${timeoutMs}ms`, provider.name, symbol, 'getDailySeries')
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      provider.getDailySeries(symbol, { ...request, signal: controller.signal }),
      timeout,
    ]);
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    return unavailable(
      'network',
      new ProviderError(cause.message, provider.name, symbol, 'getDailySeries', cause)
    );
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}

async function analyzeTicker(
  ticker: string,
  options: AnalyzeOptions,
  throttler: RequestThrottler
): Promise<TickerOutcome> {
  const fetched = await throttler.schedule(() =>
    fetchSeriesWithTimeout(
      options.provider,
      ticker,
      { lookbackDays: options.lookbackDays, signal: options.signal },
      options.fetchTimeoutMs ?? 30_000
    )
  );

  if (!fetched.ok) {
    const detail = fetched.error?.message ?? fetched.reason;
    logger.warn({ ticker, reason: fetched.reason, error: detail }, 'Skipping ticker: fetch failed');
    return { kind: 'skipped', skip: { ticker, reason: 'fetch_failed', detail } };
  }

  const outcome = computeIndicators(ticker, fetched.series);
  if (!outcome.ok) {
    logger.debug({ ticker, reason: outcome.reason, bars: outcome.barCount }, 'No indicator record');
    return { kind: 'skipped', skip: { ticker, reason: outcome.reason } };
  }

  return { kind: 'scored', record: scoreRecord(outcome.record) };
}

export async function analyzeUniverse(
  symbols: readonly string[],
  options: AnalyzeOptions
): Promise<AnalysisRun> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const tickers = normalizeSymbols(symbols);
  const progressEvery = options.progressEvery ?? 20;
  const throttler = new RequestThrottler(options.throttleMs ?? 0);
  const slots: Array<TickerOutcome | undefined> = Array.from(
    { length: tickers.length },
    () => undefined
  );

  logger.info(
    { tickers: tickers.length, provider: options.provider.name, lookbackDays: options.lookbackDays },
    'Starting momentum analysis'
  );

  await runWithConcurrency(
    tickers,
    async (ticker, index) => {
      if (index % progressEvery === 0) {
        logger.info({ progress: `${index + 1}/${tickers.length}` }, 'Processing tickers');
      }
      slots[index] = await analyzeTicker(ticker, options, throttler);
    },
    options.concurrency ?? 4,
    options.signal
  );

  const results: ScoredRecord[] = [];
  const skipped: SkippedTicker[] = [];
  for (const slot of slots) {
    if (!slot) continue;
    if (slot.kind === 'scored') results.push(slot.record);
    else skipped.push(slot.skip);
  }

  const aborted = options.signal?.aborted ?? false;
  if (aborted) {
    logger.warn(
      { completed: results.length + skipped.length, total: tickers.length },
      'Analysis aborted, returning partial results'
    );
  }

  const metadata: AnalysisMetadata = {
    startedAt,
    finishedAt: now(),
    period: describeLookback(options.lookbackDays),
    lookbackDays: options.lookbackDays,
    provider: options.provider.name,
    tickersRequested: tickers.length,
    tickersAnalyzed: results.length,
    requestsMade: options.provider.getRequestCount(),
    aborted,
  };

  logger.info(
    { analyzed: results.length, skipped: skipped.length, requests: metadata.requestsMade },
    'Momentum analysis complete'
  );

  return { results, skipped, metadata };
}

export interface RunOverrides {
  topN?: number;
  maxSymbols?: number;
  concurrency?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface MomentumRunResult {
  run: AnalysisRun;
  recommendations: Recommendations;
  truncated: boolean;
}

export async function runMomentumAnalysis(
  appConfig: AppConfig,
  provider: PriceSeriesProvider,
  overrides: RunOverrides = {}
): Promise<MomentumRunResult> {
  const analysis = appConfig.analysis;
  const { symbolsToScore, truncated, originalCount } = applySymbolLimit(
    appConfig.universe.symbols,
    overrides.maxSymbols ?? analysis.maxSymbols
  );
  if (truncated) {
    logger.warn({ originalCount, kept: symbolsToScore.length }, 'Universe truncated by symbol limit');
  }

  const run = await analyzeUniverse(symbolsToScore, {
    provider,
    lookbackDays: analysis.lookbackDays,
    concurrency: overrides.concurrency ?? analysis.concurrency,
    fetchTimeoutMs: analysis.fetchTimeoutMs,
    throttleMs: analysis.throttleMs,
    progressEvery: analysis.progressEvery,
    signal: overrides.signal,
    now: overrides.now,
  });

  const recommendations = selectRecommendations(run.results, {
    topN: overrides.topN ?? analysis.topN,
    maxVolatility: analysis.maxVolatility,
    minPrice: analysis.minPrice,
  });

  logger.info(
    {
      eligible: recommendations.screen.eligibleCount,
      removedVolatility: recommendations.screen.removedByReason.volatility.length,
      removedPrice: recommendations.screen.removedByReason.price.length,
    },
    'Risk screen applied'
  );

  return { run, recommendations, truncated };
}
