import type { AppConfig } from '@/core/config';
import { getEnvConfig, type EnvConfig } from '@/core/env';
import { getDefaultDbPath, initializeDatabase } from '@/data/db';
import { CachedSeriesProvider } from './cached_provider';
import { FinnhubClient } from './finnhub/client';
import { FinnhubCandleProvider } from './finnhub/provider';
import type { PriceSeriesProvider, ProviderType } from './types';
import { YahooChartProvider } from './yahoo_provider';

export interface CreateProviderOptions {
  type?: ProviderType;
  cache?: boolean;
}

/**
 * Create the price-series provider based on ENV configuration.
 *
 * ENV:
 * - MARKET_DATA_PROVIDER: 'yahoo' | 'finnhub' (default 'yahoo')
 * - PRICE_CACHE: 'off' disables the SQLite cache
 * - PRICE_CACHE_DB: cache file path (default data/price_cache.db)
 */
export function createProvider(
  appConfig: AppConfig,
  options: CreateProviderOptions = {},
  env: EnvConfig = getEnvConfig()
): PriceSeriesProvider {
  const type = options.type ?? env.provider;

  let provider: PriceSeriesProvider;
  switch (type) {
    case 'yahoo':
      provider = new YahooChartProvider();
      break;
    case 'finnhub': {
      if (!env.finnhubApiKey) {
        throw new Error('FINNHUB_API_KEY environment variable is required');
      }
      provider = new FinnhubCandleProvider(new FinnhubClient(env.finnhubApiKey));
      break;
    }
  }

  const useCache = options.cache ?? env.priceCacheEnabled;
  if (!useCache) {
    return provider;
  }

  const db = initializeDatabase(env.priceCacheDbPath ?? getDefaultDbPath(appConfig.projectRoot));
  return new CachedSeriesProvider(provider, db, appConfig.cacheTtl.prices_ttl_hours);
}
