/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { isAbsolute, join } from 'path';
import { DEFAULT_LOOKBACK_DAYS } from './time';
import { validateAnalysisConfig, validateUniverse } from '@/validation/ajv_instance';

export interface UniverseConfig {
  name: string;
  description: string;
  version: string;
  symbols: string[];
}

export interface AnalysisConfig {
  lookbackDays: number;
  topN: number;
  maxVolatility: number;
  minPrice: number;
  concurrency: number;
  fetchTimeoutMs: number;
  throttleMs: number;
  progressEvery: number;
  maxSymbols: number | null;
}

export interface CacheTtlConfig {
  prices_ttl_hours: number;
}

export interface AppConfig {
  universe: UniverseConfig;
  analysis: AnalysisConfig;
  cacheTtl: CacheTtlConfig;
  projectRoot: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public file: string,
    public details: string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  lookbackDays: DEFAULT_LOOKBACK_DAYS,
  topN: 5,
  maxVolatility: 50,
  minPrice: 5,
  concurrency: 4,
  fetchTimeoutMs: 30_000,
  throttleMs: 0,
  progressEvery: 20,
  maxSymbols: null,
};

const DEFAULT_CACHE_TTL: CacheTtlConfig = { prices_ttl_hours: 12 };

let cachedConfig: AppConfig | null = null;

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('Unable to read config file', filePath, [reason]);
  }
}

function resolveUniverseByDisplayName(projectRoot: string, universeName: string): string | null {
  const normalized = universeName.trim().toLowerCase();
  if (!normalized) return null;

  const universeDir = join(projectRoot, 'config', 'universes');
  if (!existsSync(universeDir)) return null;

  const files = readdirSync(universeDir).filter((file) => file.endsWith('.json'));
  for (const file of files) {
    const filePath = join(universeDir, file);
    const parsed = readJson(filePath);
    const name =
      parsed && typeof parsed === 'object' && 'name' in parsed && typeof parsed.name === 'string'
        ? parsed.name.trim().toLowerCase()
        : '';
    if (name && name === normalized) {
      return filePath;
    }
  }

  return null;
}

export function resolveUniversePath(
  projectRoot: string,
  requested: string | undefined = process.env.UNIVERSE
): string {
  const configDir = join(projectRoot, 'config');

  if (requested) {
    const asPack =
      requested.endsWith('.json') || requested.includes('/')
        ? requested
        : join('universes', `${requested}.json`);
    const packPath = isAbsolute(asPack)
      ? asPack
      : join(projectRoot, asPack.startsWith('config/') ? asPack : join('config', asPack));
    if (existsSync(packPath)) {
      return packPath;
    }

    // Display names such as "US Large Cap 100" are accepted too
    const displayNamePath = resolveUniverseByDisplayName(projectRoot, requested);
    if (displayNamePath) {
      return displayNamePath;
    }

    throw new ConfigError('Universe not found', packPath);
  }

  const defaultPack = join(configDir, 'universe.json');
  if (existsSync(defaultPack)) return defaultPack;

  return join(configDir, 'universes', 'sp100.json');
}

/** Trim, upper-case and de-duplicate while keeping first-seen order. */
export function normalizeSymbols(symbols: readonly string[]): string[] {
  const normalized: string[] = [];
  const seen = new Set<string>();
  for (const sym of symbols) {
    const upper = sym.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalized.push(upper);
    }
  }
  return normalized;
}

export function loadUniverse(universePath: string, projectRoot: string): UniverseConfig {
  const result = validateUniverse(readJson(universePath), projectRoot);
  if (!result.valid || !result.data) {
    throw new ConfigError('Invalid universe pack', universePath, result.errors ?? []);
  }

  const { name, description, version, symbols } = result.data;
  return {
    name: name ?? 'Universe',
    description: description ?? '',
    version: version ?? '1',
    symbols: normalizeSymbols(symbols),
  };
}

export function loadAnalysisConfig(projectRoot: string): AnalysisConfig {
  const analysisPath = join(projectRoot, 'config', 'analysis.json');
  if (!existsSync(analysisPath)) {
    return { ...DEFAULT_ANALYSIS_CONFIG };
  }

  const result = validateAnalysisConfig(readJson(analysisPath), projectRoot);
  if (!result.valid || !result.data) {
    throw new ConfigError('Invalid analysis config', analysisPath, result.errors ?? []);
  }

  const raw = result.data;
  return {
    lookbackDays: raw.lookback_days ?? DEFAULT_ANALYSIS_CONFIG.lookbackDays,
    topN: raw.top_n ?? DEFAULT_ANALYSIS_CONFIG.topN,
    maxVolatility: raw.max_volatility ?? DEFAULT_ANALYSIS_CONFIG.maxVolatility,
    minPrice: raw.min_price ?? DEFAULT_ANALYSIS_CONFIG.minPrice,
    concurrency: raw.concurrency ?? DEFAULT_ANALYSIS_CONFIG.concurrency,
    fetchTimeoutMs: raw.fetch_timeout_ms ?? DEFAULT_ANALYSIS_CONFIG.fetchTimeoutMs,
    throttleMs: raw.throttle_ms ?? DEFAULT_ANALYSIS_CONFIG.throttleMs,
    progressEvery: raw.progress_every ?? DEFAULT_ANALYSIS_CONFIG.progressEvery,
    maxSymbols: raw.max_symbols ?? DEFAULT_ANALYSIS_CONFIG.maxSymbols,
  };
}

function loadCacheTtl(projectRoot: string): CacheTtlConfig {
  const ttlPath = join(projectRoot, 'config', 'cache_ttl.json');
  if (!existsSync(ttlPath)) return { ...DEFAULT_CACHE_TTL };

  const parsed = readJson(ttlPath);
  const hours =
    parsed && typeof parsed === 'object' && 'prices_ttl_hours' in parsed
      ? parsed.prices_ttl_hours
      : undefined;
  if (typeof hours !== 'number' || !Number.isFinite(hours) || hours < 0) {
    throw new ConfigError('Invalid cache TTL config', ttlPath, [
      'prices_ttl_hours must be a non-negative number',
    ]);
  }
  return { prices_ttl_hours: hours };
}

export function loadConfig(projectRoot: string = process.cwd()): AppConfig {
  return {
    universe: loadUniverse(resolveUniversePath(projectRoot), projectRoot),
    analysis: loadAnalysisConfig(projectRoot),
    cacheTtl: loadCacheTtl(projectRoot),
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
