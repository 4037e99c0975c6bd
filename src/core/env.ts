/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export type ProviderType = 'yahoo' | 'finnhub';

export interface EnvConfig {
  provider: ProviderType;
  finnhubApiKey: string | null;
  priceCacheEnabled: boolean;
  priceCacheDbPath: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

const PROVIDER_TYPES: readonly ProviderType[] = ['yahoo', 'finnhub'];
const LOG_LEVELS: readonly EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name]?.trim();
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value || undefined;
}

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function parseProviderType(raw: string | undefined): ProviderType | null {
  const normalized = raw?.trim().toLowerCase();
  return PROVIDER_TYPES.find((candidate) => candidate === normalized) ?? null;
}

export function loadEnvConfig(): EnvConfig {
  const providerRaw = getEnvVar('MARKET_DATA_PROVIDER');
  const provider = parseProviderType(providerRaw) ?? 'yahoo';
  if (providerRaw && parseProviderType(providerRaw) === null) {
    throw new Error(`Unknown MARKET_DATA_PROVIDER: ${providerRaw}`);
  }

  const finnhubApiKey =
    provider === 'finnhub' ? getEnvVar('FINNHUB_API_KEY', true) ?? null : getEnvVar('FINNHUB_API_KEY') ?? null;

  const cacheFlag = getEnvVar('PRICE_CACHE')?.toLowerCase();

  return {
    provider,
    finnhubApiKey,
    priceCacheEnabled: cacheFlag !== 'off' && cacheFlag !== 'false' && cacheFlag !== '0',
    priceCacheDbPath: getEnvVar('PRICE_CACHE_DB') ?? null,
    logLevel: pick(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pick(process.env.NODE_ENV, NODE_ENVS, 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
