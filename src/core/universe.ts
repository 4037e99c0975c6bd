/**
 * Universe management - handles the list of symbols to analyze
 */

import { getConfig, type AppConfig } from './config';

export interface UniverseInfo {
  name: string;
  version: string;
  description: string;
  symbolCount: number;
}

export interface SymbolLimitResult {
  symbolsToScore: string[];
  truncated: boolean;
  originalCount: number;
}

export function getUniverse(appConfig: AppConfig = getConfig()): string[] {
  return appConfig.universe.symbols;
}

export function getUniverseInfo(appConfig: AppConfig = getConfig()): UniverseInfo {
  return {
    name: appConfig.universe.name,
    version: appConfig.universe.version,
    description: appConfig.universe.description,
    symbolCount: appConfig.universe.symbols.length,
  };
}

/** Deterministic truncation: keeps the first `max` symbols in universe order. */
export function applySymbolLimit(
  symbols: string[],
  max: number | null | undefined
): SymbolLimitResult {
  if (!max || max <= 0 || symbols.length <= max) {
    return { symbolsToScore: symbols, truncated: false, originalCount: symbols.length };
  }
  return {
    symbolsToScore: symbols.slice(0, max),
    truncated: true,
    originalCount: symbols.length,
  };
}
