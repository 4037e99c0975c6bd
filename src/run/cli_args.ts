import { parseProviderType, type ProviderType } from '@/core/env';

export interface MomentumCliArgs {
  universe?: string;
  topN?: number;
  provider?: ProviderType;
  maxSymbols?: number;
  concurrency?: number;
  cache?: boolean;
}

function readFlag(argv: readonly string[], name: string): string | undefined {
  const eqArg = argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);

  const posIndex = argv.indexOf(name);
  if (posIndex >= 0) {
    const value = argv[posIndex + 1];
    if (value !== undefined && !value.startsWith('--')) return value;
  }
  return undefined;
}

function readPositiveInt(argv: readonly string[], name: string): number | undefined {
  const raw = readFlag(argv, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} expects a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Supported flags: --universe, --top, --provider, --max-symbols,
 * --concurrency (each as `--flag=value` or `--flag value`) and --no-cache.
 */
export function parseCliArgs(argv: readonly string[]): MomentumCliArgs {
  const args: MomentumCliArgs = {};

  const universe = readFlag(argv, '--universe');
  if (universe) args.universe = universe;

  const providerRaw = readFlag(argv, '--provider');
  if (providerRaw !== undefined) {
    const provider = parseProviderType(providerRaw);
    if (!provider) {
      throw new Error(`Unknown provider "${providerRaw}" (expected yahoo or finnhub)`);
    }
    args.provider = provider;
  }

  const topN = readPositiveInt(argv, '--top');
  if (topN !== undefined) args.topN = topN;

  const maxSymbols = readPositiveInt(argv, '--max-symbols');
  if (maxSymbols !== undefined) args.maxSymbols = maxSymbols;

  const concurrency = readPositiveInt(argv, '--concurrency');
  if (concurrency !== undefined) args.concurrency = concurrency;

  if (argv.includes('--no-cache')) args.cache = false;

  return args;
}
