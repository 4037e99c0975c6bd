/**
 * Momentum Run Script
 * Scores the configured universe and prints buy/sell recommendations.
 *
 * Usage: npx tsx scripts/run_momentum.ts [--universe=sample] [--top=5] [--provider=yahoo]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { ConfigError, loadConfig } from '../src/core/config';
import { getUniverseInfo } from '../src/core/universe';
import { closeDatabase } from '../src/data/db';
import { createProvider } from '../src/providers/registry';
import { parseCliArgs } from '../src/run/cli_args';
import { formatReport } from '../src/run/report';
import { runMomentumAnalysis } from '../src/scoring/engine';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_momentum');

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));
  if (cliArgs.universe) {
    process.env.UNIVERSE = cliArgs.universe;
    logger.info({ universe: cliArgs.universe }, 'Using universe from CLI flag');
  }

  const appConfig = loadConfig();
  const universe = getUniverseInfo(appConfig);
  logger.info({ universe: universe.name, symbols: universe.symbolCount }, 'Loaded universe');

  const provider = createProvider(appConfig, { type: cliArgs.provider, cache: cliArgs.cache });

  // Ctrl+C cancels in-flight fetches and reports what has been scored so far
  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupt received, cancelling in-flight fetches');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const { run, recommendations } = await runMomentumAnalysis(appConfig, provider, {
      topN: cliArgs.topN,
      maxSymbols: cliArgs.maxSymbols,
      concurrency: cliArgs.concurrency,
      signal: controller.signal,
    });

    console.log(formatReport(recommendations, run.metadata, cliArgs.topN ?? appConfig.analysis.topN));
    return 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
    provider.close();
    closeDatabase();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.error({ file: error.file, details: error.details }, 'Invalid configuration');
    } else {
      logger.error({ error }, 'Momentum run failed');
    }
    process.exitCode = 1;
  });
