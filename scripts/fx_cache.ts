/**
 * Exchange rate cache script
 * Populates, charts and/or keeps updating the local rate table
 *
 * Usage: npx tsx scripts/fx_cache.ts --populate --start 2024-01-01 --end 2024-03-31
 */

import '../src/core/load_env';
import { USAGE, hasMode, parseCliArgs, type FxCliArgs } from '../src/cli/args';
import { runCli } from '../src/cli/run';
import { getConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { today } from '../src/core/time';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { RateRepository } from '../src/data/repositories/rate_repo';
import { ExchangeRatesClient } from '../src/providers/exchange_rates/client';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('fx_cache');

async function main() {
  const startTime = Date.now();
  const config = getConfig();

  let args: FxCliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2), {
      base: config.defaultBase,
      start: config.defaultStart,
      end: today(),
      currencies: config.defaultCurrencies,
    });
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  if (!hasMode(args)) {
    logger.warn(
      'None of the behavior flags (--populate, --visualize, --update) were provided so no action will be taken.'
    );
    return;
  }

  const controller = new AbortController();
  const stop = () => {
    logger.info('Stop requested, finishing current step');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const env = getEnvConfig();
    const store = new RateRepository(initializeDatabase(env.dbPath), config.tableName);
    const source = new ExchangeRatesClient({
      baseUrl: env.apiBaseUrl,
      apiKey: env.apiKey,
      timeoutMs: config.requestTimeoutMs,
      minIntervalMs: config.requestIntervalMs,
    });

    const outcome = await runCli(args, { store, source, config, signal: controller.signal });

    const duration = (Date.now() - startTime) / 1000;
    console.log('\n' + '='.repeat(50));
    console.log('FX CACHE RUN COMPLETE');
    console.log('='.repeat(50));
    console.log(`Table:         ${store.tableName} (${store.count()} rows)`);
    console.log(`Base:          ${outcome.base ?? '-'}`);
    if (outcome.reconciliation) {
      const r = outcome.reconciliation;
      console.log(`Mode:          ${r.mode}`);
      console.log(`Inserted:      ${r.inserted} (fetched ${r.fetched}, carried ${r.carried})`);
      if (r.mismatch) {
        console.log(`Base mismatch: requested ${r.mismatch.requested}, cached ${r.mismatch.cached}`);
      }
    }
    if (outcome.chartPath) console.log(`Chart:         ${outcome.chartPath}`);
    if (outcome.poll) {
      console.log(`Updates:       ${outcome.poll.inserted} rows over ${outcome.poll.wakeUps} wake-ups`);
    }
    console.log(`Requests:      ${source.getRequestCount()}`);
    console.log(`Duration:      ${duration.toFixed(1)}s`);
    console.log('='.repeat(50) + '\n');
  } catch (error) {
    logger.error({ error }, 'FX cache run failed');
    console.error('FX cache run failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    closeDatabase();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
