/**
 * Runs the modes selected on the command line, in order: populate,
 * visualize, update. Dependencies come in from the caller so the whole flow
 * runs against an in-memory store in tests.
 */

import { buildChartSeries } from '@/chart/series';
import { writeChart } from '@/chart/render';
import type { AppConfig } from '@/core/config';
import { resolveDateRange } from '@/core/date_range';
import { secondsToMs } from '@/core/time';
import type { RateStore } from '@/data/repositories/rate_repo';
import type { CurrencyCode, RateSnapshotSource } from '@/providers/types';
import { UpdatePoller, type PollSummary } from '@/sync/poller';
import {
  ReconciliationEngine,
  describeMismatch,
  type ReconciliationResult,
} from '@/sync/reconcile';
import { createChildLogger } from '@/utils/logger';
import type { FxCliArgs } from './args';

const logger = createChildLogger('cli');

export interface CliDependencies {
  store: RateStore;
  source: RateSnapshotSource;
  config: AppConfig;
  signal?: AbortSignal;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface CliOutcome {
  base: CurrencyCode | null;
  reconciliation: ReconciliationResult | null;
  chartPath: string | null;
  poll: PollSummary | null;
}

export async function runCli(args: FxCliArgs, deps: CliDependencies): Promise<CliOutcome> {
  const { store, source, config } = deps;

  // Validated before touching the store or the network
  const range = resolveDateRange(args.start, args.end);
  const engine = new ReconciliationEngine(store, source);

  const outcome: CliOutcome = { base: null, reconciliation: null, chartPath: null, poll: null };

  const effectiveBase = (behavior: string): CurrencyCode => {
    if (outcome.base) return outcome.base;
    const resolution = engine.inspect(args.base);
    if (resolution.mismatch) {
      logger.warn({ ...resolution.mismatch }, describeMismatch(resolution.mismatch, behavior));
    }
    outcome.base = resolution.base;
    return resolution.base;
  };

  if (args.populate) {
    outcome.reconciliation = await engine.reconcile(range, args.base, {
      rebuild: args.rebuild,
      currencies: args.currencies,
    });
    outcome.base = outcome.reconciliation.base;
  }

  if (args.visualize) {
    const base = effectiveBase('Visualization');
    const series = buildChartSeries(store, range, base, args.currencies, config.chart.maxTicks);
    outcome.chartPath = writeChart(series, { ...config.chart, baseDir: config.projectRoot });
  }

  if (args.update) {
    const base = effectiveBase('Update');
    const poller = new UpdatePoller(store, source, {
      base,
      startDate: range[0],
      pollIntervalMs: secondsToMs(config.pollIntervalSeconds),
      currencies: args.currencies,
      now: deps.now,
      sleep: deps.sleep,
    });
    outcome.poll = await poller.run(deps.signal);
  }

  return outcome;
}
