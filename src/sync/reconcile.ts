/**
 * Reconciliation engine
 *
 * Brings the rate cache in line with a requested date range and base
 * currency using the fewest provider calls: only dates missing from the
 * cache are fetched, and a base currency change either rebuilds the whole
 * table (when allowed) or leaves it untouched.
 */

import type { DateRange } from '@/core/date_range';
import type { IsoDate } from '@/core/time';
import type { RateStore } from '@/data/repositories/rate_repo';
import type { CurrencyCode, RateSnapshotSource } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';
import { validateCurrencies } from './currencies';
import { SnapshotResolver, snapshotToRow, type ResolvedSnapshot } from './snapshot_resolver';

const logger = createChildLogger('reconcile');

export type ReconciliationMode = 'rebuild' | 'incremental';

export interface ReconciliationPlan {
  mode: ReconciliationMode;
  /** Ascending */
  datesToFetch: IsoDate[];
}

/**
 * Raised as a warning, never thrown: the cached base keeps being used.
 */
export interface BaseCurrencyMismatch {
  requested: CurrencyCode;
  cached: CurrencyCode;
}

export interface BaseResolution {
  base: CurrencyCode;
  cachedBase: CurrencyCode | null;
  mismatch: BaseCurrencyMismatch | null;
}

export interface ReconcileOptions {
  /** Permit dropping the cache when the requested base differs from it */
  rebuild?: boolean;
  /** Currencies the caller needs; checked against the table columns */
  currencies?: CurrencyCode[];
}

export interface ReconciliationResult {
  base: CurrencyCode;
  mode: ReconciliationMode | 'skipped';
  mismatch: BaseCurrencyMismatch | null;
  planned: number;
  fetched: number;
  carried: number;
  inserted: number;
  purged: number;
}

export function resolveEffectiveBase(
  cachedBase: CurrencyCode | null,
  requestedBase: CurrencyCode,
  rebuild: boolean
): BaseResolution {
  const requested = requestedBase.toUpperCase();

  if (cachedBase === null || rebuild) {
    return { base: requested, cachedBase, mismatch: null };
  }
  if (cachedBase !== requested) {
    return { base: cachedBase, cachedBase, mismatch: { requested, cached: cachedBase } };
  }
  return { base: cachedBase, cachedBase, mismatch: null };
}

/**
 * Returns null when nothing may be fetched because of an unresolved base
 * mismatch.
 */
export function planReconciliation(
  range: DateRange,
  resolution: BaseResolution,
  existingDates: ReadonlySet<IsoDate>
): ReconciliationPlan | null {
  if (resolution.mismatch) {
    return null;
  }

  const ordered = [...new Set(range)].sort();
  if (resolution.cachedBase !== null && resolution.base !== resolution.cachedBase) {
    return { mode: 'rebuild', datesToFetch: ordered };
  }
  return {
    mode: 'incremental',
    datesToFetch: ordered.filter((date) => !existingDates.has(date)),
  };
}

export function describeMismatch(mismatch: BaseCurrencyMismatch, behavior: string): string {
  return (
    `${behavior}: base currency to be used - ${mismatch.requested} - does not match base currency ` +
    `in table - ${mismatch.cached}. Current table currency will be used. ` +
    'Include the --populate and --rebuild flags to repopulate the table using the new base currency.'
  );
}

export class ReconciliationEngine {
  constructor(
    private readonly store: RateStore,
    private readonly source: RateSnapshotSource
  ) {}

  inspect(requestedBase: CurrencyCode, rebuild: boolean = false): BaseResolution {
    const cachedBase = this.store.isEmpty() ? null : this.store.existingBase();
    return resolveEffectiveBase(cachedBase, requestedBase, rebuild);
  }

  async reconcile(
    range: DateRange,
    requestedBase: CurrencyCode,
    options: ReconcileOptions = {}
  ): Promise<ReconciliationResult> {
    const rebuild = options.rebuild ?? false;
    const resolution = this.inspect(requestedBase, rebuild);

    logger.info(
      {
        table: this.store.tableName,
        cachedBase: resolution.cachedBase,
        bounds: this.store.dateBounds(),
        requestedBase,
        rebuild,
      },
      'Inspected rate cache'
    );

    const emptyResult: ReconciliationResult = {
      base: resolution.base,
      mode: 'skipped',
      mismatch: resolution.mismatch,
      planned: 0,
      fetched: 0,
      carried: 0,
      inserted: 0,
      purged: 0,
    };

    const plan = planReconciliation(
      range,
      resolution,
      resolution.cachedBase === null ? new Set() : this.store.existingDates()
    );

    if (!plan) {
      if (resolution.mismatch) {
        logger.warn({ ...resolution.mismatch }, describeMismatch(resolution.mismatch, 'Populate'));
      }
      this.checkCurrencies(options.currencies);
      return emptyResult;
    }

    const resolver = new SnapshotResolver(this.store, this.source, resolution.base);
    let first: ResolvedSnapshot | null = null;
    let purged = 0;

    if (plan.mode === 'rebuild' && plan.datesToFetch.length > 0) {
      // The new column set comes from this snapshot; nothing is dropped until the filter passes
      first = await resolver.resolve(plan.datesToFetch[0]);
      if (options.currencies && options.currencies.length > 0) {
        validateCurrencies(options.currencies, Object.keys(first.snapshot.rates));
      }
      logger.info({ from: resolution.cachedBase, to: resolution.base }, 'Base currency changed, rebuilding table');
      purged = this.store.purgeAll();
    }

    this.checkCurrencies(options.currencies);

    if (plan.datesToFetch.length === 0) {
      logger.info(
        { base: resolution.base },
        `Given dates already exist in table for base currency of ${resolution.base}`
      );
      return { ...emptyResult, mode: plan.mode, purged };
    }

    logger.info(
      { table: this.store.tableName, mode: plan.mode, dates: plan.datesToFetch.length },
      'Populating table'
    );

    let inserted = 0;

    for (const [index, date] of plan.datesToFetch.entries()) {
      const { snapshot, origin } = index === 0 && first ? first : await resolver.resolve(date);

      if (!this.store.hasSchema()) {
        this.store.ensureSchema(Object.keys(snapshot.rates));
        this.checkCurrencies(options.currencies);
      }

      const added = this.store.insertIfAbsent(snapshotToRow(snapshot, this.store.currencyColumns()));
      if (added) inserted++;
      logger.debug({ date, origin, added }, 'Processed date');
    }

    const result: ReconciliationResult = {
      base: resolution.base,
      mode: plan.mode,
      mismatch: null,
      planned: plan.datesToFetch.length,
      fetched: resolver.getFetchedCount(),
      carried: resolver.getCarriedCount(),
      inserted,
      purged,
    };

    logger.info(
      {
        from: plan.datesToFetch[0],
        to: plan.datesToFetch[plan.datesToFetch.length - 1],
        base: result.base,
        fetched: result.fetched,
        carried: result.carried,
        inserted: result.inserted,
      },
      'Table populated'
    );

    return result;
  }

  private checkCurrencies(currencies: CurrencyCode[] | undefined): void {
    if (!currencies || currencies.length === 0 || !this.store.hasSchema()) return;
    validateCurrencies(currencies, this.store.currencyColumns());
  }
}
