/**
 * Resolves the snapshot to persist for one calendar date.
 *
 * The provider publishes nothing on Saturdays and Sundays, so a weekend date
 * reuses the snapshot of the calendar day right before it: the one resolved
 * earlier in this pass, or the row already in the cache. Only when neither
 * exists is the provider asked, and it answers with its last published day.
 */

import { isWeekendDate, previousDay, type IsoDate } from '@/core/time';
import type { CachedRateRow, RateStore } from '@/data/repositories/rate_repo';
import type { CurrencyCode, RateSnapshot, RateSnapshotSource } from '@/providers/types';
import { withBaseRate } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('snapshot_resolver');

export type SnapshotOrigin = 'fetched' | 'carried';

export interface ResolvedSnapshot {
  snapshot: RateSnapshot;
  origin: SnapshotOrigin;
}

export function rowToSnapshot(row: CachedRateRow): RateSnapshot {
  const rates: Record<CurrencyCode, number> = {};
  for (const [code, value] of Object.entries(row.rates)) {
    if (value !== null) rates[code] = value;
  }
  return withBaseRate({ date: row.date, base: row.base, rates });
}

/**
 * Project a snapshot onto the table's fixed column set.
 */
export function snapshotToRow(snapshot: RateSnapshot, columns: CurrencyCode[]): CachedRateRow {
  const rates: Record<CurrencyCode, number | null> = {};
  for (const code of columns) {
    rates[code] = code === snapshot.base ? 1.0 : snapshot.rates[code] ?? null;
  }
  return { date: snapshot.date, base: snapshot.base, rates };
}

export class SnapshotResolver {
  private previous: RateSnapshot | null = null;
  private fetched = 0;
  private carried = 0;

  constructor(
    private readonly store: RateStore,
    private readonly source: RateSnapshotSource,
    private readonly base: CurrencyCode
  ) {}

  getFetchedCount(): number {
    return this.fetched;
  }

  getCarriedCount(): number {
    return this.carried;
  }

  async resolve(date: IsoDate): Promise<ResolvedSnapshot> {
    if (isWeekendDate(date)) {
      const predecessor = this.findPredecessor(date);
      if (predecessor) {
        const snapshot: RateSnapshot = {
          date,
          base: predecessor.base,
          rates: { ...predecessor.rates },
          publishedDate: predecessor.publishedDate,
        };
        this.previous = snapshot;
        this.carried++;
        return { snapshot, origin: 'carried' };
      }
      logger.debug({ date }, 'No predecessor for weekend date, asking provider');
    }

    const snapshot = withBaseRate(await this.source.fetchSnapshot(date, this.base));
    this.previous = snapshot;
    this.fetched++;
    return { snapshot, origin: 'fetched' };
  }

  private findPredecessor(date: IsoDate): RateSnapshot | null {
    const dayBefore = previousDay(date);
    if (this.previous?.date === dayBefore) {
      return this.previous;
    }

    const row = this.store.getRow(dayBefore);
    if (row && row.base === this.base) {
      return rowToSnapshot(row);
    }
    return null;
  }
}
