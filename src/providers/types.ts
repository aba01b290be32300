/**
 * Shared types for rate providers.
 *
 * A provider turns (date, base) into a snapshot of every currency it knows
 * for that date. The reconciliation engine only ever talks to this interface.
 */
import type { IsoDate } from '@/core/time';

export type CurrencyCode = string;

export interface RateSnapshot {
  /** Calendar date the snapshot was requested for */
  date: IsoDate;
  base: CurrencyCode;
  /** Units of each currency per one unit of `base` */
  rates: Record<CurrencyCode, number>;
  /** Date the provider reported; earlier than `date` on non-trading days */
  publishedDate?: IsoDate;
}

export interface RateSnapshotSource {
  readonly name: string;
  fetchSnapshot(date: IsoDate, base: CurrencyCode): Promise<RateSnapshot>;
  getRequestCount(): number;
}

/**
 * The base currency is always its own unit rate, whether or not the
 * provider listed it.
 */
export function withBaseRate(snapshot: RateSnapshot): RateSnapshot {
  return {
    ...snapshot,
    rates: { ...snapshot.rates, [snapshot.base]: 1.0 },
  };
}
