/**
 * Daily update poller
 *
 * Extends the cache one calendar day at a time as the wall clock moves past
 * the last cached day. Each wake-up handles at most one date, so a poller
 * that fell behind catches up over successive wake-ups.
 */

import { nextDay, today, type IsoDate } from '@/core/time';
import type { RateStore } from '@/data/repositories/rate_repo';
import type { CurrencyCode, RateSnapshotSource } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';
import { sleep as abortableSleep } from '@/utils/throttler';
import { validateCurrencies } from './currencies';
import { SnapshotResolver, snapshotToRow, type SnapshotOrigin } from './snapshot_resolver';

const logger = createChildLogger('poller');

export interface UpdatePollerOptions {
  base: CurrencyCode;
  /** Where to begin when the cache is empty */
  startDate: IsoDate;
  pollIntervalMs: number;
  currencies?: CurrencyCode[];
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type PollTick =
  | { status: 'waiting'; cursor: IsoDate }
  | { status: 'inserted' | 'exists'; date: IsoDate; origin: SnapshotOrigin; cursor: IsoDate };

export interface PollSummary {
  wakeUps: number;
  inserted: number;
  cursor: IsoDate;
}

export class UpdatePoller {
  private cursor: IsoDate | null = null;
  private wakeUps = 0;
  private inserted = 0;
  private readonly resolver: SnapshotResolver;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly store: RateStore,
    source: RateSnapshotSource,
    private readonly options: UpdatePollerOptions
  ) {
    this.resolver = new SnapshotResolver(store, source, options.base);
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? abortableSleep;
  }

  getCursor(): IsoDate {
    if (this.cursor === null) {
      const bounds = this.store.dateBounds();
      this.cursor = bounds ? nextDay(bounds.max) : this.options.startDate;
    }
    return this.cursor;
  }

  async tick(): Promise<PollTick> {
    this.wakeUps++;
    const cursor = this.getCursor();

    if (today(this.now()) <= cursor) {
      return { status: 'waiting', cursor };
    }

    const { snapshot, origin } = await this.resolver.resolve(cursor);

    if (!this.store.hasSchema()) {
      this.store.ensureSchema(Object.keys(snapshot.rates));
      this.checkCurrencies();
    }

    const added = this.store.insertIfAbsent(snapshotToRow(snapshot, this.store.currencyColumns()));
    if (added) this.inserted++;
    this.cursor = nextDay(cursor);

    logger.info({ date: cursor, base: this.options.base, origin, added }, 'Table updated');
    return { status: added ? 'inserted' : 'exists', date: cursor, origin, cursor: this.cursor };
  }

  /**
   * Poll until `signal` aborts. Provider errors end the loop by rejecting.
   */
  async run(signal?: AbortSignal): Promise<PollSummary> {
    this.checkCurrencies();
    logger.info(
      { base: this.options.base, cursor: this.getCursor(), intervalMs: this.options.pollIntervalMs },
      'Daily update has begun'
    );

    while (!signal?.aborted) {
      await this.tick();
      if (signal?.aborted) break;
      await this.sleep(this.options.pollIntervalMs, signal);
    }

    const summary: PollSummary = {
      wakeUps: this.wakeUps,
      inserted: this.inserted,
      cursor: this.getCursor(),
    };
    logger.info(summary, 'Daily update stopped');
    return summary;
  }

  private checkCurrencies(): void {
    const { currencies } = this.options;
    if (!currencies || currencies.length === 0 || !this.store.hasSchema()) return;
    validateCurrencies(currencies, this.store.currencyColumns());
  }
}
