import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { resolveDateRange } from '@/core/date_range';
import { InvalidCurrencyError, TransportError } from '@/core/errors';
import { openDatabase } from '@/data/db';
import { RateRepository } from '@/data/repositories/rate_repo';
import { UpdatePoller, type UpdatePollerOptions } from '@/sync/poller';
import { ReconciliationEngine } from '@/sync/reconcile';
import { FakeRateSource, dayRates } from '../helpers/fake_source';

let db: Database.Database;
let repo: RateRepository;

const SUNDAY_NOON = new Date(2024, 0, 7, 12, 0);

function makePoller(source: FakeRateSource, overrides: Partial<UpdatePollerOptions> = {}) {
  return new UpdatePoller(repo, source, {
    base: 'USD',
    startDate: '2024-01-01',
    pollIntervalMs: 1000,
    now: () => SUNDAY_NOON,
    sleep: async () => undefined,
    ...overrides,
  });
}

describe('UpdatePoller', () => {
  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new RateRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  async function seedThrough(end: string) {
    await new ReconciliationEngine(repo, new FakeRateSource()).reconcile(
      resolveDateRange('2024-01-01', end),
      'USD'
    );
  }

  it('starts from the day after the last cached date', async () => {
    await seedThrough('2024-01-03');
    expect(makePoller(new FakeRateSource()).getCursor()).toBe('2024-01-04');
  });

  it('adds exactly one day per wake-up until it reaches today', async () => {
    await seedThrough('2024-01-03');
    const source = new FakeRateSource();
    const poller = makePoller(source);

    expect(await poller.tick()).toEqual({
      status: 'inserted',
      date: '2024-01-04',
      origin: 'fetched',
      cursor: '2024-01-05',
    });
    expect(await poller.tick()).toEqual({
      status: 'inserted',
      date: '2024-01-05',
      origin: 'fetched',
      cursor: '2024-01-06',
    });
    expect(await poller.tick()).toEqual({
      status: 'inserted',
      date: '2024-01-06',
      origin: 'carried',
      cursor: '2024-01-07',
    });
    expect(await poller.tick()).toEqual({ status: 'waiting', cursor: '2024-01-07' });

    expect(source.calledDates()).toEqual(['2024-01-04', '2024-01-05']);
    expect(repo.getRow('2024-01-06')?.rates).toEqual({ ...dayRates('2024-01-05', 'USD'), USD: 1 });
    expect(repo.dateBounds()).toEqual({ min: '2024-01-01', max: '2024-01-06' });
  });

  it('bootstraps an empty cache from the start date', async () => {
    const source = new FakeRateSource();
    const poller = makePoller(source, { now: () => new Date(2024, 0, 3, 9, 0) });

    expect(await poller.tick()).toMatchObject({ status: 'inserted', date: '2024-01-01' });
    expect(await poller.tick()).toMatchObject({ status: 'inserted', date: '2024-01-02' });
    expect(await poller.tick()).toEqual({ status: 'waiting', cursor: '2024-01-03' });
    expect(repo.currencyColumns()).toEqual(['CAD', 'EUR', 'GBP', 'USD']);
  });

  it('sleeps between wake-ups and stops when the signal aborts', async () => {
    await seedThrough('2024-01-03');
    const controller = new AbortController();
    let naps = 0;
    const sleep = vi.fn(async (ms: number, signal?: AbortSignal) => {
      naps++;
      if (naps === 2) controller.abort();
    });
    const poller = makePoller(new FakeRateSource(), { sleep });

    const summary = await poller.run(controller.signal);

    expect(summary).toEqual({ wakeUps: 2, inserted: 2, cursor: '2024-01-06' });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls[0][0]).toBe(1000);
    expect(sleep.mock.calls[0][1]).toBe(controller.signal);
  });

  it('does nothing when started with an aborted signal', async () => {
    await seedThrough('2024-01-03');
    const source = new FakeRateSource();
    const controller = new AbortController();
    controller.abort();

    const summary = await makePoller(source).run(controller.signal);

    expect(summary).toEqual({ wakeUps: 0, inserted: 0, cursor: '2024-01-04' });
    expect(source.calls).toEqual([]);
  });

  it('stops on the first provider error', async () => {
    await seedThrough('2024-01-03');
    const source = new FakeRateSource();
    const failure = new TransportError('timeout', 'fake', '2024-01-05', 'USD');
    source.failOn('2024-01-05', failure);
    const controller = new AbortController();

    await expect(makePoller(source).run(controller.signal)).rejects.toBe(failure);
    expect(repo.dateBounds()).toEqual({ min: '2024-01-01', max: '2024-01-04' });
  });

  it('validates filter currencies before the first wake-up', async () => {
    await seedThrough('2024-01-03');
    const source = new FakeRateSource();

    await expect(makePoller(source, { currencies: ['CHF'] }).run()).rejects.toBeInstanceOf(
      InvalidCurrencyError
    );
    expect(source.calls).toEqual([]);
  });
});
