/**
 * Scripted rate provider for tests. Rates are derived from the day of month
 * so every date gets a distinct, reproducible snapshot.
 */

import type { IsoDate } from '@/core/time';
import type { CurrencyCode, RateSnapshot, RateSnapshotSource } from '@/providers/types';

const BASE_TABLE: Record<CurrencyCode, Record<CurrencyCode, number>> = {
  USD: { EUR: 0.9, CAD: 1.3, GBP: 0.8 },
  EUR: { USD: 1.1, CAD: 1.45, GBP: 0.85 },
};

export function dayRates(date: IsoDate, base: CurrencyCode): Record<CurrencyCode, number> {
  const day = Number(date.slice(8, 10));
  const table = BASE_TABLE[base] ?? BASE_TABLE.USD;
  const rates: Record<CurrencyCode, number> = {};
  for (const [code, value] of Object.entries(table)) {
    rates[code] = value + day / 1000;
  }
  return rates;
}

export class FakeRateSource implements RateSnapshotSource {
  readonly name = 'fake';
  readonly calls: Array<{ date: IsoDate; base: CurrencyCode }> = [];
  private readonly failures = new Map<IsoDate, Error>();

  constructor(
    private readonly ratesFor: (date: IsoDate, base: CurrencyCode) => Record<CurrencyCode, number> = dayRates
  ) {}

  failOn(date: IsoDate, error: Error): void {
    this.failures.set(date, error);
  }

  calledDates(): IsoDate[] {
    return this.calls.map((call) => call.date);
  }

  async fetchSnapshot(date: IsoDate, base: CurrencyCode): Promise<RateSnapshot> {
    this.calls.push({ date, base });
    const failure = this.failures.get(date);
    if (failure) {
      throw failure;
    }
    return { date, base, rates: this.ratesFor(date, base) };
  }

  getRequestCount(): number {
    return this.calls.length;
  }
}
