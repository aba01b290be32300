/**
 * Chart data selection from the rate cache.
 *
 * The requested range must lie inside the cached range with no missing
 * dates. Weekend dates are plotted and may be picked as tick labels.
 */

import type { DateRange } from '@/core/date_range';
import { DateNotInCacheError } from '@/core/errors';
import type { IsoDate } from '@/core/time';
import type { RateStore } from '@/data/repositories/rate_repo';
import type { CurrencyCode } from '@/providers/types';
import { validateCurrencies } from '@/sync/currencies';

export interface ChartPoint {
  date: IsoDate;
  values: Record<CurrencyCode, number | null>;
}

export interface ChartSeries {
  base: CurrencyCode;
  currencies: CurrencyCode[];
  points: ChartPoint[];
  ticks: IsoDate[];
}

export const DEFAULT_MAX_TICKS = 8;

/**
 * Up to `maxTicks` evenly spaced entries, first and last always included.
 */
export function pickTicks(dates: IsoDate[], maxTicks: number = DEFAULT_MAX_TICKS): IsoDate[] {
  if (dates.length === 0) return [];

  const bins = Math.max(1, Math.min(Math.floor(maxTicks), dates.length));
  if (bins === 1) return [dates[0]];

  const last = dates.length - 1;
  return Array.from({ length: bins }, (_, i) => dates[Math.floor((i * last) / (bins - 1))]);
}

export function chartTitle(series: Pick<ChartSeries, 'base' | 'currencies'>): string {
  const others = series.currencies.filter((code) => code !== series.base);
  return `Exchange Rates for ${others.join(', ')}\nWhen Base Rate is ${series.base} Currency`;
}

export function buildChartSeries(
  store: RateStore,
  range: DateRange,
  base: CurrencyCode,
  currencies: CurrencyCode[],
  maxTicks: number = DEFAULT_MAX_TICKS
): ChartSeries {
  const bounds = store.dateBounds();
  if (range.length === 0 || !bounds) {
    throw new DateNotInCacheError(range[0] ?? '', 'empty', store.tableName);
  }

  const start = range[0];
  const end = range[range.length - 1];
  if (start < bounds.min) {
    throw new DateNotInCacheError(start, 'start', store.tableName);
  }
  if (end > bounds.max) {
    throw new DateNotInCacheError(end, 'end', store.tableName);
  }

  const selected = currencies.includes(base) ? [...currencies] : [...currencies, base];
  validateCurrencies(selected, store.currencyColumns());

  const rows = new Map(store.getRows(start, end).map((row) => [row.date, row]));
  const points: ChartPoint[] = range.map((date) => {
    const row = rows.get(date);
    if (!row) {
      throw new DateNotInCacheError(date, 'gap', store.tableName);
    }
    const values: Record<CurrencyCode, number | null> = {};
    for (const code of selected) {
      values[code] = row.rates[code] ?? null;
    }
    return { date, values };
  });

  return {
    base,
    currencies: selected,
    points,
    ticks: pickTicks(range, maxTicks),
  };
}
