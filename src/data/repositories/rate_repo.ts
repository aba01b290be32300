/**
 * Rate repository for the daily exchange rate table
 *
 * One row per calendar date; one REAL column per currency code. The column
 * set is fixed when the table is created and only changes when the table is
 * dropped by `purgeAll` and created again.
 */

import type Database from 'better-sqlite3';
import type { IsoDate } from '@/core/time';
import type { CurrencyCode } from '@/providers/types';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_repo');

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const CURRENCY_CODE = /^[A-Z]{3}$/;
const FIXED_COLUMNS = new Set(['date', 'base']);

export interface CachedRateRow {
  date: IsoDate;
  base: CurrencyCode;
  rates: Record<CurrencyCode, number | null>;
}

export interface DateBounds {
  min: IsoDate;
  max: IsoDate;
}

/**
 * Storage contract the reconciliation engine and poller rely on.
 */
export interface RateStore {
  readonly tableName: string;
  hasSchema(): boolean;
  currencyColumns(): CurrencyCode[];
  ensureSchema(currencyKeys: CurrencyCode[]): void;
  isEmpty(): boolean;
  count(): number;
  existingBase(): CurrencyCode | null;
  dateBounds(): DateBounds | null;
  existingDates(): Set<IsoDate>;
  getRow(date: IsoDate): CachedRateRow | null;
  getRows(fromDate: IsoDate, toDate: IsoDate): CachedRateRow[];
  purgeAll(): number;
  insertIfAbsent(row: CachedRateRow): boolean;
}

type RawRow = Record<string, unknown>;

function quoteIdentifier(name: string): string {
  return `"${name}"`;
}

export function isCurrencyCode(value: string): boolean {
  return CURRENCY_CODE.test(value);
}

export class RateRepository implements RateStore {
  private columnsCache: CurrencyCode[] | null = null;

  constructor(
    private readonly db: Database.Database,
    readonly tableName: string = 'exchange_rates'
  ) {
    if (!TABLE_NAME.test(tableName)) {
      throw new Error(`Invalid table name: ${tableName}`);
    }
  }

  private get table(): string {
    return quoteIdentifier(this.tableName);
  }

  hasSchema(): boolean {
    const row = this.db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
      .get(this.tableName) as { name: string } | undefined;
    return row !== undefined;
  }

  currencyColumns(): CurrencyCode[] {
    if (this.columnsCache) return [...this.columnsCache];
    if (!this.hasSchema()) return [];

    const info = this.db.prepare(`PRAGMA table_info(${this.table})`).all() as Array<{
      name: string;
    }>;
    this.columnsCache = info.map((c) => c.name).filter((name) => !FIXED_COLUMNS.has(name));
    return [...this.columnsCache];
  }

  ensureSchema(currencyKeys: CurrencyCode[]): void {
    if (this.hasSchema()) return;

    const columns = [...new Set(currencyKeys)].sort();
    const invalid = columns.filter((code) => !isCurrencyCode(code));
    if (invalid.length > 0) {
      throw new Error(`Cannot create columns for invalid currency codes: ${invalid.join(', ')}`);
    }
    if (columns.length === 0) {
      throw new Error('Cannot create a rate table without currency columns');
    }

    const definitions = [
      'date TEXT PRIMARY KEY',
      'base TEXT NOT NULL',
      ...columns.map((code) => `${quoteIdentifier(code)} REAL`),
    ];
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${this.table} (\n  ${definitions.join(',\n  ')}\n)`);
    this.columnsCache = columns;

    logger.info({ table: this.tableName, currencies: columns.length }, 'Created rate table');
  }

  count(): number {
    if (!this.hasSchema()) return 0;
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${this.table}`).get() as {
      count: number;
    };
    return row.count;
  }

  isEmpty(): boolean {
    return this.count() === 0;
  }

  existingBase(): CurrencyCode | null {
    if (!this.hasSchema()) return null;

    const rows = this.db
      .prepare(`SELECT base, COUNT(*) as count FROM ${this.table} GROUP BY base ORDER BY count DESC`)
      .all() as Array<{ base: string; count: number }>;

    if (rows.length > 1) {
      logger.warn({ table: this.tableName, bases: rows }, 'Rate table holds more than one base currency');
    }
    return rows[0]?.base ?? null;
  }

  dateBounds(): DateBounds | null {
    if (!this.hasSchema()) return null;

    const row = this.db
      .prepare(`SELECT MIN(date) as min, MAX(date) as max FROM ${this.table}`)
      .get() as { min: string | null; max: string | null };

    if (row.min === null || row.max === null) return null;
    return { min: row.min, max: row.max };
  }

  existingDates(): Set<IsoDate> {
    if (!this.hasSchema()) return new Set();

    const rows = this.db.prepare(`SELECT date FROM ${this.table}`).all() as Array<{ date: string }>;
    return new Set(rows.map((r) => r.date));
  }

  getRow(date: IsoDate): CachedRateRow | null {
    if (!this.hasSchema()) return null;

    const row = this.db.prepare(`SELECT * FROM ${this.table} WHERE date = ?`).get(date) as
      | RawRow
      | undefined;
    return row ? this.toCachedRow(row) : null;
  }

  getRows(fromDate: IsoDate, toDate: IsoDate): CachedRateRow[] {
    if (!this.hasSchema()) return [];

    const rows = this.db
      .prepare(`SELECT * FROM ${this.table} WHERE date BETWEEN ? AND ? ORDER BY date ASC`)
      .all(fromDate, toDate) as RawRow[];
    return rows.map((row) => this.toCachedRow(row));
  }

  /**
   * Drop the table with every row in it. The next `ensureSchema` call
   * decides the new column set.
   */
  purgeAll(): number {
    const removed = this.count();
    this.db.exec(`DROP TABLE IF EXISTS ${this.table}`);
    this.columnsCache = null;

    logger.info({ table: this.tableName, removed }, 'Purged rate table');
    return removed;
  }

  insertIfAbsent(row: CachedRateRow): boolean {
    const columns = this.currencyColumns();
    if (columns.length === 0) {
      throw new Error(`Rate table '${this.tableName}' does not exist; call ensureSchema first`);
    }

    const names = ['date', 'base', ...columns.map(quoteIdentifier)];
    const placeholders = names.map(() => '?').join(', ');
    const values = [row.date, row.base, ...columns.map((code) => row.rates[code] ?? null)];

    const result = this.db
      .prepare(`INSERT OR IGNORE INTO ${this.table} (${names.join(', ')}) VALUES (${placeholders})`)
      .run(...values);

    if (result.changes === 0) {
      logger.debug({ date: row.date }, 'Row already cached, insert skipped');
      return false;
    }
    return true;
  }

  private toCachedRow(raw: RawRow): CachedRateRow {
    const rates: Record<CurrencyCode, number | null> = {};
    for (const code of this.currencyColumns()) {
      const value = raw[code];
      rates[code] = typeof value === 'number' ? value : null;
    }
    return {
      date: String(raw.date),
      base: String(raw.base),
      rates,
    };
  }
}
