/**
 * Time utilities for consistent date handling
 *
 * Calendar dates travel through the system as `YYYY-MM-DD` strings in local
 * time; date-fns does the arithmetic.
 */

import { addDays, format, isValid, isWeekend, parseISO, startOfDay, subDays } from 'date-fns';

export type IsoDate = string;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function getCurrentDate(): Date {
  return new Date();
}

export function formatDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a strict `YYYY-MM-DD` string. Returns null for malformed or
 * impossible dates such as 2024-02-30.
 */
export function parseDate(dateStr: string): Date | null {
  const trimmed = dateStr.trim();
  if (!ISO_DATE.test(trimmed)) return null;

  const parsed = parseISO(trimmed);
  if (!isValid(parsed) || formatDate(parsed) !== trimmed) return null;
  return parsed;
}

export function isIsoDate(value: string): boolean {
  return parseDate(value) !== null;
}

/**
 * A `Date` is read as the local calendar day it falls on, so a UTC midnight
 * such as `new Date('2024-01-01')` lands on 2023-12-31 west of Greenwich.
 * Pass `YYYY-MM-DD` strings to avoid the offset.
 */
export function toCalendarDate(value: Date | string): Date | null {
  if (typeof value === 'string') {
    return parseDate(value);
  }
  return isValid(value) ? startOfDay(value) : null;
}

export function isWeekendDate(date: IsoDate): boolean {
  const parsed = parseDate(date);
  return parsed !== null && isWeekend(parsed);
}

export function nextDay(date: IsoDate): IsoDate {
  return formatDate(addDays(parseISO(date), 1));
}

export function previousDay(date: IsoDate): IsoDate {
  return formatDate(subDays(parseISO(date), 1));
}

export function today(now: Date = getCurrentDate()): IsoDate {
  return formatDate(now);
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}
