/**
 * Turns a start/end pair into an inclusive, contiguous sequence of calendar
 * dates. Weekends are included; trading-day handling happens downstream.
 */

import { addDays, differenceInCalendarDays, isBefore } from 'date-fns';
import { InvalidRangeError } from './errors';
import { formatDate, toCalendarDate, type IsoDate } from './time';

export type DateInput = Date | string;

export type DateRange = IsoDate[];

function describeInput(value: DateInput): string {
  return typeof value === 'string' ? value : String(value);
}

export function resolveDateRange(start: DateInput, end: DateInput): DateRange {
  const startDate = toCalendarDate(start);
  const endDate = toCalendarDate(end);
  const startLabel = describeInput(start);
  const endLabel = describeInput(end);

  if (!startDate) {
    throw new InvalidRangeError(
      `Start date '${startLabel}' is not a valid date. Form of date should be YYYY-MM-DD.`,
      startLabel,
      endLabel
    );
  }
  if (!endDate) {
    throw new InvalidRangeError(
      `End date '${endLabel}' is not a valid date. Form of date should be YYYY-MM-DD.`,
      startLabel,
      endLabel
    );
  }

  if (!isBefore(startDate, endDate)) {
    throw new InvalidRangeError(
      `Start date '${formatDate(startDate)}' must be before the end date '${formatDate(endDate)}'.`,
      formatDate(startDate),
      formatDate(endDate)
    );
  }

  const span = differenceInCalendarDays(endDate, startDate);
  return Array.from({ length: span + 1 }, (_, offset) => formatDate(addDays(startDate, offset)));
}
