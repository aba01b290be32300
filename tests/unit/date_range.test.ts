import { describe, expect, it } from 'vitest';
import { differenceInCalendarDays, parseISO } from 'date-fns';
import { resolveDateRange } from '@/core/date_range';
import { InvalidRangeError } from '@/core/errors';
import { nextDay } from '@/core/time';

describe('resolveDateRange', () => {
  it('includes both ends and every day in between', () => {
    expect(resolveDateRange('2024-01-01', '2024-01-07')).toEqual([
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
      '2024-01-04',
      '2024-01-05',
      '2024-01-06',
      '2024-01-07',
    ]);
  });

  it('crosses month ends and leap days', () => {
    expect(resolveDateRange('2024-02-27', '2024-03-02')).toEqual([
      '2024-02-27',
      '2024-02-28',
      '2024-02-29',
      '2024-03-01',
      '2024-03-02',
    ]);
  });

  it('accepts Date values alongside strings', () => {
    expect(resolveDateRange(new Date(2024, 0, 30, 15, 45), '2024-02-02')).toEqual([
      '2024-01-30',
      '2024-01-31',
      '2024-02-01',
      '2024-02-02',
    ]);
  });

  it('does not skip or repeat days around daylight saving changes', () => {
    expect(resolveDateRange('2024-03-09', '2024-03-12')).toEqual([
      '2024-03-09',
      '2024-03-10',
      '2024-03-11',
      '2024-03-12',
    ]);
    expect(resolveDateRange('2024-10-26', '2024-10-28')).toEqual([
      '2024-10-26',
      '2024-10-27',
      '2024-10-28',
    ]);
  });

  it.each([
    ['2023-12-30', '2024-01-02'],
    ['2019-05-01', '2019-08-15'],
    ['2020-02-01', '2021-03-01'],
  ])('produces a contiguous range from %s to %s', (start, end) => {
    const range = resolveDateRange(start, end);

    expect(range).toHaveLength(differenceInCalendarDays(parseISO(end), parseISO(start)) + 1);
    expect(range[0]).toBe(start);
    expect(range[range.length - 1]).toBe(end);
    for (let i = 1; i < range.length; i++) {
      expect(range[i]).toBe(nextDay(range[i - 1]));
    }
  });

  it('rejects a start equal to the end', () => {
    expect(() => resolveDateRange('2024-01-05', '2024-01-05')).toThrow(InvalidRangeError);
  });

  it('rejects a start after the end', () => {
    expect(() => resolveDateRange('2024-01-06', '2024-01-05')).toThrow(
      "Start date '2024-01-06' must be before the end date '2024-01-05'."
    );
  });

  it.each(['2024-13-01', '2024-02-30', '01/05/2024', ''])('rejects malformed date %j', (value) => {
    expect(() => resolveDateRange(value, '2025-01-01')).toThrow(InvalidRangeError);
  });
});
