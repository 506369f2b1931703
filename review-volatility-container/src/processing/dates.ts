/**
 * UTC date helpers.
 *
 * Review timestamps are UTC; week boundaries must not depend on the host time zone.
 */

import { UTCDate } from '@date-fns/utc';
import { addWeeks, formatISO, getISOWeek, getISOWeekYear, startOfISOWeek, subDays } from 'date-fns';

export interface IsoWeek {
  label: string;
  start: Date;
}

export function isoWeekOf(date: Date): IsoWeek {
  const utc = new UTCDate(date.getTime());
  const week = String(getISOWeek(utc)).padStart(2, '0');
  return {
    label: `${getISOWeekYear(utc)}-W${week}`,
    start: new Date(startOfISOWeek(utc).getTime()),
  };
}

/**
 * Consecutive ISO weeks from the week of `first` through the week of `last`
 */
export function isoWeekRange(first: Date, last: Date): IsoWeek[] {
  const weeks: IsoWeek[] = [];
  const end = isoWeekOf(last).start.getTime();
  let cursor = new UTCDate(isoWeekOf(first).start.getTime());

  while (cursor.getTime() <= end) {
    weeks.push(isoWeekOf(cursor));
    cursor = addWeeks(cursor, 1);
  }
  return weeks;
}

export function windowStart(now: Date, daysBack: number): Date {
  return new Date(subDays(new UTCDate(now.getTime()), daysBack).getTime());
}

export function isoDate(date: Date): string {
  return formatISO(new UTCDate(date.getTime()), { representation: 'date' });
}
