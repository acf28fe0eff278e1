import type { IsoDate } from './types';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function fromUtcParts(year: number, monthIndex: number, day: number): IsoDate {
  // setUTCFullYear normalizes overflowing months and days, which carries month and year
  // rollover, and unlike Date.UTC it does not map years 0-99 onto 1900-1999.
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date.toISOString().split('T')[0];
}

function toEpochMs(date: IsoDate): number {
  return Date.parse(`${date}T00:00:00Z`);
}

/**
 * Validates a `YYYY-MM-DD` string and returns it when it names a real calendar date.
 * `2025-02-29` and `2026-13-01` return undefined.
 */
export function parseIsoDate(value: string): IsoDate | undefined {
  const match = value.match(ISO_DATE_PATTERN);
  if (!match) {
    return undefined;
  }

  const [, year, month, day] = match.map(Number);
  const normalized = fromUtcParts(year, month - 1, day);
  return normalized === value ? normalized : undefined;
}

/** UTC calendar date of an instant; the time of day is discarded. */
export function utcDateOf(instant: Date): IsoDate {
  return instant.toISOString().split('T')[0];
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return utcDateOf(new Date(toEpochMs(date) + days * MS_PER_DAY));
}

export function yearOf(date: IsoDate): number {
  return Number(date.slice(0, 4));
}

/** 1-based month number. */
export function monthOf(date: IsoDate): number {
  return Number(date.slice(5, 7));
}

/** ISO weekday: Monday is 1, Sunday is 7. */
export function isoWeekday(date: IsoDate): number {
  const day = new Date(toEpochMs(date)).getUTCDay();
  return day === 0 ? 7 : day;
}

export function startOfIsoWeek(date: IsoDate): IsoDate {
  return addDays(date, 1 - isoWeekday(date));
}

export function firstDayOfMonth(year: number, month: number): IsoDate {
  return fromUtcParts(year, month - 1, 1);
}

export function lastDayOfMonth(year: number, month: number): IsoDate {
  // Day 0 of the following month is the last day of this one.
  return fromUtcParts(year, month, 0);
}

/** Number of calendar days in an inclusive range. */
export function countDays(start: IsoDate, end: IsoDate): number {
  return Math.round((toEpochMs(end) - toEpochMs(start)) / MS_PER_DAY) + 1;
}
