/**
 * Calendar and granularity utilities.
 *
 * This module provides functions for:
 * - Converting granularities to milliseconds
 * - Truncating timestamps to their bucket start
 * - Parsing, formatting and stepping YYYY-MM-DD calendar dates
 *
 * All functions work in UTC, the canonical timezone of the downloader.
 * Provider adapters convert vendor-local times to UTC before calling them.
 */

import type { Granularity } from '@mdd/contracts';

export const MINUTE_MS = 60_000;
export const DAY_MS = 86_400_000;

const GRANULARITY_MS: Record<Granularity, number> = {
  minute: MINUTE_MS,
  day: DAY_MS,
};

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Converts a granularity to its bucket length in milliseconds.
 *
 * @example
 * ```typescript
 * granularityToMillis('minute') // 60000
 * granularityToMillis('day')    // 86400000
 * ```
 */
export function granularityToMillis(granularity: Granularity): number {
  return GRANULARITY_MS[granularity];
}

/**
 * Truncates a timestamp to the start of its minute or UTC day.
 *
 * Polygon stamps daily bars at midnight New York time (e.g. 05:00Z), while
 * Twelve Data stamps them with a bare date. Truncation makes both land on
 * 00:00Z of the same day.
 *
 * @example
 * ```typescript
 * truncateTimestamp(Date.UTC(2024, 0, 2, 5), 'day') // Date.UTC(2024, 0, 2)
 * truncateTimestamp(Date.UTC(2024, 0, 2, 14, 30, 59), 'minute') // Date.UTC(2024, 0, 2, 14, 30)
 * ```
 */
export function truncateTimestamp(timestamp: number, granularity: Granularity): number {
  const size = GRANULARITY_MS[granularity];
  return Math.floor(timestamp / size) * size;
}

/**
 * Parses a YYYY-MM-DD calendar date to epoch milliseconds at 00:00Z.
 * Returns undefined for malformed strings and impossible dates (2024-02-30).
 */
export function parseCalendarDate(value: string): number | undefined {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const timestamp = Date.UTC(year, month - 1, day);
  const date = new Date(timestamp);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  return timestamp;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== undefined;
}

/**
 * Formats a timestamp as the YYYY-MM-DD of its UTC calendar day.
 *
 * @example
 * ```typescript
 * dayKey(Date.UTC(2024, 0, 2, 23, 59)) // '2024-01-02'
 * ```
 */
export function dayKey(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Adds whole days to a YYYY-MM-DD date.
 *
 * @throws RangeError if the input is not a calendar date
 */
export function addDays(date: string, days: number): string {
  const start = parseCalendarDate(date);
  if (start === undefined) {
    throw new RangeError(`Not a calendar date: ${date}`);
  }
  return dayKey(start + days * DAY_MS);
}

/**
 * Lists every calendar day of the inclusive range [from, to].
 * Returns an empty array when from > to.
 *
 * @example
 * ```typescript
 * listCalendarDays('2024-02-28', '2024-03-01')
 * // ['2024-02-28', '2024-02-29', '2024-03-01']
 * ```
 */
export function listCalendarDays(from: string, to: string): string[] {
  const days: string[] = [];
  const start = parseCalendarDate(from);
  const end = parseCalendarDate(to);
  if (start === undefined || end === undefined) {
    return days;
  }

  for (let ts = start; ts <= end; ts += DAY_MS) {
    days.push(dayKey(ts));
  }
  return days;
}

/**
 * Returns the inclusive millisecond bounds [from 00:00:00.000Z, to 23:59:59.999Z].
 *
 * @throws RangeError if either bound is not a calendar date
 */
export function rangeBounds(from: string, to: string): { start: number; end: number } {
  const start = parseCalendarDate(from);
  const end = parseCalendarDate(to);
  if (start === undefined || end === undefined) {
    throw new RangeError(`Invalid calendar range: ${from}..${to}`);
  }
  return { start, end: end + DAY_MS - 1 };
}
