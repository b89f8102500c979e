/**
 * Partitioning of a bar sequence by UTC calendar day.
 */

import type { Bar } from '@mdd/contracts';
import { dayKey, listCalendarDays } from './timeframe.js';

export interface DayGroup {
  /** YYYY-MM-DD (UTC) */
  day: string;

  /** Bars of that day, in input order */
  bars: Bar[];
}

/**
 * Groups bars by UTC calendar day, with one group for every day of the
 * inclusive range [from, to] even when the day has no bars. Bars outside the
 * range are ignored.
 *
 * @example
 * ```typescript
 * groupBarsByDay(bars, '2024-01-01', '2024-01-03').map((g) => g.day);
 * // ['2024-01-01', '2024-01-02', '2024-01-03']
 * ```
 */
export function groupBarsByDay(bars: Bar[], from: string, to: string): DayGroup[] {
  const groups = new Map<string, Bar[]>();
  for (const day of listCalendarDays(from, to)) {
    groups.set(day, []);
  }

  for (const bar of bars) {
    groups.get(dayKey(bar.timestamp))?.push(bar);
  }

  return [...groups.entries()].map(([day, dayBars]) => ({ day, bars: dayBars }));
}
