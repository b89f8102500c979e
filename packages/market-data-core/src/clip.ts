/**
 * Bar clipping and de-duplication.
 *
 * Providers interpret date ranges in their own timezone, so a page can carry
 * bars that fall outside the requested UTC days, and overlapping slices can
 * repeat a bar. This module brings a fetched sequence back to the invariant:
 * ascending, unique timestamps inside [from 00:00Z, to 23:59:59.999Z].
 */

import type { Bar } from '@mdd/contracts';
import { rangeBounds } from './timeframe.js';

export interface NormalizeResult {
  bars: Bar[];

  /** Bars dropped because they fell outside the requested days */
  outOfRange: number;

  /** Bars dropped because an earlier bar had the same timestamp */
  duplicates: number;
}

/**
 * Clips bars to an inclusive timestamp range.
 *
 * Unlike a half-open window, both bounds are inclusive because they come from
 * calendar days: the last millisecond of `to` still belongs to the range.
 *
 * @param bars - Bars sorted ascending by timestamp
 * @param start - First included timestamp
 * @param end - Last included timestamp
 * @returns Sub-array of bars (a new array)
 *
 * Edge cases:
 * - Empty input: Returns empty array
 * - start > end: Returns empty array
 */
export function clipBars(bars: Bar[], start: number, end: number): Bar[] {
  if (bars.length === 0 || start > end) {
    return [];
  }

  const startIdx = lowerBound(bars, start);
  const endIdx = lowerBound(bars, end + 1);
  return bars.slice(startIdx, endIdx);
}

/**
 * Sorts (stable), clips to the calendar range and drops repeated timestamps,
 * keeping the first occurrence.
 *
 * @example
 * ```typescript
 * const { bars, outOfRange, duplicates } = normalizeBars(raw, '2024-01-02', '2024-01-02');
 * ```
 */
export function normalizeBars(bars: Bar[], from: string, to: string): NormalizeResult {
  const { start, end } = rangeBounds(from, to);
  const sorted = [...bars].sort((a, b) => a.timestamp - b.timestamp);
  const clipped = clipBars(sorted, start, end);

  const unique: Bar[] = [];
  let previous: number | undefined;
  for (const bar of clipped) {
    if (bar.timestamp === previous) {
      continue;
    }
    unique.push(bar);
    previous = bar.timestamp;
  }

  return {
    bars: unique,
    outOfRange: sorted.length - clipped.length,
    duplicates: clipped.length - unique.length,
  };
}

/**
 * Binary search: first index whose timestamp is >= target, or bars.length.
 */
function lowerBound(bars: Bar[], target: number): number {
  let left = 0;
  let right = bars.length;

  while (left < right) {
    const mid = (left + right) >>> 1;
    const bar = bars[mid];
    if (bar !== undefined && bar.timestamp < target) {
      left = mid + 1;
    } else {
      right = mid;
    }
  }

  return left;
}
