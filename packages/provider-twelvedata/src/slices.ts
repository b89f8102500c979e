/**
 * @fileoverview Date-range slicing for Twelve Data pagination.
 *
 * time_series returns at most 5000 rows per call and has no continuation
 * token, so a long range is walked in calendar-day slices. The cursor
 * handed to the pager is the start date of the next slice.
 *
 * @module @mdd/provider-twelvedata/slices
 */

import { ProviderError, type FetchRequest, type Granularity } from '@mdd/contracts';
import { addDays, isCalendarDate } from '@mdd/market-data-core';
import type { DateSlice } from './types.js';

/**
 * Rows per call.
 */
export const TWELVEDATA_OUTPUT_SIZE = 5000;

/**
 * Slice length in days. 3 x 1440 minute bars stay below the row cap.
 */
export const SLICE_DAYS: Record<Granularity, number> = {
  minute: 3,
  day: 5000,
};

/**
 * Resolves the slice a request covers for a given cursor.
 *
 * @throws ProviderError if the cursor is not a date inside the range
 *
 * @example
 * ```typescript
 * sliceFor({ ...request, from: '2024-01-01', to: '2024-01-05', granularity: 'minute' });
 * // { start: '2024-01-01', end: '2024-01-03', next: '2024-01-04' }
 * ```
 */
export function sliceFor(request: FetchRequest, cursor?: string): DateSlice {
  const start = cursor ?? request.from;
  if (!isCalendarDate(start) || start < request.from || start > request.to) {
    throw new ProviderError(`Invalid Twelve Data cursor "${start}"`, {
      provider: 'twelvedata',
      from: request.from,
      to: request.to,
    });
  }

  const candidate = addDays(start, SLICE_DAYS[request.granularity] - 1);
  const end = candidate < request.to ? candidate : request.to;

  return end < request.to ? { start, end, next: addDays(end, 1) } : { start, end };
}
