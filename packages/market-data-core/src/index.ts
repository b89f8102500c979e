/**
 * @mdd/market-data-core
 *
 * Provider-agnostic building blocks of a download: request validation, UTC
 * calendar math, clipping and de-duplication, day grouping and the pager.
 *
 * @example
 * ```typescript
 * import { validateFetchRequest, fetchAllBars, normalizeBars } from "@mdd/market-data-core";
 *
 * const request = validateFetchRequest(input);
 * const { bars } = await fetchAllBars(provider, request, { rateLimitWaitMs: 12_000 });
 * const clean = normalizeBars(bars, request.from, request.to).bars;
 * ```
 *
 * @packageDocumentation
 */

export {
  MINUTE_MS,
  DAY_MS,
  granularityToMillis,
  truncateTimestamp,
  parseCalendarDate,
  isCalendarDate,
  dayKey,
  addDays,
  listCalendarDays,
  rangeBounds,
} from './timeframe.js';

export { clipBars, normalizeBars } from './clip.js';
export type { NormalizeResult } from './clip.js';

export { groupBarsByDay } from './group.js';
export type { DayGroup } from './group.js';

export { validateFetchRequest, validateRequestFields, validateBar } from './validate.js';
export type { FetchRequestInput, RequestFields } from './validate.js';

export { fetchAllBars, DEFAULT_MAX_PAGES, DEFAULT_MAX_RETRIES } from './pager.js';
export type { PagerOptions, PagerResult, Sleep } from './pager.js';

export { getJson, parseRetryAfter, isRecord, DEFAULT_TIMEOUT_MS } from './http.js';
export type { FetchFn, HttpGetOptions } from './http.js';
