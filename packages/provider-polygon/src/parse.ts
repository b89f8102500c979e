/**
 * Parsing utilities for Polygon.io API responses.
 *
 * This module converts Polygon.io aggregates bodies into the canonical Bar
 * format used by @mdd/market-data-core.
 */

import { ProviderError, type Bar, type Granularity } from '@mdd/contracts';
import { isRecord, truncateTimestamp, validateBar } from '@mdd/market-data-core';
import type { PolygonAggregate } from './types.js';

/**
 * Statuses that carry usable results. DELAYED is returned to plans with
 * delayed data and is otherwise identical to OK.
 */
const ACCEPTED_STATUSES = new Set(['OK', 'DELAYED']);

type RequiredField = keyof Pick<PolygonAggregate, 't' | 'o' | 'h' | 'l' | 'c' | 'v'>;

const FIELD_NAMES: Record<RequiredField, string> = {
  t: 'timestamp',
  o: 'open',
  h: 'high',
  l: 'low',
  c: 'close',
  v: 'volume',
};

/**
 * One parsed aggregates page.
 */
export interface PolygonPage {
  bars: Bar[];

  /** next_url as sent by Polygon (no API key) */
  nextUrl?: string;
}

function fail(message: string, data: Record<string, unknown> = {}): never {
  throw new ProviderError(message, { provider: 'polygon', ...data });
}

/**
 * Parses a Polygon.io aggregates body into bars and the next-page URL.
 *
 * Handles both intraday (minute) and daily granularities. Timestamps are
 * truncated to the bucket start in UTC, so daily bars stamped at New York
 * midnight land on 00:00Z.
 *
 * @param body - Decoded JSON body
 * @param granularity - Granularity of the request
 * @returns Bars sorted by timestamp ascending, and next_url when present
 *
 * @throws ProviderError if the status is not OK/DELAYED or the body is malformed
 *
 * @example
 * ```typescript
 * const page = parseAggregatesResponse({
 *   status: 'OK',
 *   ticker: 'AAPL',
 *   results: [{ t: 1704085200000, o: 185, h: 186, l: 184.5, c: 185.5, v: 1000000 }]
 * }, 'day');
 * // page.bars[0].timestamp === Date.UTC(2024, 0, 1)
 * ```
 */
export function parseAggregatesResponse(body: unknown, granularity: Granularity): PolygonPage {
  if (!isRecord(body)) {
    fail('Polygon.io response is not a JSON object', { actualType: typeof body });
  }

  const status = body['status'];
  if (typeof status === 'string' && !ACCEPTED_STATUSES.has(status)) {
    const detail = body['error'] ?? body['message'];
    fail(
      `Polygon API returned error status: ${status}${typeof detail === 'string' ? ` (${detail})` : ''}`,
      { status, requestId: body['request_id'] }
    );
  }

  const results = body['results'];
  if (results !== undefined && results !== null && !Array.isArray(results)) {
    fail("Field 'results' must be an array", { actualType: typeof results });
  }

  const bars: Bar[] = [];
  const entries: unknown[] = Array.isArray(results) ? results : [];
  entries.forEach((entry, index) => {
    try {
      bars.push(parseAggregate(entry, granularity));
    } catch (error) {
      fail(
        `Failed to parse aggregate at index ${index}: ${error instanceof Error ? error.message : String(error)}`,
        { field: `results[${index}]` }
      );
    }
  });

  // Should already be sorted (sort=asc), but ensure
  bars.sort((a, b) => a.timestamp - b.timestamp);

  const nextUrl = body['next_url'];
  if (typeof nextUrl === 'string' && nextUrl.length > 0) {
    return { bars, nextUrl };
  }
  return { bars };
}

function readNumber(aggregate: Record<string, unknown>, field: RequiredField): number {
  const value = aggregate[field];
  if (value === undefined || value === null) {
    fail(`Missing required field: ${field}`, { field });
  }
  if (typeof value !== 'number') {
    fail(`Field '${field}' (${FIELD_NAMES[field]}) must be a number`, {
      field,
      expectedType: 'number',
      actualType: typeof value,
    });
  }
  return value;
}

/**
 * Parses a single Polygon aggregate into a Bar.
 *
 * Polygon's compact field names (t, o, h, l, c, v) map onto the canonical
 * Bar; vw and n are accepted and dropped.
 *
 * @throws ProviderError if a required field is missing, not a number, or
 *   the OHLCV invariants do not hold
 *
 * @example
 * ```typescript
 * parseAggregate({ t: 1704205800000, o: 185, h: 186, l: 184.5, c: 185.5, v: 12000, vw: 185.2, n: 310 }, 'minute');
 * // { timestamp: 1704205800000, open: 185, high: 186, low: 184.5, close: 185.5, volume: 12000 }
 * ```
 */
export function parseAggregate(aggregate: unknown, granularity: Granularity): Bar {
  if (!isRecord(aggregate)) {
    fail('Aggregate must be an object', { actualType: typeof aggregate });
  }

  return validateBar(
    {
      timestamp: truncateTimestamp(readNumber(aggregate, 't'), granularity),
      open: readNumber(aggregate, 'o'),
      high: readNumber(aggregate, 'h'),
      low: readNumber(aggregate, 'l'),
      close: readNumber(aggregate, 'c'),
      volume: readNumber(aggregate, 'v'),
    },
    'polygon'
  );
}
