/**
 * @fileoverview Response parser for Twelve Data time_series.
 *
 * Converts string-typed rows into canonical bars, validates data integrity
 * and turns in-body errors into typed errors.
 *
 * @module @mdd/provider-twelvedata/parser
 */

import { ProviderError, type Bar, type Granularity } from '@mdd/contracts';
import {
  isRecord,
  parseCalendarDate,
  truncateTimestamp,
  validateBar,
} from '@mdd/market-data-core';
import { isNoDataError, mapTwelveDataError } from './errors.js';

const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

function fail(message: string, data: Record<string, unknown> = {}): never {
  throw new ProviderError(message, { provider: 'twelvedata', ...data });
}

/**
 * Parses a Twelve Data datetime, read as UTC (requests ask for timezone=UTC).
 *
 * @returns Epoch milliseconds, or undefined if the value is malformed
 *
 * @example
 * ```typescript
 * parseDatetime('2024-01-02')          // Date.UTC(2024, 0, 2)
 * parseDatetime('2024-01-02 14:30:00') // Date.UTC(2024, 0, 2, 14, 30)
 * ```
 */
export function parseDatetime(value: string): number | undefined {
  const match = DATETIME_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const day = parseCalendarDate(match[1] ?? '');
  if (day === undefined) {
    return undefined;
  }

  const hours = Number(match[2] ?? 0);
  const minutes = Number(match[3] ?? 0);
  const seconds = Number(match[4] ?? 0);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  return day + ((hours * 60 + minutes) * 60 + seconds) * 1000;
}

/**
 * Converts a string or numeric field to a number.
 *
 * @throws ProviderError if the value is empty or not numeric
 */
function parseNumber(value: unknown, field: string, datetime: string): number {
  const parsed =
    typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;

  if (!Number.isFinite(parsed)) {
    fail(`Invalid ${field} value at ${datetime}: ${String(value)}`, { field, datetime });
  }
  return parsed;
}

/**
 * Parses one row into a Bar.
 *
 * A missing volume (indices, FX) becomes 0.
 *
 * @throws ProviderError for malformed rows and OHLCV violations
 */
export function parseValue(row: unknown, granularity: Granularity): Bar {
  if (!isRecord(row)) {
    fail('time_series row must be an object', { actualType: typeof row });
  }

  const datetime = row['datetime'];
  if (typeof datetime !== 'string') {
    fail("Field 'datetime' must be a string", { actualType: typeof datetime });
  }

  const timestamp = parseDatetime(datetime);
  if (timestamp === undefined) {
    fail(`Invalid datetime: ${datetime}`, { field: 'datetime' });
  }

  const volume = row['volume'];
  return validateBar(
    {
      timestamp: truncateTimestamp(timestamp, granularity),
      open: parseNumber(row['open'], 'open', datetime),
      high: parseNumber(row['high'], 'high', datetime),
      low: parseNumber(row['low'], 'low', datetime),
      close: parseNumber(row['close'], 'close', datetime),
      volume: volume === undefined || volume === null ? 0 : parseNumber(volume, 'volume', datetime),
    },
    'twelvedata'
  );
}

/**
 * Parses a time_series body.
 *
 * @returns Bars sorted by timestamp ascending; an empty array when the body
 *   says no data is available for the slice
 * @throws AuthError, RateLimitedError or ProviderError for in-body errors
 * @throws ProviderError for malformed bodies
 *
 * @example
 * ```typescript
 * const bars = parseTimeSeriesResponse(body, 'day');
 * console.log(`Parsed ${bars.length} bars`);
 * ```
 */
export function parseTimeSeriesResponse(body: unknown, granularity: Granularity): Bar[] {
  if (!isRecord(body)) {
    fail('Twelve Data response is not a JSON object', { actualType: typeof body });
  }

  if (body['status'] === 'error') {
    const code = typeof body['code'] === 'number' ? body['code'] : undefined;
    const message = typeof body['message'] === 'string' ? body['message'] : 'unknown error';
    if (isNoDataError(code, message)) {
      return [];
    }
    throw mapTwelveDataError(code, message);
  }

  const values = body['values'];
  if (values === undefined || values === null) {
    return [];
  }
  if (!Array.isArray(values)) {
    fail("Field 'values' must be an array", { actualType: typeof values });
  }

  const rows: unknown[] = values;
  const bars = rows.map((row, index) => {
    try {
      return parseValue(row, granularity);
    } catch (error) {
      return fail(
        `Failed to parse value at index ${index}: ${error instanceof Error ? error.message : String(error)}`,
        { field: `values[${index}]` }
      );
    }
  });

  return bars.sort((a, b) => a.timestamp - b.timestamp);
}
