/**
 * Row rendering shared by the CSV and JSON writers
 */

import type { Bar } from '@mdd/contracts';

export type TimestampFormat = 'iso' | 'epoch-ms';

/**
 * Output field order. CSV headers and JSON keys both follow it.
 */
export const OUTPUT_COLUMNS = ['ticker', 'timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

export interface RenderOptions {
  ticker: string;

  /** @default 'iso' */
  timestampFormat?: TimestampFormat;

  /** Maximum decimal places; full precision when unset */
  maxDecimals?: number;
}

/**
 * One output row
 */
export interface OutputRecord {
  ticker: string;
  timestamp: string | number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Rounds to at most `maxDecimals` places. Trailing zeros disappear once the
 * value is printed (185.0 -> 185).
 */
export function roundNumber(value: number, maxDecimals?: number): number {
  if (maxDecimals === undefined) {
    return value;
  }
  return Number(value.toFixed(maxDecimals));
}

export function formatTimestamp(timestamp: number, format: TimestampFormat = 'iso'): string | number {
  return format === 'iso' ? new Date(timestamp).toISOString() : timestamp;
}

export function toOutputRecord(bar: Bar, options: RenderOptions): OutputRecord {
  const { ticker, timestampFormat = 'iso', maxDecimals } = options;
  return {
    ticker,
    timestamp: formatTimestamp(bar.timestamp, timestampFormat),
    open: roundNumber(bar.open, maxDecimals),
    high: roundNumber(bar.high, maxDecimals),
    low: roundNumber(bar.low, maxDecimals),
    close: roundNumber(bar.close, maxDecimals),
    volume: roundNumber(bar.volume, maxDecimals),
  };
}
