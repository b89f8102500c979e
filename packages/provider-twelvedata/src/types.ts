/**
 * @fileoverview Type definitions for the Twelve Data provider.
 *
 * @module @mdd/provider-twelvedata/types
 */

import type { Logger } from '@mdd/logger';
import type { FetchFn } from '@mdd/market-data-core';

/**
 * Configuration options for TwelveDataProvider.
 */
export interface TwelveDataProviderOptions {
  /**
   * Base URL of the REST API.
   * Defaults to https://api.twelvedata.com
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds (default: 30000).
   */
  timeoutMs?: number;

  /**
   * fetch implementation, replaced in tests.
   */
  fetch?: FetchFn;

  logger?: Logger;
}

/**
 * One row of a time_series response. Numbers arrive as strings.
 *
 * @example
 * ```json
 * { "datetime": "2024-01-02 14:30:00", "open": "185.00000", "high": "186.00000",
 *   "low": "184.50000", "close": "185.50000", "volume": "12000" }
 * ```
 */
export interface TwelveDataValue {
  /** 'YYYY-MM-DD' for daily rows, 'YYYY-MM-DD HH:mm:ss' for intraday rows */
  datetime: string;
  open: string;
  high: string;
  low: string;
  close: string;
  /** Absent for indices and FX pairs */
  volume?: string;
}

/**
 * time_series response body.
 *
 * Errors arrive with HTTP 200 and `status: "error"`.
 */
export interface TwelveDataTimeSeriesResponse {
  meta?: {
    symbol?: string;
    interval?: string;
    exchange_timezone?: string;
    type?: string;
  };
  values?: TwelveDataValue[];
  status?: 'ok' | 'error';
  code?: number;
  message?: string;
}

/**
 * Calendar-day window requested in one call.
 */
export interface DateSlice {
  /** First day, YYYY-MM-DD */
  start: string;

  /** Last day, YYYY-MM-DD (inclusive) */
  end: string;

  /** Start of the following slice, absent for the last one */
  next?: string;
}
