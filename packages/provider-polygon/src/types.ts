/**
 * Type definitions for the Polygon.io provider adapter.
 */

import type { Logger } from '@mdd/logger';
import type { FetchFn } from '@mdd/market-data-core';

/**
 * Configuration for creating a Polygon.io provider instance.
 *
 * The API key is not part of the configuration: it travels with each
 * FetchRequest.
 *
 * @example
 * ```typescript
 * const config: PolygonProviderConfig = {
 *   baseUrl: 'https://api.polygon.io', // optional
 *   timeoutMs: 30000, // optional
 *   logger: createLogger({ level: 'info' }) // optional
 * };
 * ```
 */
export interface PolygonProviderConfig {
  /**
   * Base URL for Polygon.io API.
   * Defaults to https://api.polygon.io
   * Override for testing or alternative endpoints.
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * Defaults to 30000 (30 seconds).
   */
  timeoutMs?: number;

  /**
   * fetch implementation. Defaults to the global fetch.
   */
  fetch?: FetchFn;

  /**
   * Logger instance for debug and error logging.
   * If not provided, logging will be disabled.
   */
  logger?: Logger;
}

/**
 * Raw response from Polygon.io aggregates API.
 * Every field is optional because the body is checked field by field.
 *
 * @internal
 */
export interface PolygonAggregatesResponse {
  /**
   * API response status ('OK', 'DELAYED', 'ERROR').
   */
  status?: string;

  ticker?: string;

  resultsCount?: number;

  queryCount?: number;

  adjusted?: boolean;

  /**
   * Array of aggregate bars. Absent when the range holds no data.
   */
  results?: unknown;

  /**
   * Absolute URL of the next page, without the API key.
   */
  next_url?: string;

  /**
   * Error message (present if status is 'ERROR').
   */
  error?: string;

  message?: string;

  /**
   * Request ID for debugging.
   */
  request_id?: string;
}

/**
 * Single aggregate bar from Polygon.io API response.
 *
 * @internal
 */
export interface PolygonAggregate {
  /**
   * Opening price.
   */
  o: number;

  /**
   * Highest price.
   */
  h: number;

  /**
   * Lowest price.
   */
  l: number;

  /**
   * Closing price.
   */
  c: number;

  /**
   * Trading volume.
   */
  v: number;

  /**
   * Volume-weighted average price.
   */
  vw?: number;

  /**
   * Unix timestamp in milliseconds, start of the aggregate window.
   */
  t: number;

  /**
   * Number of transactions.
   */
  n?: number;
}
