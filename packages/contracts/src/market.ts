/**
 * @fileoverview Market data types and provider contracts.
 *
 * Defines the normalized bar, the immutable fetch request and the paged
 * provider capability shared by every vendor adapter. All types are pure
 * data structures with no I/O.
 *
 * @module @mdd/contracts/market
 */

/**
 * Time-bucket size of one aggregate.
 */
export type Granularity = 'minute' | 'day';

export const GRANULARITIES: readonly Granularity[] = ['minute', 'day'];

/**
 * Supported market-data vendors.
 */
export type ProviderName = 'polygon' | 'twelvedata';

export const PROVIDER_NAMES: readonly ProviderName[] = ['polygon', 'twelvedata'];

/**
 * Human-readable vendor names used in messages.
 */
export const PROVIDER_LABELS: Record<ProviderName, string> = {
  polygon: 'Polygon.io',
  twelvedata: 'Twelve Data',
};

/**
 * A single OHLCV bar in canonical form.
 *
 * @invariant high >= open && high >= close
 * @invariant low <= open && low <= close
 * @invariant volume >= 0
 * @invariant timestamp is UTC epoch milliseconds, truncated to the minute or the UTC day
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   timestamp: Date.UTC(2024, 0, 2),
 *   open: 185.0,
 *   high: 186.0,
 *   low: 184.5,
 *   close: 185.5,
 *   volume: 1000000
 * };
 * ```
 */
export interface Bar {
  /** Bucket start, Unix epoch milliseconds (UTC) */
  timestamp: number;

  /** Opening price for the period */
  open: number;

  /** Highest price during the period */
  high: number;

  /** Lowest price during the period */
  low: number;

  /** Closing price for the period */
  close: number;

  /** Traded volume during the period */
  volume: number;
}

/**
 * One download request. Immutable for the duration of an invocation.
 *
 * @invariant from <= to
 * @invariant ticker and apiKey are non-empty
 */
export interface FetchRequest {
  /** Upper-cased symbol, e.g. 'AAPL' or 'I:SPX' */
  readonly ticker: string;

  /** First calendar day, YYYY-MM-DD (inclusive) */
  readonly from: string;

  /** Last calendar day, YYYY-MM-DD (inclusive) */
  readonly to: string;

  readonly granularity: Granularity;

  readonly apiKey: string;

  readonly provider: ProviderName;
}

/**
 * Result of one adapter call.
 */
export interface BarPage {
  /** Parsed bars, ascending by timestamp */
  bars: Bar[];

  /**
   * Opaque cursor for the next page. Absent when the range is exhausted.
   * Only meaningful to the adapter that produced it.
   */
  nextCursor?: string;
}

/**
 * Describes a provider. Logged when a download starts; apiKeyEnvVar names
 * the variable the CLI reads the key from.
 */
export interface ProviderCapabilities {
  supportsGranularities: Granularity[];

  /** Maximum bars returnable in a single request */
  maxBarsPerRequest: number;

  /** Environment variable consulted for the API key */
  apiKeyEnvVar: string;

  /** How further pages are addressed */
  pagination: 'cursor' | 'date-slice';
}

/**
 * The single capability every vendor adapter implements.
 *
 * Adding a vendor means adding an implementation of this interface; the
 * pager never branches on the vendor.
 */
export interface BarProvider {
  readonly name: ProviderName;

  /**
   * Issues one HTTP request and returns the parsed page.
   *
   * @param request - The download request
   * @param cursor - Cursor returned by the previous page, if any
   * @throws AuthError, RateLimitedError, ProviderError, NetworkError
   */
  fetchPage(request: FetchRequest, cursor?: string): Promise<BarPage>;

  capabilities(): ProviderCapabilities;
}
