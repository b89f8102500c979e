/**
 * @fileoverview HTTP client for the Twelve Data REST API.
 *
 * @module @mdd/provider-twelvedata/client
 */

import type { FetchRequest, Granularity } from '@mdd/contracts';
import { DEFAULT_TIMEOUT_MS, getJson } from '@mdd/market-data-core';
import type { DateSlice, TwelveDataProviderOptions } from './types.js';
import { TWELVEDATA_OUTPUT_SIZE } from './slices.js';

export const TWELVEDATA_BASE_URL = 'https://api.twelvedata.com';

const INTERVALS: Record<Granularity, string> = {
  minute: '1min',
  day: '1day',
};

/**
 * HTTP client for Twelve Data's time_series endpoint.
 *
 * @internal
 */
export class TwelveDataClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly options: TwelveDataProviderOptions;

  constructor(options: TwelveDataProviderOptions = {}) {
    this.options = options;
    this.baseUrl = (options.baseUrl || TWELVEDATA_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Builds the time_series URL for one slice. The whole slice is requested
   * in UTC, from 00:00:00 of its first day to 23:59:59 of its last.
   *
   * @example
   * ```typescript
   * client.buildTimeSeriesUrl(request, { start: '2024-01-01', end: '2024-01-03' });
   * // 'https://api.twelvedata.com/time_series?symbol=AAPL&interval=1min&start_date=2024-01-01+00%3A00%3A00&...'
   * ```
   */
  buildTimeSeriesUrl(request: FetchRequest, slice: DateSlice): string {
    const params = new URLSearchParams({
      symbol: request.ticker,
      interval: INTERVALS[request.granularity],
      start_date: `${slice.start} 00:00:00`,
      end_date: `${slice.end} 23:59:59`,
      timezone: 'UTC',
      order: 'ASC',
      outputsize: String(TWELVEDATA_OUTPUT_SIZE),
      format: 'JSON',
      apikey: request.apiKey,
    });

    return `${this.baseUrl}/time_series?${params.toString()}`;
  }

  /**
   * Fetches one time_series slice.
   *
   * @returns Unvalidated JSON body
   * @throws AuthError, RateLimitedError, ProviderError, NetworkError for
   *   HTTP-level failures
   */
  async fetchTimeSeries(request: FetchRequest, slice: DateSlice): Promise<unknown> {
    return getJson(this.buildTimeSeriesUrl(request, slice), {
      provider: 'twelvedata',
      timeoutMs: this.timeoutMs,
      fetch: this.options.fetch,
      logger: this.options.logger,
    });
  }
}
