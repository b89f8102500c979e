/**
 * @fileoverview Twelve Data market data provider.
 *
 * Implements BarProvider on top of Twelve Data's time_series endpoint.
 * Pagination walks the requested range in calendar-day slices.
 *
 * @module @mdd/provider-twelvedata
 */

import {
  AuthError,
  type BarPage,
  type BarProvider,
  type FetchRequest,
  type ProviderCapabilities,
} from '@mdd/contracts';
import { TwelveDataClient } from './client.js';
import { parseTimeSeriesResponse } from './parser.js';
import { sliceFor, TWELVEDATA_OUTPUT_SIZE } from './slices.js';
import type { TwelveDataProviderOptions } from './types.js';

/**
 * Environment variable consulted by the CLI for the Twelve Data key.
 */
export const TWELVEDATA_API_KEY_ENV = 'TWELVEDATA_API_KEY';

/**
 * Twelve Data provider.
 *
 * @example
 * ```typescript
 * const provider = new TwelveDataProvider({ logger });
 * const first = await provider.fetchPage(request);
 * const second = await provider.fetchPage(request, first.nextCursor);
 * ```
 */
export class TwelveDataProvider implements BarProvider {
  readonly name = 'twelvedata' as const;

  private readonly client: TwelveDataClient;
  private readonly options: TwelveDataProviderOptions;

  constructor(options: TwelveDataProviderOptions = {}) {
    this.options = options;
    this.client = new TwelveDataClient(options);
  }

  /**
   * Fetches the slice starting at the cursor (or at `from`).
   *
   * The next cursor is the day after the slice, even when the slice held no
   * data, so gaps such as weekends do not end the download early.
   *
   * @throws AuthError if the key is blank (before any request) or rejected
   * @throws RateLimitedError, ProviderError, NetworkError
   */
  async fetchPage(request: FetchRequest, cursor?: string): Promise<BarPage> {
    if (request.apiKey.trim() === '') {
      throw new AuthError('API key must not be empty', { provider: this.name });
    }

    const slice = sliceFor(request, cursor);
    const body = await this.client.fetchTimeSeries(request, slice);
    const bars = parseTimeSeriesResponse(body, request.granularity);

    this.options.logger?.debug('Twelve Data slice parsed', {
      ticker: request.ticker,
      granularity: request.granularity,
      start: slice.start,
      end: slice.end,
      count: bars.length,
    });

    return slice.next === undefined ? { bars } : { bars, nextCursor: slice.next };
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsGranularities: ['minute', 'day'],
      maxBarsPerRequest: TWELVEDATA_OUTPUT_SIZE,
      apiKeyEnvVar: TWELVEDATA_API_KEY_ENV,
      pagination: 'date-slice',
    };
  }
}

/**
 * Factory matching createPolygonProvider.
 */
export function createTwelveDataProvider(options: TwelveDataProviderOptions = {}): BarProvider {
  return new TwelveDataProvider(options);
}

export type {
  TwelveDataProviderOptions,
  TwelveDataTimeSeriesResponse,
  TwelveDataValue,
  DateSlice,
} from './types.js';
export { TwelveDataClient, TWELVEDATA_BASE_URL } from './client.js';
export { parseTimeSeriesResponse, parseValue, parseDatetime } from './parser.js';
export { isNoDataError, mapTwelveDataError } from './errors.js';
export { sliceFor, SLICE_DAYS, TWELVEDATA_OUTPUT_SIZE } from './slices.js';
