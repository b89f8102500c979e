/**
 * HTTP client for Polygon.io API.
 *
 * Builds aggregates URLs and performs the GET through the shared transport,
 * which maps HTTP failures onto the downloader error taxonomy.
 */

import { ProviderError, type FetchRequest } from '@mdd/contracts';
import type { Logger } from '@mdd/logger';
import { getJson, type FetchFn } from '@mdd/market-data-core';

export const POLYGON_BASE_URL = 'https://api.polygon.io';

/**
 * Polygon caps one aggregates request at 50,000 base bars.
 */
export const POLYGON_PAGE_LIMIT = 50_000;

/**
 * HTTP client configuration.
 */
export interface ClientConfig {
  /**
   * Base URL for Polygon.io API, without a trailing slash.
   */
  baseUrl: string;

  /**
   * Request timeout in milliseconds.
   */
  timeoutMs: number;

  fetch?: FetchFn;

  logger?: Logger;
}

/**
 * HTTP client for Polygon.io API.
 *
 * @internal
 */
export class PolygonClient {
  private readonly config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
  }

  /**
   * Fetches one page of aggregates.
   *
   * @param url - First-page URL from buildAggregatesUrl, or a next_url
   *   already carrying the key
   * @returns Unvalidated JSON body
   *
   * @throws AuthError for 401/403
   * @throws RateLimitedError for 429
   * @throws ProviderError for other HTTP errors and non-JSON bodies
   * @throws NetworkError on transport failure or timeout
   */
  async getAggregates(url: string): Promise<unknown> {
    return getJson(url, {
      provider: 'polygon',
      timeoutMs: this.config.timeoutMs,
      fetch: this.config.fetch,
      logger: this.config.logger,
    });
  }

  /**
   * Builds the first-page aggregates URL.
   *
   * Format: /v2/aggs/ticker/{ticker}/range/1/{minute|day}/{from}/{to}
   *
   * @example
   * ```typescript
   * client.buildAggregatesUrl(request);
   * // 'https://api.polygon.io/v2/aggs/ticker/AAPL/range/1/day/2024-01-01/2024-01-31?adjusted=true&sort=asc&limit=50000&apiKey=...'
   * ```
   */
  buildAggregatesUrl(request: FetchRequest): string {
    const ticker = encodeURIComponent(request.ticker);
    const path = `/v2/aggs/ticker/${ticker}/range/1/${request.granularity}/${request.from}/${request.to}`;

    const params = new URLSearchParams();
    params.set('adjusted', 'true'); // split-adjusted prices
    params.set('sort', 'asc');
    params.set('limit', String(POLYGON_PAGE_LIMIT));
    params.set('apiKey', request.apiKey);

    return `${this.config.baseUrl}${path}?${params.toString()}`;
  }

  /**
   * Adds the API key to a next_url. Polygon does not echo the key back.
   */
  withApiKey(nextUrl: string, apiKey: string): string {
    let url: URL;
    try {
      url = new URL(nextUrl);
    } catch {
      throw new ProviderError(`Polygon.io returned an invalid next_url: ${nextUrl}`, {
        provider: 'polygon',
      });
    }
    url.searchParams.set('apiKey', apiKey);
    return url.toString();
  }
}

/**
 * Creates a new Polygon HTTP client.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   baseUrl: 'https://api.polygon.io',
 *   timeoutMs: 30000,
 *   logger: createLogger({ level: 'info' })
 * });
 * ```
 */
export function createClient(config: ClientConfig): PolygonClient {
  return new PolygonClient(config);
}
