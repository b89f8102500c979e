/**
 * @mdd/provider-polygon
 *
 * Polygon.io market data provider adapter.
 *
 * This package implements BarProvider on top of the Polygon.io v2
 * aggregates endpoint. It handles:
 * - URL construction for minute and day aggregates
 * - next_url pagination (the API key is re-attached to every page)
 * - Response parsing and validation
 * - HTTP error mapping onto the shared error taxonomy
 *
 * @example
 * ```typescript
 * import { createPolygonProvider } from "@mdd/provider-polygon";
 * import { createLogger } from "@mdd/logger";
 *
 * const provider = createPolygonProvider({
 *   logger: createLogger({ level: 'info' })
 * });
 *
 * const page = await provider.fetchPage(request);
 * ```
 *
 * @packageDocumentation
 */

import {
  AuthError,
  type BarPage,
  type BarProvider,
  type FetchRequest,
  type ProviderCapabilities,
} from '@mdd/contracts';
import { DEFAULT_TIMEOUT_MS } from '@mdd/market-data-core';
import type { PolygonProviderConfig } from './types.js';
import { createClient, POLYGON_BASE_URL, POLYGON_PAGE_LIMIT } from './client.js';
import { parseAggregatesResponse } from './parse.js';

/**
 * Environment variable consulted by the CLI for the Polygon.io key.
 */
export const POLYGON_API_KEY_ENV = 'POLYGON_API_KEY';

/**
 * Creates a new Polygon.io provider instance.
 *
 * The cursor handed to the pager is Polygon's next_url exactly as received,
 * so it never contains the API key.
 *
 * @param config - Provider configuration
 * @returns BarProvider for Polygon.io
 *
 * @example
 * ```typescript
 * const provider = createPolygonProvider({
 *   baseUrl: 'https://api.polygon.io', // optional
 *   timeoutMs: 30000, // optional (default: 30s)
 *   logger: createLogger({ level: 'debug' }) // optional
 * });
 *
 * let page = await provider.fetchPage(request);
 * while (page.nextCursor) {
 *   page = await provider.fetchPage(request, page.nextCursor);
 * }
 * ```
 */
export function createPolygonProvider(config: PolygonProviderConfig = {}): BarProvider {
  const client = createClient({
    baseUrl: config.baseUrl || POLYGON_BASE_URL,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    fetch: config.fetch,
    logger: config.logger,
  });

  return {
    name: 'polygon',

    /**
     * Fetches one aggregates page.
     *
     * @throws AuthError if the key is blank (before any request) or rejected
     * @throws RateLimitedError if rate limit exceeded (429)
     * @throws ProviderError for other HTTP errors and malformed bodies
     * @throws NetworkError on transport failure or timeout
     */
    fetchPage: async (request: FetchRequest, cursor?: string): Promise<BarPage> => {
      if (request.apiKey.trim() === '') {
        throw new AuthError('API key must not be empty', { provider: 'polygon' });
      }

      const url =
        cursor === undefined
          ? client.buildAggregatesUrl(request)
          : client.withApiKey(cursor, request.apiKey);

      const body = await client.getAggregates(url);
      const { bars, nextUrl } = parseAggregatesResponse(body, request.granularity);

      config.logger?.debug('Polygon page parsed', {
        ticker: request.ticker,
        granularity: request.granularity,
        count: bars.length,
        firstTimestamp: bars[0] ? new Date(bars[0].timestamp).toISOString() : null,
        hasNext: nextUrl !== undefined,
      });

      return nextUrl === undefined ? { bars } : { bars, nextCursor: nextUrl };
    },

    capabilities: (): ProviderCapabilities => ({
      supportsGranularities: ['minute', 'day'],
      // Polygon API allows up to 50,000 base aggregates per request
      maxBarsPerRequest: POLYGON_PAGE_LIMIT,
      apiKeyEnvVar: POLYGON_API_KEY_ENV,
      pagination: 'cursor',
    }),
  };
}

export type { PolygonProviderConfig, PolygonAggregate, PolygonAggregatesResponse } from './types.js';
export { parseAggregatesResponse, parseAggregate } from './parse.js';
export type { PolygonPage } from './parse.js';
export { PolygonClient, createClient, POLYGON_BASE_URL, POLYGON_PAGE_LIMIT } from './client.js';
