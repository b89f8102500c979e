/**
 * @fileoverview Tests for the Polygon.io provider.
 *
 * Covers URL construction, next_url pagination, parsing, timestamp
 * normalization and error mapping against an in-process fake fetch.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AuthError,
  ProviderError,
  RateLimitedError,
  type FetchRequest,
} from '@mdd/contracts';
import type { FetchFn } from '@mdd/market-data-core';
import { createPolygonProvider, parseAggregate, parseAggregatesResponse } from '../src/index.js';
import type { PolygonAggregate } from '../src/index.js';

const BASE_URL = 'https://polygon.test';

const dayRequest: FetchRequest = {
  ticker: 'AAPL',
  from: '2024-01-01',
  to: '2024-01-02',
  granularity: 'day',
  apiKey: 'test-key',
  provider: 'polygon',
};

/** 2024-01-01 at New York midnight */
const JAN1_NY = Date.UTC(2024, 0, 1, 5);

function aggregate(overrides: Partial<PolygonAggregate> = {}): PolygonAggregate {
  return { t: JAN1_NY, o: 185, h: 186, l: 184.5, c: 185.5, v: 1_000_000, vw: 185.3, n: 4200, ...overrides };
}

/**
 * Fake fetch answering JSON bodies in order and recording requested URLs.
 */
function fakeFetch(...bodies: unknown[]): { fetch: FetchFn; urls: string[] } {
  const urls: string[] = [];
  let call = 0;
  const fetchFn: FetchFn = vi.fn(async (input: Parameters<FetchFn>[0]) => {
    urls.push(String(input));
    const body = bodies[Math.min(call, bodies.length - 1)];
    call++;
    return new Response(JSON.stringify(body), { status: 200 });
  });
  return { fetch: fetchFn, urls };
}

describe('createPolygonProvider', () => {
  describe('capabilities', () => {
    it('reports limits and the key variable', () => {
      const caps = createPolygonProvider().capabilities();

      expect(caps).toEqual({
        supportsGranularities: ['minute', 'day'],
        maxBarsPerRequest: 50_000,
        apiKeyEnvVar: 'POLYGON_API_KEY',
        pagination: 'cursor',
      });
    });
  });

  describe('fetchPage', () => {
    it('builds the first-page aggregates URL', async () => {
      const { fetch, urls } = fakeFetch({ status: 'OK', results: [] });
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch });

      await provider.fetchPage(dayRequest);

      expect(urls).toEqual([
        'https://polygon.test/v2/aggs/ticker/AAPL/range/1/day/2024-01-01/2024-01-02?adjusted=true&sort=asc&limit=50000&apiKey=test-key',
      ]);
    });

    it('encodes index tickers and uses minute ranges', async () => {
      const { fetch, urls } = fakeFetch({ status: 'OK' });
      const provider = createPolygonProvider({ baseUrl: `${BASE_URL}/`, fetch });

      await provider.fetchPage({ ...dayRequest, ticker: 'I:SPX', granularity: 'minute' });

      expect(urls[0]).toBe(
        'https://polygon.test/v2/aggs/ticker/I%3ASPX/range/1/minute/2024-01-01/2024-01-02?adjusted=true&sort=asc&limit=50000&apiKey=test-key'
      );
    });

    it('truncates daily timestamps to UTC midnight', async () => {
      const { fetch } = fakeFetch({ status: 'OK', results: [aggregate()] });
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch });

      const page = await provider.fetchPage(dayRequest);

      expect(page).toEqual({
        bars: [
          {
            timestamp: Date.UTC(2024, 0, 1),
            open: 185,
            high: 186,
            low: 184.5,
            close: 185.5,
            volume: 1_000_000,
          },
        ],
      });
    });

    it('returns next_url as the cursor and re-attaches the key', async () => {
      const nextUrl = 'https://polygon.test/v2/aggs/ticker/AAPL/range/1/day/1704085200000/2024-01-02?cursor=abc';
      const { fetch, urls } = fakeFetch(
        { status: 'OK', results: [aggregate()], next_url: nextUrl },
        { status: 'OK', results: [aggregate({ t: JAN1_NY + 86_400_000 })] }
      );
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch });

      const first = await provider.fetchPage(dayRequest);
      expect(first.nextCursor).toBe(nextUrl);

      const second = await provider.fetchPage(dayRequest, first.nextCursor);
      expect(second.nextCursor).toBeUndefined();
      expect(second.bars.map((b) => b.timestamp)).toEqual([Date.UTC(2024, 0, 2)]);
      expect(urls[1]).toBe(`${nextUrl}&apiKey=test-key`);
    });

    it('accepts DELAYED and missing results', async () => {
      const { fetch } = fakeFetch({ status: 'DELAYED', resultsCount: 0 });
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch });

      await expect(provider.fetchPage(dayRequest)).resolves.toEqual({ bars: [] });
    });

    it('fails on an ERROR status', async () => {
      const { fetch } = fakeFetch({ status: 'ERROR', error: 'Unknown ticker' });
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch });

      await expect(provider.fetchPage(dayRequest)).rejects.toThrow(
        'Polygon API returned error status: ERROR (Unknown ticker)'
      );
    });

    it('rejects a blank key before any request', async () => {
      const { fetch } = fakeFetch({ status: 'OK' });
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch });

      await expect(provider.fetchPage({ ...dayRequest, apiKey: ' ' })).rejects.toBeInstanceOf(AuthError);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('maps HTTP 403 to AuthError and 429 to RateLimitedError', async () => {
      const forbidden: FetchFn = vi.fn(async () => new Response('{"status":"NOT_AUTHORIZED"}', { status: 403 }));
      await expect(
        createPolygonProvider({ baseUrl: BASE_URL, fetch: forbidden }).fetchPage(dayRequest)
      ).rejects.toBeInstanceOf(AuthError);

      const limited: FetchFn = vi.fn(async () => new Response('', { status: 429 }));
      await expect(
        createPolygonProvider({ baseUrl: BASE_URL, fetch: limited }).fetchPage(dayRequest)
      ).rejects.toBeInstanceOf(RateLimitedError);
    });

    it('rejects a next_url that is not a URL', async () => {
      const provider = createPolygonProvider({ baseUrl: BASE_URL, fetch: fakeFetch({}).fetch });
      await expect(provider.fetchPage(dayRequest, 'not a url')).rejects.toBeInstanceOf(ProviderError);
    });
  });
});

describe('parseAggregatesResponse', () => {
  it('sorts bars ascending', () => {
    const page = parseAggregatesResponse(
      {
        status: 'OK',
        results: [
          aggregate({ t: Date.UTC(2024, 0, 2, 14, 31) }),
          aggregate({ t: Date.UTC(2024, 0, 2, 14, 30) }),
        ],
      },
      'minute'
    );

    expect(page.bars.map((b) => b.timestamp)).toEqual([
      Date.UTC(2024, 0, 2, 14, 30),
      Date.UTC(2024, 0, 2, 14, 31),
    ]);
  });

  it('rejects non-object bodies and non-array results', () => {
    expect(() => parseAggregatesResponse('OK', 'day')).toThrow('Polygon.io response is not a JSON object');
    expect(() => parseAggregatesResponse({ status: 'OK', results: {} }, 'day')).toThrow(
      "Field 'results' must be an array"
    );
  });

  it('names the failing aggregate', () => {
    expect(() =>
      parseAggregatesResponse({ status: 'OK', results: [aggregate(), { t: JAN1_NY, o: '185' }] }, 'day')
    ).toThrow("Failed to parse aggregate at index 1: Field 'o' (open) must be a number");
  });
});

describe('parseAggregate', () => {
  it('reports missing fields', () => {
    expect(() => parseAggregate({ t: JAN1_NY, o: 1, h: 1, l: 1, c: 1 }, 'day')).toThrow(
      'Missing required field: v'
    );
  });

  it('enforces OHLC invariants', () => {
    expect(() => parseAggregate(aggregate({ h: 184 }), 'day')).toThrow(ProviderError);
  });
});
