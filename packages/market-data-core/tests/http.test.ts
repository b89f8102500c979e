import { describe, it, expect, vi } from 'vitest';
import { AuthError, NetworkError, ProviderError, RateLimitedError } from '@mdd/contracts';
import { getJson, parseRetryAfter, type FetchFn } from '../src/http.js';

const URL_WITH_KEY = 'https://api.example.test/v2/bars?symbol=AAPL&apiKey=test-key';

function respondWith(body: string, init?: ResponseInit): FetchFn {
  return vi.fn(async () => new Response(body, init));
}

describe('getJson', () => {
  it('returns the parsed body of a 2xx answer', async () => {
    const fetchFn = respondWith('{"status":"OK","results":[]}', { status: 200 });

    await expect(getJson(URL_WITH_KEY, { provider: 'polygon', fetch: fetchFn })).resolves.toEqual({
      status: 'OK',
      results: [],
    });
  });

  it('maps 401 and 403 to AuthError', async () => {
    for (const status of [401, 403]) {
      const fetchFn = respondWith('{"message":"not entitled"}', { status });
      const error = await getJson(URL_WITH_KEY, { provider: 'polygon', fetch: fetchFn }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(AuthError);
      if (error instanceof AuthError) {
        expect(error.statusCode).toBe(status);
        expect(error.message).toBe(
          `Polygon.io rejected the request with HTTP ${status}: {"message":"not entitled"}`
        );
      }
    }
  });

  it('maps 429 to RateLimitedError with the Retry-After delay', async () => {
    const fetchFn = respondWith('', { status: 429, headers: { 'Retry-After': '7' } });
    const error = await getJson(URL_WITH_KEY, { provider: 'twelvedata', fetch: fetchFn }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(RateLimitedError);
    if (error instanceof RateLimitedError) {
      expect(error.retryAfterMs).toBe(7_000);
      expect(error.retryable).toBe(true);
    }
  });

  it('maps other statuses to ProviderError with the body', async () => {
    const fetchFn = respondWith('upstream exploded', { status: 502 });
    const error = await getJson(URL_WITH_KEY, { provider: 'polygon', fetch: fetchFn }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.message).toBe('Polygon.io returned HTTP 502');
      expect(error.statusCode).toBe(502);
      expect(error.responseBody).toBe('upstream exploded');
    }
  });

  it('rejects a body that is not JSON', async () => {
    const fetchFn = respondWith('<html>', { status: 200 });
    await expect(getJson(URL_WITH_KEY, { provider: 'polygon', fetch: fetchFn })).rejects.toThrow(
      'Polygon.io returned a body that is not valid JSON'
    );
  });

  it('wraps transport failures in NetworkError with a redacted URL', async () => {
    const fetchFn: FetchFn = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const error = await getJson(URL_WITH_KEY, { provider: 'polygon', fetch: fetchFn }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.message).toBe('Polygon.io request failed: fetch failed');
      expect(error.data?.['url']).toBe('https://api.example.test/v2/bars?symbol=AAPL&apiKey=[REDACTED]');
    }
  });

  it('aborts requests that exceed the timeout', async () => {
    const fetchFn: FetchFn = vi.fn(
      (_input: Parameters<FetchFn>[0], init?: Parameters<FetchFn>[1]) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    await expect(
      getJson(URL_WITH_KEY, { provider: 'twelvedata', fetch: fetchFn, timeoutMs: 10 })
    ).rejects.toThrow('Twelve Data request timed out after 10ms');
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds', () => {
    expect(parseRetryAfter('2')).toBe(2_000);
    expect(parseRetryAfter('0')).toBe(0);
  });

  it('reads HTTP dates relative to now', () => {
    const now = Date.UTC(2024, 0, 1, 0, 0, 0);
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:30 GMT', now)).toBe(30_000);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
