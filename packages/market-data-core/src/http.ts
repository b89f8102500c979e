/**
 * HTTP transport shared by the vendor adapters.
 *
 * One GET with a timeout, mapped onto the downloader error taxonomy:
 * - 401/403 -> AuthError
 * - 429 -> RateLimitedError (with Retry-After when sent)
 * - other non-2xx -> ProviderError with status and body
 * - transport failure or timeout -> NetworkError
 * - body that is not JSON -> ProviderError
 */

import {
  AuthError,
  NetworkError,
  PROVIDER_LABELS,
  ProviderError,
  RateLimitedError,
  type ProviderName,
} from '@mdd/contracts';
import { createSilentLogger, redactUrl, type Logger } from '@mdd/logger';

export type FetchFn = typeof fetch;

export const DEFAULT_TIMEOUT_MS = 30_000;

const USER_AGENT = 'market-data-downloader/0.1';
const MAX_BODY_IN_ERROR = 2_000;

export interface HttpGetOptions {
  provider: ProviderName;

  /** @default 30000 */
  timeoutMs?: number;

  /** Injected in tests; defaults to the global fetch */
  fetch?: FetchFn;

  logger?: Logger;
}

/**
 * Parses a Retry-After header given in seconds or as an HTTP date.
 *
 * @param now - Reference time for HTTP dates
 * @returns Delay in milliseconds, or undefined when absent or unreadable
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function truncateBody(text: string): string {
  const redacted = redactUrl(text);
  return redacted.length > MAX_BODY_IN_ERROR
    ? `${redacted.slice(0, MAX_BODY_IN_ERROR)}...`
    : redacted;
}

/**
 * Issues a GET request and returns the parsed JSON body.
 *
 * @throws AuthError, RateLimitedError, ProviderError, NetworkError
 *
 * @example
 * ```typescript
 * const body = await getJson(url, { provider: 'polygon', timeoutMs: 30_000, logger });
 * ```
 */
export async function getJson(url: string, options: HttpGetOptions): Promise<unknown> {
  const {
    provider,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetch: fetchFn = fetch,
    logger = createSilentLogger(),
  } = options;
  const label = PROVIDER_LABELS[provider];
  const safeUrl = redactUrl(url);

  logger.debug('HTTP GET', { provider, url: safeUrl });

  const send = async (): Promise<{ status: number; text: string; retryAfter: string | null }> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchFn(url, {
        signal: controller.signal,
        headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
      });
      return {
        status: response.status,
        retryAfter: response.headers.get('retry-after'),
        text: await response.text(),
      };
    } catch (error) {
      const message = controller.signal.aborted
        ? `${label} request timed out after ${timeoutMs}ms`
        : `${label} request failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new NetworkError(message, { provider, url: safeUrl });
    } finally {
      clearTimeout(timeoutId);
    }
  };

  const { status, text, retryAfter } = await send();

  logger.debug('HTTP response', { provider, status, bytes: text.length });

  if (status === 401 || status === 403) {
    throw new AuthError(`${label} rejected the request with HTTP ${status}: ${truncateBody(text)}`, {
      provider,
      statusCode: status,
      url: safeUrl,
    });
  }

  if (status === 429) {
    throw new RateLimitedError(`${label} rate limit exceeded (HTTP 429)`, {
      provider,
      statusCode: status,
      retryAfterMs: parseRetryAfter(retryAfter),
      url: safeUrl,
    });
  }

  if (status < 200 || status >= 300) {
    throw new ProviderError(`${label} returned HTTP ${status}`, {
      provider,
      statusCode: status,
      responseBody: truncateBody(text),
      url: safeUrl,
    });
  }

  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch {
    throw new ProviderError(`${label} returned a body that is not valid JSON`, {
      provider,
      statusCode: status,
      responseBody: truncateBody(text),
      url: safeUrl,
    });
  }
}

/**
 * Narrows an unknown JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
