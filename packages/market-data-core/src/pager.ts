/**
 * Pagination and rate-limit loop.
 *
 * Drives a BarProvider page by page until its cursor is exhausted, waiting
 * between requests and retrying throttled or failed transports a bounded
 * number of times. The loop never branches on the vendor.
 */

import {
  ProviderError,
  isDownloaderError,
  isRateLimitedError,
  type Bar,
  type BarPage,
  type BarProvider,
  type FetchRequest,
} from '@mdd/contracts';
import { createSilentLogger, type Logger } from '@mdd/logger';

export type Sleep = (ms: number) => Promise<void>;

export interface PagerOptions {
  /**
   * Pause between consecutive pages, and before a retry when the provider
   * did not say how long to wait.
   */
  rateLimitWaitMs: number;

  /**
   * Retries allowed per page for RateLimitedError and NetworkError.
   * The budget resets after every successful page.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Hard stop for providers that keep handing out fresh cursors.
   * @default 10000
   */
  maxPages?: number;

  /** Injected for tests; defaults to a setTimeout-based sleep */
  sleep?: Sleep;

  logger?: Logger;
}

export interface PagerResult {
  /** Bars in page order */
  bars: Bar[];

  /** Successful adapter calls */
  pages: number;

  /** Retried adapter calls across all pages */
  retries: number;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_MAX_PAGES = 10_000;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function isRetryable(error: unknown): boolean {
  return isDownloaderError(error) && error.retryable;
}

/**
 * Fetches every page of a request.
 *
 * Loop: call the adapter with the current cursor, append its bars, then
 * sleep and continue while a new cursor is returned. A cursor equal to the
 * current one ends the loop, as does a missing cursor.
 *
 * @throws The adapter's error once it is not retryable or the retry budget
 *   for the current page is spent
 * @throws ProviderError when maxPages is exceeded
 *
 * @example
 * ```typescript
 * const { bars, pages } = await fetchAllBars(provider, request, {
 *   rateLimitWaitMs: 12_000,
 *   maxRetries: 3,
 *   logger,
 * });
 * ```
 */
export async function fetchAllBars(
  provider: BarProvider,
  request: FetchRequest,
  options: PagerOptions
): Promise<PagerResult> {
  const {
    rateLimitWaitMs,
    maxRetries = DEFAULT_MAX_RETRIES,
    maxPages = DEFAULT_MAX_PAGES,
    sleep = defaultSleep,
    logger = createSilentLogger(),
  } = options;

  const bars: Bar[] = [];
  let retries = 0;
  let pages = 0;
  let cursor: string | undefined;

  const fetchWithRetry = async (): Promise<BarPage> => {
    for (let attempt = 0; ; attempt++) {
      try {
        return await provider.fetchPage(request, cursor);
      } catch (error) {
        if (!isRetryable(error) || attempt >= maxRetries) {
          throw error;
        }

        const delay = isRateLimitedError(error)
          ? (error.retryAfterMs ?? rateLimitWaitMs)
          : rateLimitWaitMs;
        retries++;

        logger.warn(`Page ${pages + 1} attempt ${attempt + 1} failed, retrying in ${delay}ms`, {
          error: error instanceof Error ? error.message : String(error),
          nextAttempt: attempt + 2,
          maxAttempts: maxRetries + 1,
        });

        await sleep(delay);
      }
    }
  };

  for (;;) {
    if (pages >= maxPages) {
      throw new ProviderError(`Pagination did not finish after ${maxPages} pages`, {
        provider: provider.name,
        maxPages,
      });
    }

    const page = await fetchWithRetry();
    pages++;
    for (const bar of page.bars) {
      bars.push(bar);
    }

    logger.debug('Page fetched', {
      page: pages,
      bars: page.bars.length,
      total: bars.length,
      hasNext: page.nextCursor !== undefined,
    });

    const next = page.nextCursor;
    if (next === undefined) {
      break;
    }
    if (next === cursor) {
      logger.warn('Provider returned the same cursor again, treating the range as complete', {
        page: pages,
      });
      break;
    }

    cursor = next;
    logger.debug(`Sleeping ${rateLimitWaitMs}ms to respect rate limit`);
    await sleep(rateLimitWaitMs);
  }

  return { bars, pages, retries };
}
