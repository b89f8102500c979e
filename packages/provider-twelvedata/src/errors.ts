/**
 * @fileoverview In-body error mapping for Twelve Data.
 *
 * Twelve Data reports most failures with HTTP 200 and a body of the form
 * `{ "code": 401, "message": "...", "status": "error" }`. HTTP-level
 * failures are mapped by the shared transport before these helpers run.
 *
 * @module @mdd/provider-twelvedata/errors
 */

import {
  AuthError,
  ProviderError,
  RateLimitedError,
  type DownloaderError,
} from '@mdd/contracts';

/**
 * Whether an error body only says the slice holds no bars. Weekends and
 * holidays produce this for daily and intraday requests alike.
 *
 * @example
 * ```typescript
 * isNoDataError(400, 'No data is available on the specified dates. Try setting different start/end dates.');
 * // true
 * ```
 */
export function isNoDataError(code: number | undefined, message: string): boolean {
  return code === 400 && message.toLowerCase().includes('no data is available');
}

/**
 * Maps an in-body error to the downloader error taxonomy.
 *
 * - 401/403 -> AuthError
 * - 429 -> RateLimitedError (no delay hint; the pager falls back to its wait)
 * - anything else -> ProviderError
 */
export function mapTwelveDataError(code: number | undefined, message: string): DownloaderError {
  switch (code) {
    case 401:
    case 403:
      return new AuthError(`Twelve Data rejected the request: ${message}`, {
        provider: 'twelvedata',
        statusCode: code,
      });
    case 429:
      return new RateLimitedError(`Twelve Data rate limit exceeded: ${message}`, {
        provider: 'twelvedata',
        statusCode: code,
      });
    default:
      return new ProviderError(`Twelve Data error${code === undefined ? '' : ` ${code}`}: ${message}`, {
        provider: 'twelvedata',
        statusCode: code,
      });
  }
}
