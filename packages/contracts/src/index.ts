/**
 * @fileoverview Main entry point for @mdd/contracts package.
 *
 * Exports the shared market data types and the error taxonomy.
 *
 * @module @mdd/contracts
 */

// Market data types
export type {
  Bar,
  BarPage,
  BarProvider,
  FetchRequest,
  Granularity,
  ProviderCapabilities,
  ProviderName,
} from './market.js';

export { GRANULARITIES, PROVIDER_LABELS, PROVIDER_NAMES } from './market.js';

// Error classes and guards
export {
  ErrorCode,
  DownloaderError,
  ValidationError,
  AuthError,
  RateLimitedError,
  ProviderError,
  NetworkError,
  IoError,
  isDownloaderError,
  isValidationError,
  isAuthError,
  isRateLimitedError,
  isProviderError,
  isNetworkError,
  isIoError,
  toDownloaderError,
} from './errors.js';
