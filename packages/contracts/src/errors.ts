/**
 * @fileoverview Error taxonomy for the market data downloader.
 *
 * Every failure that can end a run is one of the classes below. Each carries
 * a machine-readable code, structured context data, an ISO timestamp and a
 * retryable flag that the pager consults.
 *
 * @module @mdd/contracts/errors
 */

/**
 * Machine-readable error codes.
 */
export const ErrorCode = {
  VALIDATION: 'VALIDATION_ERROR',
  AUTH: 'AUTH_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  PROVIDER: 'PROVIDER_ERROR',
  NETWORK: 'NETWORK_ERROR',
  IO: 'IO_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for all downloader errors.
 *
 * @invariant code is one of ErrorCode
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new DownloaderError(ErrorCode.PROVIDER, 'Unexpected body', { status: 200 });
 * ```
 */
export class DownloaderError extends Error {
  /**
   * Machine-readable error code (e.g., 'RATE_LIMITED').
   */
  readonly code: ErrorCode;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  /**
   * Whether the pager may retry the failed request.
   */
  readonly retryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    data?: Record<string, unknown>,
    retryable = false
  ) {
    super(message);
    this.name = 'DownloaderError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when user input or an option combination is invalid.
 */
export class ValidationError extends DownloaderError {
  readonly field?: string;

  constructor(message: string, data?: { field?: string; [key: string]: unknown }) {
    super(ErrorCode.VALIDATION, message, data);
    this.name = 'ValidationError';
    this.field = data?.field;
  }
}

/**
 * Thrown when the API key is missing or rejected (HTTP 401/403).
 */
export class AuthError extends DownloaderError {
  readonly statusCode?: number;

  constructor(
    message: string,
    data?: { provider?: string; statusCode?: number; [key: string]: unknown }
  ) {
    super(ErrorCode.AUTH, message, data);
    this.name = 'AuthError';
    this.statusCode = data?.statusCode;
  }
}

/**
 * Thrown when a provider answers HTTP 429 or reports a throttled request.
 *
 * @example
 * ```typescript
 * throw new RateLimitedError('Polygon.io rate limit exceeded', {
 *   provider: 'polygon',
 *   retryAfterMs: 60000,
 * });
 * ```
 */
export class RateLimitedError extends DownloaderError {
  /**
   * Delay the provider asked for, when it sent one.
   */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    data: { provider: string; retryAfterMs?: number; [key: string]: unknown }
  ) {
    super(ErrorCode.RATE_LIMITED, message, data, true);
    this.name = 'RateLimitedError';
    this.retryAfterMs = data.retryAfterMs;
  }
}

/**
 * Thrown for non-2xx answers other than 401/403/429 and for response bodies
 * that do not have the expected shape.
 */
export class ProviderError extends DownloaderError {
  readonly statusCode?: number;
  readonly responseBody?: string;

  constructor(
    message: string,
    data: {
      provider: string;
      statusCode?: number;
      responseBody?: string;
      [key: string]: unknown;
    }
  ) {
    super(ErrorCode.PROVIDER, message, data);
    this.name = 'ProviderError';
    this.statusCode = data.statusCode;
    this.responseBody = data.responseBody;
  }
}

/**
 * Thrown when the HTTP request itself fails (DNS, reset, timeout).
 */
export class NetworkError extends DownloaderError {
  constructor(message: string, data?: { provider?: string; [key: string]: unknown }) {
    super(ErrorCode.NETWORK, message, data, true);
    this.name = 'NetworkError';
  }
}

/**
 * Thrown when an output file or directory cannot be created or written.
 */
export class IoError extends DownloaderError {
  readonly path: string;

  constructor(message: string, data: { path: string; [key: string]: unknown }) {
    super(ErrorCode.IO, message, data);
    this.name = 'IoError';
    this.path = data.path;
  }
}

export function isDownloaderError(error: unknown): error is DownloaderError {
  return error instanceof DownloaderError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

/**
 * Type guard to check if an error is a RateLimitedError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isRateLimitedError(err)) {
 *     await sleep(err.retryAfterMs ?? waitMs);
 *   }
 * }
 * ```
 */
export function isRateLimitedError(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isIoError(error: unknown): error is IoError {
  return error instanceof IoError;
}

/**
 * Wraps anything thrown by foreign code into a DownloaderError.
 * Errors that already belong to the taxonomy are returned unchanged.
 */
export function toDownloaderError(error: unknown): DownloaderError {
  if (error instanceof DownloaderError) {
    return error;
  }
  if (error instanceof Error) {
    return new DownloaderError(ErrorCode.PROVIDER, error.message, {
      originalError: error.name,
    });
  }
  return new DownloaderError(ErrorCode.PROVIDER, 'Unknown error occurred', {
    error: String(error),
  });
}
