/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  DownloaderError,
  ErrorCode,
  ValidationError,
  AuthError,
  RateLimitedError,
  ProviderError,
  NetworkError,
  IoError,
  isDownloaderError,
  isAuthError,
  isRateLimitedError,
  isProviderError,
  isNetworkError,
  isIoError,
  isValidationError,
  toDownloaderError,
} from '../src/errors.js';

describe('DownloaderError', () => {
  it('should create error with code and message', () => {
    const error = new DownloaderError(ErrorCode.PROVIDER, 'Test message');

    expect(error.name).toBe('DownloaderError');
    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.message).toBe('Test message');
    expect(error.retryable).toBe(false);
    expect(error.stack).toBeDefined();
  });

  it('should have valid ISO timestamp', () => {
    const error = new DownloaderError(ErrorCode.IO, 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new DownloaderError(ErrorCode.NETWORK, 'Test message', { key: 'value' }, true);
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('DownloaderError');
    expect(parsed.code).toBe('NETWORK_ERROR');
    expect(parsed.message).toBe('Test message');
    expect(parsed.data).toEqual({ key: 'value' });
    expect(parsed.retryable).toBe(true);
    expect(parsed.timestamp).toBe(error.timestamp);
  });
});

describe('taxonomy', () => {
  it('should mark only rate limit and network errors as retryable', () => {
    expect(new RateLimitedError('slow down', { provider: 'polygon' }).retryable).toBe(true);
    expect(new NetworkError('reset').retryable).toBe(true);
    expect(new AuthError('bad key').retryable).toBe(false);
    expect(new ProviderError('bad body', { provider: 'polygon' }).retryable).toBe(false);
    expect(new ValidationError('bad input').retryable).toBe(false);
    expect(new IoError('cannot write', { path: '/tmp/x.csv' }).retryable).toBe(false);
  });

  it('should expose rate limit delay', () => {
    const error = new RateLimitedError('Polygon.io rate limit exceeded', {
      provider: 'polygon',
      retryAfterMs: 60000,
    });

    expect(error.name).toBe('RateLimitedError');
    expect(error.code).toBe('RATE_LIMITED');
    expect(error.retryAfterMs).toBe(60000);
    expect(error.data?.provider).toBe('polygon');
  });

  it('should keep status and raw body on provider errors', () => {
    const error = new ProviderError('HTTP 500', {
      provider: 'twelvedata',
      statusCode: 500,
      responseBody: 'oops',
    });

    expect(error.statusCode).toBe(500);
    expect(error.responseBody).toBe('oops');
  });

  it('should keep the field on validation errors', () => {
    const error = new ValidationError('from must be <= to', { field: 'from' });

    expect(error.field).toBe('from');
    expect(error.data?.field).toBe('from');
  });

  it('should keep the path on io errors', () => {
    const error = new IoError('Cannot write output', { path: 'output/AAPL.csv' });

    expect(error.path).toBe('output/AAPL.csv');
  });
});

describe('type guards', () => {
  it('should narrow each class', () => {
    const auth = new AuthError('no key');
    const rate = new RateLimitedError('429', { provider: 'polygon' });

    expect(isDownloaderError(auth)).toBe(true);
    expect(isAuthError(auth)).toBe(true);
    expect(isRateLimitedError(auth)).toBe(false);
    expect(isRateLimitedError(rate)).toBe(true);
    expect(isProviderError(new ProviderError('x', { provider: 'polygon' }))).toBe(true);
    expect(isNetworkError(new NetworkError('x'))).toBe(true);
    expect(isIoError(new IoError('x', { path: 'a' }))).toBe(true);
    expect(isValidationError(new ValidationError('x'))).toBe(true);
    expect(isDownloaderError(new Error('plain'))).toBe(false);
  });
});

describe('toDownloaderError', () => {
  it('should return taxonomy errors unchanged', () => {
    const error = new NetworkError('reset');

    expect(toDownloaderError(error)).toBe(error);
  });

  it('should wrap plain errors', () => {
    const wrapped = toDownloaderError(new TypeError('boom'));

    expect(wrapped.code).toBe('PROVIDER_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.data?.originalError).toBe('TypeError');
  });

  it('should wrap non-error values', () => {
    const wrapped = toDownloaderError('weird');

    expect(wrapped.message).toBe('Unknown error occurred');
    expect(wrapped.data?.error).toBe('weird');
  });
});
