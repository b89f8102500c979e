/**
 * Input and bar validation shared by the adapters and the orchestrator.
 */

import {
  AuthError,
  GRANULARITIES,
  PROVIDER_NAMES,
  ProviderError,
  ValidationError,
  type Bar,
  type FetchRequest,
  type Granularity,
  type ProviderName,
} from '@mdd/contracts';
import { parseCalendarDate } from './timeframe.js';

/**
 * Raw request fields before validation.
 */
export interface FetchRequestInput {
  ticker: string;
  from: string;
  to: string;
  granularity: string;
  apiKey: string;
  provider: string;
}

function isGranularity(value: string): value is Granularity {
  return GRANULARITIES.some((granularity) => granularity === value);
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Request fields checked before an API key is resolved.
 */
export type RequestFields = Omit<FetchRequest, 'apiKey'>;

/**
 * Validates every request field except the API key.
 *
 * - ticker is trimmed and upper-cased and must not be empty
 * - from and to must be real YYYY-MM-DD dates with from <= to
 * - granularity and provider must be known values
 *
 * @throws ValidationError naming the offending field
 */
export function validateRequestFields(input: Omit<FetchRequestInput, 'apiKey'>): RequestFields {
  const ticker = input.ticker.trim().toUpperCase();
  if (ticker.length === 0) {
    throw new ValidationError('Ticker must not be empty', { field: 'ticker' });
  }

  const from = parseCalendarDate(input.from);
  if (from === undefined) {
    throw new ValidationError(`Invalid from date "${input.from}", expected YYYY-MM-DD`, {
      field: 'from',
    });
  }

  const to = parseCalendarDate(input.to);
  if (to === undefined) {
    throw new ValidationError(`Invalid to date "${input.to}", expected YYYY-MM-DD`, {
      field: 'to',
    });
  }

  if (from > to) {
    throw new ValidationError(`from (${input.from}) must not be after to (${input.to})`, {
      field: 'from',
    });
  }

  const { granularity, provider } = input;
  if (!isGranularity(granularity)) {
    throw new ValidationError(
      `Unsupported granularity "${granularity}". Supported: ${GRANULARITIES.join(', ')}`,
      { field: 'granularity' }
    );
  }

  if (!isProviderName(provider)) {
    throw new ValidationError(
      `Unknown provider "${provider}". Supported: ${PROVIDER_NAMES.join(', ')}`,
      { field: 'provider' }
    );
  }

  return { ticker, from: input.from, to: input.to, granularity, provider };
}

/**
 * Validates raw fields and builds an immutable FetchRequest.
 *
 * Runs validateRequestFields, then requires a non-blank API key.
 *
 * @throws ValidationError for malformed fields
 * @throws AuthError when the API key is blank
 *
 * @example
 * ```typescript
 * const request = validateFetchRequest({
 *   ticker: 'aapl', from: '2024-01-01', to: '2024-01-31',
 *   granularity: 'day', apiKey: 'test-key', provider: 'polygon'
 * });
 * request.ticker // 'AAPL'
 * ```
 */
export function validateFetchRequest(input: FetchRequestInput): FetchRequest {
  const fields = validateRequestFields(input);

  const apiKey = input.apiKey.trim();
  if (apiKey.length === 0) {
    throw new AuthError('API key must not be empty', { provider: fields.provider });
  }

  return Object.freeze({ ...fields, apiKey });
}

/**
 * Checks the OHLCV invariants of a parsed bar.
 *
 * @throws ProviderError naming the violated rule
 */
export function validateBar(bar: Bar, provider: ProviderName): Bar {
  const at = Number.isFinite(bar.timestamp)
    ? new Date(bar.timestamp).toISOString()
    : String(bar.timestamp);
  const fail = (rule: string): never => {
    throw new ProviderError(`Invalid bar at ${at}: ${rule}`, {
      provider,
      bar,
    });
  };

  if (!Number.isFinite(bar.timestamp)) {
    fail('timestamp must be a finite number');
  }

  for (const field of ['open', 'high', 'low', 'close', 'volume'] as const) {
    if (!Number.isFinite(bar[field])) {
      fail(`${field} must be a finite number`);
    }
  }

  if (bar.high < bar.low) {
    fail('high must be >= low');
  }
  if (bar.high < bar.open || bar.high < bar.close) {
    fail('high must be >= open and close');
  }
  if (bar.low > bar.open || bar.low > bar.close) {
    fail('low must be <= open and close');
  }
  if (bar.volume < 0) {
    fail('volume must be non-negative');
  }

  return bar;
}
