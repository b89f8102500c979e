/**
 * @fileoverview Custom Winston formats for the downloader logger
 * Includes secret redaction, field normalization, output formatting and run ID injection.
 */

import winston from 'winston';
import { getRunContext } from './run-context.js';

const { format } = winston;

/**
 * Sensitive field patterns that should be redacted from logs.
 * Matches are case-insensitive to catch common variations.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

/**
 * Query-string credentials embedded in URLs, e.g. `apiKey=...` or `apikey=...`.
 */
const URL_CREDENTIAL_PATTERN = /([?&](?:api[_-]?key|token)=)[^&\s"']+/gi;

/**
 * Replacement value for redacted sensitive data.
 */
export const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Masks credentials carried in URL query strings.
 *
 * @example
 * ```typescript
 * redactUrl('https://api.polygon.io/v2/aggs?limit=1&apiKey=abc');
 * // 'https://api.polygon.io/v2/aggs?limit=1&apiKey=[REDACTED]'
 * ```
 */
export function redactUrl(value: string): string {
  return value.replace(URL_CREDENTIAL_PATTERN, `$1${REDACTED}`);
}

/**
 * Recursively redacts sensitive fields and URL credentials. Returns a copy.
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactUrl(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value instanceof Error) {
    const copy = new Error(redactUrl(value.message));
    copy.name = value.name;
    if (value.stack) {
      copy.stack = redactUrl(value.stack);
    }
    return copy;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(entry);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must be applied first in the format chain.
 *
 * @example
 * ```typescript
 * logger.debug('Polygon API request', { url: 'https://api.polygon.io/...&apiKey=abc' });
 * // Output: {"level":"debug","message":"Polygon API request","url":"https://api.polygon.io/...&apiKey=[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const coreFields = ['level', 'timestamp', 'label'];

  for (const key of Object.keys(info)) {
    if (coreFields.includes(key)) {
      continue;
    }
    if (key !== 'message' && isSensitiveKey(key)) {
      info[key] = REDACTED;
    } else {
      info[key] = redactSensitiveFields(info[key]);
    }
  }

  return info;
});

/**
 * Winston format that adds the timestamp and error stacks, and copies the
 * AsyncLocalStorage run context (run_id plus any extra fields) onto the
 * entry. Fields the caller set win.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),

  format.errors({ stack: true }),

  format((info) => {
    const context = getRunContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) {
          info[key] = value;
        }
      }
    }
    return info;
  })()
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Download complete component=app ticker=AAPL bars=390
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, ticker, provider, run_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (provider) context.push(`provider=${String(provider)}`);
    if (ticker) context.push(`ticker=${String(ticker)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    if (run_id) context.push(`run_id=${String(run_id)}`);

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
