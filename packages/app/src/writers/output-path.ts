/**
 * Output file naming
 */

import { join } from 'node:path';
import type { RequestFields } from '@mdd/market-data-core';

export type OutputFormat = 'csv' | 'json';

/**
 * Replaces path separators so a ticker can be used in a file name.
 *
 * @example
 * ```typescript
 * safeTickerName('BRK/B') // 'BRK_B'
 * ```
 */
export function safeTickerName(ticker: string): string {
  return ticker.replace(/[\\/]/g, '_');
}

/**
 * `{outputDir}/{ticker}_{from}_{to}.{ext}`
 */
export function defaultOutputPath(
  outputDir: string,
  request: Pick<RequestFields, 'ticker' | 'from' | 'to'>,
  format: OutputFormat
): string {
  return join(outputDir, `${safeTickerName(request.ticker)}_${request.from}_${request.to}.${format}`);
}

/**
 * `{outputDir}/{ticker}_{from}_{to}`, the root of a day-split download
 */
export function defaultSplitRoot(
  outputDir: string,
  request: Pick<RequestFields, 'ticker' | 'from' | 'to'>
): string {
  return join(outputDir, `${safeTickerName(request.ticker)}_${request.from}_${request.to}`);
}

/**
 * `{root}/{YYYY}/{MM}/{ticker}_{YYYY-MM-DD}.csv`
 */
export function dayFilePath(root: string, ticker: string, day: string): string {
  return join(root, day.slice(0, 4), day.slice(5, 7), `${safeTickerName(ticker)}_${day}.csv`);
}
