/**
 * CSV rendering with csv-stringify
 */

import { stringify } from 'csv-stringify/sync';
import type { Bar } from '@mdd/contracts';
import { OUTPUT_COLUMNS, toOutputRecord, type RenderOptions } from './format.js';

export interface CsvOptions extends RenderOptions {
  /** @default true */
  header?: boolean;
}

/**
 * Renders bars as CSV text, one record per line, with an optional header.
 *
 * An empty bar list still yields the header line when headers are on.
 *
 * @example
 * ```typescript
 * renderCsv(bars, { ticker: 'AAPL' });
 * // 'ticker,timestamp,open,high,low,close,volume\nAAPL,2024-01-01T00:00:00.000Z,185,186,184.5,185.5,1000000\n'
 * ```
 */
export function renderCsv(bars: Bar[], options: CsvOptions): string {
  const header = options.header ?? true;

  if (bars.length === 0) {
    return header ? stringify([[...OUTPUT_COLUMNS]]) : '';
  }

  return stringify(
    bars.map((bar) => toOutputRecord(bar, options)),
    {
      header,
      columns: [...OUTPUT_COLUMNS],
      cast: { number: (value) => String(value) },
    }
  );
}
