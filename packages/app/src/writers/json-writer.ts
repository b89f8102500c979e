/**
 * JSON rendering
 */

import type { Bar } from '@mdd/contracts';
import { toOutputRecord, type RenderOptions } from './format.js';

/**
 * Renders bars as one pretty-printed JSON array with a trailing newline.
 */
export function renderJson(bars: Bar[], options: RenderOptions): string {
  return `${JSON.stringify(
    bars.map((bar) => toOutputRecord(bar, options)),
    null,
    2
  )}\n`;
}
