/**
 * @fileoverview Performance timing for measuring operation durations
 * Uses performance.now() for high-resolution measurements.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since start, rounded */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final rounded duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Create a new performance timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = await fetchAllBars(provider, request, options);
 * logger.info('Fetch complete', { duration_ms: timer.stop(), bars: result.bars.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}
