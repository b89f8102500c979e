/**
 * @fileoverview Run context for correlating the log entries of one invocation.
 * Uses AsyncLocalStorage so every entry written while a download runs carries
 * the same run_id without threading it through call signatures.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Context stored for the duration of one run.
 */
export interface RunContext {
  /** Unique run identifier (UUID v4) */
  run_id: string;

  /** Optional additional context fields */
  [key: string]: unknown;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

export function generateRunId(): string {
  return randomUUID();
}

export function getRunContext(): RunContext | undefined {
  return runContextStorage.getStore();
}

/**
 * Executes a function inside a fresh run context.
 *
 * @param fn - Function to execute
 * @param runId - Optional run ID (generated if not provided)
 * @param additionalContext - Extra fields stored next to run_id
 *
 * @example
 * ```typescript
 * await withRunContext(async () => {
 *   logger.info('Fetching'); // includes run_id
 * }, undefined, { command: 'download' });
 * ```
 */
export async function withRunContext<T>(
  fn: () => Promise<T> | T,
  runId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RunContext = {
    ...additionalContext,
    run_id: runId ?? generateRunId(),
  };

  return runContextStorage.run(context, fn);
}
