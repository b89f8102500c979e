/**
 * @fileoverview Type definitions for the downloader logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Supported levels, most severe first. Also the allowed values of LOG_LEVEL.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

/**
 * Log level determines the minimum severity of messages that will be logged.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: false,
 *   stderr: true,
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Machine-readable JSON when true, pretty-print otherwise.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Send every console level to stderr, keeping stdout free for data.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Child logger context fields.
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'pager', 'writer') */
  component?: string;

  /** Provider context */
  provider?: string;

  /** Ticker context */
  ticker?: string;

  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
