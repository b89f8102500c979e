/**
 * @fileoverview Main logger factory
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and console/file transports.
 */

import winston from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

const { format } = winston;

/**
 * Creates a configured logger instance.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message, run_id)
 * - Redaction of API keys in field names and URL query strings
 * - Console transport (optionally all levels on stderr) and file transport
 * - JSON or pretty-print output
 *
 * @param config - Logger configuration options
 * @returns Configured Winston logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, stderr: true });
 * const pagerLogger = logger.child({ component: 'pager' });
 * pagerLogger.debug('Page fetched', { page: 1, bars: 5000 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);
  const fileFormat = format.combine(redactPII(), standardFields, format.json());

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: stderr ? ['error', 'warn', 'info', 'debug'] : ['error'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: fileFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // A logger without transports makes winston complain on every write
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    transports,
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields.
 *
 * @example
 * ```typescript
 * const writerLogger = createChildLogger(logger, { component: 'writer' });
 * writerLogger.info('File written', { path: 'output/AAPL_2024-01-01_2024-01-01.csv' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * Creates a logger that discards everything. Used as the default wherever a
 * logger is optional.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    level: 'error',
    transports: [new winston.transports.Console({ silent: true })],
  });
}
