/**
 * @fileoverview Public API exports for @mdd/logger
 * Structured logging and process-level error handling
 */

// Core logger creation
export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Run context management
export { getRunContext, withRunContext } from './run-context.js';

// Performance timing
export { startTimer } from './perf-timer.js';

// Redaction helpers
export { redactUrl, redactSensitiveFields, REDACTED } from './formats.js';

// Type exports
export { LOG_LEVELS } from './types.js';
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer } from './perf-timer.js';
