/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { LOG_LEVELS } from '@mdd/logger';
import { POLYGON_BASE_URL } from '@mdd/provider-polygon';
import { TWELVEDATA_BASE_URL } from '@mdd/provider-twelvedata';

/**
 * Vendor connection settings
 */
const providerSchema = (defaultBaseUrl: string) =>
  z
    .object({
      apiKey: z.string().min(1).optional(),
      baseUrl: z.string().url().default(defaultBaseUrl),
    })
    .default({});

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  providers: z
    .object({
      polygon: providerSchema(POLYGON_BASE_URL),
      twelvedata: providerSchema(TWELVEDATA_BASE_URL),
    })
    .default({}),

  download: z
    .object({
      outputDir: z.string().min(1).default('output'),
      timeoutMs: z.coerce.number().int().positive().default(30000),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  POLYGON_API_KEY: 'providers.polygon.apiKey',
  POLYGON_BASE_URL: 'providers.polygon.baseUrl',
  TWELVEDATA_API_KEY: 'providers.twelvedata.apiKey',
  TWELVEDATA_BASE_URL: 'providers.twelvedata.baseUrl',
  OUTPUT_DIR: 'download.outputDir',
  REQUEST_TIMEOUT_MS: 'download.timeoutMs',
};

/**
 * Options of one download, as received from the command line.
 *
 * Numeric flags arrive as strings and are coerced. Ticker, dates and enum
 * values get their detailed checks from validateRequestFields.
 */
export const downloadOptionsSchema = z.object({
  ticker: z.string(),
  from: z.string(),
  to: z.string(),
  apiKey: z.string().optional(),
  out: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  format: z.enum(['csv', 'json']).default('csv'),
  granularity: z.string().default('minute'),
  provider: z.string().default('polygon'),
  splitByDay: z.boolean().default(false),
  header: z.boolean().default(true),
  maxDecimals: z.coerce.number().int().min(0).max(20).optional(),
  timestampFormat: z.enum(['iso', 'epoch-ms']).default('iso'),
  rateLimitWaitSecs: z.coerce.number().min(0).default(12),
  maxRetries: z.coerce.number().int().min(0).default(3),
  timeoutMs: z.coerce.number().int().positive().optional(),
});

/**
 * Validated download options
 */
export type DownloadOptions = z.infer<typeof downloadOptionsSchema>;

/**
 * Download options before defaults and coercion
 */
export type DownloadOptionsInput = z.input<typeof downloadOptionsSchema>;
