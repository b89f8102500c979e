/**
 * Configuration loading and management
 */

import type { ZodError } from 'zod';
import { ValidationError } from '@mdd/contracts';
import { isRecord } from '@mdd/market-data-core';
import {
  configSchema,
  downloadOptionsSchema,
  envMapping,
  type Config,
  type DownloadOptions,
} from './schema.js';

/**
 * Environment snapshot. Only the CLI passes process.env here.
 */
export type Environment = Record<string, string | undefined>;

/**
 * Load configuration from an environment snapshot and defaults
 *
 * Empty variables count as unset.
 *
 * @throws ValidationError listing every invalid setting
 */
export function loadConfig(env: Environment): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, configPath, value.trim());
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ValidationError(
      `Configuration validation failed:\n${formatIssues(result.error, reverseMapping()).join('\n')}`,
      { field: 'config' }
    );
  }

  return result.data;
}

/**
 * Validate raw download options
 *
 * @throws ValidationError listing every invalid option
 */
export function parseDownloadOptions(input: unknown): DownloadOptions {
  const result = downloadOptionsSchema.safeParse(input);

  if (!result.success) {
    const first = result.error.errors[0];
    throw new ValidationError(`Invalid options:\n${formatIssues(result.error).join('\n')}`, {
      field: first ? first.path.join('.') : undefined,
    });
  }

  return result.data;
}

/**
 * Get configuration summary for logging. Never includes API keys.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    providers: {
      polygon: {
        baseUrl: config.providers.polygon.baseUrl,
        apiKey: config.providers.polygon.apiKey ? 'set' : 'unset',
      },
      twelvedata: {
        baseUrl: config.providers.twelvedata.baseUrl,
        apiKey: config.providers.twelvedata.apiKey ? 'set' : 'unset',
      },
    },
    download: config.download,
  };
}

function formatIssues(error: ZodError, names: Map<string, string> = new Map()): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    const name = names.get(path);
    return `${name ? `${name} (${path})` : path}: ${issue.message}`;
  });
}

function reverseMapping(): Map<string, string> {
  return new Map(Object.entries(envMapping).map(([envKey, path]) => [path, envKey]));
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

// Re-export types
export type { Config, DownloadOptions, DownloadOptionsInput } from './schema.js';
export { configSchema, downloadOptionsSchema, envMapping } from './schema.js';
