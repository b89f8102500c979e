/**
 * Download command
 *
 * Orchestrates one download: validate options, resolve the API key, page
 * through the provider, clip and de-duplicate, then write the output files.
 */

import {
  AuthError,
  ValidationError,
  type Bar,
  type BarProvider,
  type FetchRequest,
  type ProviderName,
} from '@mdd/contracts';
import { createChildLogger, startTimer, type Logger } from '@mdd/logger';
import {
  fetchAllBars,
  groupBarsByDay,
  normalizeBars,
  validateFetchRequest,
  validateRequestFields,
  type FetchFn,
  type Sleep,
} from '@mdd/market-data-core';
import { parseDownloadOptions, type Config, type DownloadOptions } from '../config/index.js';
import {
  createProvider as createRegisteredProvider,
  type ProviderFactoryOptions,
} from '../providers/registry.js';
import {
  dayFilePath,
  defaultOutputPath,
  defaultSplitRoot,
  renderCsv,
  renderJson,
  writeFileAtomic,
  type CsvOptions,
} from '../writers/index.js';

/**
 * Collaborators of a download. Tests replace fetch, sleep or the whole
 * provider; the CLI passes only config and logger.
 */
export interface DownloadDependencies {
  config: Config;
  logger: Logger;
  fetch?: FetchFn;
  sleep?: Sleep;
  createProvider?: (name: ProviderName, options: ProviderFactoryOptions) => BarProvider;
}

/**
 * Outcome of a successful download
 */
export interface DownloadSummary {
  provider: ProviderName;
  ticker: string;

  /** Bars written after clipping and de-duplication */
  bars: number;

  pages: number;
  retries: number;

  /** Files written, in write order */
  files: string[];

  durationMs: number;
}

/**
 * Runs one download.
 *
 * @param input - Raw options (validated here)
 * @throws ValidationError for bad options, including JSON with split-by-day
 * @throws AuthError when no API key is available or the provider rejects it
 * @throws RateLimitedError, ProviderError, NetworkError from the provider
 * @throws IoError when an output file cannot be written
 *
 * @example
 * ```typescript
 * const summary = await runDownload(
 *   { ticker: 'AAPL', from: '2024-01-01', to: '2024-01-31', granularity: 'day' },
 *   { config, logger }
 * );
 * logger.info('Done', { files: summary.files });
 * ```
 */
export async function runDownload(input: unknown, deps: DownloadDependencies): Promise<DownloadSummary> {
  const { config, logger } = deps;
  const timer = startTimer();

  const options = parseDownloadOptions(input);
  const fields = validateRequestFields(options);

  if (options.format === 'json' && options.splitByDay) {
    throw new ValidationError('--split-by-day is only supported with --format csv', {
      field: 'splitByDay',
    });
  }

  const factory = deps.createProvider ?? createRegisteredProvider;
  const provider = factory(fields.provider, {
    baseUrl: config.providers[fields.provider].baseUrl,
    timeoutMs: options.timeoutMs ?? config.download.timeoutMs,
    fetch: deps.fetch,
    logger,
  });
  const capabilities = provider.capabilities();

  const apiKey = resolveApiKey(fields.provider, capabilities.apiKeyEnvVar, options, config);
  const request = validateFetchRequest({ ...fields, apiKey });

  logger.info('Starting download', {
    provider: request.provider,
    ticker: request.ticker,
    from: request.from,
    to: request.to,
    granularity: request.granularity,
    format: options.format,
    capabilities,
  });

  const fetched = await fetchAllBars(provider, request, {
    rateLimitWaitMs: Math.round(options.rateLimitWaitSecs * 1000),
    maxRetries: options.maxRetries,
    sleep: deps.sleep,
    logger: createChildLogger(logger, { component: 'pager', provider: request.provider }),
  });

  const { bars, outOfRange, duplicates } = normalizeBars(fetched.bars, request.from, request.to);
  logger.debug('Bars normalized', { fetched: fetched.bars.length, kept: bars.length, outOfRange, duplicates });
  if (outOfRange > 0) {
    logger.warn(`Dropped ${outOfRange} bars outside ${request.from}..${request.to} (UTC)`, {
      ticker: request.ticker,
      outOfRange,
    });
  }

  if (bars.length === 0) {
    logger.warn('No data returned', { ticker: request.ticker, from: request.from, to: request.to });
  }

  const files = await writeOutput(bars, request, options, config, logger);

  return {
    provider: request.provider,
    ticker: request.ticker,
    bars: bars.length,
    pages: fetched.pages,
    retries: fetched.retries,
    files,
    durationMs: timer.stop(),
  };
}

/**
 * Explicit option first, then the provider's key from the configuration.
 *
 * @param envVar - Variable the provider reads its key from, named in the error
 * @throws AuthError naming the environment variable to set
 */
function resolveApiKey(
  provider: ProviderName,
  envVar: string,
  options: DownloadOptions,
  config: Config
): string {
  const explicit = options.apiKey?.trim();
  if (explicit) {
    return explicit;
  }

  const configured = config.providers[provider].apiKey?.trim();
  if (configured) {
    return configured;
  }

  throw new AuthError(`API key not provided. Use --apikey or set ${envVar}.`, {
    provider,
  });
}

async function writeOutput(
  bars: Bar[],
  request: FetchRequest,
  options: DownloadOptions,
  config: Config,
  logger: Logger
): Promise<string[]> {
  const outputDir = options.outputDir ?? config.download.outputDir;
  const csvOptions: CsvOptions = {
    ticker: request.ticker,
    header: options.header,
    maxDecimals: options.maxDecimals,
    timestampFormat: options.timestampFormat,
  };

  if (options.splitByDay) {
    const root = options.out ?? defaultSplitRoot(outputDir, request);
    const files: string[] = [];
    for (const group of groupBarsByDay(bars, request.from, request.to)) {
      const path = dayFilePath(root, request.ticker, group.day);
      await writeFileAtomic(path, renderCsv(group.bars, csvOptions));
      logger.debug('Day file written', { path, bars: group.bars.length });
      files.push(path);
    }
    logger.info(`Saved ${files.length} daily files under ${root}`);
    return files;
  }

  if (bars.length === 0) {
    return [];
  }

  const path = options.out ?? defaultOutputPath(outputDir, request, options.format);
  const content = options.format === 'json' ? renderJson(bars, csvOptions) : renderCsv(bars, csvOptions);
  await writeFileAtomic(path, content);
  logger.info(`Saved to ${path}`, { bars: bars.length });
  return [path];
}
