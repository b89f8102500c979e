/**
 * Command-line program
 *
 * Builds the commander program, loads configuration from the environment
 * snapshot, creates the logger and runs the download inside a run context.
 */

import { Command, CommanderError, Option, type OptionValues } from 'commander';
import chalk from 'chalk';
import { isAuthError, toDownloaderError } from '@mdd/contracts';
import {
  attachGlobalHandlers,
  createLogger,
  redactUrl,
  withRunContext,
  type Logger,
} from '@mdd/logger';
import type { FetchFn, Sleep } from '@mdd/market-data-core';
import { getConfigSummary, loadConfig, type Environment } from './config/index.js';
import { runDownload, type DownloadSummary } from './commands/download.command.js';

export const PROGRAM_NAME = 'market-data-downloader';
export const VERSION = '0.1.0';

/**
 * Shown after a 403: the key works but the plan does not cover the data.
 */
export const ENTITLEMENT_HINT = [
  'Hint: Your API key may not be entitled to this data. Try:',
  '- Using --granularity day (daily aggregates) instead of minute',
  '- Using a different ticker (e.g., equities like AAPL)',
  '- Upgrading your plan for minute/index data',
].join('\n');

export interface MainOptions {
  /** Environment snapshot, read once */
  env: Environment;

  stdout?: (text: string) => void;
  stderr?: (text: string) => void;

  /** Install process-level error handlers (binary only) */
  attachHandlers?: boolean;

  logger?: Logger;
  fetch?: FetchFn;
  sleep?: Sleep;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Formats an error for the terminal: `Error: <message>`, plus the
 * entitlement hint for HTTP 403.
 */
export function formatCliError(error: unknown): string[] {
  const normalized = toDownloaderError(error);
  const lines = [`Error: ${redactUrl(normalized.message)}`];
  if (isAuthError(normalized) && normalized.statusCode === 403) {
    lines.push(ENTITLEMENT_HINT);
  }
  return lines;
}

/**
 * Builds the program. `onDownload` receives the raw option values.
 */
export function buildProgram(
  onDownload: (options: OptionValues) => Promise<void>,
  output: { writeOut: (text: string) => void; writeErr: (text: string) => void }
): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Download historical OHLCV bars from Polygon.io or Twelve Data to CSV or JSON')
    .version(VERSION)
    .exitOverride()
    .configureOutput(output);

  program
    .command('download')
    .description('Download bars for one ticker and date range')
    .requiredOption('-t, --ticker <ticker>', 'Ticker symbol, e.g. AAPL or I:SPX')
    .requiredOption('-f, --from <date>', 'Start date (YYYY-MM-DD)')
    .requiredOption('-T, --to <date>', 'End date, inclusive (YYYY-MM-DD)')
    .option('-k, --apikey <key>', 'API key (defaults to the provider environment variable)')
    .option('-o, --out <path>', 'Output file, or root directory with --split-by-day')
    .option('--output-dir <dir>', 'Directory for generated file names (default: "output")')
    .addOption(new Option('--format <format>', 'Output format').choices(['csv', 'json']).default('csv'))
    .addOption(
      new Option('--granularity <granularity>', 'Bar size').choices(['minute', 'day']).default('minute')
    )
    .addOption(
      new Option('--provider <provider>', 'Data provider').choices(['polygon', 'twelvedata']).default('polygon')
    )
    .option('--split-by-day', 'Write one CSV file per calendar day', false)
    .option('--no-header', 'Omit the CSV header row')
    .option('--max-decimals <n>', 'Maximum decimal places for prices and volume')
    .addOption(
      new Option('--timestamp-format <format>', 'Timestamp rendering')
        .choices(['iso', 'epoch-ms'])
        .default('iso')
    )
    .option('--rate-limit-wait-secs <n>', 'Seconds to wait between pages and before retries', '12')
    .option('--max-retries <n>', 'Retries per page for rate limits and network errors', '3')
    .option('--timeout-ms <n>', 'Per-request timeout in milliseconds (default: 30000)')
    .option('-v, --verbose', 'Debug logging; repeatable', increaseVerbosity, 0)
    .action(async (options: OptionValues) => {
      await onDownload(options);
    });

  return program;
}

/**
 * Runs the program and resolves to the process exit code.
 *
 * @param argv - Arguments after the executable and script path
 */
export async function main(argv: string[], options: MainOptions): Promise<number> {
  const writeOut = options.stdout ?? ((text: string) => void process.stdout.write(text));
  const writeErr = options.stderr ?? ((text: string) => void process.stderr.write(text));

  let exitCode = 0;
  const program = buildProgram(
    async (raw) => {
      exitCode = await runCli(raw, options, writeErr);
    },
    { writeOut, writeErr }
  );

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}

async function runCli(
  raw: OptionValues,
  options: MainOptions,
  writeErr: (text: string) => void
): Promise<number> {
  let logger = options.logger;

  try {
    const config = loadConfig(options.env);
    const verbose = typeof raw['verbose'] === 'number' ? raw['verbose'] : 0;

    logger ??= createLogger({
      level: verbose > 0 ? 'debug' : config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
      stderr: true,
    });

    if (options.attachHandlers) {
      attachGlobalHandlers(logger);
    }

    logger.debug('Configuration loaded', getConfigSummary(config));

    const activeLogger = logger;
    const summary: DownloadSummary = await withRunContext(
      () =>
        runDownload(
          { ...raw, apiKey: raw['apikey'] },
          { config, logger: activeLogger, fetch: options.fetch, sleep: options.sleep }
        ),
      undefined,
      { command: 'download' }
    );

    activeLogger.info('Download complete', {
      provider: summary.provider,
      ticker: summary.ticker,
      bars: summary.bars,
      pages: summary.pages,
      retries: summary.retries,
      files: summary.files.length,
      duration_ms: summary.durationMs,
    });
    return 0;
  } catch (error) {
    logger?.debug('Download failed', { error: toDownloaderError(error).toJSON() });
    const [first = 'Error', ...rest] = formatCliError(error);
    writeErr(`${chalk.red(first)}\n`);
    for (const line of rest) {
      writeErr(`${chalk.yellow(line)}\n`);
    }
    return 1;
  }
}
