/**
 * @mdd/app
 *
 * Download orchestration, output writers, configuration and the CLI.
 */

export { runDownload } from './commands/download.command.js';
export type { DownloadDependencies, DownloadSummary } from './commands/download.command.js';
export { loadConfig, parseDownloadOptions, getConfigSummary } from './config/index.js';
export type { Config, DownloadOptions, DownloadOptionsInput, Environment } from './config/index.js';
export { createProvider } from './providers/registry.js';
export type { ProviderFactoryOptions } from './providers/registry.js';
export * from './writers/index.js';
export { main, buildProgram, formatCliError, ENTITLEMENT_HINT } from './start.js';
export type { MainOptions } from './start.js';
