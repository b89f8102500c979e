/**
 * Provider registry
 *
 * Maps a provider name to its adapter factory. Adding a vendor means adding
 * an adapter package and one entry here; the adapter's capabilities() name
 * its key variable.
 */

import type { BarProvider, ProviderName } from '@mdd/contracts';
import type { Logger } from '@mdd/logger';
import type { FetchFn } from '@mdd/market-data-core';
import { createPolygonProvider } from '@mdd/provider-polygon';
import { createTwelveDataProvider } from '@mdd/provider-twelvedata';

/**
 * Settings every adapter factory accepts
 */
export interface ProviderFactoryOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

type ProviderFactory = (options: ProviderFactoryOptions) => BarProvider;

const PROVIDERS: Record<ProviderName, ProviderFactory> = {
  polygon: (options) => createPolygonProvider(options),
  twelvedata: (options) => createTwelveDataProvider(options),
};

/**
 * Creates the adapter for a provider
 */
export function createProvider(name: ProviderName, options: ProviderFactoryOptions = {}): BarProvider {
  return PROVIDERS[name](options);
}
