import type { SearchProvider } from './base';
import { JobSpyApiProvider } from './jobspy-api';
import type { Config } from '../config';

/**
 * Factory function to create the search provider based on configuration
 */
export function createSearchProvider(config: Config): SearchProvider {
  return new JobSpyApiProvider({
    baseUrl: config.provider.baseUrl,
    apiKey: config.provider.apiKey ?? undefined,
    timeoutMs: config.provider.timeoutMs,
  });
}

export type { SearchProvider } from './base';
export { PLATFORM_CAPABILITIES, type PlatformCapabilities } from './platforms';
