import type { RawJobRecord, SearchRequest } from '../types/job';

/**
 * Base interface for search providers
 * A provider runs one platform query and returns the platform's raw records
 */
export interface SearchProvider {
  /**
   * Unique identifier for the provider
   */
  readonly name: string;

  /**
   * Runs a single search
   * @returns Raw records exactly as the platform reported them
   * @throws ProviderError when the provider is unreachable, rejects the query
   * or answers with something that is not a list of records
   */
  search(request: SearchRequest): Promise<RawJobRecord[]>;
}
