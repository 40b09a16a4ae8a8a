import type { SearchProvider } from '../sources/base';
import { PLATFORM_CAPABILITIES, type PlatformCapabilities } from '../sources/platforms';
import type { Platform, RawJobRecord, SearchRequest } from '../types/job';
import { ProviderError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface LocationSubstitution {
  from: string;
  to: string;
}

export interface SearchOutcome {
  /** Request as it was sent to the provider, after platform adjustments */
  request: SearchRequest;
  records: RawJobRecord[];
  /** Platform is known to omit descriptions */
  descriptionIncomplete: boolean;
  substitution: LocationSubstitution | null;
  /** No request was issued (result limit of zero) */
  skipped: boolean;
}

/**
 * Wraps a search provider with per-platform parameter adjustment
 * One routine serves every platform; differences live in the capability table
 */
export class SearchProviderAdapter {
  constructor(
    private provider: SearchProvider,
    private capabilities: Readonly<Record<Platform, PlatformCapabilities>> = PLATFORM_CAPABILITIES
  ) {}

  async search(request: SearchRequest): Promise<SearchOutcome> {
    const capability = this.capabilities[request.platform];
    const { adjusted, substitution } = this.adjustLocation(request, capability);
    const descriptionIncomplete = !capability.descriptionsSupported;

    if (substitution) {
      logger.debug(`Using country-level location for ${request.platform}`, {
        from: substitution.from,
        to: substitution.to,
      });
    }

    if (adjusted.resultLimit === 0) {
      logger.debug(`Result limit is 0, skipping ${request.platform} search`, { term: request.term });
      return { request: adjusted, records: [], descriptionIncomplete, substitution, skipped: true };
    }

    let records: RawJobRecord[];
    try {
      records = await this.provider.search(adjusted);
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(
        `${request.platform} search failed: ${errorMessage(error)}`,
        request.platform,
        request.term,
        { cause: error }
      );
    }

    if (!Array.isArray(records)) {
      throw new ProviderError(
        `${request.platform} search returned a malformed response`,
        request.platform,
        request.term
      );
    }

    return { request: adjusted, records, descriptionIncomplete, substitution, skipped: false };
  }

  private adjustLocation(
    request: SearchRequest,
    capability: PlatformCapabilities
  ): { adjusted: SearchRequest; substitution: LocationSubstitution | null } {
    if (!capability.requiresCountryLocation || request.location === request.country) {
      return { adjusted: request, substitution: null };
    }

    return {
      adjusted: { ...request, location: request.country },
      substitution: { from: request.location, to: request.country },
    };
  }
}
