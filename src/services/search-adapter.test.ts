import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PLATFORM_CAPABILITIES } from '../sources/platforms';
import { StubProvider, buildRequest } from '../test-utils/fixtures';
import { ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SearchProviderAdapter } from './search-adapter';

describe('SearchProviderAdapter', () => {
  beforeEach(() => {
    logger.setVerbosity(0);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setVerbosity(1);
  });

  it('sends the country instead of the city to platforms that require it', async () => {
    const provider = new StubProvider(() => [{ id: 'gd-1' }]);
    const adapter = new SearchProviderAdapter(provider);

    const outcome = await adapter.search(buildRequest({ platform: 'glassdoor' }));

    expect(provider.requests[0].location).toBe('Brazil');
    expect(outcome.substitution).toEqual({ from: 'Recife, Pernambuco', to: 'Brazil' });
    expect(outcome.descriptionIncomplete).toBe(true);
    expect(outcome.records).toEqual([{ id: 'gd-1' }]);
    expect(outcome.skipped).toBe(false);
  });

  it('keeps the city for other platforms', async () => {
    const provider = new StubProvider();
    const adapter = new SearchProviderAdapter(provider);

    const outcome = await adapter.search(buildRequest({ platform: 'indeed' }));

    expect(provider.requests[0].location).toBe('Recife, Pernambuco');
    expect(outcome.substitution).toBeNull();
    expect(outcome.descriptionIncomplete).toBe(false);
  });

  it('records no substitution when the location already is the country', async () => {
    const provider = new StubProvider();
    const adapter = new SearchProviderAdapter(provider);

    const outcome = await adapter.search(buildRequest({ platform: 'glassdoor', location: 'Brazil' }));

    expect(outcome.substitution).toBeNull();
    expect(provider.requests[0].location).toBe('Brazil');
  });

  it('skips the provider for a result limit of zero', async () => {
    const provider = new StubProvider(() => [{ id: 'never' }]);
    const adapter = new SearchProviderAdapter(provider);

    const outcome = await adapter.search(buildRequest({ resultLimit: 0 }));

    expect(provider.requests).toHaveLength(0);
    expect(outcome.skipped).toBe(true);
    expect(outcome.records).toEqual([]);
  });

  it('wraps unexpected provider failures', async () => {
    const cause = new Error('socket hang up');
    const adapter = new SearchProviderAdapter(
      new StubProvider(() => {
        throw cause;
      })
    );

    const error = await adapter.search(buildRequest({ platform: 'linkedin' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (!(error instanceof ProviderError)) return;
    expect(error.message).toBe('linkedin search failed: socket hang up');
    expect(error.platform).toBe('linkedin');
    expect(error.term).toBe('QA Engineer');
    expect(error.cause).toBe(cause);
  });

  it('passes provider errors through unchanged', async () => {
    const original = new ProviderError('indeed search rejected with HTTP 429', 'indeed', 'QA Engineer');
    const adapter = new SearchProviderAdapter(
      new StubProvider(() => {
        throw original;
      })
    );

    await expect(adapter.search(buildRequest())).rejects.toBe(original);
  });

  it('takes its platform rules from the capability table', async () => {
    const provider = new StubProvider();
    const adapter = new SearchProviderAdapter(provider, {
      ...PLATFORM_CAPABILITIES,
      indeed: { requiresCountryLocation: true, descriptionsSupported: false },
    });

    const outcome = await adapter.search(buildRequest({ platform: 'indeed' }));

    expect(provider.requests[0].location).toBe('Brazil');
    expect(outcome.descriptionIncomplete).toBe(true);
  });
});
