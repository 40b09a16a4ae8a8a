import { Response, type RequestInit } from 'node-fetch';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildRequest } from '../test-utils/fixtures';
import { ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { JobSpyApiProvider } from './jobspy-api';

function respondWith(body: string, status: number = 200) {
  return vi.fn(async (_url: string, _init?: RequestInit) => new Response(body, { status }));
}

function sentBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

describe('JobSpyApiProvider', () => {
  beforeEach(() => {
    logger.setVerbosity(0);
  });

  afterEach(() => {
    logger.setVerbosity(1);
  });

  it('posts one platform query to the search endpoint', async () => {
    const fetchImpl = respondWith(JSON.stringify({ count: 1, jobs: [{ id: 'gd-1', title: 'QA' }] }));
    const provider = new JobSpyApiProvider({
      baseUrl: 'http://search.test/',
      apiKey: 'test-secret',
      timeoutMs: 1500,
      fetchImpl,
    });

    const records = await provider.search(
      buildRequest({
        platform: 'glassdoor',
        location: 'Brazil',
        resultLimit: 25,
        filters: { jobType: 'fulltime', isRemote: null, proxies: [] },
      })
    );

    expect(records).toEqual([{ id: 'gd-1', title: 'QA' }]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://search.test/api/v1/search_jobs');
    expect(init?.method).toBe('POST');
    expect(init?.timeout).toBe(1500);
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'x-api-key': 'test-secret',
    });
    expect(sentBody(init)).toEqual({
      site_name: ['glassdoor'],
      search_term: 'QA Engineer',
      location: 'Brazil',
      country_indeed: 'Brazil',
      results_wanted: 25,
      hours_old: 168,
      linkedin_fetch_description: true,
      job_type: 'fulltime',
    });
  });

  it('forwards the remote flag and proxies when set', async () => {
    const fetchImpl = respondWith(JSON.stringify({ jobs: [] }));
    const provider = new JobSpyApiProvider({ baseUrl: 'http://search.test', fetchImpl });

    await provider.search(
      buildRequest({ filters: { jobType: null, isRemote: true, proxies: ['http://proxy.test:8080'] } })
    );

    const [, init] = fetchImpl.mock.calls[0];
    expect(init?.headers).not.toHaveProperty('x-api-key');
    expect(sentBody(init)).toMatchObject({
      is_remote: true,
      proxies: ['http://proxy.test:8080'],
    });
    expect(sentBody(init)).not.toHaveProperty('job_type');
  });

  it('reports a rejected query', async () => {
    const provider = new JobSpyApiProvider({
      baseUrl: 'http://search.test',
      fetchImpl: respondWith('slow down', 429),
    });

    const request = provider.search(buildRequest());

    await expect(request).rejects.toBeInstanceOf(ProviderError);
    await expect(request).rejects.toThrow('indeed search rejected with HTTP 429');
  });

  it('reports an unreachable service', async () => {
    const provider = new JobSpyApiProvider({
      baseUrl: 'http://search.test',
      fetchImpl: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    await expect(provider.search(buildRequest())).rejects.toThrow(
      'indeed search unreachable: connect ECONNREFUSED'
    );
  });

  it('reports a body that is not JSON', async () => {
    const provider = new JobSpyApiProvider({
      baseUrl: 'http://search.test',
      fetchImpl: respondWith('<html>oops</html>'),
    });

    await expect(provider.search(buildRequest())).rejects.toThrow('indeed search returned invalid JSON');
  });

  it('reports a response without a job list', async () => {
    const provider = new JobSpyApiProvider({
      baseUrl: 'http://search.test',
      fetchImpl: respondWith(JSON.stringify({ results: [] })),
    });

    await expect(provider.search(buildRequest())).rejects.toThrow(
      'indeed search returned a malformed response: Required'
    );
  });
});
