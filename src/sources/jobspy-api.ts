import fetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import type { SearchProvider } from './base';
import type { RawJobRecord, SearchRequest } from '../types/job';
import { ProviderError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface JobSpyApiOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const searchResponseSchema = z.object({
  jobs: z.array(z.record(z.unknown())),
});

/**
 * JobSpy-compatible search service adapter
 * Endpoint: POST {baseUrl}/api/v1/search_jobs, one platform per call
 */
export class JobSpyApiProvider implements SearchProvider {
  readonly name = 'jobspy-api';
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: JobSpyApiOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/api/v1/search_jobs`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(request: SearchRequest): Promise<RawJobRecord[]> {
    const { platform, term } = request;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    logger.debug(`Querying ${this.name} for ${platform}`, { term, location: request.location });

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(this.buildBody(request)),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new ProviderError(
        `${platform} search unreachable: ${errorMessage(error)}`,
        platform,
        term,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ProviderError(
        `${platform} search rejected with HTTP ${response.status}`,
        platform,
        term
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ProviderError(
        `${platform} search returned invalid JSON`,
        platform,
        term,
        { cause: error }
      );
    }

    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `${platform} search returned a malformed response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
        platform,
        term,
        { cause: parsed.error }
      );
    }

    return parsed.data.jobs;
  }

  private buildBody(request: SearchRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      site_name: [request.platform],
      search_term: request.term,
      location: request.location,
      country_indeed: request.country,
      results_wanted: request.resultLimit,
      hours_old: request.maxAgeDays * 24,
      linkedin_fetch_description: true,
    };

    if (request.filters.jobType) {
      body.job_type = request.filters.jobType;
    }
    if (request.filters.isRemote !== null) {
      body.is_remote = request.filters.isRemote;
    }
    if (request.filters.proxies.length > 0) {
      body.proxies = request.filters.proxies;
    }

    return body;
  }
}
