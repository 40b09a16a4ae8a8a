import type { CollectionSettings } from '../config/schema';
import type { SearchProvider } from '../sources/base';
import type { CleanJobRecord, RawJobRecord, SearchRequest } from '../types/job';

type Responder = (request: SearchRequest) => RawJobRecord[] | Promise<RawJobRecord[]>;

/**
 * In-process search provider that records every request it receives
 */
export class StubProvider implements SearchProvider {
  readonly name = 'stub';
  readonly requests: SearchRequest[] = [];

  constructor(private respond: Responder = () => []) {}

  async search(request: SearchRequest): Promise<RawJobRecord[]> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export function buildSettings(overrides: Partial<CollectionSettings> = {}): CollectionSettings {
  return {
    searchTerms: ['QA Engineer'],
    location: 'Recife, Pernambuco',
    country: 'Brazil',
    platforms: ['indeed'],
    resultsPerTerm: 2,
    daysOld: 7,
    filters: { jobType: null, isRemote: null, proxies: [] },
    delaySeconds: 5,
    outputFilename: 'jobs_dataset',
    ...overrides,
  };
}

export function buildRequest(overrides: Partial<SearchRequest> = {}): SearchRequest {
  return {
    term: 'QA Engineer',
    location: 'Recife, Pernambuco',
    country: 'Brazil',
    platform: 'indeed',
    resultLimit: 10,
    maxAgeDays: 7,
    filters: { jobType: null, isRemote: null, proxies: [] },
    ...overrides,
  };
}

export function cleanJob(overrides: Partial<CleanJobRecord> = {}): CleanJobRecord {
  return {
    id: '',
    site: '',
    job_url: '',
    job_url_direct: '',
    title: '',
    company: '',
    location: '',
    date_posted: '',
    job_type: '',
    salary_source: '',
    interval: '',
    min_amount: '',
    max_amount: '',
    currency: '',
    is_remote: '',
    job_level: '',
    job_function: '',
    description: '',
    skills: '',
    ...overrides,
  };
}

/**
 * Parses CSV where every cell is quoted
 */
export function parseQuotedCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}
