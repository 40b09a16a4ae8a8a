/**
 * Job record schemas
 * Raw records come from a search provider; clean records are what gets exported
 */

export const PLATFORMS = [
  'indeed',
  'glassdoor',
  'linkedin',
  'zip_recruiter',
  'google',
  'bayt',
  'naukri',
] as const;

export type Platform = (typeof PLATFORMS)[number];

export const JOB_TYPES = ['fulltime', 'parttime', 'contract', 'internship'] as const;

export type JobType = (typeof JOB_TYPES)[number];

/**
 * Raw job data from a provider (before cleaning)
 * Field names and value types are platform-defined
 */
export type RawJobRecord = Readonly<Record<string, unknown>>;

/**
 * Exported columns, in output order
 */
export const CLEAN_JOB_FIELDS = [
  'id',
  'site',
  'job_url',
  'job_url_direct',
  'title',
  'company',
  'location',
  'date_posted',
  'job_type',
  'salary_source',
  'interval',
  'min_amount',
  'max_amount',
  'currency',
  'is_remote',
  'job_level',
  'job_function',
  'description',
  'skills',
] as const;

export type CleanJobField = (typeof CLEAN_JOB_FIELDS)[number];

export type NumericJobField = 'min_amount' | 'max_amount';

export type TextJobField = Exclude<CleanJobField, NumericJobField | 'is_remote'>;

/**
 * Cleaned job schema
 * Absent values are the empty string, never null or NaN
 */
export type CleanJobRecord = Readonly<
  { [K in TextJobField]: string } & {
    [K in NumericJobField]: number | '';
  } & {
    is_remote: boolean | '';
  }
>;

export type CleanJobValue = CleanJobRecord[CleanJobField];

/**
 * Deduplicated, ordered result of a collection run
 */
export type JobDataset = readonly CleanJobRecord[];

export interface SearchFilters {
  jobType: JobType | null;
  isRemote: boolean | null;
  proxies: string[];
}

export interface SearchRequest {
  term: string;
  location: string;
  country: string;
  platform: Platform;
  resultLimit: number;
  maxAgeDays: number;
  filters: SearchFilters;
}

export interface LocationTarget {
  location: string;
  country: string;
}

/**
 * Raw record with the search step that produced it
 */
export interface TaggedRawJob {
  record: RawJobRecord;
  platform: Platform;
  term: string;
  location: string;
  country: string;
  descriptionIncomplete: boolean;
}
