import { z } from 'zod';
import { JOB_TYPES, PLATFORMS } from '../types/job';

const platformEnum = z.enum(PLATFORMS);
const jobTypeEnum = z.enum(JOB_TYPES);
const verbosityEnum = z.union([z.literal(0), z.literal(1), z.literal(2)]);

const locationTargetSchema = z.object({
  location: z.string().min(1),
  country: z.string().min(1),
});

/**
 * Shape of config.json after defaults are merged in
 */
export const configFileSchema = z.object({
  search: z.object({
    terms: z.array(z.string().min(1)).min(1),
    locations: z.array(locationTargetSchema).min(1),
    platforms: z.array(platformEnum).min(1),
    results_per_term: z.number().int().min(0),
    days_old: z.number().int().min(1),
  }),
  output: z.object({
    directory: z.string().min(1),
    filename: z.string().min(1),
  }),
  scraping: z.object({
    delay_between_searches: z.number().min(0),
    verbose: verbosityEnum,
    proxies: z.array(z.string()),
  }),
  filters: z.object({
    job_type: jobTypeEnum.nullable(),
    is_remote: z.boolean().nullable(),
    require_term_match: z.boolean(),
  }),
  provider: z.object({
    base_url: z.string().url(),
    api_key: z.string().nullable(),
    timeout_ms: z.number().int().positive(),
  }),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Settings handed to a collection run
 * Empty term or platform lists are allowed and produce an empty dataset
 */
export const collectionSettingsSchema = z.object({
  searchTerms: z.array(z.string()),
  location: z.string(),
  country: z.string(),
  extraLocations: z.array(locationTargetSchema).optional(),
  platforms: z.array(platformEnum),
  resultsPerTerm: z.number().int().min(0),
  daysOld: z.number().int().min(1),
  filters: z.object({
    jobType: jobTypeEnum.nullable(),
    isRemote: z.boolean().nullable(),
    proxies: z.array(z.string()),
  }),
  delaySeconds: z.number().min(0),
  outputFilename: z.string().min(1),
  requireTermMatch: z.boolean().optional(),
});

export type CollectionSettings = z.infer<typeof collectionSettingsSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
