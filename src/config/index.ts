/**
 * Configuration management
 * Behavior comes from config.json, with a few environment variable overrides
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { configFileSchema, formatIssues, type CollectionSettings, type ConfigFile } from './schema';
import { JOB_TYPES, PLATFORMS, type JobType, type LocationTarget, type Platform } from '../types/job';
import { ConfigError, errorMessage } from '../utils/errors';
import { logger, type Verbosity } from '../utils/logger';
import { isPlainObject } from '../utils/object';

export interface Config {
  // Search
  search: {
    terms: string[];
    locations: LocationTarget[];
    platforms: Platform[];
    resultsPerTerm: number;
    daysOld: number;
  };

  // Output
  output: {
    directory: string;
    filename: string;
  };

  // Scraping Behavior
  scraping: {
    delaySeconds: number;
    verbose: Verbosity;
    proxies: string[];
  };

  // Job Filtering
  filters: {
    jobType: JobType | null;
    isRemote: boolean | null;
    requireTermMatch: boolean;
  };

  // Search Service
  provider: {
    baseUrl: string;
    apiKey: string | null;
    timeoutMs: number;
  };
}

export const DEFAULT_CONFIG: ConfigFile = {
  search: {
    terms: ['QA Engineer'],
    locations: [{ location: 'Brazil', country: 'Brazil' }],
    platforms: ['indeed'],
    results_per_term: 10,
    days_old: 7,
  },
  output: {
    directory: 'results',
    filename: 'jobs_dataset',
  },
  scraping: {
    delay_between_searches: 10,
    verbose: 1,
    proxies: [],
  },
  filters: {
    job_type: null,
    is_remote: null,
    require_term_match: false,
  },
  provider: {
    base_url: 'http://localhost:8000',
    api_key: null,
    timeout_ms: 60000,
  },
};

function parseString(value: string | undefined, defaultValue: string): string {
  if (!value) return defaultValue;
  return value.trim() || defaultValue;
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseVerbosity(value: string | undefined, defaultValue: Verbosity): Verbosity {
  const parsed = parseNumber(value, defaultValue);
  if (parsed === 0 || parsed === 1 || parsed === 2) return parsed;
  throw new ConfigError(`JOB_VERBOSE must be 0, 1 or 2, got "${value}"`);
}

/**
 * Recursively merges user config over defaults; arrays and scalars replace
 */
function mergeConfigs(
  userConfig: Record<string, unknown>,
  defaults: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults };

  for (const [key, value] of Object.entries(userConfig)) {
    const base = merged[key];
    merged[key] = isPlainObject(base) && isPlainObject(value)
      ? mergeConfigs(value, base)
      : value;
  }

  return merged;
}

/**
 * Older configs carried a single search.location / search.country pair
 */
function upgradeLegacyLocation(userConfig: Record<string, unknown>): Record<string, unknown> {
  const search = userConfig.search;
  if (!isPlainObject(search) || !('location' in search) || 'locations' in search) {
    return userConfig;
  }

  const { location, country, ...rest } = search;
  return {
    ...userConfig,
    search: {
      ...rest,
      locations: [{ location, country: country ?? location }],
    },
  };
}

function readUserConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    logger.warn(`Config file not found: ${configPath}, using default configuration`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${configPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }

  logger.info(`Configuration loaded from: ${resolve(configPath)}`);
  return parsed;
}

function validate(raw: unknown, source: string): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration (${source}):\n  ${formatIssues(result.error).join('\n  ')}`);
  }
  return result.data;
}

function applyEnvOverrides(file: ConfigFile, env: NodeJS.ProcessEnv): ConfigFile {
  return {
    ...file,
    output: {
      directory: parseString(env.JOB_OUTPUT_DIR, file.output.directory),
      filename: parseString(env.JOB_OUTPUT_FILENAME, file.output.filename),
    },
    scraping: {
      ...file.scraping,
      delay_between_searches: parseNumber(env.JOB_DELAY_SECONDS, file.scraping.delay_between_searches),
      verbose: parseVerbosity(env.JOB_VERBOSE, file.scraping.verbose),
    },
    provider: {
      ...file.provider,
      base_url: parseString(env.JOBSPY_API_URL, file.provider.base_url),
      api_key: env.JOBSPY_API_KEY ? env.JOBSPY_API_KEY : file.provider.api_key,
    },
  };
}

function toConfig(file: ConfigFile): Config {
  return {
    search: {
      terms: file.search.terms,
      locations: file.search.locations,
      platforms: file.search.platforms,
      resultsPerTerm: file.search.results_per_term,
      daysOld: file.search.days_old,
    },
    output: { ...file.output },
    scraping: {
      delaySeconds: file.scraping.delay_between_searches,
      verbose: file.scraping.verbose,
      proxies: file.scraping.proxies,
    },
    filters: {
      jobType: file.filters.job_type,
      isRemote: file.filters.is_remote,
      requireTermMatch: file.filters.require_term_match,
    },
    provider: {
      baseUrl: file.provider.base_url,
      apiKey: file.provider.api_key,
      timeoutMs: file.provider.timeout_ms,
    },
  };
}

export function loadConfig(
  configPath: string = 'config.json',
  env: NodeJS.ProcessEnv = process.env
): Config {
  const userConfig = upgradeLegacyLocation(readUserConfig(configPath));
  const file = validate(mergeConfigs(userConfig, DEFAULT_CONFIG), configPath);

  // Overrides are validated again so a bad env value fails the same way
  return toConfig(validate(applyEnvOverrides(file, env), 'environment overrides'));
}

/**
 * Maps loaded configuration onto the settings of one collection run
 */
export function toCollectionSettings(config: Config): CollectionSettings {
  const [primary, ...extraLocations] = config.search.locations;

  return {
    searchTerms: config.search.terms,
    location: primary.location,
    country: primary.country,
    extraLocations,
    platforms: config.search.platforms,
    resultsPerTerm: config.search.resultsPerTerm,
    daysOld: config.search.daysOld,
    filters: {
      jobType: config.filters.jobType,
      isRemote: config.filters.isRemote,
      proxies: config.scraping.proxies,
    },
    delaySeconds: config.scraping.delaySeconds,
    outputFilename: config.output.filename,
    requireTermMatch: config.filters.requireTermMatch,
  };
}

export function createExampleConfig(outputPath: string = 'config.example.json'): void {
  const example = {
    _comment: 'Job collection configuration',
    search: {
      terms: [
        'QA Engineer',
        'Test Engineer',
        'Software Tester',
        'Quality Assurance Engineer',
        'Test Automation Engineer',
      ],
      locations: [
        { location: 'São Paulo', country: 'Brazil' },
        { location: 'Recife, Pernambuco', country: 'Brazil' },
      ],
      platforms: ['indeed', 'glassdoor'],
      results_per_term: 50,
      days_old: 7,
    },
    output: {
      directory: 'results',
      filename: 'jobs_consolidated',
    },
    scraping: {
      delay_between_searches: 10,
      verbose: 1,
      proxies: [],
    },
    filters: {
      _note: 'Set to null to disable filters',
      job_type: null,
      is_remote: null,
      require_term_match: false,
    },
    provider: {
      base_url: DEFAULT_CONFIG.provider.base_url,
      api_key: null,
      timeout_ms: DEFAULT_CONFIG.provider.timeout_ms,
    },
    _valid_platforms: PLATFORMS,
    _valid_job_types: JOB_TYPES,
    _valid_verbose_levels: '0=silent, 1=basic, 2=detailed',
  };

  writeFileSync(outputPath, `${JSON.stringify(example, null, 2)}\n`, 'utf-8');
  logger.info(`Example configuration created: ${outputPath}`);
}
