import type { JobDataset, Platform } from '../types/job';

/**
 * A platform query failed: unreachable provider, rejected query or malformed response
 */
export class ProviderError extends Error {
  readonly name = 'ProviderError';

  constructor(
    message: string,
    readonly platform: Platform,
    readonly term: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Output directory or file could not be written
 * When raised from a collection run, `dataset` holds the records that were not exported
 */
export class ExportError extends Error {
  readonly name = 'ExportError';
  readonly dataset?: JobDataset;

  constructor(message: string, options?: { cause?: unknown; dataset?: JobDataset }) {
    super(message, options);
    this.dataset = options?.dataset;
  }
}

/**
 * Collection settings are missing fields or hold values of the wrong type
 */
export class SettingsError extends Error {
  readonly name = 'SettingsError';

  constructor(message: string, readonly issues: string[]) {
    super(message);
  }
}

/**
 * Configuration file could not be read or is invalid
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface FailedSearch {
  platform: Platform;
  term: string;
  location: string;
  message: string;
}

/**
 * Every issued search request failed
 */
export class CollectionFailedError extends Error {
  readonly name = 'CollectionFailedError';

  constructor(readonly failures: FailedSearch[]) {
    super(`All ${failures.length} search request(s) failed`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
