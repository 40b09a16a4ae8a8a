export { loadConfig, toCollectionSettings, createExampleConfig, DEFAULT_CONFIG, type Config } from './config';
export { collectionSettingsSchema, configFileSchema, type CollectionSettings } from './config/schema';
export { JobFilter } from './filters/job-filter';
export { JobCollector, type CollectionSummary, type CollectionResult, type CollectOptions } from './services/job-collector';
export { JobDataCleaner, isMissing, type CleanResult, type CleaningDrop } from './services/cleaner';
export { DeduplicationEngine } from './services/deduplication';
export { JobDataExporter, toCsv, toJson, type ExportPaths } from './services/exporter';
export { SearchProviderAdapter, type SearchOutcome } from './services/search-adapter';
export { createSearchProvider, PLATFORM_CAPABILITIES, type SearchProvider } from './sources';
export { JobSpyApiProvider } from './sources/jobspy-api';
export * from './types/job';
export * from './utils/errors';
export { logger } from './utils/logger';
