import { collectionSettingsSchema, formatIssues, type CollectionSettings } from '../config/schema';
import { JobFilter } from '../filters/job-filter';
import type { SearchProvider } from '../sources/base';
import type { JobDataset, LocationTarget, SearchRequest, TaggedRawJob } from '../types/job';
import {
  CollectionFailedError,
  ExportError,
  ProviderError,
  SettingsError,
  errorMessage,
  type FailedSearch,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep as defaultSleep } from '../utils/sleep';
import { JobDataCleaner, isMissing } from './cleaner';
import { DeduplicationEngine } from './deduplication';
import { JobDataExporter, type ExportPaths } from './exporter';
import { SearchProviderAdapter, type SearchOutcome } from './search-adapter';

export interface CollectOptions {
  /** Checked before each search step; once aborted, what was collected is kept */
  signal?: AbortSignal;
}

export interface CollectionStats {
  searchesIssued: number;
  recordsCollected: number;
  recordsExcluded: number;
  recordsDropped: number;
  duplicatesRemoved: number;
  recordsAfterDedup: number;
  recordsPerPlatform: Record<string, number>;
  failedSearches: FailedSearch[];
  cancelled: boolean;
}

export interface CollectionResult {
  dataset: JobDataset;
  stats: CollectionStats;
}

export interface CollectionSummary extends CollectionStats {
  filesWritten: string[];
}

export interface JobCollectorDeps {
  adapter?: SearchProviderAdapter;
  cleaner?: JobDataCleaner;
  deduplication?: DeduplicationEngine;
  exporter?: JobDataExporter;
  sleep?: (ms: number) => Promise<void>;
}

interface SearchStep {
  term: string;
  target: LocationTarget;
  request: SearchRequest;
}

/**
 * Orchestrates job collection: search every term on every platform,
 * one request at a time, then clean, deduplicate and export
 */
export class JobCollector {
  private adapter: SearchProviderAdapter;
  private cleaner: JobDataCleaner;
  private deduplication: DeduplicationEngine;
  private exporter: JobDataExporter;
  private sleep: (ms: number) => Promise<void>;

  constructor(provider: SearchProvider, deps: JobCollectorDeps = {}) {
    this.adapter = deps.adapter ?? new SearchProviderAdapter(provider);
    this.cleaner = deps.cleaner ?? new JobDataCleaner();
    this.deduplication = deps.deduplication ?? new DeduplicationEngine();
    this.exporter = deps.exporter ?? new JobDataExporter();
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Collects, cleans and exports
   * An empty dataset is reported but not written
   */
  async collectAndExport(
    settings: CollectionSettings,
    options: CollectOptions = {}
  ): Promise<CollectionSummary> {
    const { dataset, stats } = await this.collect(settings, options);

    if (dataset.length === 0) {
      logger.warn('No jobs collected, nothing to export');
      return { ...stats, filesWritten: [] };
    }

    let paths: ExportPaths;
    try {
      paths = await this.exporter.export(dataset, settings.outputFilename);
    } catch (error) {
      logger.error('Export failed, collected dataset kept in memory', error, {
        records: dataset.length,
      });
      if (error instanceof ExportError) {
        throw new ExportError(error.message, { cause: error.cause, dataset });
      }
      throw new ExportError(`Export failed: ${errorMessage(error)}`, { cause: error, dataset });
    }

    const summary: CollectionSummary = { ...stats, filesWritten: [paths.csvPath, paths.jsonPath] };
    logger.info('Collection completed', {
      recordsCollected: summary.recordsCollected,
      recordsAfterDedup: summary.recordsAfterDedup,
      filesWritten: summary.filesWritten,
    });
    return summary;
  }

  /**
   * Runs every search step and returns the deduplicated dataset
   */
  async collect(
    settings: CollectionSettings,
    options: CollectOptions = {}
  ): Promise<CollectionResult> {
    const validated = this.validateSettings(settings);
    const filter = new JobFilter({ requireTermMatch: validated.requireTermMatch ?? false });
    const steps = this.planSteps(validated);

    const collected: TaggedRawJob[] = [];
    const failedSearches: FailedSearch[] = [];
    let searchesIssued = 0;
    let recordsCollected = 0;
    let recordsExcluded = 0;
    let cancelled = false;

    logger.info(`Starting job collection`, {
      terms: validated.searchTerms.length,
      platforms: validated.platforms,
      steps: steps.length,
    });

    const isCancelled = (remaining: number): boolean => {
      if (!options.signal?.aborted) return false;
      cancelled = true;
      logger.warn(`Collection cancelled, ${remaining} search(es) abandoned`);
      return true;
    };

    for (const [index, step] of steps.entries()) {
      const { request } = step;
      if (isCancelled(steps.length - index)) break;

      if (request.resultLimit > 0 && searchesIssued > 0) {
        logger.info(`Waiting ${validated.delaySeconds}s before next search...`);
        await this.sleep(validated.delaySeconds * 1000);
        if (isCancelled(steps.length - index)) break;
      }

      logger.info(`Search ${index + 1}/${steps.length}`, {
        term: step.term,
        location: step.target.location,
        platform: request.platform,
      });

      let outcome: SearchOutcome;
      try {
        outcome = await this.adapter.search(request);
      } catch (error) {
        if (!(error instanceof ProviderError)) throw error;

        searchesIssued++;
        failedSearches.push({
          platform: request.platform,
          term: step.term,
          location: step.target.location,
          message: error.message,
        });
        logger.error(`Search failed, continuing with next`, error, {
          platform: request.platform,
          term: step.term,
        });
        continue;
      }

      if (outcome.skipped) continue;
      searchesIssued++;

      const batch = outcome.records.map((record): TaggedRawJob => ({
        record: isMissing(record.site) ? { ...record, site: request.platform } : record,
        platform: request.platform,
        term: step.term,
        location: step.target.location,
        country: step.target.country,
        descriptionIncomplete: outcome.descriptionIncomplete,
      }));
      recordsCollected += batch.length;

      const { kept, excluded } = filter.filter(batch);
      recordsExcluded += excluded;
      collected.push(...kept);

      logger.info(`Search ${index + 1}/${steps.length} completed`, {
        platform: request.platform,
        fetched: batch.length,
        kept: kept.length,
        excluded,
      });
    }

    if (searchesIssued > 0 && failedSearches.length === searchesIssued) {
      throw new CollectionFailedError(failedSearches);
    }

    const { records, drops } = this.cleaner.clean(collected.map(job => job.record));
    for (const drop of drops) {
      const source = collected[drop.index];
      logger.debug(`Record dropped during cleaning: ${drop.reason}`, {
        detail: drop.detail,
        platform: source?.platform,
        term: source?.term,
      });
    }
    if (drops.length > 0) {
      logger.info(`Dropped ${drops.length} record(s) during cleaning`);
    }

    const { unique, duplicates } = this.deduplication.deduplicate(records);

    const recordsPerPlatform: Record<string, number> = {};
    for (const job of unique) {
      recordsPerPlatform[job.site] = (recordsPerPlatform[job.site] ?? 0) + 1;
    }

    return {
      dataset: unique,
      stats: {
        searchesIssued,
        recordsCollected,
        recordsExcluded,
        recordsDropped: drops.length,
        duplicatesRemoved: duplicates,
        recordsAfterDedup: unique.length,
        recordsPerPlatform,
        failedSearches,
        cancelled,
      },
    };
  }

  private validateSettings(settings: CollectionSettings): CollectionSettings {
    const result = collectionSettingsSchema.safeParse(settings);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new SettingsError(`Invalid collection settings: ${issues.join('; ')}`, issues);
    }
    return result.data;
  }

  /**
   * Term outer, then location, then platform: a term's results are grouped
   * before the next term starts
   */
  private planSteps(settings: CollectionSettings): SearchStep[] {
    const targets: LocationTarget[] = [
      { location: settings.location, country: settings.country },
      ...(settings.extraLocations ?? []),
    ];

    const steps: SearchStep[] = [];
    for (const term of settings.searchTerms) {
      for (const target of targets) {
        for (const platform of settings.platforms) {
          steps.push({
            term,
            target,
            request: {
              term,
              location: target.location,
              country: target.country,
              platform,
              resultLimit: settings.resultsPerTerm,
              maxAgeDays: settings.daysOld,
              filters: settings.filters,
            },
          });
        }
      }
    }
    return steps;
  }
}
