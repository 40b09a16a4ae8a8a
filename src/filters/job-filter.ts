import type { TaggedRawJob } from '../types/job';
import { tryNormalizeText } from '../services/cleaner';
import { logger } from '../utils/logger';

export interface JobFilterOptions {
  /** Drop records whose title and description never mention the search term */
  requireTermMatch: boolean;
}

export interface FilterResult {
  kept: TaggedRawJob[];
  excluded: number;
}

/**
 * Filters raw search results before cleaning
 * Exclusions here are business rules, not faults
 */
export class JobFilter {
  constructor(private options: JobFilterOptions) {}

  /**
   * Platforms known to omit descriptions produce unusable records when they do
   */
  hasUsableDescription(job: TaggedRawJob): boolean {
    if (!job.descriptionIncomplete) return true;
    // Judged on the cleaned text; values without a text form are left to the cleaner
    return tryNormalizeText(job.record.description) !== '';
  }

  /**
   * Checks if the search term appears in the title or description
   */
  matchesSearchTerm(job: TaggedRawJob): boolean {
    const term = job.term.trim().toLowerCase();
    if (!term) return true;

    return ['title', 'description'].some(field => {
      const value = job.record[field];
      return typeof value === 'string' && value.toLowerCase().includes(term);
    });
  }

  /**
   * Filters one search step's batch
   */
  filter(batch: TaggedRawJob[]): FilterResult {
    const withDescription = batch.filter(job => {
      const usable = this.hasUsableDescription(job);
      if (!usable) {
        logger.debug(`Job excluded: ${job.platform} record without description`, {
          jobUrl: typeof job.record.job_url === 'string' ? job.record.job_url : undefined,
        });
      }
      return usable;
    });

    let kept = withDescription;
    if (this.options.requireTermMatch && withDescription.length > 0) {
      const matching = withDescription.filter(job => this.matchesSearchTerm(job));
      // Keep the batch as-is when nothing matches
      if (matching.length > 0) {
        kept = matching;
        logger.debug(`Search term filter kept ${matching.length}/${withDescription.length} jobs`, {
          term: batch[0]?.term,
        });
      }
    }

    return { kept, excluded: batch.length - kept.length };
  }
}
