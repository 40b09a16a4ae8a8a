import type { CleanJobRecord, JobDataset } from '../types/job';
import { generateDedupKey } from '../utils/hash';
import { logger } from '../utils/logger';

export interface DeduplicationResult {
  unique: JobDataset;
  duplicates: number;
}

/**
 * Cross-source deduplication
 * The first occurrence of a key wins, so input order is the tie-break rule
 */
export class DeduplicationEngine {
  deduplicate(jobs: readonly CleanJobRecord[]): DeduplicationResult {
    if (jobs.length === 0) {
      return { unique: [], duplicates: 0 };
    }

    const seen = new Set<string>();
    const unique: CleanJobRecord[] = [];

    for (const job of jobs) {
      const key = generateDedupKey(job);
      if (seen.has(key)) {
        logger.debug(`Duplicate job skipped`, { jobUrl: job.job_url, id: job.id, site: job.site });
        continue;
      }
      seen.add(key);
      unique.push(job);
    }

    const duplicates = jobs.length - unique.length;
    logger.info(`Deduplication complete`, {
      total: jobs.length,
      unique: unique.length,
      duplicates,
    });

    return { unique, duplicates };
  }

  /**
   * Generates the deduplication key for a job (for testing/debugging)
   */
  static generateKey(job: CleanJobRecord): string {
    return generateDedupKey(job);
  }
}
