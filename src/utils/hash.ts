import { createHash } from 'crypto';
import type { CleanJobRecord } from '../types/job';

/**
 * Generates a deterministic deduplication key for a job based on:
 * - job_url, when present
 * - otherwise site + id
 *
 * The same posting found by overlapping searches yields the same key
 */
export function generateDedupKey(job: CleanJobRecord): string {
  const url = job.job_url.trim();
  const hashInput = url
    ? `url|${url}`
    : `id|${job.site.toLowerCase().trim()}|${job.id.trim()}`;
  return createHash('sha256').update(hashInput).digest('hex');
}
