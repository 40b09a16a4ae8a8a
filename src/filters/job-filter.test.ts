import { describe, expect, it } from 'vitest';
import type { RawJobRecord, TaggedRawJob } from '../types/job';
import { JobFilter } from './job-filter';

function tagged(record: RawJobRecord, overrides: Partial<TaggedRawJob> = {}): TaggedRawJob {
  return {
    record,
    platform: 'indeed',
    term: 'QA Engineer',
    location: 'Recife, Pernambuco',
    country: 'Brazil',
    descriptionIncomplete: false,
    ...overrides,
  };
}

describe('JobFilter', () => {
  describe('hasUsableDescription', () => {
    const filter = new JobFilter({ requireTermMatch: false });

    it('rejects empty descriptions from platforms that omit them', () => {
      expect(filter.hasUsableDescription(tagged({ description: '' }, { descriptionIncomplete: true }))).toBe(false);
      expect(filter.hasUsableDescription(tagged({ description: 'nan' }, { descriptionIncomplete: true }))).toBe(false);
      expect(filter.hasUsableDescription(tagged({}, { descriptionIncomplete: true }))).toBe(false);
    });

    it('rejects descriptions that are empty once cleaned', () => {
      expect(filter.hasUsableDescription(tagged({ description: '\u0000 ' }, { descriptionIncomplete: true }))).toBe(false);
      expect(filter.hasUsableDescription(tagged({ description: [''] }, { descriptionIncomplete: true }))).toBe(false);
    });

    it('accepts described records and platforms that always describe', () => {
      expect(filter.hasUsableDescription(tagged({ description: 'Test APIs' }, { descriptionIncomplete: true }))).toBe(true);
      expect(filter.hasUsableDescription(tagged({ description: '' }))).toBe(true);
    });
  });

  describe('filter', () => {
    it('counts excluded records', () => {
      const filter = new JobFilter({ requireTermMatch: false });
      const batch = [
        tagged({ job_url: 'https://x.test/1', description: '' }, { platform: 'glassdoor', descriptionIncomplete: true }),
        tagged({ job_url: 'https://x.test/2', description: 'Regression suites' }, { platform: 'glassdoor', descriptionIncomplete: true }),
      ];

      const { kept, excluded } = filter.filter(batch);

      expect(kept).toEqual([batch[1]]);
      expect(excluded).toBe(1);
    });

    it('keeps only records mentioning the term when required', () => {
      const filter = new JobFilter({ requireTermMatch: true });
      const batch = [
        tagged({ title: 'Senior QA Engineer' }),
        tagged({ title: 'Data Analyst', description: 'Works with the qa engineer team' }),
        tagged({ title: 'Backend Developer', description: 'Node services' }),
      ];

      const { kept, excluded } = filter.filter(batch);

      expect(kept).toEqual([batch[0], batch[1]]);
      expect(excluded).toBe(1);
    });

    it('keeps the whole batch when no record mentions the term', () => {
      const filter = new JobFilter({ requireTermMatch: true });
      const batch = [tagged({ title: 'Backend Developer' }), tagged({ title: 'Designer' })];

      const { kept, excluded } = filter.filter(batch);

      expect(kept).toEqual(batch);
      expect(excluded).toBe(0);
    });
  });
});
