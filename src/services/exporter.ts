import { constants } from 'fs';
import { access, mkdir, rm, stat, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { CLEAN_JOB_FIELDS, type CleanJobValue, type JobDataset } from '../types/job';
import { ExportError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ExportPaths {
  csvPath: string;
  jsonPath: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function csvCell(value: CleanJobValue): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

/**
 * Every field quoted, header first, empty string for absent values
 */
export function toCsv(dataset: JobDataset): string {
  const lines = [CLEAN_JOB_FIELDS.map(field => csvCell(field)).join(',')];
  for (const job of dataset) {
    lines.push(CLEAN_JOB_FIELDS.map(field => csvCell(job[field])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Indented JSON array; absent values become null
 */
export function toJson(dataset: JobDataset): string {
  const records = dataset.map(job => {
    const out: Record<string, string | number | boolean | null> = {};
    for (const field of CLEAN_JOB_FIELDS) {
      const value = job[field];
      out[field] = value === '' ? null : value;
    }
    return out;
  });
  return `${JSON.stringify(records, null, 2)}\n`;
}

/**
 * Exports job data to CSV and JSON files
 */
export class JobDataExporter {
  readonly outputDir: string;

  constructor(
    outputDir: string = 'results',
    private now: () => Date = () => new Date()
  ) {
    this.outputDir = resolve(outputDir);
  }

  async export(dataset: JobDataset, baseFilename: string): Promise<ExportPaths> {
    await this.ensureOutputDirectory();

    const timestamp = formatTimestamp(this.now());
    const csvPath = join(this.outputDir, `${baseFilename}_${timestamp}.csv`);
    const jsonPath = join(this.outputDir, `${baseFilename}_${timestamp}.json`);

    logger.info(`Exporting dataset`, { records: dataset.length, columns: CLEAN_JOB_FIELDS.length });

    await this.write(csvPath, toCsv(dataset));
    try {
      await this.write(jsonPath, toJson(dataset));
    } catch (error) {
      // Files are written as a pair
      await rm(csvPath, { force: true });
      throw error;
    }

    const [csvStat, jsonStat] = await Promise.all([stat(csvPath), stat(jsonPath)]);
    logger.info(`Files saved in: ${this.outputDir}`, {
      csv: csvPath,
      json: jsonPath,
      csvKb: Number((csvStat.size / 1024).toFixed(2)),
      jsonKb: Number((jsonStat.size / 1024).toFixed(2)),
    });

    return { csvPath, jsonPath };
  }

  private async ensureOutputDirectory(): Promise<void> {
    try {
      await mkdir(this.outputDir, { recursive: true });
      await access(this.outputDir, constants.W_OK);
    } catch (error) {
      throw new ExportError(
        `Output directory ${this.outputDir} is not writable: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async write(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, 'utf-8');
    } catch (error) {
      throw new ExportError(`Failed to write ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
