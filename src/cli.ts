#!/usr/bin/env node
/**
 * Job collection CLI
 * Usage: job-collector --config config.json --verbose 2
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, toCollectionSettings } from './config';
import { createSearchProvider } from './sources';
import { JobCollector } from './services/job-collector';
import { JobDataExporter } from './services/exporter';
import { logger, type Verbosity } from './utils/logger';

function parseVerbosity(value: string): Verbosity {
  if (value === '0') return 0;
  if (value === '1') return 1;
  if (value === '2') return 2;
  throw new InvalidArgumentError(`verbose level must be 0, 1 or 2, got "${value}"`);
}

const program = new Command();
program
  .name('job-collector')
  .description('Collect job postings from several platforms and export them to CSV/JSON')
  .option('-c, --config <path>', 'Path to the configuration file', 'config.json')
  .option('-v, --verbose <level>', 'Verbosity: 0=silent, 1=basic, 2=detailed', parseVerbosity)
  .parse(process.argv);

async function main(): Promise<void> {
  const opts = program.opts<{ config: string; verbose?: Verbosity }>();
  const startTime = Date.now();

  if (opts.verbose !== undefined) logger.setVerbosity(opts.verbose);
  const config = loadConfig(opts.config);
  logger.setVerbosity(opts.verbose ?? config.scraping.verbose);

  logger.info('Configuration loaded', {
    terms: config.search.terms,
    locations: config.search.locations.map(l => `${l.location} (${l.country})`),
    platforms: config.search.platforms,
    resultsPerTerm: config.search.resultsPerTerm,
    daysOld: config.search.daysOld,
  });

  const collector = new JobCollector(createSearchProvider(config), {
    exporter: new JobDataExporter(config.output.directory),
  });

  // Ctrl+C stops searching; whatever was collected is still exported
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, finishing after the current search');
    controller.abort();
  });

  const summary = await collector.collectAndExport(toCollectionSettings(config), {
    signal: controller.signal,
  });

  logger.info('Job collection finished', {
    duration: `${Date.now() - startTime}ms`,
    ...summary,
  });
}

main().catch(error => {
  logger.error('Job collection failed', error);
  process.exitCode = 1;
});
