#!/usr/bin/env node
import { createExampleConfig } from '../config';
import { logger } from '../utils/logger';

/**
 * Writes an example configuration file
 * Usage: job-collector-init [path]
 */
function initConfig(): void {
  try {
    createExampleConfig(process.argv[2] ?? 'config.example.json');
  } catch (error) {
    logger.error('Could not write example configuration', error);
    process.exitCode = 1;
  }
}

initConfig();
