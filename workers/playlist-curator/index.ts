#!/usr/bin/env npx tsx

/**
 * Playlist Curator Worker
 *
 * Downloads an M3U playlist, keeps the channels matching the configured
 * categories, relabels and sorts them, and writes a new M3U file.
 *
 * Usage:
 *   npm run curate
 *
 * Environment variables:
 *   - M3U_URL: Source playlist URL (required)
 *   - OUTPUT_FILE: Output path (optional, defaults to list.m3u)
 *   - CURATION_CONFIG: Rules file (optional, defaults to config/curation.json)
 *   - FETCH_TIMEOUT_MS: Download timeout per attempt (optional, defaults to 10000)
 *   - LOG_LEVEL: debug | info | warn | error | silent
 */

import { config } from 'dotenv';

// Load environment variables
config();

import { ConfigurationError, loadCurationRules } from '../../src/lib/config';
import { createLogger } from '../../src/lib/logger';
import { LOG_SERVICE, readCuratorEnv } from './config';
import { runCurator } from './curator';

const logger = createLogger(LOG_SERVICE);

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info('Playlist curator started');

  const env = readCuratorEnv();
  const rules = await loadCurationRules(env.curationConfigPath);

  const result = await logger.withTiming('curation run', () => runCurator(env, rules));

  switch (result.status) {
    case 'written':
      logger.info(`Finished: ${result.stats.retained} channels written to ${result.path}`);
      break;
    case 'fetch-failed':
      logger.warn('Finished without output: playlist could not be retrieved');
      break;
    case 'write-failed':
      logger.error(`Finished with errors: could not write ${result.path}`, result.error);
      process.exitCode = 1;
      break;
  }
}

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error('Fatal error', error);
  }
  process.exit(1);
});
