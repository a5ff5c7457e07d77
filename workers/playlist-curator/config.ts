/**
 * Playlist Curator Configuration
 *
 * Constants and environment settings for the worker that downloads,
 * curates and writes an M3U playlist.
 */

import { ConfigurationError } from '../../src/lib/config';
import type { CuratorEnv } from './types';

/**
 * Default output file
 */
export const DEFAULT_OUTPUT_FILE = 'list.m3u';

/**
 * Default curation rules file, relative to the working directory
 */
export const DEFAULT_CURATION_CONFIG = 'config/curation.json';

/**
 * HTTP fetch configuration
 */
export const FETCH_CONFIG = {
  /** User agent for M3U requests */
  userAgent: 'Mozilla/5.0 (compatible; Playlist-Curator/1.0)',

  /** Request timeout in milliseconds, per attempt */
  timeout: 10_000,

  /** Max attempts for failed fetches */
  maxRetries: 3,

  /** Base delay for exponential backoff (ms) */
  retryBaseDelay: 1000,
} as const;

/**
 * Logging service name
 */
export const LOG_SERVICE = 'Playlist-Curator';

/**
 * Reads worker settings from the environment
 */
export function readCuratorEnv(env: NodeJS.ProcessEnv = process.env): CuratorEnv {
  const m3uUrl = env.M3U_URL?.trim();
  if (!m3uUrl) {
    throw new ConfigurationError('Missing M3U_URL environment variable');
  }

  let fetchTimeoutMs: number = FETCH_CONFIG.timeout;
  if (env.FETCH_TIMEOUT_MS) {
    fetchTimeoutMs = Number(env.FETCH_TIMEOUT_MS.trim());
    if (!Number.isInteger(fetchTimeoutMs) || fetchTimeoutMs <= 0) {
      throw new ConfigurationError(`FETCH_TIMEOUT_MS must be a positive integer, got "${env.FETCH_TIMEOUT_MS}"`);
    }
  }

  return {
    m3uUrl,
    outputFile: env.OUTPUT_FILE?.trim() || DEFAULT_OUTPUT_FILE,
    curationConfigPath: env.CURATION_CONFIG?.trim() || DEFAULT_CURATION_CONFIG,
    fetchTimeoutMs,
  };
}
