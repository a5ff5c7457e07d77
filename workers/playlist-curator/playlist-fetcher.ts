/**
 * Playlist Fetcher
 *
 * Downloads an M3U playlist over HTTP. Returns either the complete text or
 * a failure result; partial bodies are never handed on.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import { createLogger } from '../../src/lib/logger';
import { FETCH_CONFIG, LOG_SERVICE } from './config';
import type { FetchFailureKind, PlaylistFetchResult } from './types';

const logger = createLogger(LOG_SERVICE).child({ component: 'fetcher' });

/**
 * Per-call overrides of FETCH_CONFIG
 */
export interface FetchOptions {
  timeout: number;
  maxRetries: number;
  retryBaseDelay: number;
  userAgent: string;
}

/**
 * HTTP agent that skips SSL validation (many IPTV providers have bad certs)
 */
const insecureAgent = new Agent({
  connect: {
    rejectUnauthorized: false,
    // Allow legacy TLS versions that some IPTV providers use
    minVersion: 'TLSv1' as const,
    checkServerIdentity: () => undefined,
  },
});

/**
 * Failure of a single download attempt
 */
class FetchAttemptError extends Error {
  constructor(
    message: string,
    readonly kind: FetchFailureKind,
    readonly status?: number
  ) {
    super(message);
    this.name = 'FetchAttemptError';
  }

  /** Empty or non-M3U bodies will not change on retry */
  get retryable(): boolean {
    return this.kind === 'timeout' || this.kind === 'http' || this.kind === 'network';
  }
}

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether text looks like an M3U playlist
 */
export function looksLikeM3U(content: string): boolean {
  return content.includes('#EXTM3U') || content.includes('#EXTINF');
}

/**
 * One download attempt; the timeout covers headers and body
 */
async function fetchOnce(url: string, options: FetchOptions): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await undiciFetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent,
        Accept: '*/*',
      },
      dispatcher: insecureAgent,
    });

    if (!response.ok) {
      throw new FetchAttemptError(`HTTP ${response.status}: ${response.statusText}`, 'http', response.status);
    }

    const content = await response.text();

    if (!content || content.trim().length === 0) {
      throw new FetchAttemptError('Empty playlist content', 'empty');
    }

    if (!looksLikeM3U(content)) {
      throw new FetchAttemptError('Invalid M3U format: missing #EXTM3U or #EXTINF', 'invalid');
    }

    return content;
  } catch (error) {
    if (error instanceof FetchAttemptError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new FetchAttemptError(`Request timed out after ${options.timeout}ms`, 'timeout');
    }
    throw new FetchAttemptError(error instanceof Error ? error.message : String(error), 'network');
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch an M3U playlist with retry logic and exponential backoff
 *
 * Never throws: transport problems, bad statuses, timeouts and non-playlist
 * bodies all come back as `{ success: false }`.
 */
export async function fetchPlaylist(
  url: string,
  overrides: Partial<FetchOptions> = {}
): Promise<PlaylistFetchResult> {
  const options: FetchOptions = { ...FETCH_CONFIG, ...overrides };
  const startTime = Date.now();
  let lastError = new FetchAttemptError('Fetch failed after retries', 'network');

  logger.info(`Fetching playlist from: ${url}`);

  for (let attempt = 0; attempt < options.maxRetries; attempt++) {
    try {
      const content = await fetchOnce(url, options);
      logger.info(`Fetched ${content.length} characters`, { attempt: attempt + 1 });
      return { success: true, content, durationMs: Date.now() - startTime };
    } catch (error) {
      lastError = error instanceof FetchAttemptError
        ? error
        : new FetchAttemptError(String(error), 'network');

      if (!lastError.retryable) {
        break;
      }

      if (attempt < options.maxRetries - 1) {
        const delay = options.retryBaseDelay * Math.pow(2, attempt);
        logger.warn(`Fetch attempt ${attempt + 1} failed, retrying in ${delay}ms: ${lastError.message}`);
        await sleep(delay);
      }
    }
  }

  logger.error('Failed to fetch playlist', lastError);

  return {
    success: false,
    kind: lastError.kind,
    error: lastError.message,
    status: lastError.status,
    durationMs: Date.now() - startTime,
  };
}
