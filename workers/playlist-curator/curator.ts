/**
 * Playlist Curator
 *
 * One curation run: download the source playlist, filter and categorize
 * its channels, then write the result.
 */

import { curatePlaylist } from '../../src/lib/iptv/pipeline';
import type { CurationRules } from '../../src/lib/iptv/types';
import { createLogger } from '../../src/lib/logger';
import { LOG_SERVICE } from './config';
import { fetchPlaylist } from './playlist-fetcher';
import { writePlaylistFile } from './playlist-writer';
import type { CuratorEnv, CuratorRunResult, PlaylistFetchResult, PlaylistWriteResult } from './types';

const logger = createLogger(LOG_SERVICE);

/**
 * External collaborators of a run
 */
export interface CuratorDeps {
  fetchPlaylist: (url: string, options: { timeout: number }) => Promise<PlaylistFetchResult>;
  writePlaylist: (content: string, filePath: string) => Promise<PlaylistWriteResult>;
}

const defaultDeps: CuratorDeps = {
  fetchPlaylist,
  writePlaylist: writePlaylistFile,
};

/**
 * Run the curator once
 *
 * A failed download means there is nothing to do: no file is written.
 */
export async function runCurator(
  env: CuratorEnv,
  rules: CurationRules,
  deps: CuratorDeps = defaultDeps
): Promise<CuratorRunResult> {
  logger.info(`Configured M3U URL: ${env.m3uUrl}`);
  logger.info(
    `Rules: ${rules.categories.length} categories, ${rules.blacklist.length} blacklist keywords, ` +
      `${rules.includeKeywords.length} include keywords (${rules.mode} mode)`
  );

  const fetched = await deps.fetchPlaylist(env.m3uUrl, { timeout: env.fetchTimeoutMs });

  if (!fetched.success) {
    logger.error('Failed to retrieve M3U content, nothing written', undefined, {
      kind: fetched.kind,
      error: fetched.error,
    });
    return { status: 'fetch-failed', error: fetched.error };
  }

  const { content, stats } = curatePlaylist(fetched.content, rules);

  logger.info(`Parsed ${stats.parsed} channels (${stats.skippedEntries} entries without URL skipped)`);
  logger.info(
    `Retained ${stats.retained} channels: ${stats.blacklisted} blacklisted, ` +
      `${stats.notIncluded} not included, ${stats.uncategorized} uncategorized, ${stats.fallback} in fallback`
  );
  for (const [category, count] of Object.entries(stats.byCategory).sort((a, b) => b[1] - a[1])) {
    logger.info(`  ${category}: ${count}`);
  }

  const written = await deps.writePlaylist(content, env.outputFile);

  if (!written.success) {
    return { status: 'write-failed', path: written.path, error: written.error, stats };
  }

  return { status: 'written', path: written.path, stats };
}
