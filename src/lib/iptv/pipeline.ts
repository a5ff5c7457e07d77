/**
 * Curation Pipeline
 *
 * parse → filter/categorize → sort → serialize, as one synchronous run
 * over an already downloaded playlist.
 */

import { createLogger } from '../logger';
import { extractEpgUrl, parseM3U } from './m3u-parser';
import { writeM3U } from './m3u-writer';
import { applyRules } from './rule-engine';
import type { ChannelRecord, CurationRules, CurationStats } from './types';

const logger = createLogger('Pipeline');

/**
 * Ordinal string comparison; a missing value sorts after every present one
 */
function compareKeys(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a < b ? -1 : 1;
}

/**
 * Sorts channels by group-title, then by name
 *
 * Returns a new array; the sort is stable for equal keys.
 */
export function sortChannels(channels: readonly ChannelRecord[]): ChannelRecord[] {
  return [...channels].sort(
    (a, b) =>
      compareKeys(a.attributes['group-title'], b.attributes['group-title']) ||
      compareKeys(a.name, b.name)
  );
}

function createStats(): CurationStats {
  return {
    parsed: 0,
    skippedEntries: 0,
    blacklisted: 0,
    notIncluded: 0,
    uncategorized: 0,
    fallback: 0,
    retained: 0,
    byCategory: {},
  };
}

/**
 * Pipeline Result
 */
export interface PipelineResult {
  /** Retained channels, sorted, with group-title set to their category */
  channels: ChannelRecord[];
  stats: CurationStats;
  /** EPG URL from the source header, when the rules preserve it */
  epgUrl?: string;
}

/**
 * Runs the parse, filter and sort stages over raw playlist text
 */
export function runPipeline(content: string, rules: CurationRules): PipelineResult {
  const stats = createStats();

  const parsed = parseM3U(content, {
    onSkippedEntry: (entry) => {
      stats.skippedEntries++;
      logger.warn(`Skipping channel '${entry.name}' without stream URL`, { line: entry.lineNumber });
    },
  });
  stats.parsed = parsed.length;

  // Map keeps names such as "__proto__" countable
  const byCategory = new Map<string, number>();

  const retained = applyRules(parsed, rules, (_channel, decision) => {
    if (decision.action === 'drop') {
      if (decision.reason === 'blacklisted') stats.blacklisted++;
      else if (decision.reason === 'not-included') stats.notIncluded++;
      else stats.uncategorized++;
      return;
    }

    if (decision.fallback) stats.fallback++;
    byCategory.set(decision.category, (byCategory.get(decision.category) ?? 0) + 1);
  });

  stats.byCategory = Object.fromEntries(byCategory);
  stats.retained = retained.length;

  logger.debug('Pipeline complete', {
    parsed: stats.parsed,
    retained: stats.retained,
    blacklisted: stats.blacklisted,
  });

  return {
    channels: sortChannels(retained),
    stats,
    epgUrl: rules.preserveEpgUrl ? extractEpgUrl(content) : undefined,
  };
}

/**
 * Curated playlist ready to be written
 */
export interface CurationResult extends PipelineResult {
  /** Serialized M3U text */
  content: string;
}

/**
 * Runs the full pipeline and serializes the result
 */
export function curatePlaylist(content: string, rules: CurationRules): CurationResult {
  const result = runPipeline(content, rules);

  return {
    ...result,
    content: writeM3U(result.channels, {
      epgUrl: result.epgUrl,
      includeExtraAttributes: rules.preserveExtraAttributes,
    }),
  };
}
