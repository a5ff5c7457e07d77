/**
 * IPTV Curation Types
 *
 * Shared types for parsing, curating and writing M3U playlists.
 */

/**
 * EXTINF attributes the curator understands, in the order they are written out
 */
export const KNOWN_ATTRIBUTES = [
  'tvg-id',
  'tvg-name',
  'tvg-logo',
  'group-title',
  'tvg-url',
  'tvg-rec',
  'tvg-shift',
] as const;

export type KnownAttribute = (typeof KNOWN_ATTRIBUTES)[number];

/**
 * Well-known attributes present on a channel's EXTINF line
 */
export type ChannelAttributes = Partial<Record<KnownAttribute, string>>;

/**
 * Name used when an EXTINF line carries no display name
 */
export const UNKNOWN_CHANNEL_NAME = 'Unknown Channel';

/**
 * A single playlist entry
 */
export interface ChannelRecord {
  /** Well-known EXTINF attributes */
  attributes: ChannelAttributes;
  /** Any other key="value" pairs, in source order */
  extraAttributes: Record<string, string>;
  /** Display name (text after the last comma) */
  name: string;
  /** Stream URL, never empty */
  url: string;
}

/**
 * What happens to a record that matches no category
 *
 * - strict: the category map is the sole inclusion filter, unmatched records are dropped
 * - permissive: unmatched records are kept under the fallback category
 */
export type CurationMode = 'strict' | 'permissive';

export interface CategoryRule {
  /** Label written to group-title */
  name: string;
  /** Trigger keywords, matched as whole words */
  keywords: readonly string[];
}

/**
 * Rules applied to a parsed playlist
 */
export interface CurationRules {
  mode: CurationMode;
  /** Category used for unmatched records in permissive mode */
  fallbackCategory: string;
  /** Keywords that exclude a record outright */
  blacklist: readonly string[];
  /**
   * Optional gate: when non-empty, a record must match one of these (or any
   * category keyword) to be considered at all
   */
  includeKeywords: readonly string[];
  /** Categories in precedence order */
  categories: readonly CategoryRule[];
  /** Write the source x-tvg-url back into the output header */
  preserveEpgUrl: boolean;
  /** Write non-standard EXTINF attributes back out */
  preserveExtraAttributes: boolean;
}

export const DEFAULT_FALLBACK_CATEGORY = 'Other';

/**
 * Counters collected during a pipeline run
 */
export interface CurationStats {
  parsed: number;
  skippedEntries: number;
  blacklisted: number;
  notIncluded: number;
  uncategorized: number;
  fallback: number;
  retained: number;
  byCategory: Record<string, number>;
}
