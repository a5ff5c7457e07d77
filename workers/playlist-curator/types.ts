/**
 * Playlist Curator Worker Types
 *
 * Result types for the retrieval and output collaborators.
 */

import type { CurationStats } from '../../src/lib/iptv/types';

/**
 * Why a playlist download failed
 */
export type FetchFailureKind = 'timeout' | 'http' | 'network' | 'empty' | 'invalid';

/**
 * Result from downloading a playlist
 */
export type PlaylistFetchResult =
  | {
      success: true;
      /** Full playlist text */
      content: string;
      /** Fetch duration in ms */
      durationMs: number;
    }
  | {
      success: false;
      kind: FetchFailureKind;
      /** Error message */
      error: string;
      /** HTTP status, for kind 'http' */
      status?: number;
      durationMs: number;
    };

/**
 * Result from writing the curated playlist
 */
export type PlaylistWriteResult =
  | { success: true; path: string; bytes: number }
  | { success: false; path: string; error: string };

/**
 * Environment-derived settings for a run
 */
export interface CuratorEnv {
  /** Source playlist URL */
  m3uUrl: string;
  /** Destination file */
  outputFile: string;
  /** Curation rules JSON file */
  curationConfigPath: string;
  /** Per-attempt download timeout */
  fetchTimeoutMs: number;
}

/**
 * Outcome of a single curator run
 */
export type CuratorRunResult =
  | { status: 'written'; path: string; stats: CurationStats }
  | { status: 'fetch-failed'; error: string }
  | { status: 'write-failed'; path: string; error: string; stats: CurationStats };
