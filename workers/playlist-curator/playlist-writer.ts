/**
 * Playlist Writer
 *
 * Writes the curated playlist to disk, creating the parent directory
 * when needed. Failures are returned, not thrown.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { createLogger } from '../../src/lib/logger';
import { LOG_SERVICE } from './config';
import type { PlaylistWriteResult } from './types';

const logger = createLogger(LOG_SERVICE).child({ component: 'writer' });

/**
 * Write playlist text to a file (UTF-8)
 */
export async function writePlaylistFile(content: string, filePath: string): Promise<PlaylistWriteResult> {
  const path = resolve(filePath);

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error(`Error writing to file ${path}`, error);
    return { success: false, path, error: errorMessage };
  }

  const bytes = Buffer.byteLength(content, 'utf-8');
  logger.info(`Successfully generated ${path}`, { bytes });

  return { success: true, path, bytes };
}
