/**
 * M3U Writer
 *
 * Serializes channel records back into M3U playlist text.
 */

import { KNOWN_ATTRIBUTES, type ChannelRecord } from './types';

/**
 * Write M3U Options
 */
export interface WriteM3UOptions {
  /** EPG URL written to the header as x-tvg-url */
  epgUrl?: string;
  /** Append non-standard attributes after the well-known ones */
  includeExtraAttributes?: boolean;
}

/**
 * Builds the EXTINF line for a channel
 */
export function formatExtInf(channel: ChannelRecord, options: WriteM3UOptions = {}): string {
  let extinf = '#EXTINF:-1';

  for (const key of KNOWN_ATTRIBUTES) {
    const value = channel.attributes[key];
    if (value !== undefined) {
      extinf += ` ${key}="${value}"`;
    }
  }

  if (options.includeExtraAttributes) {
    for (const [key, value] of Object.entries(channel.extraAttributes)) {
      extinf += ` ${key}="${value}"`;
    }
  }

  return `${extinf},${channel.name}`;
}

/**
 * Generate M3U content from channels
 *
 * One EXTINF line and one URL line per channel, in the given order.
 * Every line, including the last, ends with a newline.
 */
export function writeM3U(channels: readonly ChannelRecord[], options: WriteM3UOptions = {}): string {
  const lines: string[] = [];

  lines.push(options.epgUrl ? `#EXTM3U x-tvg-url="${options.epgUrl}"` : '#EXTM3U');

  for (const channel of channels) {
    lines.push(formatExtInf(channel, options));
    lines.push(channel.url);
  }

  return lines.join('\n') + '\n';
}
