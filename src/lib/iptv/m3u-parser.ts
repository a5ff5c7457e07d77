/**
 * M3U Parser
 *
 * Lenient, line-oriented parser for IPTV M3U playlists.
 * Malformed entries are dropped, never fatal: the parser returns whatever
 * well-formed channels it can find.
 */

import {
  KNOWN_ATTRIBUTES,
  UNKNOWN_CHANNEL_NAME,
  type ChannelAttributes,
  type ChannelRecord,
  type KnownAttribute,
} from './types';

const EXTINF_MARKER = '#EXTINF:';

/**
 * An EXTINF entry that was dropped during parsing
 */
export interface SkippedEntry {
  /** 1-based line number of the EXTINF line */
  lineNumber: number;
  /** Channel name extracted from the EXTINF line */
  name: string;
  reason: 'missing-url';
}

export interface ParseOptions {
  /** Called for every EXTINF line that has no stream URL after it */
  onSkippedEntry?: (entry: SkippedEntry) => void;
}

const knownAttributeSet: ReadonlySet<string> = new Set(KNOWN_ATTRIBUTES);

function isKnownAttribute(key: string): key is KnownAttribute {
  return knownAttributeSet.has(key);
}

/**
 * Parse key="value" pairs from an EXTINF line
 *
 * Pairs with an unterminated quote never match and are left out.
 * When a key repeats, the last occurrence wins.
 */
export function parseAttributes(line: string): {
  attributes: ChannelAttributes;
  extraAttributes: Record<string, string>;
} {
  const attributes: ChannelAttributes = {};
  const extraAttributes: Record<string, string> = {};
  const regex = /(\S+?)="([^"]*)"/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    const [, key, value] = match;
    if (isKnownAttribute(key)) {
      attributes[key] = value;
    } else {
      extraAttributes[key] = value;
    }
  }

  return { attributes, extraAttributes };
}

/**
 * Extracts the channel name from an EXTINF line
 * The name is everything after the last comma
 */
export function extractChannelName(line: string): string {
  const commaIndex = line.lastIndexOf(',');
  if (commaIndex === -1) {
    return UNKNOWN_CHANNEL_NAME;
  }
  const name = line.substring(commaIndex + 1).trim();
  return name || UNKNOWN_CHANNEL_NAME;
}

/**
 * Reads the EPG URL (x-tvg-url or url-tvg) from the #EXTM3U header, if any
 */
export function extractEpgUrl(content: string): string | undefined {
  const header = content
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .find(line => line.length > 0);

  if (!header?.startsWith('#EXTM3U')) {
    return undefined;
  }

  const match = header.match(/(?:x-tvg-url|url-tvg)="([^"]*)"/);
  return match?.[1] || undefined;
}

/**
 * Parses M3U playlist content into channel records, in source order
 *
 * An EXTINF line is only emitted as a channel when the very next line is a
 * stream URL (non-empty and not starting with '#'). Everything else
 * (header, comments, directives, blank lines) is ignored.
 */
export function parseM3U(content: string, options: ParseOptions = {}): ChannelRecord[] {
  if (!content) {
    return [];
  }

  const channels: ChannelRecord[] = [];
  const lines = content.split(/\r\n|\r|\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line.startsWith(EXTINF_MARKER)) continue;

    const name = extractChannelName(line);
    const next = i + 1 < lines.length ? lines[i + 1].trim() : '';

    if (!next || next.startsWith('#')) {
      options.onSkippedEntry?.({ lineNumber: i + 1, name, reason: 'missing-url' });
      continue;
    }

    const { attributes, extraAttributes } = parseAttributes(line);
    channels.push({ attributes, extraAttributes, name, url: next });

    // The URL line has been consumed
    i++;
  }

  return channels;
}
