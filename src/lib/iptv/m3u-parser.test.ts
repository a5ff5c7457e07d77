/**
 * M3U Parser Tests
 *
 * Tests for parsing M3U playlist files into channel records.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  parseM3U,
  parseAttributes,
  extractChannelName,
  extractEpgUrl,
  type SkippedEntry,
} from './m3u-parser';

describe('M3U Parser', () => {
  describe('parseM3U', () => {
    it('parses a basic M3U playlist', () => {
      const m3uContent = `#EXTM3U
#EXTINF:-1,Channel One
http://example.com/stream1.m3u8
#EXTINF:-1,Channel Two
http://example.com/stream2.m3u8`;

      const channels = parseM3U(m3uContent);

      expect(channels).toEqual([
        { attributes: {}, extraAttributes: {}, name: 'Channel One', url: 'http://example.com/stream1.m3u8' },
        { attributes: {}, extraAttributes: {}, name: 'Channel Two', url: 'http://example.com/stream2.m3u8' },
      ]);
    });

    it('parses M3U with all well-known attributes', () => {
      const m3uContent = `#EXTM3U
#EXTINF:-1 tvg-id="espn.us" tvg-name="ESPN US" tvg-logo="http://example.com/espn.png" group-title="Sports" tvg-url="http://example.com/epg.xml" tvg-rec="3" tvg-shift="-2",ESPN HD
http://example.com/espn.m3u8`;

      const channels = parseM3U(m3uContent);

      expect(channels).toHaveLength(1);
      expect(channels[0].attributes).toEqual({
        'tvg-id': 'espn.us',
        'tvg-name': 'ESPN US',
        'tvg-logo': 'http://example.com/espn.png',
        'group-title': 'Sports',
        'tvg-url': 'http://example.com/epg.xml',
        'tvg-rec': '3',
        'tvg-shift': '-2',
      });
      expect(channels[0].name).toBe('ESPN HD');
    });

    it('keeps unknown attributes separately', () => {
      const m3uContent = `#EXTM3U
#EXTINF:-1 tvg-id="a" catchup="default" catchup-days="7",Channel A
http://example.com/a.m3u8`;

      const [channel] = parseM3U(m3uContent);

      expect(channel.attributes).toEqual({ 'tvg-id': 'a' });
      expect(channel.extraAttributes).toEqual({ catchup: 'default', 'catchup-days': '7' });
    });

    it('accepts empty attribute values', () => {
      const [channel] = parseM3U('#EXTINF:-1 tvg-logo="" group-title="News",CNN\nhttp://example.com/cnn');

      expect(channel.attributes).toEqual({ 'tvg-logo': '', 'group-title': 'News' });
    });

    it('handles empty M3U content', () => {
      expect(parseM3U('')).toEqual([]);
    });

    it('handles M3U with only header', () => {
      expect(parseM3U('#EXTM3U')).toEqual([]);
    });

    it('handles Windows line endings (CRLF)', () => {
      const channels = parseM3U('#EXTM3U\r\n#EXTINF:-1,Channel One\r\nhttp://example.com/stream1.m3u8\r\n');

      expect(channels).toHaveLength(1);
      expect(channels[0].name).toBe('Channel One');
      expect(channels[0].url).toBe('http://example.com/stream1.m3u8');
    });

    it('trims indentation around EXTINF and URL lines', () => {
      const channels = parseM3U('#EXTM3U\n   #EXTINF:-1,Indented  \n  rtmp://example.com/live  \n');

      expect(channels).toEqual([
        { attributes: {}, extraAttributes: {}, name: 'Indented', url: 'rtmp://example.com/live' },
      ]);
    });

    it('accepts any non-comment line as the stream URL', () => {
      const [channel] = parseM3U('#EXTINF:-1,Local\nstreams/local.ts');

      expect(channel.url).toBe('streams/local.ts');
    });

    it('skips an entry followed directly by another EXTINF line', () => {
      const m3uContent = `#EXTM3U
#EXTINF:-1,Channel One
#EXTINF:-1,Channel Two
http://example.com/stream2.m3u8`;

      const channels = parseM3U(m3uContent);

      expect(channels).toHaveLength(1);
      expect(channels[0].name).toBe('Channel Two');
    });

    it('skips an entry whose next line is a comment', () => {
      const channels = parseM3U('#EXTINF:-1,Channel One\n#EXTVLCOPT:http-user-agent=foo\nhttp://example.com/1');

      expect(channels).toEqual([]);
    });

    it('skips an entry followed by a blank line', () => {
      const channels = parseM3U('#EXTINF:-1,Channel One\n\nhttp://example.com/1');

      expect(channels).toEqual([]);
    });

    it('skips a trailing EXTINF line at end of input', () => {
      const channels = parseM3U('#EXTM3U\n#EXTINF:-1,Last');

      expect(channels).toEqual([]);
    });

    it('reports skipped entries', () => {
      const onSkippedEntry = vi.fn<(entry: SkippedEntry) => void>();

      parseM3U('#EXTM3U\n#EXTINF:-1,Orphan\n#EXTINF:-1,Kept\nhttp://example.com/k', { onSkippedEntry });

      expect(onSkippedEntry).toHaveBeenCalledTimes(1);
      expect(onSkippedEntry).toHaveBeenCalledWith({ lineNumber: 2, name: 'Orphan', reason: 'missing-url' });
    });

    it('ignores URL-looking lines without a preceding EXTINF', () => {
      const channels = parseM3U('#EXTM3U\nhttp://example.com/orphan\n#EXTINF:-1,Real\nhttp://example.com/real');

      expect(channels).toHaveLength(1);
      expect(channels[0].url).toBe('http://example.com/real');
    });

    it('does not reprocess a consumed URL line', () => {
      const channels = parseM3U('#EXTINF:-1,A\nhttp://example.com/a\nhttp://example.com/stray');

      expect(channels).toHaveLength(1);
    });

    it('drops an attribute with an unterminated quote and keeps parsing', () => {
      const m3uContent = `#EXTINF:-1 tvg-id="1" tvg-logo="http://example.com/logo.png,Broken Logo
http://example.com/b
#EXTINF:-1,Next
http://example.com/n`;

      const channels = parseM3U(m3uContent);

      expect(channels).toHaveLength(2);
      expect(channels[0].attributes).toEqual({ 'tvg-id': '1' });
      expect(channels[0].name).toBe('Broken Logo');
      expect(channels[1].name).toBe('Next');
    });

    it('preserves source order', () => {
      const m3uContent = ['#EXTM3U', 'Z', 'M', 'A']
        .map((name, i) => (i === 0 ? name : `#EXTINF:-1,${name}\nhttp://example.com/${name}`))
        .join('\n');

      expect(parseM3U(m3uContent).map(c => c.name)).toEqual(['Z', 'M', 'A']);
    });

    it('never throws and never emits an empty URL for malformed input', () => {
      const inputs = [
        '#EXTINF:',
        '#EXTINF:-1 tvg-id="',
        ',,,\n#EXTINF\n\n\n',
        '#EXTINF:-1,\n   \n#EXTINF:-1,x\n',
        '"""\n#EXTINF:-1 =""="",\nhttp://example.com',
        '\r\r\n\n#EXTINF:-1,A\r#EXTINF:-1,B\rhttp://b\r',
      ];

      for (const input of inputs) {
        const channels = parseM3U(input);
        for (const channel of channels) {
          expect(channel.url.length).toBeGreaterThan(0);
        }
      }
    });
  });

  describe('extractChannelName', () => {
    it('uses the text after the last comma', () => {
      expect(extractChannelName('#EXTINF:-1 group-title="News, Sports",Star Sports, HD')).toBe('HD');
    });

    it('trims whitespace', () => {
      expect(extractChannelName('#EXTINF:-1,   Channel One  ')).toBe('Channel One');
    });

    it('falls back when there is no comma', () => {
      expect(extractChannelName('#EXTINF:-1 tvg-id="x"')).toBe('Unknown Channel');
    });

    it('falls back when the name is blank', () => {
      expect(extractChannelName('#EXTINF:-1,   ')).toBe('Unknown Channel');
    });
  });

  describe('parseAttributes', () => {
    it('is independent of attribute order', () => {
      const a = parseAttributes('#EXTINF:-1 group-title="G" tvg-id="1",N');
      const b = parseAttributes('#EXTINF:-1 tvg-id="1" group-title="G",N');

      expect(a).toEqual(b);
    });

    it('lets the last duplicate key win', () => {
      const { attributes } = parseAttributes('#EXTINF:-1 group-title="First" group-title="Second",N');

      expect(attributes['group-title']).toBe('Second');
    });

    it('returns empty maps when there are no attributes', () => {
      expect(parseAttributes('#EXTINF:-1,Plain')).toEqual({ attributes: {}, extraAttributes: {} });
    });
  });

  describe('extractEpgUrl', () => {
    it('reads x-tvg-url from the header', () => {
      expect(extractEpgUrl('#EXTM3U x-tvg-url="http://example.com/epg.xml"\n#EXTINF:-1,A\nhttp://a'))
        .toBe('http://example.com/epg.xml');
    });

    it('reads url-tvg from the header', () => {
      expect(extractEpgUrl('#EXTM3U url-tvg="http://example.com/guide.xml"')).toBe('http://example.com/guide.xml');
    });

    it('returns undefined without a header attribute', () => {
      expect(extractEpgUrl('#EXTM3U\n#EXTINF:-1,A\nhttp://a')).toBeUndefined();
    });

    it('returns undefined when the first line is not a header', () => {
      expect(extractEpgUrl('#EXTINF:-1 x-tvg-url="http://example.com/epg.xml",A\nhttp://a')).toBeUndefined();
    });
  });
});
