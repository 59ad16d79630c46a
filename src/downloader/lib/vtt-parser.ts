import type { TranscriptEntry } from '../../types/video.types.js';
import { formatTimestamp } from '../../utils/time-utils.js';

const METADATA_PREFIXES = ['WEBVTT', 'Kind:', 'Language:'];
const CUE_START = /^(\d+):(\d+):(\d+)\.\d+/;
const INLINE_TAG = /<[^>]+>/g;

/**
 * Parse WebVTT subtitles into timestamped transcript lines
 *
 * Auto-generated captions repeat each line across rolling cues; a text line
 * that was already emitted is dropped.
 */
export function parseVtt(content: string): TranscriptEntry[] {
  const entries: TranscriptEntry[] = [];
  const seen = new Set<string>();
  let cueStart: number | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line || /^\d+$/.test(line) || METADATA_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      continue;
    }

    if (line.includes('-->')) {
      const match = line.match(CUE_START);
      if (match) {
        const [, hours, minutes, seconds] = match;
        cueStart = Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
      }
      continue;
    }

    const text = line.replace(INLINE_TAG, '');
    if (!text || seen.has(text)) {
      continue;
    }

    seen.add(text);
    entries.push({
      timestamp: cueStart === undefined ? '[00:00]' : formatTimestamp(cueStart),
      text,
    });
  }

  return entries;
}
