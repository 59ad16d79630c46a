import type { TranscriptEntry } from '../types/video.types.js';

/**
 * Join consecutive entries that share a timestamp into one paragraph
 */
export function groupTranscript(entries: readonly TranscriptEntry[]): TranscriptEntry[] {
  const paragraphs: { timestamp: string; lines: string[] }[] = [];

  for (const entry of entries) {
    const last = paragraphs.at(-1);
    if (last && last.timestamp === entry.timestamp) {
      last.lines.push(entry.text);
    } else {
      paragraphs.push({ timestamp: entry.timestamp, lines: [entry.text] });
    }
  }

  return paragraphs.map(({ timestamp, lines }) => ({ timestamp, text: lines.join(' ') }));
}
