import { describe, expect, it } from 'vitest';
import { groupTranscript } from './transcript-paragraphs.js';

describe('groupTranscript', () => {
  it('should join consecutive entries with the same timestamp', () => {
    expect(
      groupTranscript([
        { timestamp: '[00:01]', text: 'a' },
        { timestamp: '[00:01]', text: 'b' },
        { timestamp: '[00:02]', text: 'c' },
        { timestamp: '[00:01]', text: 'd' },
      ]),
    ).toEqual([
      { timestamp: '[00:01]', text: 'a b' },
      { timestamp: '[00:02]', text: 'c' },
      { timestamp: '[00:01]', text: 'd' },
    ]);
  });

  it('should return an empty list for no entries', () => {
    expect(groupTranscript([])).toEqual([]);
  });
});
