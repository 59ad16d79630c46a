import { createVideoMeta, type VideoMeta } from '../types/video.types.js';

/**
 * Fully populated video used by the writer tests
 */
export function sampleVideo(overrides: Partial<VideoMeta> = {}): VideoMeta {
  return {
    ...createVideoMeta({
      videoId: 'abc123def45',
      url: 'https://youtu.be/abc123def45',
      title: 'Maps of Meaning',
      channel: 'Jordan Peterson',
      channelUrl: 'https://youtube.com/@jp',
      uploadDate: '20170115',
      duration: 3725,
      viewCount: 1234567,
      likeCount: 8910,
      channelFollowerCount: 5000000,
      description: 'Lecture one.\nBook: https://example.com/book',
      chapters: [
        { title: 'Intro', startTime: 0, endTime: 60 },
        { title: 'Part 1', startTime: 75 },
      ],
      links: [
        { url: 'https://example.com/book', context: 'Book:' },
        { url: 'https://example.com/x', context: '' },
      ],
      transcript: [
        { timestamp: '[00:01]', text: 'hello' },
        { timestamp: '[00:01]', text: 'there' },
        { timestamp: '[00:05]', text: 'next' },
      ],
    }),
    ...overrides,
  };
}
