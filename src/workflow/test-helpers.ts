import { FetchError, NoTranscriptError } from '../errors/custom-errors.js';
import { extractLinks } from '../downloader/lib/link-extractor.js';
import type { TranscriptOptions, VideoSource } from '../downloader/types.js';
import type { NotificationLevel, Notifier } from '../notifications/notifier.js';
import { createVideoMeta, type TranscriptEntry, type VideoMeta, type VideoMetaInit } from '../types/video.types.js';
import { extractVideoId } from '../utils/url-utils.js';

export type FakeVideo = Omit<VideoMetaInit, 'videoId' | 'url'> & {
  unreachable?: boolean;
};

/**
 * 11-character id for the n-th fake video
 */
export function fakeId(n: number): string {
  return `vid${n.toString().padStart(8, '0')}`;
}

export function fakeUrl(n: number): string {
  return `https://youtu.be/${fakeId(n)}`;
}

/**
 * VideoSource serving canned videos by id; unknown ids are unreachable
 */
export class InMemoryVideoSource implements VideoSource {
  readonly metadataRequests: string[] = [];
  readonly transcriptRequests: string[] = [];

  constructor(private readonly videos: Map<string, FakeVideo> = new Map()) {}

  add(id: string, video: FakeVideo): this {
    this.videos.set(id, video);
    return this;
  }

  async fetchMetadata(url: string): Promise<VideoMeta> {
    this.metadataRequests.push(url);
    const videoId = extractVideoId(url);
    const video = videoId ? this.videos.get(videoId) : undefined;
    if (!videoId || !video || video.unreachable) {
      throw new FetchError(`Video unavailable: ${url}`, url);
    }
    const { transcript: _transcript, unreachable: _unreachable, ...meta } = video;
    return createVideoMeta({ ...meta, videoId, url });
  }

  async fetchTranscript(video: VideoMeta, options: TranscriptOptions): Promise<VideoMeta> {
    this.transcriptRequests.push(video.videoId);
    if (options.includeLinks) {
      video.links = extractLinks(video.description);
    }
    const transcript: TranscriptEntry[] = this.videos.get(video.videoId)?.transcript ?? [];
    if (transcript.length === 0) {
      throw new NoTranscriptError(`No English auto-generated subtitles for ${video.url}`, video.url);
    }
    video.transcript = transcript.map((entry) => ({ ...entry }));
    return video;
  }

  async checkInstalled(): Promise<boolean> {
    return true;
  }
}

/**
 * Notifier that keeps every message
 */
export class RecordingNotifier implements Notifier {
  readonly messages: { level: NotificationLevel; message: string }[] = [];
  progressCalls = 0;

  notify(level: NotificationLevel, message: string): void {
    this.messages.push({ level, message });
  }

  progress(): void {
    this.progressCalls++;
  }

  endProgress(): void {}

  at(level: NotificationLevel): string[] {
    return this.messages.filter((m) => m.level === level).map((m) => m.message);
  }
}
