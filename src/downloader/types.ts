import type { VideoMeta } from '../types/video.types.js';

export type TranscriptOptions = {
  /** Also extract links from the description */
  includeLinks: boolean;
};

/**
 * Where video metadata and transcripts come from
 */
export type VideoSource = {
  /**
   * Fetch metadata for a single video, nothing downloaded
   *
   * @throws FetchError for invalid URLs, unreachable videos or tool failures
   */
  fetchMetadata(url: string): Promise<VideoMeta>;

  /**
   * Fill `transcript` (and `links` when requested) on the video
   *
   * @throws NoTranscriptError when no English auto-generated subtitles exist
   * @throws FetchError when the tool fails
   */
  fetchTranscript(video: VideoMeta, options: TranscriptOptions): Promise<VideoMeta>;

  /**
   * Whether the backing tool is available
   */
  checkInstalled(): Promise<boolean>;
};
