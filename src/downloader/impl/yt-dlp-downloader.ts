import { existsSync } from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatZodError } from '../../config/config-schema.js';
import { errorMessage, FetchError, NoTranscriptError } from '../../errors/custom-errors.js';
import { createVideoMeta, type VideoMeta } from '../../types/video.types.js';
import { logger } from '../../utils/logger.js';
import { extractVideoId, watchUrl } from '../../utils/url-utils.js';
import { extractLinks } from '../lib/link-extractor.js';
import { parseVtt } from '../lib/vtt-parser.js';
import { type YtdlpInfo, YtdlpInfoSchema } from '../lib/ytdlp-info.schema.js';
import { YtdlpPresets } from '../lib/ytdlp-presets.js';
import { YtdlpWrapper } from '../lib/ytdlp-wrapper.js';
import type { TranscriptOptions, VideoSource } from '../types.js';

export const TRANSCRIPT_LANGUAGE = 'en';

export type YtDlpDownloaderOptions = {
  /** Netscape cookie file passed to yt-dlp */
  cookieFile?: string;
};

/**
 * VideoSource backed by the yt-dlp CLI
 */
export class YtDlpDownloader implements VideoSource {
  private readonly presets: YtdlpPresets;

  constructor(
    private readonly wrapper: YtdlpWrapper = new YtdlpWrapper(),
    private readonly options: YtDlpDownloaderOptions = {},
  ) {
    this.presets = new YtdlpPresets(wrapper);
  }

  async fetchMetadata(url: string): Promise<VideoMeta> {
    const videoId = extractVideoId(url);
    if (!videoId) {
      throw new FetchError(`Not a YouTube video URL: ${url}`, url);
    }

    let stdout: string;
    try {
      stdout = await this.presets.fetchInfo(watchUrl(videoId), { cookieFile: this.options.cookieFile });
    } catch (error) {
      throw new FetchError(`Could not fetch metadata for ${url}: ${errorMessage(error)}`, url);
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (error) {
      throw new FetchError(`yt-dlp returned invalid JSON for ${url}: ${errorMessage(error)}`, url);
    }

    const parsed = YtdlpInfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new FetchError(`Unexpected metadata for ${url}: ${formatZodError(parsed.error)}`, url);
    }

    return toVideoMeta(videoId, url, parsed.data);
  }

  async fetchTranscript(video: VideoMeta, options: TranscriptOptions): Promise<VideoMeta> {
    if (options.includeLinks) {
      video.links = extractLinks(video.description);
    }

    const dir = await fsPromises.mkdtemp(join(tmpdir(), 'tubescribe-'));
    try {
      let files: string[];
      try {
        ({ files } = await this.presets.downloadAutoSubtitles(
          watchUrl(video.videoId),
          video.videoId,
          dir,
          [TRANSCRIPT_LANGUAGE],
          {
            cookieFile: this.options.cookieFile,
            onLog: (message) => logger.debug(message),
          },
        ));
      } catch (error) {
        throw new FetchError(`Could not fetch subtitles for ${video.url}: ${errorMessage(error)}`, video.url);
      }

      const vttPath =
        files.find((file) => file.endsWith(`.${TRANSCRIPT_LANGUAGE}.vtt`)) ??
        join(dir, `${video.videoId}.${TRANSCRIPT_LANGUAGE}.vtt`);

      if (!existsSync(vttPath)) {
        throw new NoTranscriptError(`No English auto-generated subtitles for ${video.url}`, video.url);
      }

      const transcript = parseVtt(await fsPromises.readFile(vttPath, 'utf-8'));
      if (transcript.length === 0) {
        throw new NoTranscriptError(`Subtitles for ${video.url} contain no text`, video.url);
      }

      video.transcript = transcript;
      return video;
    } finally {
      await fsPromises.rm(dir, { recursive: true, force: true });
    }
  }

  checkInstalled(): Promise<boolean> {
    return this.wrapper.checkInstalled();
  }
}

function toVideoMeta(videoId: string, url: string, info: YtdlpInfo): VideoMeta {
  return createVideoMeta({
    videoId,
    url,
    title: info.title ?? undefined,
    channel: info.channel || info.uploader || undefined,
    channelUrl: info.channel_url ?? undefined,
    uploadDate: info.upload_date ?? undefined,
    duration: info.duration ?? undefined,
    viewCount: info.view_count ?? undefined,
    likeCount: info.like_count ?? undefined,
    channelFollowerCount: info.channel_follower_count ?? undefined,
    description: info.description ?? undefined,
    chapters: (info.chapters ?? []).map((chapter) => ({
      title: chapter.title ?? '',
      startTime: chapter.start_time,
      ...(chapter.end_time != null && { endTime: chapter.end_time }),
    })),
  });
}
