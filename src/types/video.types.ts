import { formatDate, formatDuration } from '../utils/time-utils.js';

/**
 * One transcript line with its cue start time
 */
export type TranscriptEntry = {
  /** "[MM:SS]" */
  timestamp: string;
  text: string;
};

/**
 * Chapter marker from the video info
 */
export type Chapter = {
  title: string;
  /** Start in seconds */
  startTime: number;
  /** End in seconds, when yt-dlp reports it */
  endTime?: number;
};

/**
 * URL found in the video description, with the rest of its line as context
 */
export type DescriptionLink = {
  url: string;
  context: string;
};

/**
 * Proposed naming used for the output folder and filenames
 */
export type Naming = {
  author: string;
  topic: string;
  year: string;
};

/**
 * In-memory record of one video's raw and proposed metadata plus transcript
 */
export type VideoMeta = {
  videoId: string;
  /** URL as the user entered it */
  url: string;

  // Raw metadata from yt-dlp
  title: string;
  channel: string;
  channelUrl: string;
  /** YYYYMMDD */
  uploadDate: string;
  /** YYYY-MM-DD */
  uploadDateFormatted: string;
  /** Seconds */
  duration: number;
  durationFormatted: string;
  viewCount: number;
  likeCount: number;
  channelFollowerCount: number;
  description: string;
  chapters: Chapter[];
  links: DescriptionLink[];

  // Proposed naming, editable during review
  proposedAuthor: string;
  proposedTopic: string;
  proposedYear: string;

  /** Included when saving */
  selected: boolean;
  /** Empty until the transcript is fetched */
  transcript: TranscriptEntry[];
};

/**
 * Raw fields accepted by createVideoMeta; everything but the identifiers is optional
 */
export type VideoMetaInit = Pick<VideoMeta, 'videoId' | 'url'> &
  Partial<Omit<VideoMeta, 'videoId' | 'url' | 'uploadDateFormatted' | 'durationFormatted'>>;

const EPISODE_PREFIX = /^(?:EP\.?\s*\d+[:\s-]*|#\d+[:\s-]*)/i;
const EDGE_SEPARATORS = /^[\s|:\-–—]+|[\s|:\-–—]+$/g;
const TOPIC_MAX_LENGTH = 100;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Derive a topic from the title: episode markers and the channel name removed
 */
export function proposeTopic(title: string, channel: string): string {
  let topic = title.replace(EPISODE_PREFIX, '');

  if (channel && topic.toLowerCase().includes(channel.toLowerCase())) {
    topic = topic.replace(new RegExp(escapeRegExp(channel), 'gi'), '');
  }

  topic = topic.replace(EDGE_SEPARATORS, '').slice(0, TOPIC_MAX_LENGTH).trim();
  return topic || 'Untitled';
}

/**
 * Suggest author, topic and year from the raw fields
 */
export function proposeNaming(video: Pick<VideoMeta, 'title' | 'channel' | 'uploadDate'>): Naming {
  return {
    author: video.channel.trim() || 'Unknown',
    topic: proposeTopic(video.title, video.channel),
    year: /^\d{4}/.test(video.uploadDate) ? video.uploadDate.slice(0, 4) : 'Unknown',
  };
}

/**
 * Build a VideoMeta from raw fields, filling defaults and proposing naming
 */
export function createVideoMeta(init: VideoMetaInit): VideoMeta {
  const title = init.title || 'Untitled';
  const channel = init.channel || 'Unknown';
  const uploadDate = init.uploadDate ?? '';
  const duration = init.duration ?? 0;
  const proposal = proposeNaming({ title, channel, uploadDate });

  return {
    videoId: init.videoId,
    url: init.url,
    title,
    channel,
    channelUrl: init.channelUrl ?? '',
    uploadDate,
    uploadDateFormatted: formatDate(uploadDate),
    duration,
    durationFormatted: formatDuration(duration),
    viewCount: init.viewCount ?? 0,
    likeCount: init.likeCount ?? 0,
    channelFollowerCount: init.channelFollowerCount ?? 0,
    description: init.description ?? '',
    chapters: init.chapters ?? [],
    links: init.links ?? [],
    proposedAuthor: init.proposedAuthor?.trim() || proposal.author,
    proposedTopic: init.proposedTopic?.trim() || proposal.topic,
    proposedYear: init.proposedYear?.trim() || proposal.year,
    selected: init.selected ?? true,
    transcript: init.transcript ?? [],
  };
}

/**
 * Current naming of a video
 */
export function namingOf(video: VideoMeta): Naming {
  return { author: video.proposedAuthor, topic: video.proposedTopic, year: video.proposedYear };
}
