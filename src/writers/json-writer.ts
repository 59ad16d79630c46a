import * as fsPromises from 'node:fs/promises';
import { z } from 'zod';
import { formatZodError } from '../config/config-schema.js';
import { errorMessage, TubescribeError } from '../errors/custom-errors.js';
import { createVideoMeta, type VideoMeta } from '../types/video.types.js';
import { writeOutputFile } from './output-file.js';

export const JsonOutputSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string(),
  channel: z.string(),
  channel_url: z.string(),
  upload_date: z.string(),
  upload_date_formatted: z.string(),
  duration: z.number(),
  duration_formatted: z.string(),
  view_count: z.number(),
  like_count: z.number(),
  channel_follower_count: z.number(),
  description: z.string(),
  chapters: z.array(
    z.object({
      title: z.string(),
      start_time: z.number(),
      end_time: z.number().optional(),
    }),
  ),
  links: z.array(z.object({ url: z.string(), context: z.string() })),
  transcript: z.array(z.object({ timestamp: z.string(), text: z.string() })),
  transcript_entries: z.number().int(),
  processed_at: z.string(),
  saved_as: z.object({
    author: z.string(),
    topic: z.string(),
    year: z.string(),
  }),
});

export type JsonOutput = z.infer<typeof JsonOutputSchema>;

/**
 * Serializable document for a video, naming taken from the approved proposal
 */
export function toJsonOutput(video: VideoMeta, processedAt: Date = new Date()): JsonOutput {
  return {
    id: video.videoId,
    url: video.url,
    title: video.title,
    channel: video.channel,
    channel_url: video.channelUrl,
    upload_date: video.uploadDate,
    upload_date_formatted: video.uploadDateFormatted,
    duration: video.duration,
    duration_formatted: video.durationFormatted,
    view_count: video.viewCount,
    like_count: video.likeCount,
    channel_follower_count: video.channelFollowerCount,
    description: video.description,
    chapters: video.chapters.map((chapter) => ({
      title: chapter.title,
      start_time: chapter.startTime,
      ...(chapter.endTime !== undefined && { end_time: chapter.endTime }),
    })),
    links: video.links.map((link) => ({ ...link })),
    transcript: video.transcript.map((entry) => ({ ...entry })),
    transcript_entries: video.transcript.length,
    processed_at: processedAt.toISOString(),
    saved_as: {
      author: video.proposedAuthor,
      topic: video.proposedTopic,
      year: video.proposedYear,
    },
  };
}

export async function writeJson(video: VideoMeta, outputPath: string, processedAt?: Date): Promise<string> {
  const content = JSON.stringify(toJsonOutput(video, processedAt), null, 2);
  return writeOutputFile(outputPath, content);
}

/**
 * Read a JSON output file back
 *
 * @throws TubescribeError when the file is unreadable or not a tubescribe document
 */
export async function readJsonOutput(path: string): Promise<JsonOutput> {
  let json: unknown;
  try {
    json = JSON.parse(await fsPromises.readFile(path, 'utf-8'));
  } catch (error) {
    throw new TubescribeError(`Failed to read ${path}: ${errorMessage(error)}`);
  }

  const result = JsonOutputSchema.safeParse(json);
  if (!result.success) {
    throw new TubescribeError(`Invalid output document ${path}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Rebuild a VideoMeta from a JSON output document
 */
export function videoMetaFromJson(doc: JsonOutput): VideoMeta {
  return createVideoMeta({
    videoId: doc.id,
    url: doc.url,
    title: doc.title,
    channel: doc.channel,
    channelUrl: doc.channel_url,
    uploadDate: doc.upload_date,
    duration: doc.duration,
    viewCount: doc.view_count,
    likeCount: doc.like_count,
    channelFollowerCount: doc.channel_follower_count,
    description: doc.description,
    chapters: doc.chapters.map((chapter) => ({
      title: chapter.title,
      startTime: chapter.start_time,
      ...(chapter.end_time !== undefined && { endTime: chapter.end_time }),
    })),
    links: doc.links,
    transcript: doc.transcript,
    proposedAuthor: doc.saved_as.author,
    proposedTopic: doc.saved_as.topic,
    proposedYear: doc.saved_as.year,
  });
}
