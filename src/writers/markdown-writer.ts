import type { VideoMeta } from '../types/video.types.js';
import { formatChapterTime, formatCount } from '../utils/time-utils.js';
import { watchUrl } from '../utils/url-utils.js';
import { writeOutputFile } from './output-file.js';
import { groupTranscript } from './transcript-paragraphs.js';

/**
 * Render the Markdown document: title, metadata block, links, chapters, transcript
 */
export function renderMarkdown(video: VideoMeta): string {
  const lines = [
    `# ${video.title}\n`,
    `**URL:** ${watchUrl(video.videoId)}  `,
    `**Channel:** [${video.channel}](${video.channelUrl})  `,
    `**Subscribers:** ${formatCount(video.channelFollowerCount)}  `,
    `**Date:** ${video.uploadDateFormatted}  `,
    `**Duration:** ${video.durationFormatted}  `,
    `**Views:** ${formatCount(video.viewCount)} · **Likes:** ${formatCount(video.likeCount)}`,
    '',
  ];

  if (video.links.length > 0) {
    lines.push('\n## Links Mentioned\n');
    for (const link of video.links) {
      lines.push(`- <${link.url}>${link.context ? ` — ${link.context}` : ''}`);
    }
    lines.push('');
  }

  if (video.chapters.length > 0) {
    lines.push('\n## Chapters\n');
    for (const chapter of video.chapters) {
      lines.push(`- **${formatChapterTime(chapter.startTime)}** — ${chapter.title}`);
    }
    lines.push('');
  }

  lines.push('\n---\n\n## Transcript\n');

  if (video.transcript.length > 0) {
    for (const paragraph of groupTranscript(video.transcript)) {
      lines.push(`**${paragraph.timestamp}** ${paragraph.text}\n`);
    }
  } else {
    lines.push('*No transcript available*');
  }

  return lines.join('\n');
}

export async function writeMarkdown(video: VideoMeta, outputPath: string): Promise<string> {
  return writeOutputFile(outputPath, renderMarkdown(video));
}
