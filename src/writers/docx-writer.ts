import { AlignmentType, Document, HeadingLevel, Packer, PageBreak, Paragraph, TextRun } from 'docx';
import { errorMessage, WriteError } from '../errors/custom-errors.js';
import type { VideoMeta } from '../types/video.types.js';
import { formatChapterTime, formatCount } from '../utils/time-utils.js';
import { watchUrl } from '../utils/url-utils.js';
import { writeOutputFile } from './output-file.js';
import { groupTranscript } from './transcript-paragraphs.js';

const INTENSE_QUOTE = 'IntenseQuote';

// docx sizes: spacing in twips (1/20 pt), font size in half-points
const INFO_SPACING_AFTER = 40;
const TIMESTAMP_FONT_SIZE = 18;

function heading(text: string): Paragraph {
  return new Paragraph({ text, heading: HeadingLevel.HEADING_1 });
}

function bullet(text: string): Paragraph {
  return new Paragraph({ text, bullet: { level: 0 } });
}

function transcriptParagraphs(video: VideoMeta): Paragraph[] {
  if (video.transcript.length === 0) {
    return [new Paragraph({ text: 'No transcript available', style: INTENSE_QUOTE })];
  }

  return groupTranscript(video.transcript).map(
    (paragraph) =>
      new Paragraph({
        children: [
          new TextRun({ text: `${paragraph.timestamp} `, bold: true, size: TIMESTAMP_FONT_SIZE }),
          new TextRun(paragraph.text),
        ],
      }),
  );
}

/**
 * Build the Word document: centered title, video information, links,
 * chapters, then the transcript on a new page
 */
export function buildDocxDocument(video: VideoMeta): Document {
  const info = [
    `URL: ${watchUrl(video.videoId)}`,
    `Channel: ${video.channel}`,
    `Subscribers: ${formatCount(video.channelFollowerCount)}`,
    `Date: ${video.uploadDateFormatted}`,
    `Duration: ${video.durationFormatted}`,
    `Views: ${formatCount(video.viewCount)}`,
    `Likes: ${formatCount(video.likeCount)}`,
  ];

  const children: Paragraph[] = [
    new Paragraph({ text: video.title, heading: HeadingLevel.TITLE, alignment: AlignmentType.CENTER }),
    heading('Video Information'),
    ...info.map((text) => new Paragraph({ text, spacing: { after: INFO_SPACING_AFTER } })),
  ];

  if (video.links.length > 0) {
    children.push(heading('Links Mentioned'));
    children.push(...video.links.map((link) => bullet(link.context ? `${link.url} — ${link.context}` : link.url)));
  }

  if (video.chapters.length > 0) {
    children.push(heading('Chapters'));
    children.push(
      ...video.chapters.map((chapter) => bullet(`${formatChapterTime(chapter.startTime)} — ${chapter.title}`)),
    );
  }

  children.push(new Paragraph({ children: [new PageBreak()] }));
  children.push(heading('Transcript'));
  children.push(...transcriptParagraphs(video));

  return new Document({
    creator: 'tubescribe',
    title: video.title,
    styles: {
      paragraphStyles: [
        {
          id: INTENSE_QUOTE,
          name: 'Intense Quote',
          basedOn: 'Normal',
          next: 'Normal',
          run: { italics: true, color: '1F4E79' },
          paragraph: { indent: { left: 864, right: 864 } },
        },
      ],
    },
    sections: [{ children }],
  });
}

export async function writeDocx(video: VideoMeta, outputPath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await Packer.toBuffer(buildDocxDocument(video));
  } catch (error) {
    throw new WriteError(`Failed to build ${outputPath}: ${errorMessage(error)}`, outputPath, error);
  }
  return writeOutputFile(outputPath, buffer);
}
