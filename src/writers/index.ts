import { errorMessage, WriteError } from '../errors/custom-errors.js';
import type { VideoMeta } from '../types/video.types.js';
import { writeDocx } from './docx-writer.js';
import { writeJson } from './json-writer.js';
import { writeMarkdown } from './markdown-writer.js';

export { writeDocx } from './docx-writer.js';
export { readJsonOutput, videoMetaFromJson, writeJson } from './json-writer.js';
export { writeMarkdown } from './markdown-writer.js';

/**
 * Output formats in write order, keyed by file extension
 */
export const OUTPUT_EXTENSIONS = ['md', 'docx', 'json'] as const;

export type OutputExtension = (typeof OUTPUT_EXTENSIONS)[number];

export type OutputPaths = Record<OutputExtension, string>;

export type Writer = (video: VideoMeta, outputPath: string) => Promise<string>;

const WRITERS: Record<OutputExtension, Writer> = {
  md: writeMarkdown,
  docx: writeDocx,
  json: (video, outputPath) => writeJson(video, outputPath),
};

export type WriteAllResult = {
  written: string[];
  errors: WriteError[];
};

/**
 * Run every writer; one failing does not stop the others
 */
export async function writeAll(
  video: VideoMeta,
  paths: OutputPaths,
  writers: Record<OutputExtension, Writer> = WRITERS,
): Promise<WriteAllResult> {
  const result: WriteAllResult = { written: [], errors: [] };

  for (const extension of OUTPUT_EXTENSIONS) {
    const path = paths[extension];
    try {
      result.written.push(await writers[extension](video, path));
    } catch (error) {
      result.errors.push(
        error instanceof WriteError ? error : new WriteError(`Failed to write ${path}: ${errorMessage(error)}`, path, error),
      );
    }
  }

  return result;
}
