import { existsSync } from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { join } from 'node:path';
import { expandPath } from './env-resolver.js';
import { type FilenameSanitizer, sanitizeForFilename } from './filename-sanitizer.js';

export const DEFAULT_FILENAME_MAX_LENGTH = 50;
const AUTHOR_MAX_LENGTH = 30;
const YEAR_MAX_LENGTH = 4;
const FOLDER_MAX_LENGTH = 50;
const MAX_UNIQUE_ATTEMPTS = 100;

/**
 * Build `{Author}_{Topic}_{Year}` from the approved naming
 *
 * Author is capped at 30 characters and year at 4; topic gets what is left of
 * maxLength. The result never exceeds maxLength.
 *
 * @example buildFilename('Jordan Peterson', 'Maps of Meaning', '2017') // 'Jordan_Peterson_Maps_of_Meaning_2017'
 */
export function buildFilename(
  author: string,
  topic: string,
  year: string,
  maxLength: number = DEFAULT_FILENAME_MAX_LENGTH,
  sanitize: FilenameSanitizer = sanitizeForFilename,
): string {
  const cleanAuthor = sanitize(author, Math.min(AUTHOR_MAX_LENGTH, maxLength));
  const cleanYear = sanitize(year, YEAR_MAX_LENGTH);
  const topicBudget = Math.max(1, maxLength - cleanAuthor.length - cleanYear.length - 2);
  const cleanTopic = sanitize(topic, topicBudget);

  const filename = `${cleanAuthor}_${cleanTopic}_${cleanYear}`;
  if (filename.length <= maxLength) {
    return filename;
  }
  return filename.slice(0, maxLength).replace(/_+$/, '');
}

/**
 * Folder name for an author
 */
export function authorFolder(author: string, sanitize: FilenameSanitizer = sanitizeForFilename): string {
  return sanitize(author, FOLDER_MAX_LENGTH);
}

/**
 * Compose `{base}/{Author}/{filename}.{ext}` and create the author folder
 *
 * @param baseDir - Output root; `~` and ${VAR} are expanded
 * @param extension - With or without the leading dot
 */
export async function buildOutputPath(
  baseDir: string,
  author: string,
  filename: string,
  extension: string,
  sanitize: FilenameSanitizer = sanitizeForFilename,
): Promise<string> {
  const outputDir = join(expandPath(baseDir), authorFolder(author, sanitize));
  await fsPromises.mkdir(outputDir, { recursive: true });

  return join(outputDir, `${filename}.${extension.replace(/^\.+/, '')}`);
}

export type UniqueFilenameOptions = {
  /** Names already claimed in this run */
  isReserved?: (filename: string) => boolean;
  /** Treat names with files on disk as taken. Default: true */
  checkExisting?: boolean;
};

/**
 * Pick a filename that is free for every extension, appending `_2`, `_3`, …
 * while the name is reserved or any of its files exists
 *
 * @throws Error after 100 attempts
 */
export async function generateUniqueFilename(
  baseDir: string,
  author: string,
  filename: string,
  extensions: readonly string[],
  sanitize: FilenameSanitizer = sanitizeForFilename,
  options: UniqueFilenameOptions = {},
): Promise<string> {
  const { isReserved = () => false, checkExisting = true } = options;

  const taken = async (name: string) => {
    if (isReserved(name)) return true;
    if (!checkExisting) return false;
    const paths = await Promise.all(extensions.map((ext) => buildOutputPath(baseDir, author, name, ext, sanitize)));
    return paths.some((path) => existsSync(path));
  };

  if (!(await taken(filename))) {
    return filename;
  }

  for (let counter = 2; counter <= MAX_UNIQUE_ATTEMPTS; counter++) {
    const candidate = `${filename}_${counter}`;
    if (!(await taken(candidate))) {
      return candidate;
    }
  }

  throw new Error(`Too many files with same name: ${filename}`);
}

/**
 * Relative path shown in the review preview, e.g. `Jordan_Peterson/Jordan_Peterson_Maps_of_Meaning_2017.{md,docx,json}`
 */
export function previewPath(
  author: string,
  filename: string,
  extensions: readonly string[],
  sanitize: FilenameSanitizer = sanitizeForFilename,
): string {
  return `${authorFolder(author, sanitize)}/${filename}.{${extensions.join(',')}}`;
}
