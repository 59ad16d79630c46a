/**
 * Turns free text into a single path segment
 */
export type FilenameSanitizer = (text: string, maxLength?: number, replacement?: string) => string;

export const FALLBACK_FILENAME = 'untitled';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function trimReplacement(value: string, replacement: string): string {
  if (!replacement) return value;
  let result = value;
  while (result.startsWith(replacement)) result = result.slice(replacement.length);
  while (result.endsWith(replacement)) result = result.slice(0, -replacement.length);
  return result;
}

/**
 * Sanitize free text for use in a filename or folder name
 *
 * Drops characters that Windows or *nix reject, keeps only letters, digits,
 * underscores, whitespace and hyphens, and joins words with `replacement`.
 * Never returns an empty string.
 */
export function sanitizeForFilename(text: string, maxLength: number = 50, replacement: string = '_'): string {
  const fallback = FALLBACK_FILENAME.slice(0, Math.max(1, maxLength));
  if (!text) {
    return fallback;
  }

  const sep = escapeRegExp(replacement);

  let clean = text
    // Reserved characters: < > : " / \ | ? *
    // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
    .replace(/[<>:"/\\|?*\x00-\x1F]/g, '')
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/\s+/g, replacement);

  if (replacement) {
    clean = clean.replace(new RegExp(`(?:${sep})+`, 'g'), replacement);
  }
  clean = trimReplacement(clean, replacement);

  if (clean.length > maxLength) {
    clean = trimReplacement(clean.slice(0, maxLength), replacement);
  }

  return clean || fallback;
}
