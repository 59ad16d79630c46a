import type { DescriptionLink } from '../../types/video.types.js';

const URL_PATTERN = /https?:\/\/[^\s<>"]+/g;
const MAX_LINKS = 20;
const MAX_CONTEXT_LENGTH = 100;

/**
 * Collect URLs from a video description, each with the rest of its line as context
 */
export function extractLinks(description: string): DescriptionLink[] {
  if (!description) {
    return [];
  }

  const links: DescriptionLink[] = [];

  for (const line of description.split('\n')) {
    const urls = line.match(URL_PATTERN);
    if (!urls) continue;

    const context = line.replace(URL_PATTERN, '').trim().slice(0, MAX_CONTEXT_LENGTH);
    for (const url of urls) {
      links.push({ url, context });
    }
  }

  return links.slice(0, MAX_LINKS);
}
