const VIDEO_ID_PATTERNS = [/(?:v=|\/v\/|youtu\.be\/|\/embed\/|\/shorts\/|\/live\/)([a-zA-Z0-9_-]{11})/, /^([a-zA-Z0-9_-]{11})$/];

/**
 * Extract the 11-character YouTube video ID from a URL or bare ID
 *
 * Handles watch?v=, youtu.be/, /v/, /embed/, /shorts/ and /live/ forms,
 * with or without trailing query parameters.
 *
 * @param url - URL or bare ID
 * @returns Video ID, or undefined if none is found
 */
export function extractVideoId(url: string): string | undefined {
  const input = url.trim();
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = input.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Canonical watch URL passed to yt-dlp
 */
export function watchUrl(videoId: string): string {
  return `https://youtube.com/watch?v=${videoId}`;
}

/**
 * Split pasted text into candidate URLs: one per line, blanks and `#` comments dropped
 */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
