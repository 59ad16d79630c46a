const pad2 = (n: number) => n.toString().padStart(2, '0');

/**
 * Format a duration in seconds as H:MM:SS, or M:SS under an hour
 *
 * @returns "Unknown" when the duration is missing or zero
 */
export function formatDuration(seconds: number | null | undefined): string {
  if (!seconds) {
    return 'Unknown';
  }
  const total = Math.floor(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return h > 0 ? `${h}:${pad2(m)}:${pad2(s)}` : `${m}:${pad2(s)}`;
}

/**
 * Convert a yt-dlp YYYYMMDD date to YYYY-MM-DD
 *
 * Other shapes are returned unchanged; empty input gives "Unknown".
 */
export function formatDate(dateStr: string | null | undefined): string {
  if (dateStr && /^\d{8}$/.test(dateStr)) {
    return `${dateStr.slice(0, 4)}-${dateStr.slice(4, 6)}-${dateStr.slice(6)}`;
  }
  return dateStr || 'Unknown';
}

/**
 * Transcript timestamp, `[MM:SS]`. Minutes keep counting past the hour.
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.floor(seconds);
  return `[${pad2(Math.floor(total / 60))}:${pad2(total % 60)}]`;
}

/**
 * Chapter start time, M:SS
 */
export function formatChapterTime(seconds: number): string {
  const total = Math.floor(seconds);
  return `${Math.floor(total / 60)}:${pad2(total % 60)}`;
}

/**
 * Integer with comma thousands separators
 */
export function formatCount(value: number): string {
  return Math.trunc(value)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}
