/**
 * Base error class for tubescribe
 */
export class TubescribeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TubescribeError';
  }
}

/**
 * Configuration error (missing or corrupt config file). Fatal at startup.
 */
export class ConfigError extends TubescribeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Metadata could not be fetched: invalid URL, unreachable video or yt-dlp failure
 */
export class FetchError extends TubescribeError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * No auto-generated English subtitles exist for the video
 */
export class NoTranscriptError extends TubescribeError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'NoTranscriptError';
  }
}

/**
 * Output file could not be written
 */
export class WriteError extends TubescribeError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'WriteError';
    this.cause = cause;
  }
}

/**
 * Workflow stage invoked out of order, or with unusable input
 */
export class WorkflowError extends TubescribeError {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
