/**
 * Explicit per-session context
 *
 * Created once at startup and passed to the orchestrator; holds the config,
 * notifier, video source, batch state and the optional utilities.
 */

import type { Config } from '../config/config-schema.js';
import type { VideoSource } from '../downloader/types.js';
import { type MetricsRecorder, NoopMetrics } from '../metrics/metrics.js';
import type { Notifier } from '../notifications/notifier.js';
import { BatchState } from '../state/batch-state.js';
import { type FilenameSanitizer, sanitizeForFilename } from '../utils/filename-sanitizer.js';

/**
 * Optional capabilities supplied by the host. Absent members fall back to the built-ins.
 */
export type SharedUtilities = {
  sanitizer?: FilenameSanitizer;
  metrics?: MetricsRecorder;
};

export type SessionContext = {
  readonly config: Config;
  readonly notifier: Notifier;
  readonly source: VideoSource;
  readonly batch: BatchState;
  readonly sanitizer: FilenameSanitizer;
  readonly metrics: MetricsRecorder;
};

export type SessionContextOptions = {
  config: Config;
  notifier: Notifier;
  source: VideoSource;
  utilities?: SharedUtilities;
};

export function createSessionContext({ config, notifier, source, utilities }: SessionContextOptions): SessionContext {
  return {
    config,
    notifier,
    source,
    batch: new BatchState(config.batch_max_size),
    sanitizer: utilities?.sanitizer ?? sanitizeForFilename,
    metrics: utilities?.metrics ?? new NoopMetrics(),
  };
}
