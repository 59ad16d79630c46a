import { errorMessage, NoTranscriptError, WorkflowError, WriteError } from '../errors/custom-errors.js';
import { renderMetrics } from '../metrics/metrics.js';
import { NotificationLevel } from '../notifications/notifier.js';
import { type BatchEntry, BatchPhase, type BatchProgress, type ReviewEdit } from '../state/batch-state.js';
import { createProcessResult, isSuccess, type ProcessResult, ProcessStatus } from '../types/process-result.types.js';
import type { VideoMeta } from '../types/video.types.js';
import {
  authorFolder,
  buildFilename,
  buildOutputPath,
  generateUniqueFilename,
  previewPath,
} from '../utils/filename-builder.js';
import { extractVideoId, parseUrlList } from '../utils/url-utils.js';
import { OUTPUT_EXTENSIONS, type OutputPaths, writeAll } from '../writers/index.js';
import type { SessionContext } from './session-context.js';

/**
 * Where one selected entry will be saved, relative to output_base
 */
export type PreviewLine = {
  index: number;
  title: string;
  path: string;
};

/**
 * Drives one batch through input → fetched → reviewed → saved
 */
export class Orchestrator {
  constructor(private readonly context: SessionContext) {}

  get batch() {
    return this.context.batch;
  }

  /**
   * Accept pasted text or a URL list. Invalid lines and duplicate videos are
   * skipped; anything past batch_max_size is dropped with a warning.
   *
   * @throws WorkflowError when no valid URL remains
   */
  async submitUrls(input: string | readonly string[]): Promise<readonly BatchEntry[]> {
    const lines = parseUrlList(typeof input === 'string' ? input : input.join('\n'));
    const seen = new Set<string>();
    const accepted: { url: string; videoId: string }[] = [];

    for (const url of lines) {
      const videoId = extractVideoId(url);
      if (!videoId) {
        await this.notify(NotificationLevel.WARNING, `Skipping invalid URL: ${url}`);
        continue;
      }
      if (seen.has(videoId)) {
        await this.notify(NotificationLevel.INFO, `Skipping duplicate video: ${url}`);
        continue;
      }
      seen.add(videoId);
      accepted.push({ url, videoId });
    }

    if (accepted.length === 0) {
      throw new WorkflowError('No valid YouTube URLs provided');
    }

    const dropped = this.batch.accept(accepted);
    if (dropped > 0) {
      await this.notify(
        NotificationLevel.WARNING,
        `Batch limit is ${this.batch.maxSize}: ignoring the last ${dropped} URL(s)`,
      );
    }

    return this.batch.entries;
  }

  /**
   * Fetch metadata for every accepted URL, one at a time. A failure is
   * recorded on its entry and the batch moves on.
   */
  async fetchAll(): Promise<BatchProgress> {
    const { notifier, source } = this.context;
    const entries = this.batch.entries;

    for (const [index, entry] of entries.entries()) {
      await notifier.progress(index + 1, entries.length, `Fetching ${entry.url}`);

      try {
        this.batch.recordFetched(index, await source.fetchMetadata(entry.url));
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(errorMessage(error));
        this.batch.recordFetchFailure(index, failure);
        await notifier.endProgress();
        await this.notify(NotificationLevel.ERROR, `Failed to fetch ${entry.url}: ${failure.message}`);
      }
    }

    await notifier.endProgress();
    this.batch.markFetched();

    const progress = this.batch.progress();
    await this.notify(NotificationLevel.INFO, `Fetched metadata for ${progress.fetched}/${progress.total} video(s)`);
    return progress;
  }

  /**
   * Apply one naming or selection edit
   */
  edit(edit: ReviewEdit): VideoMeta {
    return this.batch.applyEdit(edit);
  }

  /**
   * Apply the edits and confirm the review
   */
  review(edits: readonly ReviewEdit[] = []): PreviewLine[] {
    for (const edit of edits) {
      this.edit(edit);
    }
    this.batch.markReviewed();
    return this.preview();
  }

  /**
   * `Author/Author_Topic_Year.{md,docx,json}` for every selected entry.
   * Entries sharing a name within the batch get `_2`, `_3`, …
   */
  preview(): PreviewLine[] {
    const { config, sanitizer } = this.context;
    const claimed = new Set<string>();

    return this.batch.entries.flatMap((entry, index) => {
      const video = entry.video;
      if (!video?.selected) return [];

      const filename = buildFilename(
        video.proposedAuthor,
        video.proposedTopic,
        video.proposedYear,
        config.filename_max_length,
        sanitizer,
      );
      const folder = authorFolder(video.proposedAuthor, sanitizer);
      let unique = filename;
      for (let counter = 2; claimed.has(`${folder}/${unique}`); counter++) {
        unique = `${filename}_${counter}`;
      }
      claimed.add(`${folder}/${unique}`);

      const path = previewPath(video.proposedAuthor, unique, OUTPUT_EXTENSIONS, sanitizer);
      return [{ index, title: video.title, path }];
    });
  }

  /**
   * Fetch transcripts and write the outputs for every selected entry
   */
  async saveAll(): Promise<ProcessResult[]> {
    if (this.batch.phase !== BatchPhase.REVIEWED) {
      throw new WorkflowError(`Cannot save in phase "${this.batch.phase}" (expected "${BatchPhase.REVIEWED}")`);
    }

    const { notifier, metrics } = this.context;
    const results: ProcessResult[] = [];
    const selected = this.batch.progress().selected;
    // `Author/filename` stems written by this run
    const claimed = new Set<string>();
    let position = 0;

    for (const entry of this.batch.entries) {
      const video = entry.video;

      if (!video) {
        const errorKind = entry.failure?.kind ?? 'FetchError';
        metrics.recordFailure(errorKind);
        results.push(
          createProcessResult({
            videoId: entry.videoId,
            url: entry.url,
            status: ProcessStatus.ERROR,
            message: entry.failure?.message ?? 'Metadata was not fetched',
            errorKind,
          }),
        );
        continue;
      }

      if (!video.selected) {
        results.push(
          createProcessResult({
            videoId: video.videoId,
            url: video.url,
            status: ProcessStatus.SKIPPED,
            message: 'Not selected',
            title: video.title,
          }),
        );
        continue;
      }

      position++;
      await notifier.progress(position, selected, `Saving ${video.title}`);
      const result = await this.saveOne(video, claimed);
      await notifier.endProgress();
      await this.report(result);
      results.push(result);
    }

    this.batch.markSaved(results);

    const summary = metrics.snapshot();
    if (summary) {
      await this.notify(NotificationLevel.HIGHLIGHT, `Session ${summary.sessionId}: ${renderMetrics(summary)}`);
    }

    return results;
  }

  /**
   * Back to the input phase for another batch
   */
  reset(): void {
    this.batch.reset();
  }

  private async saveOne(video: VideoMeta, claimed: Set<string>): Promise<ProcessResult> {
    const { config, source, metrics } = this.context;
    const base = { videoId: video.videoId, url: video.url, title: video.title };

    let hasTranscript = true;
    try {
      await source.fetchTranscript(video, { includeLinks: config.include_links_default });
    } catch (error) {
      if (!(error instanceof NoTranscriptError)) {
        return this.failed(base, error);
      }
      hasTranscript = false;
      await this.notify(NotificationLevel.WARNING, `${video.title}: no transcript available, saving metadata only`);
    }

    let paths: OutputPaths;
    try {
      paths = await this.outputPaths(video, claimed);
    } catch (error) {
      return this.failed(
        base,
        new WriteError(`Cannot prepare output for ${video.title}: ${errorMessage(error)}`, config.output_base, error),
      );
    }

    const { written, errors } = await writeAll(video, paths);
    if (errors.length > 0) {
      metrics.recordFailure(WriteError.name);
      return createProcessResult({
        ...base,
        status: ProcessStatus.ERROR,
        message: errors.map((error) => error.message).join('; '),
        files: written,
        errorKind: WriteError.name,
      });
    }

    metrics.recordSuccess(written.length);
    return createProcessResult({
      ...base,
      status: ProcessStatus.SUCCESS,
      message: hasTranscript ? `Saved ${written.length} files` : `Saved ${written.length} files (metadata only)`,
      files: written,
    });
  }

  /**
   * A name claimed earlier in the run is never reused; overwrite only decides
   * whether files from earlier runs count as taken
   */
  private async outputPaths(video: VideoMeta, claimed: Set<string>): Promise<OutputPaths> {
    const { config, sanitizer } = this.context;
    const author = video.proposedAuthor;
    const folder = authorFolder(author, sanitizer);

    const proposed = buildFilename(
      author,
      video.proposedTopic,
      video.proposedYear,
      config.filename_max_length,
      sanitizer,
    );
    const filename = await generateUniqueFilename(
      config.output_base,
      author,
      proposed,
      OUTPUT_EXTENSIONS,
      sanitizer,
      { isReserved: (name) => claimed.has(`${folder}/${name}`), checkExisting: !config.overwrite },
    );
    claimed.add(`${folder}/${filename}`);

    const pathFor = (extension: string) => buildOutputPath(config.output_base, author, filename, extension, sanitizer);
    return { md: await pathFor('md'), docx: await pathFor('docx'), json: await pathFor('json') };
  }

  private failed(base: { videoId: string; url: string; title: string }, error: unknown): ProcessResult {
    const errorKind = error instanceof Error ? error.name : 'Error';
    this.context.metrics.recordFailure(errorKind);
    return createProcessResult({ ...base, status: ProcessStatus.ERROR, message: errorMessage(error), errorKind });
  }

  private async report(result: ProcessResult): Promise<void> {
    if (isSuccess(result)) {
      await this.notify(NotificationLevel.SUCCESS, `${result.title}: ${result.message}`);
    } else {
      await this.notify(NotificationLevel.ERROR, `${result.title || result.url}: ${result.message}`);
    }
  }

  private async notify(level: NotificationLevel, message: string): Promise<void> {
    await this.context.notifier.notify(level, message);
  }
}
