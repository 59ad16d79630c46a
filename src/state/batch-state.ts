import { WorkflowError } from '../errors/custom-errors.js';
import type { ProcessResult } from '../types/process-result.types.js';
import { proposeNaming, type VideoMeta } from '../types/video.types.js';
import { createEnum } from '../utils/create-enum.js';

const batchPhase = createEnum(['input', 'fetched', 'reviewed', 'saved'] as const);

export const BatchPhase = batchPhase.object;

export type BatchPhase = typeof batchPhase.type;

/**
 * Hard upper bound for batch_max_size
 */
export const BATCH_SIZE_LIMIT = 10;

/**
 * One accepted URL and what its metadata fetch produced
 */
export type BatchEntry = {
  url: string;
  videoId: string;
  video?: VideoMeta;
  /** Set when the metadata fetch failed */
  failure?: {
    kind: string;
    message: string;
  };
};

/**
 * Review edit for one entry. Empty strings restore the proposal.
 */
export type ReviewEdit = {
  index: number;
  author?: string;
  topic?: string;
  year?: string;
  selected?: boolean;
};

export type BatchProgress = {
  total: number;
  fetched: number;
  failed: number;
  selected: number;
  succeeded: number;
};

/**
 * Session state for the input → fetched → reviewed → saved workflow
 *
 * Holds the accepted URLs in order, their fetched metadata or failure, and
 * the results of the save stage. Only the orchestrator mutates it.
 */
export class BatchState {
  private currentPhase: BatchPhase = BatchPhase.INPUT;
  private entryList: BatchEntry[] = [];
  private resultList: ProcessResult[] = [];
  readonly maxSize: number;

  constructor(maxSize: number = BATCH_SIZE_LIMIT) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new WorkflowError(`Batch size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = Math.min(maxSize, BATCH_SIZE_LIMIT);
  }

  get phase(): BatchPhase {
    return this.currentPhase;
  }

  get entries(): readonly BatchEntry[] {
    return this.entryList;
  }

  get results(): readonly ProcessResult[] {
    return this.resultList;
  }

  /**
   * Videos whose metadata was fetched, in input order
   */
  get videos(): VideoMeta[] {
    return this.entryList.flatMap((entry) => (entry.video ? [entry.video] : []));
  }

  /**
   * Accept URLs for the batch, truncating to maxSize
   *
   * @returns Number of URLs dropped by the cap
   */
  accept(urls: ReadonlyArray<{ url: string; videoId: string }>): number {
    this.expectPhase(BatchPhase.INPUT, 'accept URLs');
    if (urls.length === 0) {
      throw new WorkflowError('A batch needs at least one URL');
    }

    this.entryList = urls.slice(0, this.maxSize).map(({ url, videoId }) => ({ url, videoId }));
    return Math.max(0, urls.length - this.maxSize);
  }

  recordFetched(index: number, video: VideoMeta): void {
    this.expectPhase(BatchPhase.INPUT, 'record metadata');
    const entry = this.entryAt(index);
    entry.video = video;
    delete entry.failure;
  }

  recordFetchFailure(index: number, error: Error): void {
    this.expectPhase(BatchPhase.INPUT, 'record a fetch failure');
    const entry = this.entryAt(index);
    entry.failure = { kind: error.name, message: error.message };
    delete entry.video;
  }

  /**
   * INPUT → FETCHED, once every accepted URL has a video or a failure
   */
  markFetched(): void {
    this.expectPhase(BatchPhase.INPUT, 'finish fetching');
    if (this.entryList.length === 0) {
      throw new WorkflowError('No URLs have been accepted');
    }
    const pending = this.entryList.filter((entry) => !entry.video && !entry.failure);
    if (pending.length > 0) {
      throw new WorkflowError(`${pending.length} URL(s) have not been fetched yet`);
    }
    this.currentPhase = BatchPhase.FETCHED;
  }

  /**
   * Apply a review edit. Allowed while fetched or reviewed.
   */
  applyEdit(edit: ReviewEdit): VideoMeta {
    if (this.currentPhase !== BatchPhase.FETCHED && this.currentPhase !== BatchPhase.REVIEWED) {
      throw new WorkflowError(`Cannot edit naming in phase "${this.currentPhase}"`);
    }

    const video = this.entryAt(edit.index).video;
    if (!video) {
      throw new WorkflowError(`Entry ${edit.index + 1} has no metadata to edit`);
    }

    const proposal = proposeNaming(video);
    if (edit.author !== undefined) video.proposedAuthor = edit.author.trim() || proposal.author;
    if (edit.topic !== undefined) video.proposedTopic = edit.topic.trim() || proposal.topic;
    if (edit.year !== undefined) video.proposedYear = edit.year.trim() || proposal.year;
    if (edit.selected !== undefined) video.selected = edit.selected;

    return video;
  }

  /**
   * FETCHED → REVIEWED
   */
  markReviewed(): void {
    this.expectPhase(BatchPhase.FETCHED, 'confirm the review');
    this.currentPhase = BatchPhase.REVIEWED;
  }

  /**
   * REVIEWED → SAVED
   */
  markSaved(results: ProcessResult[]): void {
    this.expectPhase(BatchPhase.REVIEWED, 'record results');
    this.resultList = [...results];
    this.currentPhase = BatchPhase.SAVED;
  }

  progress(): BatchProgress {
    return {
      total: this.entryList.length,
      fetched: this.entryList.filter((entry) => entry.video).length,
      failed: this.entryList.filter((entry) => entry.failure).length,
      selected: this.videos.filter((video) => video.selected).length,
      succeeded: this.resultList.filter((result) => result.status === 'success').length,
    };
  }

  /**
   * Back to INPUT from any phase
   */
  reset(): void {
    this.currentPhase = BatchPhase.INPUT;
    this.entryList = [];
    this.resultList = [];
  }

  private entryAt(index: number): BatchEntry {
    const entry = this.entryList[index];
    if (!entry) {
      throw new WorkflowError(`No batch entry at position ${index + 1}`);
    }
    return entry;
  }

  private expectPhase(expected: BatchPhase, action: string): void {
    if (this.currentPhase !== expected) {
      throw new WorkflowError(`Cannot ${action} in phase "${this.currentPhase}" (expected "${expected}")`);
    }
  }
}
