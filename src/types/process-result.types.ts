import { createEnum } from '../utils/create-enum.js';

const processStatus = createEnum(['success', 'error', 'skipped'] as const);

export const ProcessStatus = processStatus.object;

export type ProcessStatus = typeof processStatus.type;

/**
 * Outcome of processing one URL. Frozen once created.
 */
export type ProcessResult = {
  readonly videoId: string;
  readonly url: string;
  readonly status: ProcessStatus;
  readonly message: string;
  readonly title: string;
  /** Paths of the files that were written */
  readonly files: readonly string[];
  /** Error class name when status is "error" */
  readonly errorKind?: string;
};

export function createProcessResult(result: {
  videoId: string;
  url: string;
  status: ProcessStatus;
  message?: string;
  title?: string;
  files?: string[];
  errorKind?: string;
}): ProcessResult {
  return Object.freeze({
    videoId: result.videoId,
    url: result.url,
    status: result.status,
    message: result.message ?? '',
    title: result.title ?? '',
    files: Object.freeze([...(result.files ?? [])]),
    ...(result.errorKind ? { errorKind: result.errorKind } : {}),
  });
}

export function isSuccess(result: ProcessResult): boolean {
  return result.status === ProcessStatus.SUCCESS;
}
