/**
 * Usage counters for one session
 */
export type MetricsSnapshot = {
  sessionId: string;
  startedAt: string;
  tasksSucceeded: number;
  tasksFailed: number;
  filesCreated: number;
  failuresByKind: Record<string, number>;
};

/**
 * Optional usage metrics capability. Implementations must not throw.
 */
export type MetricsRecorder = {
  recordSuccess(filesCreated: number): void;
  recordFailure(kind: string): void;
  /** undefined when metrics are disabled */
  snapshot(): MetricsSnapshot | undefined;
};

/**
 * Fallback used when no metrics capability is injected
 */
export class NoopMetrics implements MetricsRecorder {
  recordSuccess(_filesCreated: number): void {}

  recordFailure(_kind: string): void {}

  snapshot(): undefined {
    return undefined;
  }
}

function sessionIdFor(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `tubescribe_${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * In-memory metrics for the current process
 */
export class SessionMetrics implements MetricsRecorder {
  private readonly sessionId: string;
  private readonly startedAt: Date;
  private tasksSucceeded = 0;
  private tasksFailed = 0;
  private filesCreated = 0;
  private failuresByKind: Record<string, number> = {};

  constructor(now: Date = new Date()) {
    this.startedAt = now;
    this.sessionId = sessionIdFor(now);
  }

  recordSuccess(filesCreated: number): void {
    this.tasksSucceeded++;
    this.filesCreated += filesCreated;
  }

  recordFailure(kind: string): void {
    this.tasksFailed++;
    this.failuresByKind[kind] = (this.failuresByKind[kind] ?? 0) + 1;
  }

  snapshot(): MetricsSnapshot {
    return {
      sessionId: this.sessionId,
      startedAt: this.startedAt.toISOString(),
      tasksSucceeded: this.tasksSucceeded,
      tasksFailed: this.tasksFailed,
      filesCreated: this.filesCreated,
      failuresByKind: { ...this.failuresByKind },
    };
  }
}

/**
 * One-line summary, e.g. "3 succeeded · 1 failed (FetchError: 1) · 9 files"
 */
export function renderMetrics(snapshot: MetricsSnapshot): string {
  const kinds = Object.entries(snapshot.failuresByKind)
    .map(([kind, count]) => `${kind}: ${count}`)
    .join(', ');
  const failed = kinds ? `${snapshot.tasksFailed} failed (${kinds})` : `${snapshot.tasksFailed} failed`;
  return `${snapshot.tasksSucceeded} succeeded · ${failed} · ${snapshot.filesCreated} files`;
}
