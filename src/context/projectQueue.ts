import type { IndexFullOptions, IndexReport } from '../types/context.types.js';

export type ChangeKind = 'changed' | 'deleted';

export type IndexJob =
  | { kind: 'full'; options: IndexFullOptions }
  | { kind: 'incremental'; changes: Map<string, ChangeKind> };

interface Waiter {
  resolve: (report: IndexReport) => void;
  reject: (err: unknown) => void;
}

interface PendingJob {
  type: 'index';
  job: IndexJob;
  waiters: Waiter[];
}

interface PendingTask {
  type: 'task';
  run: () => Promise<void>;
}

type Entry = PendingJob | PendingTask;

/**
 * Serialises work for one project. At most one entry runs at a time.
 * Incremental requests that queue up behind a running job merge into one
 * pass (the latest change per path wins), and a full request absorbs any
 * queued incremental work, whose callers then receive the full report.
 * Exclusive tasks keep their place in line; requests made after one never
 * merge into work queued before it.
 */
export class ProjectQueue {
  private readonly entries: Entry[] = [];
  private active: Promise<void> | null = null;

  constructor(private readonly worker: (job: IndexJob) => Promise<IndexReport>) {}

  get busy(): boolean {
    return this.active !== null || this.entries.length > 0;
  }

  full(options: IndexFullOptions = {}): Promise<IndexReport> {
    return this.enqueue({ kind: 'full', options });
  }

  incremental(changes: Map<string, ChangeKind>): Promise<IndexReport> {
    return this.enqueue({ kind: 'incremental', changes: new Map(changes) });
  }

  /** Runs `task` after everything already queued, holding off later requests until it settles. */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.entries.push({ type: 'task', run: () => task().then(resolve, reject) });
      this.pump();
    });
  }

  /** Resolves once nothing is running or queued. */
  async idle(): Promise<void> {
    while (this.active) await this.active;
  }

  private enqueue(job: IndexJob): Promise<IndexReport> {
    return new Promise<IndexReport>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      const last = this.entries[this.entries.length - 1];
      if (last?.type === 'index') {
        last.job = merge(last.job, job);
        last.waiters.push(waiter);
      } else {
        this.entries.push({ type: 'index', job, waiters: [waiter] });
      }
      this.pump();
    });
  }

  private pump(): void {
    if (this.active) return;
    const next = this.entries.shift();
    if (!next) return;
    const run = next.type === 'index' ? this.execute(next.job, next.waiters) : next.run();
    this.active = run.finally(() => {
      this.active = null;
      this.pump();
    });
  }

  private async execute(job: IndexJob, waiters: Waiter[]): Promise<void> {
    try {
      const report = await this.worker(job);
      for (const w of waiters) w.resolve(report);
    } catch (err) {
      for (const w of waiters) w.reject(err);
    }
  }
}

function merge(queued: IndexJob, next: IndexJob): IndexJob {
  if (queued.kind === 'full') {
    if (next.kind === 'full') return { kind: 'full', options: { reset: Boolean(queued.options.reset || next.options.reset) } };
    // the full pass has not started, so it will see these changes on disk
    return queued;
  }
  if (next.kind === 'full') return next;
  const changes = new Map(queued.changes);
  for (const [path, kind] of next.changes) changes.set(path, kind);
  return { kind: 'incremental', changes };
}
