import { resolve } from 'node:path';
import type { IndexReport } from '../types/context.types.js';
import type { Indexer } from './indexer.js';
import type { ChangeKind } from './projectQueue.js';
import type { ChangeEvent, ChangeSource, Subscription } from './changeSource.js';
import type { IgnoreRules } from './fileIndexer.js';
import { ChokidarChangeSource } from './changeSource.js';
import { FileIndexer } from './fileIndexer.js';
import { logger } from '../logging/logger.js';

export type WatchState = 'stopped' | 'watching';

export interface WatcherOptions {
  indexer: Pick<Indexer, 'requireManifest' | 'indexIncremental'>;
  debounceMs: number;
  source?: ChangeSource;
  fileIndexer?: FileIndexer;
}

interface ProjectWatch {
  root: string;
  rules: IgnoreRules;
  subscription: Subscription;
  pending: Map<string, ChangeKind>;
  timer: NodeJS.Timeout | null;
}

/**
 * Turns file-change events into incremental index passes. Events
 * accumulate per path (latest wins) and a trailing debounce timer flushes
 * them as one request.
 */
export class Watcher {
  private readonly watches = new Map<string, ProjectWatch>();
  private readonly starting = new Map<string, Promise<void>>();
  private readonly source: ChangeSource;
  private readonly fileIndexer: FileIndexer;

  constructor(private readonly options: WatcherOptions) {
    this.source = options.source ?? new ChokidarChangeSource();
    this.fileIndexer = options.fileIndexer ?? new FileIndexer();
  }

  /** Returns false when the project was already being watched, or another call is starting it. */
  async start(projectRoot: string): Promise<boolean> {
    const root = resolve(projectRoot);
    if (this.watches.has(root)) return false;
    const inFlight = this.starting.get(root);
    if (inFlight) {
      await inFlight;
      return false;
    }

    const opening = this.open(root);
    this.starting.set(root, opening);
    try {
      await opening;
    } finally {
      this.starting.delete(root);
    }
    logger.info(`Watching ${root} (debounce ${this.options.debounceMs} ms)`);
    return true;
  }

  private async open(root: string): Promise<void> {
    await this.options.indexer.requireManifest(root);
    const rules = await this.fileIndexer.loadIgnoreRules(root);
    const pending = new Map<string, ChangeKind>();
    const subscription = await this.source.subscribe(
      root,
      (rel) => this.fileIndexer.isExcluded(rel, rules, true),
      (event) => {
        const watch = this.watches.get(root);
        if (watch) this.record(watch, event);
      },
    );
    this.watches.set(root, { root, rules, subscription, pending, timer: null });
  }

  /**
   * Unsubscribes and flushes what has accumulated. A pass already running
   * is left to finish. Returns false when the project was not watched.
   */
  async stop(projectRoot: string): Promise<boolean> {
    const root = resolve(projectRoot);
    const opening = this.starting.get(root);
    if (opening) await Promise.allSettled([opening]);
    const watch = this.watches.get(root);
    if (!watch) return false;
    this.watches.delete(root);
    if (watch.timer) clearTimeout(watch.timer);
    watch.timer = null;
    await watch.subscription.close();
    await this.flush(watch).catch((err: unknown) => this.reportFailure(root, err));
    logger.info(`Stopped watching ${root}`);
    return true;
  }

  async stopAll(): Promise<void> {
    await Promise.allSettled([...this.starting.values()]);
    for (const root of [...this.watches.keys()]) await this.stop(root);
  }

  state(projectRoot: string): WatchState {
    return this.watches.has(resolve(projectRoot)) ? 'watching' : 'stopped';
  }

  listWatched(): string[] {
    return [...this.watches.keys()].sort();
  }

  private record(watch: ProjectWatch, event: ChangeEvent): void {
    if (event.kind === 'renamed' && event.previousPath !== undefined) {
      watch.pending.set(event.previousPath, 'deleted');
    }
    if (event.kind === 'deleted') {
      watch.pending.set(event.path, 'deleted');
    } else if (!this.fileIndexer.isExcluded(event.path, watch.rules)) {
      watch.pending.set(event.path, 'changed');
    }
    this.schedule(watch);
  }

  private schedule(watch: ProjectWatch): void {
    if (watch.pending.size === 0) return;
    if (watch.timer) clearTimeout(watch.timer);
    watch.timer = setTimeout(() => {
      watch.timer = null;
      this.flush(watch).catch((err: unknown) => this.reportFailure(watch.root, err));
    }, this.options.debounceMs);
  }

  private async flush(watch: ProjectWatch): Promise<IndexReport | null> {
    if (watch.pending.size === 0) return null;
    const changed: string[] = [];
    const deleted: string[] = [];
    for (const [path, kind] of watch.pending) (kind === 'deleted' ? deleted : changed).push(path);
    watch.pending.clear();

    const report = await this.options.indexer.indexIncremental(watch.root, changed, deleted);
    if (report.filesIndexed + report.filesDeleted > 0 || report.filesFailed.length > 0) {
      logger.info(
        `Re-indexed ${watch.root}: ${report.filesIndexed} updated, ${report.filesDeleted} deleted, ` +
          `${report.filesFailed.length} failed`,
      );
    }
    return report;
  }

  private reportFailure(root: string, err: unknown): void {
    logger.error(`Incremental index of ${root} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
