import chokidar from 'chokidar';
import { relative } from 'node:path';
import { toPosix } from './fileIndexer.js';
import { logger } from '../logging/logger.js';

export type ChangeEventKind = 'created' | 'modified' | 'deleted' | 'renamed';

export interface ChangeEvent {
  /** Relative to the watched root, POSIX separators. */
  path: string;
  kind: ChangeEventKind;
  /** Set on `renamed`: where the file used to be. */
  previousPath?: string;
}

export interface Subscription {
  close(): Promise<void>;
}

export interface ChangeSource {
  /**
   * Delivers changes under `root`. `isIgnored` receives root-relative paths
   * and prunes whole directories from the subscription.
   */
  subscribe(root: string, isIgnored: (relPath: string) => boolean, listener: (event: ChangeEvent) => void): Promise<Subscription>;
}

/**
 * chokidar-backed source. chokidar reports a rename as unlink + add, which
 * is exactly how renames are applied downstream.
 */
export class ChokidarChangeSource implements ChangeSource {
  async subscribe(
    root: string,
    isIgnored: (relPath: string) => boolean,
    listener: (event: ChangeEvent) => void,
  ): Promise<Subscription> {
    const toRelative = (p: string): string => toPosix(relative(root, p));
    const watcher = chokidar.watch(root, {
      ignoreInitial: true,
      persistent: true,
      ignored: (p: string) => {
        const rel = toRelative(p);
        return rel !== '' && isIgnored(rel);
      },
    });

    watcher
      .on('add', (p) => listener({ path: toRelative(p), kind: 'created' }))
      .on('change', (p) => listener({ path: toRelative(p), kind: 'modified' }))
      .on('unlink', (p) => listener({ path: toRelative(p), kind: 'deleted' }))
      .on('error', (err) => logger.warn(`File watcher error under ${root}: ${err instanceof Error ? err.message : String(err)}`));

    await new Promise<void>((resolve) => watcher.once('ready', () => resolve()));
    return { close: () => watcher.close() };
  }
}
