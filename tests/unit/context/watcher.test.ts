import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { resolve } from 'node:path';
import { Watcher } from '../../../src/context/watcher.js';
import { FakeChangeSource } from '../../fixtures/fakeChangeSource.js';
import type { IndexReport, ProjectManifest } from '../../../src/types/context.types.js';
import { NotIndexedError } from '../../../src/errors/context.js';

const ROOT = resolve('/work/shop');

type IndexIncremental = (root: string, changed: string[], deleted?: string[]) => Promise<IndexReport>;
type RequireManifest = (root: string) => Promise<ProjectManifest>;

function report(): IndexReport {
  return {
    projectRoot: ROOT,
    projectId: 'shop_1',
    mode: 'incremental',
    filesScanned: 1,
    filesIndexed: 1,
    filesUnchanged: 0,
    filesDeleted: 0,
    filesFailed: [],
    chunksEmbedded: 1,
    chunksReused: 0,
    chunksDeleted: 0,
    totalChunks: 1,
    durationMs: 1,
  };
}

describe('Watcher', () => {
  let source: FakeChangeSource;
  let indexIncremental: Mock<IndexIncremental>;
  let requireManifest: Mock<RequireManifest>;
  let watcher: Watcher;

  beforeEach(() => {
    vi.useFakeTimers();
    source = new FakeChangeSource();
    indexIncremental = vi.fn<IndexIncremental>(() => Promise.resolve(report()));
    requireManifest = vi.fn<RequireManifest>((root) =>
      Promise.resolve<ProjectManifest>({
        version: 1,
        projectId: 'shop_1',
        root,
        collection: 'shop_1__g1',
        generation: 1,
        embedding: { provider: 'ollama', model: 'keyword-test', dimensions: 9 },
        files: {},
        orphanedChunkIds: [],
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
      }),
    );
    watcher = new Watcher({ indexer: { indexIncremental, requireManifest }, debounceMs: 500, source });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('coalesces rapid saves of one file into a single pass', async () => {
    await watcher.start(ROOT);

    source.emit({ path: 'a.py', kind: 'modified' });
    await vi.advanceTimersByTimeAsync(200);
    source.emit({ path: 'a.py', kind: 'modified' });
    await vi.advanceTimersByTimeAsync(200);
    source.emit({ path: 'a.py', kind: 'modified' });
    expect(indexIncremental).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(500);

    expect(indexIncremental).toHaveBeenCalledTimes(1);
    expect(indexIncremental).toHaveBeenCalledWith(ROOT, ['a.py'], []);
  });

  it('keeps the latest event per path', async () => {
    await watcher.start(ROOT);

    source.emit({ path: 'a.py', kind: 'created' });
    source.emit({ path: 'a.py', kind: 'deleted' });
    source.emit({ path: 'b.py', kind: 'deleted' });
    source.emit({ path: 'b.py', kind: 'created' });
    await vi.advanceTimersByTimeAsync(500);

    expect(indexIncremental).toHaveBeenCalledWith(ROOT, ['b.py'], ['a.py']);
  });

  it('applies a rename as delete of the old path plus create of the new one', async () => {
    await watcher.start(ROOT);

    source.emit({ path: 'src/new.py', kind: 'renamed', previousPath: 'src/old.py' });
    await vi.advanceTimersByTimeAsync(500);

    expect(indexIncremental).toHaveBeenCalledWith(ROOT, ['src/new.py'], ['src/old.py']);
  });

  it('ignores changes to excluded files', async () => {
    await watcher.start(ROOT);

    source.emit({ path: 'logo.png', kind: 'modified' });
    await vi.advanceTimersByTimeAsync(1000);

    expect(indexIncremental).not.toHaveBeenCalled();
    expect(source.isIgnored?.('node_modules')).toBe(true);
    expect(source.isIgnored?.('src')).toBe(false);
  });

  it('refuses to watch a project that was never indexed', async () => {
    requireManifest.mockRejectedValueOnce(new NotIndexedError(ROOT));

    await expect(watcher.start(ROOT)).rejects.toBeInstanceOf(NotIndexedError);
    expect(watcher.state(ROOT)).toBe('stopped');
  });

  it('tracks state and does not subscribe twice', async () => {
    expect(await watcher.start(ROOT)).toBe(true);
    expect(await watcher.start(ROOT)).toBe(false);

    expect(watcher.state(ROOT)).toBe('watching');
    expect(watcher.listWatched()).toEqual([ROOT]);
  });

  it('subscribes once when two starts overlap', async () => {
    const results = await Promise.all([watcher.start(ROOT), watcher.start(ROOT)]);

    expect(results).toEqual([true, false]);
    expect(source.subscribed).toEqual([ROOT]);

    await watcher.stopAll();
    expect(source.closed).toBe(1);
    expect(watcher.listWatched()).toEqual([]);
  });

  it('stops a project whose start is still in progress', async () => {
    const starting = watcher.start(ROOT);

    expect(await watcher.stop(ROOT)).toBe(true);
    expect(await starting).toBe(true);
    expect(source.closed).toBe(1);
    expect(watcher.state(ROOT)).toBe('stopped');
  });

  it('flushes pending paths when stopped', async () => {
    await watcher.start(ROOT);
    source.emit({ path: 'a.py', kind: 'modified' });

    expect(await watcher.stop(ROOT)).toBe(true);

    expect(indexIncremental).toHaveBeenCalledWith(ROOT, ['a.py'], []);
    expect(source.closed).toBe(1);
    expect(watcher.state(ROOT)).toBe('stopped');

    await vi.advanceTimersByTimeAsync(1000);
    expect(indexIncremental).toHaveBeenCalledTimes(1);
    expect(await watcher.stop(ROOT)).toBe(false);
  });

  it('survives a failing pass and keeps watching', async () => {
    indexIncremental.mockRejectedValueOnce(new Error('store down'));
    await watcher.start(ROOT);

    source.emit({ path: 'a.py', kind: 'modified' });
    await vi.advanceTimersByTimeAsync(500);
    source.emit({ path: 'b.py', kind: 'modified' });
    await vi.advanceTimersByTimeAsync(500);

    expect(indexIncremental).toHaveBeenCalledTimes(2);
    expect(indexIncremental).toHaveBeenLastCalledWith(ROOT, ['b.py'], []);
  });

  it('stopAll stops every project', async () => {
    await watcher.start(ROOT);
    await watcher.stopAll();

    expect(watcher.listWatched()).toEqual([]);
  });
});
