import { isAbsolute, relative, resolve } from 'node:path';
import type { AppConfig } from '../types/config.types.js';
import type {
  Chunk,
  EmbeddingIdentity,
  FileFailure,
  IndexFullOptions,
  IndexReport,
  ManifestFileEntry,
  ProjectManifest,
  ProjectSummary,
  VerifyReport,
} from '../types/context.types.js';
import type { VectorStore } from './vectorStore.js';
import type { BatchEmbedder } from './embedders/batchEmbedder.js';
import type { ChangeKind, IndexJob } from './projectQueue.js';
import type { IgnoreRules } from './fileIndexer.js';
import { chunkFromMetadata, metadataFromChunk } from './vectorStore.js';
import { FileIndexer, toPosix } from './fileIndexer.js';
import type { ManifestStore } from './manifestStore.js';
import { ProjectQueue } from './projectQueue.js';
import { Semaphore, IO_CONCURRENCY } from './semaphore.js';
import { getChunker } from './treeChunker.js';
import { buildContextualContent, embeddingKey } from './contextualContent.js';
import { collectionName, contentHash, projectIdFor } from './hashing.js';
import { BatchEmbeddingError, EmbeddingCompatibilityError } from '../errors/embedding.js';
import { NotIndexedError, StoreWriteError } from '../errors/context.js';
import { toErrorPayload } from '../errors/base.js';
import { logger } from '../logging/logger.js';

/** Anything that hands out a batch embedder for the active provider. */
export interface EmbedderSource {
  embedder(): Promise<BatchEmbedder>;
}

export interface IndexerOptions {
  config: AppConfig;
  store: VectorStore;
  manifests: ManifestStore;
  embedders: EmbedderSource;
  fileIndexer?: FileIndexer;
  now?: () => Date;
}

interface ScannedFile {
  path: string;
  hash: string;
  chunks: Chunk[];
}

function sameIdentity(a: EmbeddingIdentity, b: EmbeddingIdentity): boolean {
  return a.provider === b.provider && a.model === b.model && a.dimensions === b.dimensions;
}

function countChunks(manifest: ProjectManifest): number {
  return Object.values(manifest.files).reduce((sum, f) => sum + f.chunks.length, 0);
}

function emptyReport(projectRoot: string, projectId: string, mode: IndexReport['mode']): IndexReport {
  return {
    projectRoot,
    projectId,
    mode,
    filesScanned: 0,
    filesIndexed: 0,
    filesUnchanged: 0,
    filesDeleted: 0,
    filesFailed: [],
    chunksEmbedded: 0,
    chunksReused: 0,
    chunksDeleted: 0,
    totalChunks: 0,
    durationMs: 0,
  };
}

/**
 * Throws when a manifest was built with a different provider triple than
 * the one now active.
 */
export function assertCompatible(manifest: ProjectManifest, active: EmbeddingIdentity): void {
  if (!sameIdentity(manifest.embedding, active)) {
    throw new EmbeddingCompatibilityError(manifest.embedding, active, manifest.root);
  }
}

/**
 * Keeps each project's vector collection in step with its files. All index
 * work for a project runs through that project's queue, one pass at a time.
 */
export class Indexer {
  private readonly queues = new Map<string, ProjectQueue>();
  private readonly fileIndexer: FileIndexer;
  private readonly now: () => Date;

  constructor(private readonly options: IndexerOptions) {
    this.fileIndexer = options.fileIndexer ?? new FileIndexer();
    this.now = options.now ?? (() => new Date());
  }

  indexFull(projectRoot: string, options: IndexFullOptions = {}): Promise<IndexReport> {
    return this.queueFor(resolve(projectRoot)).full(options);
  }

  /** Paths may be absolute or relative to the project root. */
  indexIncremental(projectRoot: string, changedPaths: string[], deletedPaths: string[] = []): Promise<IndexReport> {
    const root = resolve(projectRoot);
    const changes = new Map<string, ChangeKind>();
    for (const p of changedPaths) this.addChange(changes, root, p, 'changed');
    for (const p of deletedPaths) this.addChange(changes, root, p, 'deleted');
    return this.queueFor(root).incremental(changes);
  }

  async loadManifest(projectRoot: string): Promise<ProjectManifest | null> {
    return this.options.manifests.load(projectIdFor(projectRoot));
  }

  async requireManifest(projectRoot: string): Promise<ProjectManifest> {
    const manifest = await this.loadManifest(projectRoot);
    if (!manifest) throw new NotIndexedError(resolve(projectRoot));
    return manifest;
  }

  async listProjects(): Promise<ProjectSummary[]> {
    const manifests = await this.options.manifests.list();
    return manifests.map((m) => ({
      projectRoot: m.root,
      projectId: m.projectId,
      files: Object.keys(m.files).length,
      chunks: countChunks(m),
      embedding: m.embedding,
      updatedAt: m.updatedAt,
    }));
  }

  /**
   * Drops the collection and manifest. Runs in the project's queue after work
   * already requested; passes requested meanwhile start once it is done.
   * False when the project was not indexed.
   */
  async removeProject(projectRoot: string): Promise<boolean> {
    const root = resolve(projectRoot);
    const removed = await this.queueFor(root).exclusive(async () => {
      const manifest = await this.loadManifest(root);
      if (!manifest) return false;
      await this.options.store.deleteCollection(manifest.collection);
      await this.options.manifests.delete(manifest.projectId);
      return true;
    });
    if (removed) logger.info(`Removed index for ${root}`);
    return removed;
  }

  async verify(projectRoot: string): Promise<VerifyReport> {
    const manifest = await this.requireManifest(projectRoot);
    const expected = new Set(Object.values(manifest.files).flatMap((f) => f.chunks.map((c) => c.id)));
    const actual = new Set(await this.options.store.ids(manifest.collection));
    const missingFromStore = [...expected].filter((id) => !actual.has(id)).sort();
    const extraInStore = [...actual].filter((id) => !expected.has(id)).sort();
    return {
      projectRoot: manifest.root,
      consistent: missingFromStore.length === 0 && extraInStore.length === 0,
      missingFromStore,
      extraInStore,
    };
  }

  /** Resolves once no project has a running or queued pass. */
  async drain(): Promise<void> {
    await Promise.all([...this.queues.values()].map((queue) => queue.idle()));
  }

  private addChange(changes: Map<string, ChangeKind>, root: string, path: string, kind: ChangeKind): void {
    const rel = toPosix(isAbsolute(path) ? relative(root, path) : path);
    if (rel === '' || rel.startsWith('../') || rel === '..') {
      logger.debug(`Ignoring path outside ${root}: ${path}`);
      return;
    }
    changes.set(rel, kind);
  }

  private queueFor(root: string): ProjectQueue {
    let queue = this.queues.get(root);
    if (!queue) {
      queue = new ProjectQueue((job: IndexJob) =>
        job.kind === 'full' ? this.runFull(root, job.options) : this.runIncremental(root, job.changes),
      );
      this.queues.set(root, queue);
    }
    return queue;
  }

  private chunkFile(path: string, contents: string, language: string): Chunk[] {
    return getChunker(language, this.options.config.chunking).chunk({ path, contents, language });
  }

  private async scan(root: string, rules: IgnoreRules): Promise<{ scanned: number; files: ScannedFile[] }> {
    const paths: string[] = [];
    for await (const rel of this.fileIndexer.walkDirectory(root, rules)) paths.push(rel);

    const sem = new Semaphore(IO_CONCURRENCY);
    const files = await sem.map(paths, async (rel) => {
      const entry = await this.fileIndexer.readFile(root, rel);
      if (!entry) return null;
      return { path: rel, hash: contentHash(entry.contents), chunks: this.chunkFile(rel, entry.contents, entry.language) };
    });
    return { scanned: paths.length, files: files.filter((f): f is ScannedFile => f !== null) };
  }

  /**
   * Builds a fresh generation collection, then swaps the manifest over to it
   * and drops the previous one. Until the swap the old index stays live.
   */
  private async runFull(root: string, options: IndexFullOptions): Promise<IndexReport> {
    const started = Date.now();
    const projectId = projectIdFor(root);
    const { store, manifests } = this.options;
    const report = emptyReport(root, projectId, 'full');

    const embedder = await this.options.embedders.embedder();
    const identity = embedder.identity();
    const previous = await manifests.load(projectId);
    if (previous && !options.reset) assertCompatible(previous, identity);
    const reusable = previous && !options.reset ? previous : null;

    const generation = (previous?.generation ?? 0) + 1;
    const collection = collectionName(projectId, generation);
    // a leftover from an interrupted run with the same generation
    if (await store.hasCollection(collection)) await store.deleteCollection(collection);
    await store.createOrGetCollection(collection, identity.dimensions);

    const rules = await this.fileIndexer.loadIgnoreRules(root);
    const { scanned, files } = await this.scan(root, rules);
    report.filesScanned = scanned;

    const timestamp = this.now().toISOString();
    const entries: Record<string, ManifestFileEntry> = {};
    try {
      for (const file of files) {
        const previousEntry = reusable?.files[file.path];
        const reuse =
          reusable && previousEntry
            ? await this.reusableVectors(reusable.collection, previousEntry)
            : new Map<string, Float32Array>();
        const outcome = await this.embedFile(embedder, file.path, file.chunks, reuse, report.filesFailed);
        if (!outcome) continue;
        // nothing to roll back: a failed full pass drops the whole collection
        await this.upsertAll(collection, file.chunks, outcome.vectors, () => Promise.resolve());
        entries[file.path] = {
          contentHash: file.hash,
          chunks: file.chunks.map((c) => ({ id: c.id, contentHash: c.contentHash })),
          indexedAt: timestamp,
        };
        report.filesIndexed++;
        report.chunksEmbedded += outcome.embedded;
        report.chunksReused += outcome.reused;
      }
    } catch (err) {
      await this.dropQuietly(collection);
      throw err;
    }

    const manifest: ProjectManifest = {
      version: 1,
      projectId,
      root,
      collection,
      generation,
      embedding: identity,
      files: entries,
      orphanedChunkIds: [],
      createdAt: previous?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    await manifests.save(manifest);
    if (previous) {
      const kept = new Set(Object.values(entries).flatMap((e) => e.chunks.map((c) => c.id)));
      report.chunksDeleted = Object.values(previous.files)
        .flatMap((e) => e.chunks)
        .filter((c) => !kept.has(c.id)).length;
      await this.dropQuietly(previous.collection);
    }

    report.totalChunks = countChunks(manifest);
    report.durationMs = Date.now() - started;
    logger.info(
      `Indexed ${root}: ${report.filesIndexed}/${report.filesScanned} files, ${report.totalChunks} chunks ` +
        `(${report.chunksEmbedded} embedded, ${report.chunksReused} reused) in ${report.durationMs} ms`,
    );
    return report;
  }

  /**
   * Applies per-file changes to the live collection. Each file commits on its
   * own: vectors first, then stale deletions, then the manifest entry.
   */
  private async runIncremental(root: string, changes: Map<string, ChangeKind>): Promise<IndexReport> {
    const started = Date.now();
    const { store, manifests } = this.options;
    const manifest = await manifests.load(projectIdFor(root));
    if (!manifest) throw new NotIndexedError(root);
    const report = emptyReport(root, manifest.projectId, 'incremental');

    // a switched provider fails the pass before anything is touched
    const embedder = await this.options.embedders.embedder();
    assertCompatible(manifest, embedder.identity());

    await this.retryOrphans(manifest);

    const rules = await this.fileIndexer.loadIgnoreRules(root);
    for (const path of [...changes.keys()].sort()) {
      report.filesScanned++;
      const existing = manifest.files[path];
      const entry = this.fileIndexer.isExcluded(path, rules) ? null : await this.fileIndexer.readFile(root, path);

      if (!entry) {
        if (!existing) continue;
        const ids = existing.chunks.map((c) => c.id);
        await this.storeWrite(`deleting chunks of ${path}`, () => store.delete(manifest.collection, ids));
        delete manifest.files[path];
        await this.commit(manifest);
        report.filesDeleted++;
        report.chunksDeleted += ids.length;
        continue;
      }

      const hash = contentHash(entry.contents);
      if (existing?.contentHash === hash) {
        report.filesUnchanged++;
        continue;
      }

      const chunks = this.chunkFile(path, entry.contents, entry.language);
      const oldIds = new Set(existing?.chunks.map((c) => c.id) ?? []);
      const newIds = new Set(chunks.map((c) => c.id));
      const toInsert = chunks.filter((c) => !oldIds.has(c.id));
      const stale = [...oldIds].filter((id) => !newIds.has(id));

      const removedEntry: ManifestFileEntry | undefined = existing && {
        ...existing,
        chunks: existing.chunks.filter((c) => !newIds.has(c.id)),
      };
      const reuse = removedEntry
        ? await this.reusableVectors(manifest.collection, removedEntry)
        : new Map<string, Float32Array>();
      const outcome =
        toInsert.length === 0
          ? { vectors: [], embedded: 0, reused: 0 }
          : await this.embedFile(embedder, path, toInsert, reuse, report.filesFailed);
      if (!outcome) continue;

      await this.upsertAll(manifest.collection, toInsert, outcome.vectors, (written) =>
        this.compensate(manifest, written),
      );
      try {
        await store.delete(manifest.collection, stale);
      } catch (err) {
        await this.compensate(manifest, toInsert.map((c) => c.id));
        throw new StoreWriteError(`Failed to delete stale chunks of ${path}`, err);
      }

      manifest.files[path] = {
        contentHash: hash,
        chunks: chunks.map((c) => ({ id: c.id, contentHash: c.contentHash })),
        indexedAt: this.now().toISOString(),
      };
      await this.commit(manifest);
      report.filesIndexed++;
      report.chunksEmbedded += outcome.embedded;
      report.chunksReused += outcome.reused;
      report.chunksDeleted += stale.length;
    }

    report.totalChunks = countChunks(manifest);
    report.durationMs = Date.now() - started;
    logger.debug(
      `Incremental pass on ${root}: ${report.filesIndexed} updated, ${report.filesDeleted} deleted, ` +
        `${report.filesUnchanged} unchanged, ${report.filesFailed.length} failed`,
    );
    return report;
  }

  /**
   * Vectors for `chunks`, reusing stored ones with the same embedding key. A provider
   * failure is recorded against the file and yields null.
   */
  private async embedFile(
    embedder: BatchEmbedder,
    path: string,
    chunks: Chunk[],
    reuse: Map<string, Float32Array>,
    failures: FileFailure[],
  ): Promise<{ vectors: Float32Array[]; embedded: number; reused: number } | null> {
    const pending = chunks.filter((c) => !reuse.has(embeddingKey(c)));
    let fresh: Float32Array[];
    try {
      fresh = await embedder.embedAll(pending.map((c) => buildContextualContent(c)));
    } catch (err) {
      if (!(err instanceof BatchEmbeddingError)) throw err;
      logger.warn(`Skipping ${path}: ${err.message}`);
      failures.push({ path, error: toErrorPayload(err) });
      return null;
    }

    const byId = new Map<string, Float32Array>();
    pending.forEach((c, i) => {
      const vector = fresh[i];
      if (vector) byId.set(c.id, vector);
    });
    const vectors: Float32Array[] = [];
    for (const chunk of chunks) {
      const vector = byId.get(chunk.id) ?? reuse.get(embeddingKey(chunk));
      if (!vector) throw new BatchEmbeddingError(`No vector produced for chunk ${chunk.id} of ${path}`, 1);
      vectors.push(vector);
    }
    return { vectors, embedded: pending.length, reused: chunks.length - pending.length };
  }

  /** Stored vectors of `entry`'s chunks keyed by embedding key. */
  private async reusableVectors(collection: string, entry: ManifestFileEntry): Promise<Map<string, Float32Array>> {
    if (entry.chunks.length === 0) return new Map();
    const stored = await this.options.store.get(
      collection,
      entry.chunks.map((c) => c.id),
    );
    return new Map(stored.map((s) => [embeddingKey(chunkFromMetadata(s.id, s.metadata)), s.vector]));
  }

  /** Writes every chunk; on failure hands the ids already written to `rollback`. */
  private async upsertAll(
    collection: string,
    chunks: Chunk[],
    vectors: Float32Array[],
    rollback: (written: string[]) => Promise<void>,
  ): Promise<void> {
    const written: string[] = [];
    try {
      for (const [i, chunk] of chunks.entries()) {
        const vector = vectors[i];
        if (!vector) throw new Error(`Missing vector for chunk ${chunk.id}`);
        await this.options.store.upsert(collection, chunk.id, vector, metadataFromChunk(chunk));
        written.push(chunk.id);
      }
    } catch (err) {
      await rollback(written);
      throw new StoreWriteError(`Failed to write chunks of ${chunks[0]?.filePath ?? collection}`, err);
    }
  }

  /** Removes ids written by a failed file; whatever cannot be removed is left for the next pass. */
  private async compensate(manifest: ProjectManifest, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    try {
      await this.options.store.delete(manifest.collection, ids);
    } catch (err) {
      logger.warn(
        `Could not roll back ${ids.length} chunk(s) in ${manifest.collection}: ` +
          `${err instanceof Error ? err.message : String(err)}; will retry on the next pass`,
      );
      manifest.orphanedChunkIds = [...new Set([...manifest.orphanedChunkIds, ...ids])];
      await this.commit(manifest);
    }
  }

  private async retryOrphans(manifest: ProjectManifest): Promise<void> {
    if (manifest.orphanedChunkIds.length === 0) return;
    const ids = manifest.orphanedChunkIds;
    await this.storeWrite('removing outstanding chunk deletions', () =>
      this.options.store.delete(manifest.collection, ids),
    );
    manifest.orphanedChunkIds = [];
    await this.commit(manifest);
    logger.info(`Removed ${ids.length} outstanding chunk(s) from ${manifest.collection}`);
  }

  private async storeWrite(action: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      throw new StoreWriteError(`Vector store failure while ${action}`, err);
    }
  }

  private async commit(manifest: ProjectManifest): Promise<void> {
    manifest.updatedAt = this.now().toISOString();
    try {
      await this.options.manifests.save(manifest);
    } catch (err) {
      throw new StoreWriteError(`Failed to save manifest for ${manifest.root}`, err);
    }
  }

  private async dropQuietly(collection: string): Promise<void> {
    try {
      await this.options.store.deleteCollection(collection);
    } catch (err) {
      logger.warn(`Could not drop collection ${collection}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
