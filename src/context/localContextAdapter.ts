import type {
  ChunkContext,
  EmbeddingStatus,
  IndexFullOptions,
  IndexReport,
  ProjectSummary,
  SearchHit,
  TopologyGraph,
  VerifyReport,
} from '../types/context.types.js';
import type { ContextEngine, ModifiedFilesSearch } from './contextEngine.js';
import type { Indexer } from './indexer.js';
import type { Searcher } from './searcher.js';
import type { TopologyBuilder } from './topologyBuilder.js';
import type { ContextExpander } from './contextExpander.js';
import type { GitTracker } from './gitTracker.js';
import type { Watcher, WatchState } from './watcher.js';
import type { VectorStore } from './vectorStore.js';
import type { ProviderRegistry } from './embedders/providerRegistry.js';

export const DEFAULT_MODIFIED_COMMITS = 5;

export interface LocalContextComponents {
  store: VectorStore;
  registry: ProviderRegistry;
  indexer: Indexer;
  searcher: Searcher;
  topology: TopologyBuilder;
  expander: ContextExpander;
  git: GitTracker;
  watcher: Watcher;
}

/**
 * In-process ContextEngine: every operation runs against the local vector
 * store and manifests. Owns the store and closes it on dispose().
 */
export class LocalContextAdapter implements ContextEngine {
  private disposed = false;

  constructor(private readonly c: LocalContextComponents) {}

  indexProject(projectRoot: string, options: IndexFullOptions = {}): Promise<IndexReport> {
    return this.c.indexer.indexFull(projectRoot, options);
  }

  indexChanges(projectRoot: string, changedPaths: string[], deletedPaths: string[] = []): Promise<IndexReport> {
    return this.c.indexer.indexIncremental(projectRoot, changedPaths, deletedPaths);
  }

  search(query: string, projectRoot: string, topK: number): Promise<SearchHit[]> {
    return this.c.searcher.search(query, projectRoot, topK);
  }

  async searchModifiedFiles(
    query: string,
    projectRoot: string,
    topK: number,
    commits = DEFAULT_MODIFIED_COMMITS,
  ): Promise<ModifiedFilesSearch> {
    const files = await this.c.git.modifiedFiles(projectRoot, commits);
    const hits = await this.c.searcher.searchModifiedFiles(query, projectRoot, topK, files);
    return { files, hits };
  }

  projectMap(projectRoot: string): Promise<TopologyGraph> {
    return this.c.topology.build(projectRoot);
  }

  chunkContext(projectRoot: string, chunkId: string, before?: number, after?: number): Promise<ChunkContext> {
    return this.c.expander.expand(projectRoot, chunkId, before, after);
  }

  watch(projectRoot: string): Promise<boolean> {
    return this.c.watcher.start(projectRoot);
  }

  unwatch(projectRoot: string): Promise<boolean> {
    return this.c.watcher.stop(projectRoot);
  }

  watchState(projectRoot: string): WatchState {
    return this.c.watcher.state(projectRoot);
  }

  watchedProjects(): string[] {
    return this.c.watcher.listWatched();
  }

  listProjects(): Promise<ProjectSummary[]> {
    return this.c.indexer.listProjects();
  }

  embeddingStatus(): Promise<EmbeddingStatus> {
    return this.c.registry.status();
  }

  verify(projectRoot: string): Promise<VerifyReport> {
    return this.c.indexer.verify(projectRoot);
  }

  async removeProject(projectRoot: string): Promise<boolean> {
    await this.c.watcher.stop(projectRoot);
    return this.c.indexer.removeProject(projectRoot);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.c.watcher.stopAll();
    await this.c.indexer.drain();
    await this.c.store.close();
  }
}
