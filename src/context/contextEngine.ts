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
import type { WatchState } from './watcher.js';

export interface ModifiedFilesSearch {
  /** The allow-list git reported, relative to the project root. */
  files: string[];
  hits: SearchHit[];
}

/**
 * Every operation the transports expose, behind one
 * interface. Callers never wire the indexing components themselves.
 */
export interface ContextEngine {
  /** Full pass into a fresh collection; `reset` re-embeds everything with the active provider. */
  indexProject(projectRoot: string, options?: IndexFullOptions): Promise<IndexReport>;

  /** Incremental pass over the given paths (absolute or relative to the root). */
  indexChanges(projectRoot: string, changedPaths: string[], deletedPaths?: string[]): Promise<IndexReport>;

  search(query: string, projectRoot: string, topK: number): Promise<SearchHit[]>;

  /** Search restricted to files git reports as changed in the working tree or the last `commits` commits. */
  searchModifiedFiles(query: string, projectRoot: string, topK: number, commits?: number): Promise<ModifiedFilesSearch>;

  projectMap(projectRoot: string): Promise<TopologyGraph>;

  chunkContext(projectRoot: string, chunkId: string, before?: number, after?: number): Promise<ChunkContext>;

  /** False when the project was already watched. */
  watch(projectRoot: string): Promise<boolean>;
  /** False when the project was not watched. */
  unwatch(projectRoot: string): Promise<boolean>;
  watchState(projectRoot: string): WatchState;
  watchedProjects(): string[];

  listProjects(): Promise<ProjectSummary[]>;
  embeddingStatus(): Promise<EmbeddingStatus>;
  verify(projectRoot: string): Promise<VerifyReport>;

  /** Stops any watcher, then drops the project's vectors and manifest. */
  removeProject(projectRoot: string): Promise<boolean>;

  /** Stops watchers, waits for queued passes and closes the store. */
  dispose(): Promise<void>;
}
