import { join } from 'node:path';
import type { AppConfig } from '../types/config.types.js';
import type { ContextEngine } from './contextEngine.js';
import type { VectorStore } from './vectorStore.js';
import type { ChangeSource } from './changeSource.js';
import type { ProviderFactory } from './embedders/providerRegistry.js';
import { ProviderRegistry, createProvider } from './embedders/providerRegistry.js';
import { MemoryVectorStore } from './memoryVectorStore.js';
import { SqliteVectorStore } from './sqliteVectorStore.js';
import { ManifestStore } from './manifestStore.js';
import { FileIndexer } from './fileIndexer.js';
import { Indexer } from './indexer.js';
import { Searcher } from './searcher.js';
import { TopologyBuilder } from './topologyBuilder.js';
import { ContextExpander } from './contextExpander.js';
import { GitTracker } from './gitTracker.js';
import { Watcher } from './watcher.js';
import { LocalContextAdapter } from './localContextAdapter.js';

export type { ContextEngine, ModifiedFilesSearch } from './contextEngine.js';
export { LocalContextAdapter } from './localContextAdapter.js';

/** Collaborators a caller may substitute; everything else is built from config. */
export interface ContextEngineOverrides {
  store?: VectorStore;
  providerFactory?: ProviderFactory;
  env?: NodeJS.ProcessEnv;
  changeSource?: ChangeSource;
  git?: GitTracker;
}

export function storePath(config: AppConfig): string {
  return join(config.dataDir, 'index.db');
}

/**
 * Factory that wires up the LocalContextAdapter: one vector store and one
 * manifest directory under `config.dataDir`, shared by every project.
 */
export function createContextEngine(config: AppConfig, overrides: ContextEngineOverrides = {}): ContextEngine {
  const store =
    overrides.store ?? (config.store === 'memory' ? new MemoryVectorStore() : new SqliteVectorStore(storePath(config)));
  const manifests = new ManifestStore(config.dataDir);
  const registry = new ProviderRegistry(
    config.embedding,
    overrides.env ?? process.env,
    overrides.providerFactory ?? createProvider,
  );
  const fileIndexer = new FileIndexer();
  const indexer = new Indexer({ config, store, manifests, embedders: registry, fileIndexer });

  return new LocalContextAdapter({
    store,
    registry,
    indexer,
    searcher: new Searcher({ store, manifests, embedders: registry }),
    topology: new TopologyBuilder({ store, manifests, config: config.topology }),
    expander: new ContextExpander({ manifests, store }),
    git: overrides.git ?? new GitTracker(),
    watcher: new Watcher({
      indexer,
      debounceMs: config.watch.debounceMs,
      fileIndexer,
      ...(overrides.changeSource !== undefined && { source: overrides.changeSource }),
    }),
  });
}
