// Public API: explicit named exports only (no re-export *)

export type { ContextEngine, ModifiedFilesSearch } from './context/contextEngine.js';
export type { ContextEngineOverrides } from './context/index.js';
export type { VectorStore, ChunkMetadata, QueryFilter, StoredVector, VectorQueryResult } from './context/vectorStore.js';
export type { EmbeddingProvider } from './context/embedders/embeddingProvider.js';
export type { ChangeSource, ChangeEvent, Subscription } from './context/changeSource.js';
export type { Chunker, SourceFile } from './context/treeChunker.js';
export type {
  Chunk,
  ChunkContext,
  EmbeddingIdentity,
  EmbeddingStatus,
  IndexReport,
  ProjectManifest,
  ProjectSummary,
  SearchHit,
  TopologyGraph,
  VerifyReport,
} from './types/context.types.js';
export type { AppConfig, ProviderName } from './types/config.types.js';
export type { ErrorPayload } from './errors/base.js';

export { createContextEngine } from './context/index.js';
export { LocalContextAdapter } from './context/localContextAdapter.js';
export { Indexer } from './context/indexer.js';
export { Searcher } from './context/searcher.js';
export { TopologyBuilder } from './context/topologyBuilder.js';
export { Watcher } from './context/watcher.js';
export { ContextExpander } from './context/contextExpander.js';
export { GitTracker } from './context/gitTracker.js';
export { TreeChunker, TextChunker, getChunker } from './context/treeChunker.js';
export { MemoryVectorStore } from './context/memoryVectorStore.js';
export { SqliteVectorStore } from './context/sqliteVectorStore.js';
export { ManifestStore } from './context/manifestStore.js';
export { ProviderRegistry } from './context/embedders/providerRegistry.js';
export { loadConfig } from './config/loader.js';
export { AtlasError, toErrorPayload } from './errors/base.js';
export { createMcpServer, startMcpServer } from './mcp/server.js';
export {
  formatSearchResults,
  formatChunkContext,
  formatProjectMap,
  formatIndexReport,
} from './formatting/resultFormatter.js';
