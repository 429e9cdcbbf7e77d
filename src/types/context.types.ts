import type { ErrorPayload } from '../errors/base.js';

export type SymbolKind = 'function' | 'class' | 'method' | 'statement' | 'block' | 'unknown';

export interface Chunk {
  id: string;
  filePath: string;
  /** 1-indexed, inclusive. */
  startLine: number;
  endLine: number;
  language: string;
  kind: SymbolKind;
  symbolName: string | null;
  content: string;
  contentHash: string;
  /** Set on a definition truncated to its signature; its nested definitions are separate chunks. */
  summary?: string;
}

export interface SearchHit {
  chunk: Chunk;
  score: number;
}

export interface EmbeddingIdentity {
  provider: string;
  model: string;
  dimensions: number;
}

export interface ManifestChunk {
  id: string;
  contentHash: string;
}

export interface ManifestFileEntry {
  contentHash: string;
  chunks: ManifestChunk[];
  indexedAt: string;
}

export interface ProjectManifest {
  version: 1;
  projectId: string;
  root: string;
  collection: string;
  generation: number;
  embedding: EmbeddingIdentity;
  files: Record<string, ManifestFileEntry>;
  /** Chunk ids whose deletion from the store failed; retried at the start of the next pass. */
  orphanedChunkIds: string[];
  createdAt: string;
  updatedAt: string;
}

export interface FileFailure {
  path: string;
  error: ErrorPayload;
}

export interface IndexReport {
  projectRoot: string;
  projectId: string;
  mode: 'full' | 'incremental';
  filesScanned: number;
  filesIndexed: number;
  filesUnchanged: number;
  filesDeleted: number;
  filesFailed: FileFailure[];
  chunksEmbedded: number;
  chunksReused: number;
  chunksDeleted: number;
  totalChunks: number;
  durationMs: number;
}

export interface IndexFullOptions {
  /** Ignore the previous manifest and embed everything with the active provider. */
  reset?: boolean;
}

export interface ProjectSummary {
  projectRoot: string;
  projectId: string;
  files: number;
  chunks: number;
  embedding: EmbeddingIdentity;
  updatedAt: string;
}

export interface VerifyReport {
  projectRoot: string;
  consistent: boolean;
  missingFromStore: string[];
  extraInStore: string[];
}

export interface ComponentRepresentative {
  chunkId: string;
  filePath: string;
  startLine: number;
  endLine: number;
  kind: SymbolKind;
  symbolName: string | null;
}

export interface TopologyComponent {
  name: string;
  chunkIds: string[];
  chunkCount: number;
  files: string[];
  languages: string[];
  representatives: ComponentRepresentative[];
}

export interface TopologyEdge {
  from: string;
  to: string;
  similarity: number;
}

export interface TopologyGraph {
  projectRoot: string;
  components: TopologyComponent[];
  edges: TopologyEdge[];
}

export interface ChunkContextLine {
  line: number;
  text: string;
  inChunk: boolean;
}

export interface ChunkContext {
  chunkId: string;
  filePath: string;
  startLine: number;
  endLine: number;
  lines: ChunkContextLine[];
}

export type EmbeddingStatus =
  | { available: true; provider: string; model: string; dimensions: number }
  | { available: false; attempted: string[]; message: string };
