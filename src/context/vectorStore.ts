import { z } from 'zod';
import type { Chunk, SymbolKind } from '../types/context.types.js';

/** What the store keeps beside each vector; enough to rebuild a Chunk without the file. */
export interface ChunkMetadata {
  filePath: string;
  startLine: number;
  endLine: number;
  symbolName: string | null;
  kind: SymbolKind;
  language: string;
  contentHash: string;
  content: string;
  summary?: string;
}

export const chunkMetadataSchema: z.ZodType<ChunkMetadata> = z.object({
  filePath: z.string(),
  startLine: z.number().int(),
  endLine: z.number().int(),
  symbolName: z.string().nullable(),
  kind: z.enum(['function', 'class', 'method', 'statement', 'block', 'unknown']),
  language: z.string(),
  contentHash: z.string(),
  content: z.string(),
  summary: z.string().optional(),
});

export interface StoredVector {
  id: string;
  vector: Float32Array;
  metadata: ChunkMetadata;
}

export interface VectorQueryResult {
  id: string;
  /** Cosine similarity, higher is closer. */
  score: number;
  metadata: ChunkMetadata;
}

export interface QueryFilter {
  /** Only chunks whose file path is listed. An empty list matches nothing. */
  filePaths?: string[];
}

/**
 * Named collections of fixed-dimension vectors. Query results are ordered by
 * descending similarity, then ascending file path and start line.
 */
export interface VectorStore {
  createOrGetCollection(name: string, dimensions: number): Promise<void>;
  hasCollection(name: string): Promise<boolean>;
  upsert(collection: string, id: string, vector: Float32Array, metadata: ChunkMetadata): Promise<void>;
  delete(collection: string, ids: string[]): Promise<void>;
  query(collection: string, vector: Float32Array, topK: number, filter?: QueryFilter): Promise<VectorQueryResult[]>;
  /** All entries, or only those with the given ids (missing ids are skipped). */
  get(collection: string, ids?: string[]): Promise<StoredVector[]>;
  ids(collection: string): Promise<string[]>;
  deleteCollection(name: string): Promise<void>;
  close(): Promise<void>;
}

export function compareResults(a: VectorQueryResult, b: VectorQueryResult): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.metadata.filePath !== b.metadata.filePath) return a.metadata.filePath < b.metadata.filePath ? -1 : 1;
  return a.metadata.startLine - b.metadata.startLine;
}

export function metadataFromChunk(chunk: Chunk): ChunkMetadata {
  return {
    filePath: chunk.filePath,
    startLine: chunk.startLine,
    endLine: chunk.endLine,
    symbolName: chunk.symbolName,
    kind: chunk.kind,
    language: chunk.language,
    contentHash: chunk.contentHash,
    content: chunk.content,
    ...(chunk.summary !== undefined && { summary: chunk.summary }),
  };
}

export function chunkFromMetadata(id: string, metadata: ChunkMetadata): Chunk {
  return { id, ...metadata };
}
