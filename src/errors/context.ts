import { AtlasError } from './base.js';

/** AST parse failure. Recovered by the sliding-window fallback; never escapes the chunker. */
export class ChunkingError extends AtlasError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CHUNKING_FAILURE', cause);
  }
}

export class StoreWriteError extends AtlasError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORE_WRITE_FAILURE', cause);
  }
}

export class NotIndexedError extends AtlasError {
  constructor(public readonly projectRoot: string) {
    super(`Project not indexed: ${projectRoot}. Index it first (code-atlas index ${projectRoot}).`, 'NOT_INDEXED');
  }
}

export class ChunkNotFoundError extends AtlasError {
  constructor(chunkId: string) {
    super(`Chunk not found in index: ${chunkId}`, 'CHUNK_NOT_FOUND');
  }
}

export class InvalidArgumentError extends AtlasError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
  }
}

export class ManifestCorruptError extends AtlasError {
  constructor(path: string, cause?: unknown) {
    super(`Manifest at ${path} is unreadable; re-index the project with --reset`, 'MANIFEST_CORRUPT', cause);
  }
}
