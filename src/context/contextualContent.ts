import type { Chunk } from '../types/context.types.js';
import { contentHash } from './hashing.js';

/**
 * Text sent to the embedding provider for a chunk: a short File/Language/Symbol
 * header, the summary marker of a truncated definition, then the raw content.
 * Only the vector is stored; the chunk keeps its exact bytes.
 */
export function buildContextualContent(chunk: Chunk): string {
  const lines: string[] = [`File: ${chunk.filePath}`, `Language: ${chunk.language}`];
  if (chunk.symbolName) {
    lines.push(`Symbol: ${chunk.symbolName}`);
  }
  if (chunk.summary) {
    lines.push(`Summary: ${chunk.summary}`);
  }
  lines.push('', chunk.content);
  return lines.join('\n');
}

/**
 * Vectors are reused between chunks with the same key, so anything that
 * changes the embedded text (a renamed slice, a new summary) forces a re-embed.
 */
export function embeddingKey(chunk: Chunk): string {
  return contentHash(buildContextualContent(chunk));
}
