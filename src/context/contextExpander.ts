import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ChunkContext } from '../types/context.types.js';
import type { ManifestStore } from './manifestStore.js';
import type { VectorStore } from './vectorStore.js';
import { projectIdFor } from './hashing.js';
import { splitLines } from './treeChunker.js';
import { ChunkNotFoundError, InvalidArgumentError, NotIndexedError } from '../errors/context.js';
import { logger } from '../logging/logger.js';

export const DEFAULT_CONTEXT_LINES = 15;

export interface ContextExpanderOptions {
  manifests: ManifestStore;
  store: VectorStore;
}

function assertLineCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/** The lines around an indexed chunk, read from the file as it is now. */
export class ContextExpander {
  constructor(private readonly options: ContextExpanderOptions) {}

  async expand(
    projectRoot: string,
    chunkId: string,
    before = DEFAULT_CONTEXT_LINES,
    after = DEFAULT_CONTEXT_LINES,
  ): Promise<ChunkContext> {
    assertLineCount('before', before);
    assertLineCount('after', after);
    const root = resolve(projectRoot);
    const manifest = await this.options.manifests.load(projectIdFor(root));
    if (!manifest) throw new NotIndexedError(root);

    const owner = Object.entries(manifest.files).find(([, entry]) => entry.chunks.some((c) => c.id === chunkId));
    const [stored] = owner ? await this.options.store.get(manifest.collection, [chunkId]) : [];
    if (!owner || !stored) throw new ChunkNotFoundError(chunkId);

    const { filePath, startLine, endLine } = stored.metadata;
    let lines = await this.readLines(join(root, filePath));
    let firstLine = 1;
    if (lines === null || lines.length < endLine) {
      // deleted or truncated since the last pass; the stored text is all there is
      lines = splitLines(stored.metadata.content);
      firstLine = startLine;
    }

    const lastLine = firstLine + lines.length - 1;
    const from = Math.max(firstLine, startLine - before);
    const to = Math.min(lastLine, endLine + after);
    const context: ChunkContext = { chunkId, filePath, startLine, endLine, lines: [] };
    for (let line = from; line <= to; line++) {
      context.lines.push({
        line,
        text: (lines[line - firstLine] ?? '').replace(/\r$/, ''),
        inChunk: line >= startLine && line <= endLine,
      });
    }
    return context;
  }

  private async readLines(path: string): Promise<string[] | null> {
    try {
      return splitLines(await readFile(path, 'utf8'));
    } catch (err) {
      logger.debug(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }
}
