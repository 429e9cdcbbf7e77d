import { isAbsolute, relative, resolve } from 'node:path';
import type { SearchHit } from '../types/context.types.js';
import type { VectorStore } from './vectorStore.js';
import type { ManifestStore } from './manifestStore.js';
import type { EmbedderSource } from './indexer.js';
import { chunkFromMetadata, compareResults } from './vectorStore.js';
import { assertCompatible } from './indexer.js';
import { projectIdFor } from './hashing.js';
import { toPosix } from './fileIndexer.js';
import { InvalidArgumentError, NotIndexedError } from '../errors/context.js';

export interface SearcherOptions {
  store: VectorStore;
  manifests: ManifestStore;
  embedders: EmbedderSource;
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InvalidArgumentError(`topK must be a positive integer, got ${topK}`);
  }
}

/** Nearest-chunk queries against a project's active collection. */
export class Searcher {
  constructor(private readonly options: SearcherOptions) {}

  search(query: string, projectRoot: string, topK: number): Promise<SearchHit[]> {
    return this.run(query, projectRoot, topK);
  }

  /**
   * Same ranking, restricted to files in `allowList` (absolute or
   * root-relative) before the top-k cut. An empty list matches nothing.
   */
  searchModifiedFiles(query: string, projectRoot: string, topK: number, allowList: string[]): Promise<SearchHit[]> {
    const root = resolve(projectRoot);
    const filePaths = allowList.map((p) => toPosix(isAbsolute(p) ? relative(root, p) : p));
    return this.run(query, root, topK, filePaths);
  }

  private async run(query: string, projectRoot: string, topK: number, filePaths?: string[]): Promise<SearchHit[]> {
    assertTopK(topK);
    const root = resolve(projectRoot);
    const manifest = await this.options.manifests.load(projectIdFor(root));
    if (!manifest) throw new NotIndexedError(root);
    if (filePaths?.length === 0) return [];

    const embedder = await this.options.embedders.embedder();
    assertCompatible(manifest, embedder.identity());
    const [vector] = await embedder.embedAll([query]);
    if (!vector) return [];

    const results = await this.options.store.query(
      manifest.collection,
      vector,
      topK,
      filePaths !== undefined ? { filePaths } : undefined,
    );
    return [...results].sort(compareResults).map((r) => ({ chunk: chunkFromMetadata(r.id, r.metadata), score: r.score }));
  }
}
