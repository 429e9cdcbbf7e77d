import type { ChunkMetadata, QueryFilter, StoredVector, VectorQueryResult, VectorStore } from './vectorStore.js';
import { compareResults } from './vectorStore.js';
import { cosineSimilarity } from './vectorMath.js';

interface Collection {
  dimensions: number;
  entries: Map<string, StoredVector>;
}

/** Process-local store for tests and `store: "memory"`; nothing survives a restart. */
export class MemoryVectorStore implements VectorStore {
  private collections = new Map<string, Collection>();

  async createOrGetCollection(name: string, dimensions: number): Promise<void> {
    const existing = this.collections.get(name);
    if (existing) {
      if (existing.dimensions !== dimensions) {
        throw new Error(`Collection ${name} has dimension ${existing.dimensions}, requested ${dimensions}`);
      }
      return;
    }
    this.collections.set(name, { dimensions, entries: new Map() });
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async upsert(collection: string, id: string, vector: Float32Array, metadata: ChunkMetadata): Promise<void> {
    const target = this.require(collection);
    if (vector.length !== target.dimensions) {
      throw new Error(`Vector dimension mismatch: expected ${target.dimensions}, got ${vector.length}`);
    }
    target.entries.set(id, { id, vector: Float32Array.from(vector), metadata: { ...metadata } });
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    const target = this.collections.get(collection);
    if (!target) return;
    for (const id of ids) target.entries.delete(id);
  }

  async query(
    collection: string,
    vector: Float32Array,
    topK: number,
    filter?: QueryFilter,
  ): Promise<VectorQueryResult[]> {
    const target = this.collections.get(collection);
    if (!target || vector.length === 0) return [];
    const allowed = filter?.filePaths ? new Set(filter.filePaths) : null;

    const results: VectorQueryResult[] = [];
    for (const entry of target.entries.values()) {
      if (allowed && !allowed.has(entry.metadata.filePath)) continue;
      results.push({ id: entry.id, score: cosineSimilarity(vector, entry.vector), metadata: entry.metadata });
    }
    results.sort(compareResults);
    return results.slice(0, topK);
  }

  async get(collection: string, ids?: string[]): Promise<StoredVector[]> {
    const target = this.collections.get(collection);
    if (!target) return [];
    if (!ids) return [...target.entries.values()];
    return ids.flatMap((id) => {
      const entry = target.entries.get(id);
      return entry ? [entry] : [];
    });
  }

  async ids(collection: string): Promise<string[]> {
    return [...(this.collections.get(collection)?.entries.keys() ?? [])];
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  private require(name: string): Collection {
    const target = this.collections.get(name);
    if (!target) throw new Error(`Unknown collection: ${name}`);
    return target;
  }
}
