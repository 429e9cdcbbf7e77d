import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ChunkMetadata, QueryFilter, StoredVector, VectorQueryResult, VectorStore } from './vectorStore.js';
import { chunkMetadataSchema } from './vectorStore.js';

interface VectorRow {
  id: string;
  embedding: Buffer;
  metadata: string;
}

interface QueryRow {
  id: string;
  metadata: string;
  distance: number;
}

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

function fromBlob(blob: Buffer): Float32Array {
  // copy: the Buffer may not be 4-byte aligned
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / Float32Array.BYTES_PER_ELEMENT);
}

function parseMetadata(raw: string): ChunkMetadata {
  return chunkMetadataSchema.parse(JSON.parse(raw));
}

/**
 * Persistent store on better-sqlite3. Vectors are float32 BLOBs ranked with
 * sqlite-vec's `vec_distance_cosine`; score = 1 - distance.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;

  constructor(dbPath = ':memory:') {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    sqliteVec.load(this.db);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name       TEXT PRIMARY KEY,
        dimensions INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS vectors (
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        id         TEXT NOT NULL,
        file_path  TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        embedding  BLOB NOT NULL,
        metadata   TEXT NOT NULL,
        PRIMARY KEY (collection, id)
      );
      CREATE INDEX IF NOT EXISTS vectors_by_file ON vectors(collection, file_path);
    `);
  }

  async createOrGetCollection(name: string, dimensions: number): Promise<void> {
    const existing = this.dimensionsOf(name);
    if (existing === undefined) {
      this.db.prepare<[string, number]>('INSERT INTO collections(name, dimensions) VALUES (?, ?)').run(name, dimensions);
    } else if (existing !== dimensions) {
      throw new Error(`Collection ${name} has dimension ${existing}, requested ${dimensions}`);
    }
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.dimensionsOf(name) !== undefined;
  }

  async upsert(collection: string, id: string, vector: Float32Array, metadata: ChunkMetadata): Promise<void> {
    const dimensions = this.dimensionsOf(collection);
    if (dimensions === undefined) throw new Error(`Unknown collection: ${collection}`);
    if (vector.length !== dimensions) {
      throw new Error(`Vector dimension mismatch: expected ${dimensions}, got ${vector.length}`);
    }
    this.db
      .prepare<[string, string, string, number, Buffer, string]>(
        `INSERT OR REPLACE INTO vectors(collection, id, file_path, start_line, embedding, metadata)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(collection, id, metadata.filePath, metadata.startLine, toBlob(vector), JSON.stringify(metadata));
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const remove = this.db.prepare<[string, string]>('DELETE FROM vectors WHERE collection = ? AND id = ?');
    this.db.transaction((list: string[]) => {
      for (const id of list) remove.run(collection, id);
    })(ids);
  }

  async query(
    collection: string,
    vector: Float32Array,
    topK: number,
    filter?: QueryFilter,
  ): Promise<VectorQueryResult[]> {
    const filePaths = filter?.filePaths;
    if (vector.length === 0 || filePaths?.length === 0) return [];
    const sql = `
      SELECT id, metadata, vec_distance_cosine(embedding, ?) AS distance
      FROM vectors
      WHERE collection = ?${filePaths ? ' AND file_path IN (SELECT value FROM json_each(?))' : ''}
      ORDER BY distance, file_path, start_line
      LIMIT ?`;
    const params: (Buffer | string | number)[] = [toBlob(vector), collection];
    if (filePaths) params.push(JSON.stringify(filePaths));
    params.push(topK);

    const rows = this.db.prepare<(Buffer | string | number)[], QueryRow>(sql).all(...params);
    return rows.map((row) => ({ id: row.id, score: 1 - row.distance, metadata: parseMetadata(row.metadata) }));
  }

  async get(collection: string, ids?: string[]): Promise<StoredVector[]> {
    let rows: VectorRow[];
    if (ids === undefined) {
      rows = this.db
        .prepare<[string], VectorRow>(
          'SELECT id, embedding, metadata FROM vectors WHERE collection = ? ORDER BY file_path, start_line, id',
        )
        .all(collection);
    } else {
      const one = this.db.prepare<[string, string], VectorRow>(
        'SELECT id, embedding, metadata FROM vectors WHERE collection = ? AND id = ?',
      );
      rows = ids.flatMap((id) => {
        const row = one.get(collection, id);
        return row ? [row] : [];
      });
    }
    return rows.map((row) => ({ id: row.id, vector: fromBlob(row.embedding), metadata: parseMetadata(row.metadata) }));
  }

  async ids(collection: string): Promise<string[]> {
    return this.db
      .prepare<[string], { id: string }>('SELECT id FROM vectors WHERE collection = ?')
      .all(collection)
      .map((row) => row.id);
  }

  async deleteCollection(name: string): Promise<void> {
    this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM vectors WHERE collection = ?').run(name);
      this.db.prepare<[string]>('DELETE FROM collections WHERE name = ?').run(name);
    })();
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private dimensionsOf(name: string): number | undefined {
    return this.db
      .prepare<[string], { dimensions: number }>('SELECT dimensions FROM collections WHERE name = ?')
      .get(name)?.dimensions;
  }
}
