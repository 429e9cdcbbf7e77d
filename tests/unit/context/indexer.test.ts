import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Indexer } from '../../../src/context/indexer.js';
import { ProviderRegistry } from '../../../src/context/embedders/providerRegistry.js';
import { EmbeddingCompatibilityError } from '../../../src/errors/embedding.js';
import { NotIndexedError, StoreWriteError } from '../../../src/errors/context.js';
import { collectionName, projectIdFor } from '../../../src/context/hashing.js';
import { createHarness, A_PY, B_PY } from '../../fixtures/indexerHarness.js';
import type { Harness } from '../../fixtures/indexerHarness.js';
import { DEFAULT_VOCABULARY, KeywordEmbeddingProvider } from '../../fixtures/keywordEmbeddingProvider.js';

describe('Indexer', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness({ 'a.py': A_PY, 'b.py': B_PY });
  });

  afterEach(async () => {
    await h.cleanup();
  });

  describe('indexFull', () => {
    it('indexes every file and writes a consistent manifest', async () => {
      const report = await h.indexer.indexFull(h.root);

      expect(report).toMatchObject({
        mode: 'full',
        filesScanned: 2,
        filesIndexed: 2,
        chunksEmbedded: 3,
        chunksReused: 0,
        totalChunks: 3,
        filesFailed: [],
      });
      const manifest = await h.indexer.requireManifest(h.root);
      expect(manifest.generation).toBe(1);
      expect(Object.keys(manifest.files).sort()).toEqual(['a.py', 'b.py']);
      expect(manifest.embedding).toEqual({ provider: 'ollama', model: 'keyword-test', dimensions: 9 });
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('embeds the contextual header with each chunk', async () => {
      await h.indexer.indexFull(h.root);

      expect(h.provider.batches[0]).toEqual([
        'File: a.py\nLanguage: python\nSymbol: f\n\ndef f():\n    return 1',
        'File: a.py\nLanguage: python\nSymbol: g\n\ndef g():\n    return 2',
      ]);
    });

    it('swaps to a new generation and copies unchanged vectors', async () => {
      const first = await h.indexer.indexFull(h.root);
      const oldCollection = (await h.indexer.requireManifest(h.root)).collection;

      const second = await h.indexer.indexFull(h.root);

      expect(second).toMatchObject({ chunksEmbedded: 0, chunksReused: 3, totalChunks: 3 });
      const manifest = await h.indexer.requireManifest(h.root);
      expect(manifest.generation).toBe(2);
      expect(manifest.collection).toBe(oldCollection.replace(/__g1$/, '__g2'));
      expect(await h.store.hasCollection(oldCollection)).toBe(false);
      expect(h.provider.embeddedCount).toBe(first.chunksEmbedded);
    });

    it('re-embeds everything on reset', async () => {
      await h.indexer.indexFull(h.root);
      const report = await h.indexer.indexFull(h.root, { reset: true });

      expect(report).toMatchObject({ chunksEmbedded: 3, chunksReused: 0 });
      expect(h.provider.embeddedCount).toBe(6);
    });

    it('skips excluded directories and gitignored files', async () => {
      await h.write('node_modules/dep/index.js', 'module.exports = 1;\n');
      await h.write('build/out.py', 'x = 1\n');
      await h.write('.gitignore', 'build/\n');
      await h.write('logo.png', 'not really an image');

      const report = await h.indexer.indexFull(h.root);

      expect(report.filesScanned).toBe(2);
      expect(Object.keys((await h.indexer.requireManifest(h.root)).files).sort()).toEqual(['a.py', 'b.py']);
    });

    it('records a provider failure against the file and indexes the rest', async () => {
      h.provider.failNext = 1;

      const report = await h.indexer.indexFull(h.root);

      expect(report.filesIndexed).toBe(1);
      expect(report.filesFailed).toEqual([
        {
          path: 'a.py',
          error: {
            kind: 'BATCH_EMBEDDING_FAILURE',
            message: 'Embedding batch failed after 1 attempt(s): keyword embedder failure',
          },
        },
      ]);
      const manifest = await h.indexer.requireManifest(h.root);
      expect(Object.keys(manifest.files)).toEqual(['b.py']);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('keeps the previous index when a store write fails', async () => {
      await h.indexer.indexFull(h.root);
      const before = await h.indexer.requireManifest(h.root);
      vi.spyOn(h.store, 'upsert').mockRejectedValueOnce(new Error('disk full'));

      await expect(h.indexer.indexFull(h.root)).rejects.toBeInstanceOf(StoreWriteError);

      expect(await h.indexer.requireManifest(h.root)).toEqual(before);
      expect(await h.store.hasCollection(before.collection.replace(/__g1$/, '__g2'))).toBe(false);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('refuses to mix providers without reset', async () => {
      await h.indexer.indexFull(h.root);
      const other = new KeywordEmbeddingProvider('ollama', DEFAULT_VOCABULARY, 'other-model');
      const indexer = new Indexer({
        config: h.config,
        store: h.store,
        manifests: h.manifests,
        embedders: new ProviderRegistry(h.config.embedding, {}, () => other),
      });

      await expect(indexer.indexFull(h.root)).rejects.toBeInstanceOf(EmbeddingCompatibilityError);
      await expect(indexer.indexIncremental(h.root, ['a.py'])).rejects.toBeInstanceOf(EmbeddingCompatibilityError);

      await h.write('a.py', A_PY.replace('return 2', 'return 22'));
      await expect(indexer.indexIncremental(h.root, ['a.py'])).rejects.toBeInstanceOf(EmbeddingCompatibilityError);

      const reset = await indexer.indexFull(h.root, { reset: true });
      expect(reset.chunksEmbedded).toBe(3);
      expect((await indexer.requireManifest(h.root)).embedding.model).toBe('other-model');
    });

    it('rejects deletions under a switched provider without touching the index', async () => {
      await h.indexer.indexFull(h.root);
      const before = await h.indexer.requireManifest(h.root);
      const other = new KeywordEmbeddingProvider('ollama', DEFAULT_VOCABULARY, 'other-model');
      const indexer = new Indexer({
        config: h.config,
        store: h.store,
        manifests: h.manifests,
        embedders: new ProviderRegistry(h.config.embedding, {}, () => other),
      });
      await h.remove('b.py');

      await expect(indexer.indexIncremental(h.root, [], ['b.py'])).rejects.toBeInstanceOf(EmbeddingCompatibilityError);

      expect(await h.indexer.requireManifest(h.root)).toEqual(before);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });
  });

  describe('indexIncremental', () => {
    beforeEach(async () => {
      await h.indexer.indexFull(h.root);
    });

    it('requires an indexed project', async () => {
      const other = await createHarness({ 'x.py': B_PY });
      try {
        await expect(other.indexer.indexIncremental(other.root, ['x.py'])).rejects.toBeInstanceOf(NotIndexedError);
      } finally {
        await other.cleanup();
      }
    });

    it('skips files whose content hash is unchanged', async () => {
      const report = await h.indexer.indexIncremental(h.root, ['a.py', 'b.py']);

      expect(report).toMatchObject({ filesScanned: 2, filesUnchanged: 2, filesIndexed: 0 });
      expect(h.provider.embeddedCount).toBe(3);
    });

    it('re-embeds only the chunks that changed', async () => {
      await h.write('a.py', A_PY.replace('return 2', 'return 20'));

      const report = await h.indexer.indexIncremental(h.root, ['a.py']);

      expect(report).toMatchObject({ filesIndexed: 1, chunksEmbedded: 1, chunksDeleted: 1, totalChunks: 3 });
      expect(h.provider.batches[h.provider.batches.length - 1]).toEqual([
        'File: a.py\nLanguage: python\nSymbol: g\n\ndef g():\n    return 20',
      ]);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('reuses vectors for code that moved within the file', async () => {
      await h.write('a.py', 'def g():\n    return 2\n\n\ndef f():\n    return 1\n');

      const report = await h.indexer.indexIncremental(h.root, [`${h.root}/a.py`]);

      expect(report).toMatchObject({ chunksEmbedded: 0, chunksReused: 2, chunksDeleted: 2 });
      expect(h.provider.embeddedCount).toBe(3);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('re-embeds moved code whose slice name changed', async () => {
      const sliced = new Indexer({
        config: { ...h.config, chunking: { ...h.config.chunking, maxDefinitionLines: 2, maxChunkLines: 3 } },
        store: h.store,
        manifests: h.manifests,
        embedders: h.registry,
      });
      const head = ['def big():', '    a = 1', '    b = 2'];
      const tail = ['    c = 3', '    d = 4', '    return a'];
      await h.write('big.py', [...head, ...tail].join('\n'));
      await sliced.indexFull(h.root);

      await h.write('big.py', [...head, '    p = 7', '    q = 8', '    r = 9', ...tail].join('\n'));
      const report = await sliced.indexIncremental(h.root, ['big.py']);

      expect(report).toMatchObject({ chunksEmbedded: 2, chunksReused: 0, chunksDeleted: 1 });
      expect(h.provider.batches[h.provider.batches.length - 1]).toEqual([
        'File: big.py\nLanguage: python\nSymbol: big[1]\n\n    p = 7\n    q = 8\n    r = 9',
        'File: big.py\nLanguage: python\nSymbol: big[2]\n\n    c = 3\n    d = 4\n    return a',
      ]);
    });

    it('treats explicit deletions and missing files alike', async () => {
      await h.remove('b.py');

      const report = await h.indexer.indexIncremental(h.root, ['b.py']);

      expect(report).toMatchObject({ filesDeleted: 1, chunksDeleted: 1, totalChunks: 2 });
      expect(Object.keys((await h.indexer.requireManifest(h.root)).files)).toEqual(['a.py']);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('drops files that became gitignored', async () => {
      await h.write('.gitignore', 'b.py\n');

      const report = await h.indexer.indexIncremental(h.root, ['b.py']);

      expect(report.filesDeleted).toBe(1);
    });

    it('indexes a newly created file', async () => {
      await h.write('lib/c.py', 'def parse():\n    return 4\n');

      const report = await h.indexer.indexIncremental(h.root, ['lib/c.py']);

      expect(report).toMatchObject({ filesIndexed: 1, chunksEmbedded: 1, totalChunks: 4 });
    });

    it('ignores paths outside the project root', async () => {
      const report = await h.indexer.indexIncremental(h.root, ['../elsewhere.py', '/tmp/not-here.py']);
      expect(report.filesScanned).toBe(0);
    });

    it('leaves the manifest entry untouched when embedding fails', async () => {
      const before = (await h.indexer.requireManifest(h.root)).files['a.py'];
      await h.write('a.py', A_PY.replace('return 2', 'return 20'));
      h.provider.failNext = 1;

      const report = await h.indexer.indexIncremental(h.root, ['a.py']);

      expect(report.filesFailed.map((f) => f.path)).toEqual(['a.py']);
      expect((await h.indexer.requireManifest(h.root)).files['a.py']).toEqual(before);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('rolls back a partially written file on store failure', async () => {
      await h.write('a.py', 'def f():\n    return 10\n\n\ndef g():\n    return 20\n');
      const upsert = h.store.upsert.bind(h.store);
      vi.spyOn(h.store, 'upsert').mockImplementationOnce(upsert).mockRejectedValueOnce(new Error('disk full'));

      await expect(h.indexer.indexIncremental(h.root, ['a.py'])).rejects.toBeInstanceOf(StoreWriteError);

      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });

    it('records ids it cannot roll back and removes them on the next pass', async () => {
      await h.write('a.py', 'def f():\n    return 10\n\n\ndef g():\n    return 20\n');
      const upsert = h.store.upsert.bind(h.store);
      vi.spyOn(h.store, 'upsert').mockImplementationOnce(upsert).mockRejectedValueOnce(new Error('disk full'));
      vi.spyOn(h.store, 'delete').mockRejectedValueOnce(new Error('disk full'));

      await expect(h.indexer.indexIncremental(h.root, ['a.py'])).rejects.toBeInstanceOf(StoreWriteError);

      const manifest = await h.indexer.requireManifest(h.root);
      expect(manifest.orphanedChunkIds).toHaveLength(1);
      expect((await h.indexer.verify(h.root)).extraInStore).toEqual(manifest.orphanedChunkIds);

      await h.indexer.indexIncremental(h.root, []);

      expect((await h.indexer.requireManifest(h.root)).orphanedChunkIds).toEqual([]);
      expect((await h.indexer.verify(h.root)).consistent).toBe(true);
    });
  });

  describe('project management', () => {
    it('lists indexed projects with counts', async () => {
      await h.indexer.indexFull(h.root);

      const [summary, ...rest] = await h.indexer.listProjects();

      expect(rest).toEqual([]);
      expect(summary).toMatchObject({
        projectRoot: h.root,
        files: 2,
        chunks: 3,
        embedding: { provider: 'ollama', model: 'keyword-test', dimensions: 9 },
      });
    });

    it('removes a project and its collection', async () => {
      await h.indexer.indexFull(h.root);
      const { collection } = await h.indexer.requireManifest(h.root);

      expect(await h.indexer.removeProject(h.root)).toBe(true);
      expect(await h.indexer.removeProject(h.root)).toBe(false);
      expect(await h.store.hasCollection(collection)).toBe(false);
      expect(await h.indexer.listProjects()).toEqual([]);
    });

    it('removes after queued passes and before passes requested during removal', async () => {
      const full = h.indexer.indexFull(h.root);
      const removal = h.indexer.removeProject(h.root);
      const later = expect(h.indexer.indexIncremental(h.root, ['a.py'])).rejects.toBeInstanceOf(NotIndexedError);

      await expect(full).resolves.toMatchObject({ totalChunks: 3 });
      await expect(removal).resolves.toBe(true);
      await later;
      expect(await h.indexer.loadManifest(h.root)).toBeNull();
      expect(await h.store.hasCollection(collectionName(projectIdFor(h.root), 1))).toBe(false);
    });

    it('verify reports missing and extra ids', async () => {
      await h.indexer.indexFull(h.root);
      const manifest = await h.indexer.requireManifest(h.root);
      const [victim] = manifest.files['b.py']?.chunks ?? [];
      await h.store.delete(manifest.collection, [victim?.id ?? '']);

      const report = await h.indexer.verify(h.root);

      expect(report).toEqual({
        projectRoot: h.root,
        consistent: false,
        missingFromStore: [victim?.id],
        extraInStore: [],
      });
    });

    it('drain waits for passes that were not awaited', async () => {
      const pending = h.indexer.indexFull(h.root);

      await h.indexer.drain();

      expect(await h.indexer.loadManifest(h.root)).not.toBeNull();
      await expect(pending).resolves.toMatchObject({ totalChunks: 3 });
    });
  });
});
