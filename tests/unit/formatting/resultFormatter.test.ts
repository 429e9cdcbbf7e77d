import { describe, it, expect } from 'vitest';
import {
  CHUNK_END_MARKER,
  CHUNK_START_MARKER,
  formatChunkContext,
  formatEmbeddingStatus,
  formatIndexReport,
  formatProjectMap,
  formatSearchResults,
} from '../../../src/formatting/resultFormatter.js';
import type { Chunk, ChunkContext, IndexReport, SearchHit, TopologyGraph } from '../../../src/types/context.types.js';

function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    id: 'c1',
    filePath: 'src/auth.ts',
    startLine: 3,
    endLine: 4,
    language: 'typescript',
    kind: 'function',
    symbolName: 'login',
    content: 'function login() {\n}',
    contentHash: 'h1',
    ...overrides,
  };
}

function hit(overrides: Partial<Chunk> = {}, score = 0.5): SearchHit {
  return { chunk: makeChunk(overrides), score };
}

const GUTTER = ' '.repeat(19);

describe('formatSearchResults', () => {
  it('returns empty string for no hits', () => {
    expect(formatSearchResults([], 'login')).toBe('');
  });

  it('renders each hit with its locator and escapes attributes', () => {
    const out = formatSearchResults([hit({ filePath: 'src/a&b.ts' })], 'say "hi"');

    expect(out).toBe(
      '<codebase_context query="say &quot;hi&quot;" results="1">\n' +
        '<result rank="1" id="c1" file="src/a&amp;b.ts" lines="3-4" language="typescript" kind="function" ' +
        'symbol="login" score="0.5000">\n' +
        'function login() {\n}\n' +
        '</result>\n' +
        '</codebase_context>',
    );
  });

  it('omits the symbol attribute for anonymous chunks', () => {
    const out = formatSearchResults([hit({ symbolName: null, kind: 'statement' })], 'q');

    expect(out).toContain('kind="statement" score="0.5000">');
  });

  it('keeps rank order', () => {
    const out = formatSearchResults([hit({ id: 'first' }, 0.9), hit({ id: 'second' }, 0.8)], 'q');

    expect(out.indexOf('id="first"')).toBeLessThan(out.indexOf('id="second"'));
    expect(out).toContain('<result rank="2" id="second"');
  });

  it('truncates long content at a line boundary', () => {
    const out = formatSearchResults([hit({ content: 'aaaa\nbbbb\ncccc' })], 'q', { maxCharsPerChunk: 10 });

    expect(out).toContain('>\naaaa\nbbbb\n... [truncated]\n</result>');
  });
});

describe('formatChunkContext', () => {
  function context(startLine: number, endLine: number, texts: string[]): ChunkContext {
    return {
      chunkId: 'c1',
      filePath: 'f.py',
      startLine,
      endLine,
      lines: texts.map((text, i) => ({ line: i + 1, text, inChunk: i + 1 >= startLine && i + 1 <= endLine })),
    };
  }

  it('marks the first and last chunk lines and indents the rest', () => {
    expect(formatChunkContext(context(2, 4, ['a', 'b', 'c', 'd', 'e']))).toBe(
      [
        'Context for f.py:1-5 (chunk at lines 2-4)',
        '',
        `${GUTTER}a`,
        `${CHUNK_START_MARKER}b`,
        `${GUTTER}c`,
        `${CHUNK_END_MARKER}d`,
        `${GUTTER}e`,
      ].join('\n'),
    );
  });

  it('puts both markers on a single-line chunk', () => {
    const lines = formatChunkContext(context(2, 2, ['a', 'b', 'c'])).split('\n');

    expect(lines[3]).toBe('>>> CHUNK START >>> b <<< CHUNK END <<<');
  });
});

describe('formatProjectMap', () => {
  it('lists components, representatives, files and relationships', () => {
    const graph: TopologyGraph = {
      projectRoot: '/work/shop',
      components: [
        {
          name: 'src/orders',
          chunkIds: ['o1', 'o2'],
          chunkCount: 2,
          files: ['src/orders/cart.ts'],
          languages: ['typescript'],
          representatives: [
            { chunkId: 'o1', filePath: 'src/orders/cart.ts', startLine: 1, endLine: 9, kind: 'class', symbolName: 'Cart' },
          ],
        },
        {
          name: 'sql',
          chunkIds: ['s1'],
          chunkCount: 1,
          files: ['sql/schema.sql'],
          languages: ['sql'],
          representatives: [
            { chunkId: 's1', filePath: 'sql/schema.sql', startLine: 1, endLine: 3, kind: 'statement', symbolName: null },
          ],
        },
      ],
      edges: [{ from: 'src/orders', to: 'sql', similarity: 0.61234 }],
    };

    expect(formatProjectMap(graph)).toBe(
      [
        '# Project map: shop',
        'Path: `/work/shop`',
        'Components: 2 | Chunks: 3',
        '',
        '## src/orders (2 chunks, 1 files, typescript)',
        'Representatives:',
        '  - `src/orders/cart.ts:1-9` Cart (class)',
        'Files:',
        '  - `src/orders/cart.ts`',
        '',
        '## sql (1 chunks, 1 files, sql)',
        'Representatives:',
        '  - `sql/schema.sql:1-3` (statement)',
        'Files:',
        '  - `sql/schema.sql`',
        '',
        '## Relationships',
        '  - **src/orders** <-> **sql** (similarity: 0.612)',
      ].join('\n'),
    );
  });
});

describe('formatIndexReport', () => {
  it('summarises counts and lists failed files', () => {
    const report: IndexReport = {
      projectRoot: '/work/shop',
      projectId: 'shop_1',
      mode: 'incremental',
      filesScanned: 3,
      filesIndexed: 1,
      filesUnchanged: 1,
      filesDeleted: 0,
      filesFailed: [{ path: 'b.py', error: { kind: 'BATCH_EMBEDDING_FAILURE', message: 'timed out' } }],
      chunksEmbedded: 2,
      chunksReused: 1,
      chunksDeleted: 1,
      totalChunks: 7,
      durationMs: 12,
    };

    expect(formatIndexReport(report)).toBe(
      'Updated /work/shop: 1 files indexed, 1 unchanged, 0 deleted; ' +
        '2 chunks embedded, 1 reused, 1 removed; 7 chunks total (12 ms)\n' +
        '  failed: b.py: timed out',
    );
  });
});

describe('formatEmbeddingStatus', () => {
  it('describes the active provider', () => {
    expect(formatEmbeddingStatus({ available: true, provider: 'ollama', model: 'nomic-embed-text', dimensions: 768 })).toBe(
      'Embedding provider: ollama (model: nomic-embed-text, dimensions: 768)',
    );
  });

  it('lists what was tried when nothing is available', () => {
    expect(
      formatEmbeddingStatus({ available: false, attempted: ['ollama', 'google'], message: 'no provider' }),
    ).toBe('No embedding provider available (tried ollama, google): no provider');
  });
});
