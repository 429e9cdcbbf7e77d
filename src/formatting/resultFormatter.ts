import { basename } from 'node:path';
import type {
  ChunkContext,
  EmbeddingStatus,
  IndexReport,
  ProjectSummary,
  SearchHit,
  TopologyGraph,
} from '../types/context.types.js';

export interface FormatOptions {
  maxCharsPerChunk?: number;
}

export const CHUNK_START_MARKER = '>>> CHUNK START >>> ';
export const CHUNK_END_MARKER = '<<< CHUNK END <<<   ';
const GUTTER = ' '.repeat(19);

function escapeAttr(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Cuts at the last line boundary before `maxChars`. */
function truncate(content: string, maxChars: number): string {
  if (content.length <= maxChars) return content;
  const lastNewline = content.lastIndexOf('\n', maxChars);
  return (lastNewline > 0 ? content.slice(0, lastNewline) : content.slice(0, maxChars)) + '\n... [truncated]';
}

/**
 * Formats search hits into a <codebase_context> XML block, in rank order.
 * Returns empty string when hits is empty; the caller decides the fallback text.
 */
export function formatSearchResults(hits: SearchHit[], query: string, options: FormatOptions = {}): string {
  if (hits.length === 0) return '';
  const maxChars = options.maxCharsPerChunk ?? 2000;

  const resultBlocks = hits
    .map(({ chunk, score }, i) => {
      const symbolAttr = chunk.symbolName ? ` symbol="${escapeAttr(chunk.symbolName)}"` : '';
      return (
        `<result rank="${i + 1}" id="${chunk.id}" file="${escapeAttr(chunk.filePath)}" ` +
        `lines="${chunk.startLine}-${chunk.endLine}" language="${chunk.language}" kind="${chunk.kind}"` +
        `${symbolAttr} score="${score.toFixed(4)}">\n` +
        `${truncate(chunk.content, maxChars)}\n` +
        `</result>`
      );
    })
    .join('\n');

  return `<codebase_context query="${escapeAttr(query)}" results="${hits.length}">\n${resultBlocks}\n</codebase_context>`;
}

/** The expanded range with the chunk's first and last lines marked. */
export function formatChunkContext(context: ChunkContext): string {
  const { startLine, endLine, lines } = context;
  const first = lines[0]?.line ?? startLine;
  const last = lines[lines.length - 1]?.line ?? endLine;
  const body = lines.map(({ line, text }) => {
    if (line === startLine && line === endLine) return `${CHUNK_START_MARKER}${text} <<< CHUNK END <<<`;
    if (line === startLine) return `${CHUNK_START_MARKER}${text}`;
    if (line === endLine) return `${CHUNK_END_MARKER}${text}`;
    return `${GUTTER}${text}`;
  });
  return [
    `Context for ${context.filePath}:${first}-${last} (chunk at lines ${startLine}-${endLine})`,
    '',
    ...body,
  ].join('\n');
}

export function formatProjectMap(graph: TopologyGraph): string {
  const chunkTotal = graph.components.reduce((n, c) => n + c.chunkCount, 0);
  const out = [
    `# Project map: ${basename(graph.projectRoot)}`,
    `Path: \`${graph.projectRoot}\``,
    `Components: ${graph.components.length} | Chunks: ${chunkTotal}`,
  ];

  for (const component of graph.components) {
    const langs = component.languages.length > 0 ? component.languages.join(', ') : 'none';
    out.push('', `## ${component.name} (${component.chunkCount} chunks, ${component.files.length} files, ${langs})`);
    if (component.representatives.length > 0) {
      out.push('Representatives:');
      for (const r of component.representatives) {
        const label = r.symbolName ? ` ${r.symbolName} (${r.kind})` : ` (${r.kind})`;
        out.push(`  - \`${r.filePath}:${r.startLine}-${r.endLine}\`${label}`);
      }
    }
    if (component.files.length > 0) {
      out.push('Files:');
      for (const file of component.files) out.push(`  - \`${file}\``);
    }
  }

  if (graph.edges.length > 0) {
    out.push('', '## Relationships');
    for (const edge of graph.edges) {
      out.push(`  - **${edge.from}** <-> **${edge.to}** (similarity: ${edge.similarity.toFixed(3)})`);
    }
  }
  return out.join('\n');
}

export function formatIndexReport(report: IndexReport): string {
  const out = [
    `${report.mode === 'full' ? 'Indexed' : 'Updated'} ${report.projectRoot}: ` +
      `${report.filesIndexed} files indexed, ${report.filesUnchanged} unchanged, ${report.filesDeleted} deleted; ` +
      `${report.chunksEmbedded} chunks embedded, ${report.chunksReused} reused, ${report.chunksDeleted} removed; ` +
      `${report.totalChunks} chunks total (${report.durationMs} ms)`,
  ];
  for (const failure of report.filesFailed) {
    out.push(`  failed: ${failure.path}: ${failure.error.message}`);
  }
  return out.join('\n');
}

export function formatProjects(projects: ProjectSummary[]): string {
  if (projects.length === 0) return 'No indexed projects.';
  return projects
    .map(
      (p) =>
        `${p.projectRoot}\n  ${p.files} files, ${p.chunks} chunks, ` +
        `${p.embedding.provider}/${p.embedding.model} (${p.embedding.dimensions}d), updated ${p.updatedAt}`,
    )
    .join('\n');
}

export function formatEmbeddingStatus(status: EmbeddingStatus): string {
  if (status.available) {
    return `Embedding provider: ${status.provider} (model: ${status.model}, dimensions: ${status.dimensions})`;
  }
  return `No embedding provider available (tried ${status.attempted.join(', ')}): ${status.message}`;
}
