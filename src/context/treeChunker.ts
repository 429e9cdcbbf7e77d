import type { Chunk, SymbolKind } from '../types/context.types.js';
import type { ChunkingConfig } from '../types/config.types.js';
import type { SyntaxParser, SyntaxUnit } from './syntax/syntaxUnit.js';
import { isBlank } from './syntax/syntaxUnit.js';
import { TypeScriptSyntaxParser } from './syntax/typescriptSyntax.js';
import { PythonSyntaxParser } from './syntax/pythonSyntax.js';
import { SqlSyntaxParser } from './syntax/sqlSyntax.js';
import { JAVA_GRAMMAR, KOTLIN_GRAMMAR, TreeSitterSyntaxParser } from './syntax/treeSitterSyntax.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ChunkingError } from '../errors/context.js';
import { chunkId, contentHash } from './hashing.js';
import { logger } from '../logging/logger.js';

export interface SourceFile {
  /** Project-relative, POSIX separators. */
  path: string;
  contents: string;
  language: string;
}

export interface Chunker {
  chunk(file: SourceFile): Chunk[];
}

const typescriptParser = new TypeScriptSyntaxParser();

const LANGUAGE_PARSERS: Record<string, SyntaxParser> = {
  typescript: typescriptParser,
  javascript: typescriptParser,
  python: new PythonSyntaxParser(),
  sql: new SqlSyntaxParser(),
  java: new TreeSitterSyntaxParser(JAVA_GRAMMAR),
  kotlin: new TreeSitterSyntaxParser(KOTLIN_GRAMMAR),
};

export const AST_LANGUAGES: ReadonlySet<string> = new Set(Object.keys(LANGUAGE_PARSERS));

/**
 * Splits on `\n` only, so a CRLF file keeps its `\r` in every line. The empty
 * string after a final newline is not a line.
 */
export function splitLines(contents: string): string[] {
  if (contents === '') return [];
  const lines = contents.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function buildChunk(
  file: SourceFile,
  lines: string[],
  start: number,
  end: number,
  kind: SymbolKind,
  symbolName: string | null,
  summary?: string,
): Chunk {
  const content = lines.slice(start, end + 1).join('\n');
  const hash = contentHash(content);
  return {
    id: chunkId(file.path, start + 1, end + 1, hash),
    filePath: file.path,
    startLine: start + 1,
    endLine: end + 1,
    language: file.language,
    kind,
    symbolName,
    content,
    contentHash: hash,
    ...(summary !== undefined && { summary }),
  };
}

/** Fixed-size overlapping windows for languages without a parser, and for files that fail to parse. */
export class TextChunker implements Chunker {
  constructor(
    private readonly options: Pick<ChunkingConfig, 'windowLines' | 'overlapLines'> = DEFAULT_CONFIG.chunking,
  ) {}

  chunk(file: SourceFile): Chunk[] {
    const lines = splitLines(file.contents);
    const { windowLines, overlapLines } = this.options;
    const step = Math.max(1, windowLines - overlapLines);
    const chunks: Chunk[] = [];

    for (let start = 0; start < lines.length; start += step) {
      const end = Math.min(start + windowLines, lines.length) - 1;
      if (lines.slice(start, end + 1).some((l) => !isBlank(l))) {
        chunks.push(buildChunk(file, lines, start, end, 'unknown', null));
      }
      if (end >= lines.length - 1) break;
    }
    return chunks;
  }
}

/** Sorts units and folds any that share a line into their predecessor. */
function normalizeUnits(units: SyntaxUnit[]): SyntaxUnit[] {
  const sorted = [...units].sort((a, b) => a.startLine - b.startLine || a.endLine - b.endLine);
  const result: SyntaxUnit[] = [];
  for (const unit of sorted) {
    const prev = result[result.length - 1];
    if (prev && unit.startLine <= prev.endLine) {
      if (unit.endLine > prev.endLine) {
        result[result.length - 1] = { ...prev, endLine: unit.endLine, signatureEndLine: unit.endLine, children: [] };
      }
      continue;
    }
    result.push(unit);
  }
  return result;
}

class ChunkAssembler {
  private readonly chunks: Chunk[] = [];

  constructor(
    private readonly file: SourceFile,
    private readonly lines: string[],
    private readonly options: ChunkingConfig,
  ) {}

  assemble(parsed: SyntaxUnit[]): Chunk[] {
    const units = normalizeUnits(parsed);
    let run: { start: number; end: number } | null = null;
    let cursor = 0;

    const flushRun = (): void => {
      if (run) this.emitSpan(run.start, run.end, 'statement', null);
      run = null;
    };
    const addStatement = (start: number, end: number): void => {
      if (run && start - run.end - 1 < this.options.statementGapLines) {
        run.end = end;
        return;
      }
      flushRun();
      run = { start, end };
    };
    // lines no parser claimed (stray comments, directives) join the statement runs
    const addUncovered = (from: number, to: number): void => {
      for (let i = from; i <= to; i++) {
        if (!isBlank(this.lines[i])) addStatement(i, i);
      }
    };

    for (const unit of units) {
      addUncovered(cursor, unit.startLine - 1);
      if (unit.kind === 'statement') {
        addStatement(unit.startLine, unit.endLine);
      } else {
        flushRun();
        this.emitDefinition(unit, null);
      }
      cursor = unit.endLine + 1;
    }
    addUncovered(cursor, this.lines.length - 1);
    flushRun();

    return this.chunks;
  }

  private emitDefinition(unit: SyntaxUnit, parentName: string | null): void {
    const name = parentName && unit.name ? `${parentName}.${unit.name}` : unit.name;
    const length = unit.endLine - unit.startLine + 1;
    const children = normalizeUnits(
      unit.children.filter((c) => c.startLine > unit.signatureEndLine && c.endLine <= unit.endLine),
    );

    if (length <= this.options.maxDefinitionLines) {
      this.chunks.push(buildChunk(this.file, this.lines, unit.startLine, unit.endLine, unit.symbolKind, name));
      return;
    }
    if (children.length === 0) {
      this.emitSpan(unit.startLine, unit.endLine, unit.symbolKind, name);
      return;
    }

    const childNames = children.map((c) => c.name ?? '?').join(', ');
    const summary =
      `${name ?? 'definition'}: body of ${length} lines split into ${children.length} nested ` +
      `definition(s) indexed separately (${childNames})`;
    this.chunks.push(
      buildChunk(this.file, this.lines, unit.startLine, unit.signatureEndLine, unit.symbolKind, name, summary),
    );

    let cursor = unit.signatureEndLine + 1;
    for (const child of children) {
      this.emitBlock(cursor, child.startLine - 1, name);
      this.emitDefinition(child, name);
      cursor = child.endLine + 1;
    }
    this.emitBlock(cursor, unit.endLine, name);
  }

  /** Leftover body lines between nested definitions. Punctuation-only remnants are dropped. */
  private emitBlock(from: number, to: number, name: string | null): void {
    let start = from;
    let end = to;
    while (start <= end && isBlank(this.lines[start])) start++;
    while (end >= start && isBlank(this.lines[end])) end--;
    if (start > end) return;
    if (!this.lines.slice(start, end + 1).some((l) => /[A-Za-z0-9]/.test(l))) return;
    this.emitSpan(start, end, 'block', name);
  }

  /**
   * One chunk, or consecutive non-overlapping slices named `name[i]` when longer
   * than `maxChunkLines`. Definitions only get here once they exceed `maxDefinitionLines`.
   */
  private emitSpan(start: number, end: number, kind: SymbolKind, name: string | null): void {
    const max = this.options.maxChunkLines;
    if (end - start + 1 <= max) {
      this.chunks.push(buildChunk(this.file, this.lines, start, end, kind, name));
      return;
    }
    let part = 0;
    for (let s = start; s <= end; s += max) {
      const e = Math.min(s + max - 1, end);
      this.chunks.push(buildChunk(this.file, this.lines, s, e, kind, name === null ? null : `${name}[${part}]`));
      part++;
    }
  }
}

/**
 * Boundary-aware chunking for TypeScript/JavaScript, Python, SQL, Java and
 * Kotlin. Any other language, or a file its parser rejects, gets sliding
 * windows.
 */
export class TreeChunker implements Chunker {
  private readonly fallback: TextChunker;

  constructor(private readonly options: ChunkingConfig = DEFAULT_CONFIG.chunking) {
    this.fallback = new TextChunker(options);
  }

  chunk(file: SourceFile): Chunk[] {
    const parser = LANGUAGE_PARSERS[file.language];
    if (!parser) return this.fallback.chunk(file);

    const lines = splitLines(file.contents);
    if (lines.length === 0) return [];

    let units: SyntaxUnit[];
    try {
      units = parser.parse(file.path, file.contents, lines);
    } catch (err) {
      if (err instanceof ChunkingError) {
        logger.debug(`${err.message}; falling back to sliding windows`);
        return this.fallback.chunk(file);
      }
      throw err;
    }

    return new ChunkAssembler(file, lines, this.options).assemble(units);
  }
}

export function getChunker(language: string, options: ChunkingConfig = DEFAULT_CONFIG.chunking): Chunker {
  if (AST_LANGUAGES.has(language)) {
    return new TreeChunker(options);
  }
  return new TextChunker(options);
}
