import type { SymbolKind } from '../../types/context.types.js';
import type { SyntaxParser, SyntaxUnit } from './syntaxUnit.js';
import { attachLeadingComments, isBlank } from './syntaxUnit.js';
import { ChunkingError } from '../../errors/context.js';

interface LogicalLine {
  /** First and last physical line, 0-based. */
  start: number;
  end: number;
  indent: number;
  head: string;
  isComment: boolean;
  /** Last significant character outside strings and comments. */
  lastCode: string;
}

type Scope = 'top' | 'class' | 'function';

const DEF_RE = /^(?:async\s+)?def\s+([A-Za-z_]\w*)/;
const CLASS_RE = /^class\s+([A-Za-z_]\w*)/;

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

function indentOf(line: string): number {
  let n = 0;
  for (const ch of line) {
    if (ch === ' ') n++;
    else if (ch === '\t') n += 8 - (n % 8);
    else break;
  }
  return n;
}

const isCommentLine = (line: string): boolean => line.trimStart().startsWith('#');

/**
 * Groups physical lines into logical lines, following open brackets,
 * triple-quoted strings and backslash continuations.
 */
function logicalLines(filePath: string, lines: string[]): LogicalLine[] {
  const result: LogicalLine[] = [];
  let current: LogicalLine | null = null;
  let depth = 0;
  let triple: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const raw = (lines[i] ?? '').replace(/\r$/, '');

    if (current === null) {
      if (isBlank(raw)) continue;
      const trimmed = raw.trim();
      if (trimmed.startsWith('#')) {
        result.push({ start: i, end: i, indent: indentOf(raw), head: trimmed, isComment: true, lastCode: '' });
        continue;
      }
      current = { start: i, end: i, indent: indentOf(raw), head: trimmed, isComment: false, lastCode: '' };
    }

    let continued = false;
    for (let j = 0; j < raw.length; j++) {
      const ch = raw[j] ?? '';
      if (triple !== null) {
        if (ch === '\\') {
          j++;
        } else if (raw.startsWith(triple, j)) {
          j += 2;
          triple = null;
          current.lastCode = ch;
        }
        continue;
      }
      if (ch === '#') break;
      if (ch === '"' || ch === "'") {
        if (raw.startsWith(ch.repeat(3), j)) {
          triple = ch.repeat(3);
          j += 2;
          continue;
        }
        let k = j + 1;
        while (k < raw.length && raw[k] !== ch) {
          if (raw[k] === '\\') k++;
          k++;
        }
        if (k >= raw.length) {
          throw new ChunkingError(`${filePath}:${i + 1}: unterminated string literal`);
        }
        j = k;
        current.lastCode = ch;
        continue;
      }
      if (ch === '\\' && j === raw.trimEnd().length - 1) {
        continued = true;
        break;
      }
      if (OPENERS.has(ch)) depth++;
      if (CLOSERS.has(ch)) {
        depth--;
        if (depth < 0) throw new ChunkingError(`${filePath}:${i + 1}: unmatched '${ch}'`);
      }
      if (ch.trim() !== '') current.lastCode = ch;
    }

    current.end = i;
    if (depth === 0 && triple === null && !continued) {
      result.push(current);
      current = null;
    }
  }

  if (current !== null || triple !== null || depth !== 0) {
    throw new ChunkingError(`${filePath}: unexpected end of file inside an open bracket or string`);
  }
  return result;
}

class PythonBlockParser {
  constructor(
    private readonly filePath: string,
    private readonly lines: string[],
    private readonly logical: LogicalLine[],
  ) {}

  /** Index one past the last logical line belonging to the block opened at `from - 1`. */
  private blockEnd(from: number, indent: number): number {
    let k = from;
    while (k < this.logical.length) {
      const ll = this.logical[k];
      if (!ll) break;
      if (!ll.isComment && ll.indent <= indent) break;
      k++;
    }
    // trailing comments at or left of the opener's indent belong to what follows
    while (k > from) {
      const last = this.logical[k - 1];
      if (!last || !last.isComment || last.indent > indent) break;
      k--;
    }
    return k;
  }

  private lastCodeLine(from: number, to: number, fallback: number): number {
    for (let k = to - 1; k >= from; k--) {
      const ll = this.logical[k];
      if (ll && !ll.isComment) return ll.end;
    }
    return fallback;
  }

  private firstCodeIndent(from: number, to: number): number | undefined {
    for (let k = from; k < to; k++) {
      const ll = this.logical[k];
      if (ll && !ll.isComment) return ll.indent;
    }
    return undefined;
  }

  parse(from: number, to: number, indent: number, scope: Scope, floor: number): SyntaxUnit[] {
    const units: SyntaxUnit[] = [];
    let previousEnd = floor;
    let k = from;

    while (k < to) {
      const ll = this.logical[k];
      if (!ll) break;
      if (ll.isComment) {
        k++;
        continue;
      }
      if (ll.indent !== indent) {
        throw new ChunkingError(`${this.filePath}:${ll.start + 1}: unexpected indentation`);
      }

      const decoratorStart = ll.start;
      let header = ll;
      while (header.head.startsWith('@')) {
        k++;
        const next = this.logical[k];
        if (!next || next.isComment || next.indent !== indent) {
          throw new ChunkingError(`${this.filePath}:${header.start + 1}: decorator without a definition`);
        }
        header = next;
      }

      const opensBlock = header.lastCode === ':';
      const bodyFrom = k + 1;
      const bodyTo = opensBlock ? this.blockEnd(bodyFrom, indent) : bodyFrom;
      const bodyIndent = this.firstCodeIndent(bodyFrom, bodyTo);
      if (opensBlock && bodyIndent === undefined) {
        throw new ChunkingError(`${this.filePath}:${header.start + 1}: expected an indented block`);
      }
      const endLine = this.lastCodeLine(bodyFrom, bodyTo, header.end);

      const defMatch = DEF_RE.exec(header.head);
      const classMatch = CLASS_RE.exec(header.head);
      const name = defMatch?.[1] ?? classMatch?.[1];

      if (name !== undefined) {
        const symbolKind: SymbolKind = classMatch ? 'class' : scope === 'class' ? 'method' : 'function';
        const startLine = attachLeadingComments(this.lines, decoratorStart, previousEnd, isCommentLine);
        const children =
          bodyIndent === undefined
            ? []
            : this.parse(bodyFrom, bodyTo, bodyIndent, classMatch ? 'class' : 'function', header.end).filter(
                (u) => u.kind === 'definition',
              );
        units.push({
          kind: 'definition',
          symbolKind,
          name,
          startLine,
          endLine,
          signatureEndLine: header.end,
          children,
        });
      } else {
        if (bodyIndent !== undefined) {
          // validate nested indentation even though statements are not split
          this.parse(bodyFrom, bodyTo, bodyIndent, 'function', header.end);
        }
        units.push({
          kind: 'statement',
          symbolKind: 'statement',
          name: null,
          startLine: decoratorStart,
          endLine,
          signatureEndLine: endLine,
          children: [],
        });
      }

      previousEnd = endLine;
      k = bodyTo;
    }

    return units;
  }
}

/** Indentation-structured parser for Python sources. */
export class PythonSyntaxParser implements SyntaxParser {
  parse(filePath: string, _content: string, lines: string[]): SyntaxUnit[] {
    const logical = logicalLines(filePath, lines);
    return new PythonBlockParser(filePath, lines, logical).parse(0, logical.length, 0, 'top', -1);
  }
}
