import type { SymbolKind } from '../../types/context.types.js';

/**
 * A top-level (or nested) span found by a language parser. Line numbers are
 * 0-based and inclusive; `startLine` already covers attached leading
 * comments, decorators and modifiers.
 */
export interface SyntaxUnit {
  kind: 'definition' | 'statement';
  symbolKind: SymbolKind;
  name: string | null;
  startLine: number;
  endLine: number;
  /** Last line of the signature. Lines after it up to `endLine` are the body. */
  signatureEndLine: number;
  children: SyntaxUnit[];
}

export interface SyntaxParser {
  /** Throws ChunkingError when the source cannot be parsed. */
  parse(filePath: string, content: string, lines: string[]): SyntaxUnit[];
}

export function isBlank(line: string | undefined): boolean {
  return line === undefined || line.trim() === '';
}

/**
 * Walks upward from `startLine` over comment lines with no blank line in
 * between, never crossing `floorLine`. Returns the new start line.
 */
export function attachLeadingComments(
  lines: string[],
  startLine: number,
  floorLine: number,
  isCommentLine: (line: string) => boolean,
): number {
  let start = startLine;
  while (start - 1 > floorLine) {
    const prev = lines[start - 1];
    if (prev === undefined || isBlank(prev) || !isCommentLine(prev)) break;
    start--;
  }
  return start;
}
