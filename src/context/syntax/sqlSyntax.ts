import type { SyntaxParser, SyntaxUnit } from './syntaxUnit.js';
import { attachLeadingComments, isBlank } from './syntaxUnit.js';
import { ChunkingError } from '../../errors/context.js';

const STATEMENT_START =
  /^\s*(?:CREATE|ALTER|DROP|INSERT|UPDATE|DELETE|SELECT|WITH|GRANT|REVOKE|BEGIN|COMMIT|MERGE)\b/i;

const STATEMENT_NAME =
  /^\s*(CREATE|ALTER|DROP|INSERT|UPDATE|DELETE|SELECT)\s+(?:OR\s+REPLACE\s+)?(?:TABLE|VIEW|FUNCTION|PROCEDURE|INDEX|TYPE|TRIGGER|INTO|FROM)?\s*(?:IF\s+(?:NOT\s+)?EXISTS\s+)?([\w.]+)?/i;

const isCommentLine = (line: string): boolean => {
  const trimmed = line.trimStart();
  return trimmed.startsWith('--') || trimmed.startsWith('/*') || trimmed.startsWith('*');
};

/** Strips a trailing `-- comment` and whitespace. */
function codePart(line: string): string {
  const dash = line.indexOf('--');
  return (dash >= 0 ? line.slice(0, dash) : line).trim();
}

export function sqlStatementName(line: string): string | null {
  const match = STATEMENT_NAME.exec(line);
  if (!match?.[1]) {
    const keyword = STATEMENT_START.exec(line)?.[0]?.trim();
    return keyword ? keyword.toUpperCase() : null;
  }
  const keyword = match[1].toUpperCase();
  return match[2] ? `${keyword} ${match[2]}` : keyword;
}

/**
 * One unit per statement. A keyword line only opens a new statement once the
 * previous one has been terminated with `;`, so `WITH ... SELECT` stays whole.
 */
export class SqlSyntaxParser implements SyntaxParser {
  parse(filePath: string, _content: string, lines: string[]): SyntaxUnit[] {
    const starts: number[] = [];
    let terminated = true;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      if (isBlank(line) || isCommentLine(line)) continue;
      if (terminated && STATEMENT_START.test(line)) starts.push(i);
      terminated = codePart(line).endsWith(';');
    }

    if (starts.length === 0) {
      throw new ChunkingError(`${filePath}: no SQL statements recognised`);
    }

    const units: SyntaxUnit[] = [];
    let previousEnd = -1;
    for (let s = 0; s < starts.length; s++) {
      const start = starts[s] ?? 0;
      const limit = (starts[s + 1] ?? lines.length) - 1;
      let end = limit;
      // trailing blanks and comments lead into the next statement
      while (end > start && (isBlank(lines[end]) || isCommentLine(lines[end] ?? ''))) end--;
      const startLine = attachLeadingComments(lines, start, previousEnd, isCommentLine);
      units.push({
        kind: 'definition',
        symbolKind: 'statement',
        name: sqlStatementName(lines[start] ?? ''),
        startLine,
        endLine: end,
        signatureEndLine: end,
        children: [],
      });
      previousEnd = end;
    }
    return units;
  }
}
