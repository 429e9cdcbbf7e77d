import { createRequire } from 'node:module';
import type Parser from 'tree-sitter';
import type { SymbolKind } from '../../types/context.types.js';
import type { SyntaxParser, SyntaxUnit } from './syntaxUnit.js';
import { attachLeadingComments, isBlank } from './syntaxUnit.js';
import { ChunkingError } from '../../errors/context.js';

type SyntaxNode = Parser.SyntaxNode;
type Scope = 'top' | 'class';

/** How the node types of one tree-sitter grammar map onto syntax units. */
export interface GrammarSpec {
  /** npm package that exports the compiled grammar. */
  module: string;
  /** Declarations that become definitions; `class` ones may hold nested members. */
  definitions: Record<string, 'class' | 'function'>;
  /** Node types holding a declaration's body, for grammars without a `body` field. */
  bodies: ReadonlySet<string>;
  /** Wrappers inside a body whose children are members themselves. */
  memberGroups: ReadonlySet<string>;
  comments: ReadonlySet<string>;
  /** Names for declarations that carry no identifier. */
  defaultNames: Record<string, string>;
}

export const JAVA_GRAMMAR: GrammarSpec = {
  module: 'tree-sitter-java',
  definitions: {
    class_declaration: 'class',
    interface_declaration: 'class',
    enum_declaration: 'class',
    record_declaration: 'class',
    annotation_type_declaration: 'class',
    method_declaration: 'function',
    constructor_declaration: 'function',
    compact_constructor_declaration: 'function',
  },
  bodies: new Set(['class_body', 'interface_body', 'enum_body', 'annotation_type_body', 'block', 'constructor_body']),
  memberGroups: new Set(['enum_body_declarations']),
  comments: new Set(['line_comment', 'block_comment']),
  defaultNames: {},
};

export const KOTLIN_GRAMMAR: GrammarSpec = {
  module: 'tree-sitter-kotlin',
  definitions: {
    class_declaration: 'class',
    object_declaration: 'class',
    companion_object: 'class',
    function_declaration: 'function',
    secondary_constructor: 'function',
    anonymous_initializer: 'function',
  },
  bodies: new Set(['class_body', 'enum_class_body', 'function_body']),
  memberGroups: new Set(),
  comments: new Set(['line_comment', 'multiline_comment', 'comment']),
  defaultNames: { companion_object: 'Companion', secondary_constructor: 'constructor', anonymous_initializer: 'init' },
};

const IDENTIFIER_TYPES = new Set(['identifier', 'simple_identifier', 'type_identifier']);

const isCommentLine = (line: string): boolean => {
  const trimmed = line.trimStart();
  return trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*');
};

// native grammars are CommonJS addons, loaded on first use
const requireNative = createRequire(import.meta.url);
const parsers = new Map<string, Parser>();

function parserFor(grammar: GrammarSpec): Parser {
  const cached = parsers.get(grammar.module);
  if (cached) return cached;
  let parser: Parser;
  try {
    const TreeSitter: typeof Parser = requireNative('tree-sitter');
    parser = new TreeSitter();
    parser.setLanguage(requireNative(grammar.module));
  } catch (err) {
    throw new ChunkingError(`Cannot load the ${grammar.module} grammar`, err);
  }
  parsers.set(grammar.module, parser);
  return parser;
}

class TreeSitterWalker {
  constructor(
    private readonly grammar: GrammarSpec,
    private readonly lines: string[],
  ) {}

  units(nodes: SyntaxNode[], scope: Scope, floor: number): SyntaxUnit[] {
    const units: SyntaxUnit[] = [];
    let previousEnd = floor;
    for (const node of this.members(nodes)) {
      if (this.grammar.comments.has(node.type)) continue;
      const unit = this.unitFor(node, scope, previousEnd);
      if (unit) units.push(unit);
      previousEnd = unit ? unit.endLine : this.endLine(node);
    }
    return units;
  }

  private members(nodes: SyntaxNode[]): SyntaxNode[] {
    return nodes.flatMap((n) => (this.grammar.memberGroups.has(n.type) ? n.namedChildren : [n]));
  }

  /** Last line holding the node's text; a node may end at column 0 of the following line. */
  private endLine(node: SyntaxNode): number {
    const start = node.startPosition.row;
    let end = node.endPosition.row;
    if (end > start && node.endPosition.column === 0) end--;
    while (end > start && isBlank(this.lines[end])) end--;
    return end;
  }

  private nameOf(node: SyntaxNode): string | null {
    const named = node.childForFieldName('name');
    if (named) return named.text;
    const identifier = node.namedChildren.find((c) => IDENTIFIER_TYPES.has(c.type));
    return identifier?.text ?? this.grammar.defaultNames[node.type] ?? null;
  }

  private bodyOf(node: SyntaxNode): SyntaxNode | undefined {
    return node.childForFieldName('body') ?? node.namedChildren.find((c) => this.grammar.bodies.has(c.type));
  }

  private unitFor(node: SyntaxNode, scope: Scope, floor: number): SyntaxUnit | undefined {
    const role = this.grammar.definitions[node.type];
    const endLine = this.endLine(node);

    if (!role) {
      if (scope === 'class') return undefined;
      const startLine = node.startPosition.row;
      return { kind: 'statement', symbolKind: 'statement', name: null, startLine, endLine, signatureEndLine: endLine, children: [] };
    }

    const startLine = attachLeadingComments(this.lines, node.startPosition.row, floor, isCommentLine);
    const body = this.bodyOf(node);
    const signatureEndLine = body ? body.startPosition.row : endLine;
    const symbolKind: SymbolKind = role === 'class' ? 'class' : scope === 'class' ? 'method' : 'function';
    return {
      kind: 'definition',
      symbolKind,
      name: this.nameOf(node),
      startLine,
      endLine,
      signatureEndLine,
      children: role === 'class' && body ? this.units(body.namedChildren, 'class', signatureEndLine) : [],
    };
  }
}

/** Languages parsed with a native tree-sitter grammar (Java, Kotlin). */
export class TreeSitterSyntaxParser implements SyntaxParser {
  constructor(private readonly grammar: GrammarSpec) {}

  parse(filePath: string, content: string, lines: string[]): SyntaxUnit[] {
    const parser = parserFor(this.grammar);
    let root: SyntaxNode;
    try {
      root = parser.parse(content, undefined, { bufferSize: content.length * 2 + 1 }).rootNode;
    } catch (err) {
      throw new ChunkingError(`${filePath}: tree-sitter could not parse the file`, err);
    }
    const [firstError] = root.descendantsOfType('ERROR');
    if (firstError) {
      throw new ChunkingError(`${filePath}:${firstError.startPosition.row + 1}: syntax error`);
    }
    return new TreeSitterWalker(this.grammar, lines).units(root.namedChildren, 'top', -1);
  }
}
