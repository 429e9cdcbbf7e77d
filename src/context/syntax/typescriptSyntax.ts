import * as ts from 'typescript';
import { basename, extname } from 'node:path';
import type { SymbolKind } from '../../types/context.types.js';
import type { SyntaxParser, SyntaxUnit } from './syntaxUnit.js';
import { ChunkingError } from '../../errors/context.js';

type Scope = 'top' | 'class' | 'function';

type FunctionLikeInitializer = ts.ArrowFunction | ts.FunctionExpression;

function scriptKindFromFilePath(filePath: string): ts.ScriptKind {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.tsx') return ts.ScriptKind.TSX;
  if (ext === '.jsx') return ts.ScriptKind.JSX;
  if (ext === '.js' || ext === '.mjs' || ext === '.cjs') return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

function isFunctionLike(expr: ts.Expression | undefined): expr is FunctionLikeInitializer {
  return expr !== undefined && (ts.isArrowFunction(expr) || ts.isFunctionExpression(expr));
}

/** The single declaration of `const x = ...`, or undefined for multi-declaration statements. */
function soleDeclaration(node: ts.VariableStatement): ts.VariableDeclaration | undefined {
  const decls = node.declarationList.declarations;
  return decls.length === 1 ? decls[0] : undefined;
}

function assertParses(filePath: string, content: string): void {
  const { diagnostics } = ts.transpileModule(content, {
    fileName: basename(filePath),
    reportDiagnostics: true,
    compilerOptions: { jsx: ts.JsxEmit.Preserve, target: ts.ScriptTarget.ESNext },
  });
  const first = (diagnostics ?? []).find((d) => d.category === ts.DiagnosticCategory.Error);
  if (first) {
    throw new ChunkingError(
      `${filePath}: ${ts.flattenDiagnosticMessageText(first.messageText, ' ')}`,
    );
  }
}

class TypeScriptWalker {
  constructor(private readonly sf: ts.SourceFile) {}

  line(pos: number): number {
    return this.sf.getLineAndCharacterOfPosition(pos).line;
  }

  units(nodes: readonly ts.Node[], scope: Scope, floor: number): SyntaxUnit[] {
    const units: SyntaxUnit[] = [];
    let previousEnd = floor;
    for (const node of nodes) {
      const unit = this.unitFor(node, scope, previousEnd);
      if (unit) units.push(unit);
      previousEnd = unit ? unit.endLine : this.line(node.getEnd());
    }
    return units;
  }

  /** Start line including attached leading comments; decorators and modifiers are part of the node. */
  private startLine(node: ts.Node, floor: number): number {
    let start = this.line(node.getStart(this.sf));
    const ranges = ts.getLeadingCommentRanges(this.sf.text, node.getFullStart()) ?? [];
    for (let i = ranges.length - 1; i >= 0; i--) {
      const range = ranges[i];
      if (!range) break;
      if (start - this.line(range.end) > 1) break;
      const commentStart = this.line(range.pos);
      if (commentStart <= floor) break;
      start = commentStart;
    }
    return start;
  }

  private definition(
    node: ts.Node,
    floor: number,
    symbolKind: SymbolKind,
    name: string,
    signatureEndPos: number | undefined,
    children: (signatureEnd: number) => SyntaxUnit[],
  ): SyntaxUnit {
    const startLine = this.startLine(node, floor);
    const endLine = this.line(node.getEnd());
    const signatureEndLine = signatureEndPos === undefined ? endLine : this.line(signatureEndPos);
    return {
      kind: 'definition',
      symbolKind,
      name,
      startLine,
      endLine,
      signatureEndLine,
      children: signatureEndPos === undefined ? [] : children(signatureEndLine),
    };
  }

  private functionBody(body: ts.ConciseBody | undefined, signatureEnd: number): SyntaxUnit[] {
    if (!body || !ts.isBlock(body)) return [];
    return this.units(body.statements, 'function', signatureEnd);
  }

  private classDefinition(
    node: ts.ClassDeclaration | ts.ClassExpression,
    container: ts.Node,
    floor: number,
    name: string,
  ): SyntaxUnit {
    // members.pos sits just past the opening brace
    return this.definition(container, floor, 'class', name, node.members.pos - 1, (sig) =>
      this.units(node.members, 'class', sig),
    );
  }

  private functionDefinition(
    container: ts.Node,
    fn: ts.FunctionLikeDeclaration,
    floor: number,
    symbolKind: SymbolKind,
    name: string,
  ): SyntaxUnit {
    const body = fn.body;
    const bodyStart = body && ts.isBlock(body) ? body.getStart(this.sf) : undefined;
    return this.definition(container, floor, symbolKind, name, bodyStart, (sig) => this.functionBody(body, sig));
  }

  private unitFor(node: ts.Node, scope: Scope, floor: number): SyntaxUnit | undefined {
    const fnKind: SymbolKind = scope === 'class' ? 'method' : 'function';

    if (scope === 'class') {
      if (
        ts.isMethodDeclaration(node) ||
        ts.isConstructorDeclaration(node) ||
        ts.isGetAccessorDeclaration(node) ||
        ts.isSetAccessorDeclaration(node)
      ) {
        const name = node.name ? node.name.getText(this.sf) : 'constructor';
        return this.functionDefinition(node, node, floor, 'method', name);
      }
      if (ts.isPropertyDeclaration(node) && isFunctionLike(node.initializer)) {
        return this.functionDefinition(node, node.initializer, floor, 'method', node.name.getText(this.sf));
      }
      return undefined;
    }

    if (ts.isFunctionDeclaration(node)) {
      return this.functionDefinition(node, node, floor, fnKind, node.name?.text ?? 'default');
    }
    if (ts.isClassDeclaration(node)) {
      return this.classDefinition(node, node, floor, node.name?.text ?? 'default');
    }
    if (ts.isVariableStatement(node)) {
      const decl = soleDeclaration(node);
      const init = decl?.initializer;
      if (decl && isFunctionLike(init)) {
        return this.functionDefinition(node, init, floor, fnKind, decl.name.getText(this.sf));
      }
      if (decl && init && ts.isClassExpression(init)) {
        return this.classDefinition(init, node, floor, decl.name.getText(this.sf));
      }
    }

    if (scope === 'function') return undefined;

    if (
      ts.isInterfaceDeclaration(node) ||
      ts.isTypeAliasDeclaration(node) ||
      ts.isEnumDeclaration(node) ||
      ts.isModuleDeclaration(node)
    ) {
      return this.definition(node, floor, 'block', node.name.getText(this.sf), undefined, () => []);
    }

    return {
      kind: 'statement',
      symbolKind: 'statement',
      name: null,
      startLine: this.startLine(node, floor),
      endLine: this.line(node.getEnd()),
      signatureEndLine: this.line(node.getEnd()),
      children: [],
    };
  }
}

/** TypeScript and JavaScript, parsed with the compiler API. */
export class TypeScriptSyntaxParser implements SyntaxParser {
  parse(filePath: string, content: string): SyntaxUnit[] {
    assertParses(filePath, content);
    const sf = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true, scriptKindFromFilePath(filePath));
    return new TypeScriptWalker(sf).units(sf.statements, 'top', -1);
  }
}
