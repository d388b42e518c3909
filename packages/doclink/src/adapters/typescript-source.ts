import * as path from "node:path";
import ts from "typescript";

import { ParseFailureError } from "../core/errors.js";

import type { DeclarationNode, EntityKind, Parameter } from "../types/index.js";

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  ".ts": ts.ScriptKind.TS,
  ".mts": ts.ScriptKind.TS,
  ".cts": ts.ScriptKind.TS,
  ".tsx": ts.ScriptKind.TSX,
  ".js": ts.ScriptKind.JS,
  ".mjs": ts.ScriptKind.JS,
  ".cjs": ts.ScriptKind.JS,
  ".jsx": ts.ScriptKind.JSX,
};

export const SUPPORTED_SOURCE_EXTENSIONS = Object.keys(SCRIPT_KINDS);

export function detectScriptKind(file: string): ts.ScriptKind {
  const ext = path.extname(file).toLowerCase();
  const kind = SCRIPT_KINDS[ext];
  if (kind === undefined) {
    const reason = ext
      ? `unsupported file type '${ext}' (supported: ${SUPPORTED_SOURCE_EXTENSIONS.join(", ")})`
      : "file has no extension, cannot determine its language";
    throw new ParseFailureError(file, reason);
  }
  return kind;
}

function assertSyntaxValid(text: string, file: string): void {
  const { diagnostics = [] } = ts.transpileModule(text, {
    fileName: path.basename(file),
    reportDiagnostics: true,
    compilerOptions: { allowJs: true, jsx: ts.JsxEmit.Preserve },
  });

  const first = diagnostics.find((d) => d.category === ts.DiagnosticCategory.Error);
  if (!first) return;

  const message = ts.flattenDiagnosticMessageText(first.messageText, "\n");
  if (first.file && first.start !== undefined) {
    const { line } = first.file.getLineAndCharacterOfPosition(first.start);
    throw new ParseFailureError(file, `line ${line + 1}: ${message}`);
  }
  throw new ParseFailureError(file, message);
}

function lineOf(sf: ts.SourceFile, pos: number): number {
  return sf.getLineAndCharacterOfPosition(pos).line;
}

// the comment block ending directly above the declaration, with no blank line in between
function leadingCommentBlock(sf: ts.SourceFile, anchor: ts.Node): string[] {
  const text = sf.getFullText();
  const ranges = ts.getLeadingCommentRanges(text, anchor.getFullStart()) ?? [];
  const block: string[] = [];

  let boundary = lineOf(sf, anchor.getStart(sf));
  for (let i = ranges.length - 1; i >= 0; i--) {
    const range = ranges[i];
    if (!range) continue;
    if (boundary - lineOf(sf, range.end) > 1) break;
    block.unshift(text.slice(range.pos, range.end));
    boundary = lineOf(sf, range.pos);
  }
  return block;
}

function toParameters(sf: ts.SourceFile, node: ts.SignatureDeclaration): Parameter[] {
  const params: Parameter[] = [];
  for (const param of node.parameters) {
    if (ts.isIdentifier(param.name) && param.name.text === "this") continue;
    const name = ts.isIdentifier(param.name) ? param.name.text : param.name.getText(sf);
    params.push(param.type ? { name, type: param.type.getText(sf) } : { name });
  }
  return params;
}

function memberName(name: ts.PropertyName | undefined): string | undefined {
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

/**
 * Walk a TS/JS source file and surface its function-like declarations:
 * function declarations, class methods and constructors, and const bindings
 * initialised with arrow or function expressions.
 */
export function parseTypeScriptSource(text: string, file: string): DeclarationNode[] {
  const scriptKind = detectScriptKind(file);
  assertSyntaxValid(text, file);

  const sf = ts.createSourceFile(file, text, ts.ScriptTarget.Latest, true, scriptKind);
  const declarations: DeclarationNode[] = [];
  // first overload signature per name, waiting for its implementation
  const overloads = new Map<string, ts.Node>();

  const add = (name: string, kind: EntityKind, signature: ts.SignatureDeclaration, anchor: ts.Node) => {
    // an overloaded declaration starts at its first signature and keeps the comments above it
    const start = overloads.get(name);
    overloads.delete(name);
    const decl: DeclarationNode = {
      name,
      kind,
      line: lineOf(sf, (start ?? anchor).getStart(sf)) + 1,
      parameters: toParameters(sf, signature),
      leadingComments: start
        ? [...leadingCommentBlock(sf, start), ...leadingCommentBlock(sf, anchor)]
        : leadingCommentBlock(sf, anchor),
    };
    if (signature.type) decl.returnType = signature.type.getText(sf);
    declarations.push(decl);
  };

  const addOverload = (name: string, node: ts.Node) => {
    if (!overloads.has(name)) overloads.set(name, node);
  };

  const visit = (node: ts.Node, className: string | undefined): void => {
    if (ts.isFunctionDeclaration(node) && node.name) {
      const ambient = (ts.getCombinedModifierFlags(node) & ts.ModifierFlags.Ambient) !== 0;
      if (node.body || ambient) add(node.name.text, "function", node, node);
      else addOverload(node.name.text, node);
    } else if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
      const name = node.name?.text;
      ts.forEachChild(node, (child) => visit(child, name));
      return;
    } else if (ts.isMethodDeclaration(node) || ts.isConstructorDeclaration(node)) {
      const method = ts.isConstructorDeclaration(node) ? "constructor" : memberName(node.name);
      if (method) {
        const name = className ? `${className}.${method}` : method;
        if (node.body) add(name, "method", node, node);
        else addOverload(name, node);
      }
    } else if (ts.isVariableStatement(node)) {
      for (const decl of node.declarationList.declarations) {
        const init = decl.initializer;
        if (!ts.isIdentifier(decl.name) || !init) continue;
        if (ts.isArrowFunction(init)) add(decl.name.text, "arrow", init, node);
        else if (ts.isFunctionExpression(init)) add(decl.name.text, "function", init, node);
      }
    }
    ts.forEachChild(node, (child) => visit(child, className));
  };

  visit(sf, undefined);
  return declarations;
}
