import ts from "typescript";
import { InvalidNodeError } from "./errors.js";
import type { AnalyzedPackage } from "./types.js";

function isJsDocNode(node: ts.Node): boolean {
  return node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode;
}

function isPunctuation(kind: ts.SyntaxKind): boolean {
  return kind >= ts.SyntaxKind.FirstPunctuation && kind <= ts.SyntaxKind.LastPunctuation;
}

/** Keyword tokens; `this`, `null`, `true` and friends are expression nodes of their own. */
function isKeywordToken(node: ts.Node): boolean {
  switch (node.kind) {
    case ts.SyntaxKind.ThisKeyword:
    case ts.SyntaxKind.SuperKeyword:
    case ts.SyntaxKind.NullKeyword:
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
    case ts.SyntaxKind.ImportKeyword:
      return false;
    default:
      return node.kind >= ts.SyntaxKind.FirstKeyword && node.kind <= ts.SyntaxKind.LastKeyword;
  }
}

function invalidAt(sf: ts.SourceFile, offset: number, what: string): InvalidNodeError {
  const { line, character } = sf.getLineAndCharacterOfPosition(Math.min(offset, sf.text.length));
  return new InvalidNodeError(`invalid node: ${what} (${sf.fileName}:${line + 1}:${character + 1})`, sf.fileName);
}

/**
 * Child of a node that encloses `[start, end]`. A child the range sits
 * strictly inside wins over one it merely touches at its end (`foo|(`), and
 * both win over punctuation.
 */
function pickChild(children: readonly ts.Node[], sf: ts.SourceFile, start: number, end: number): ts.Node | undefined {
  let touching: ts.Node | undefined;
  let punctuation: ts.Node | undefined;
  for (const child of children) {
    const childStart = child.getStart(sf);
    const childEnd = child.getEnd();
    if (childStart > start || end > childEnd) continue;
    if (isPunctuation(child.kind)) {
      punctuation ??= child;
      continue;
    }
    if (end < childEnd || childStart === childEnd) return child;
    touching ??= child;
  }
  return touching ?? punctuation;
}

/**
 * Chain of nodes enclosing `[start, end]` in `pkg.sourceFile`, innermost
 * first and ending with the source file. Keywords resolve to the node that
 * owns them; whitespace, comments, punctuation and end of file are invalid.
 */
export function getPathNodes(pkg: AnalyzedPackage, start: number, end: number): ts.Node[] {
  return getPathNodesInFile(pkg.sourceFile, start, end);
}

export function getPathNodesInFile(sf: ts.SourceFile, start: number, end: number): ts.Node[] {
  if (start < 0 || end < start || end > sf.text.length) {
    throw invalidAt(sf, Math.max(start, 0), "position outside of file");
  }

  const path: ts.Node[] = [sf];
  let current: ts.Node = sf;

  for (;;) {
    const child = pickChild(current.getChildren(sf), sf, start, end);
    if (!child) {
      if (current.getChildCount(sf) > 0) throw invalidAt(sf, start, "whitespace or comment");
      return path;
    }
    if (isJsDocNode(child)) throw invalidAt(sf, start, "comment");
    if (child.kind === ts.SyntaxKind.EndOfFileToken) throw invalidAt(sf, start, "end of file");
    if (isPunctuation(child.kind)) throw invalidAt(sf, start, ts.SyntaxKind[child.kind]);
    if (isKeywordToken(child)) return path;
    if (child.kind !== ts.SyntaxKind.SyntaxList) path.unshift(child);
    current = child;
  }
}
