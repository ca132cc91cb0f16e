import ts from "typescript";
import { getPathNodesInFile } from "./path-nodes.js";
import type { TypesInfo } from "./types-info.js";
import { declarationNamePos } from "./types-info.js";
import type { SourcePos } from "./types.js";

export type DefKind =
  | "class"
  | "interface"
  | "type"
  | "enum"
  | "enum-member"
  | "function"
  | "method"
  | "property"
  | "variable"
  | "namespace"
  | "module"
  | "other";

/** Where a declaration sits in its module: the input of a symbol descriptor. */
export interface DefInfo {
  readonly fileName: string;
  readonly name: string;
  readonly kind: DefKind;
  /** Names of the enclosing classes, interfaces, enums, namespaces and type aliases, outermost first. */
  readonly container: readonly string[];
  readonly exported: boolean;
}

function defKind(decl: ts.Declaration): DefKind {
  switch (decl.kind) {
    case ts.SyntaxKind.ClassDeclaration:
    case ts.SyntaxKind.ClassExpression:
      return "class";
    case ts.SyntaxKind.InterfaceDeclaration:
      return "interface";
    case ts.SyntaxKind.TypeAliasDeclaration:
      return "type";
    case ts.SyntaxKind.EnumDeclaration:
      return "enum";
    case ts.SyntaxKind.EnumMember:
      return "enum-member";
    case ts.SyntaxKind.FunctionDeclaration:
      return "function";
    case ts.SyntaxKind.MethodDeclaration:
    case ts.SyntaxKind.MethodSignature:
      return "method";
    case ts.SyntaxKind.PropertyDeclaration:
    case ts.SyntaxKind.PropertySignature:
    case ts.SyntaxKind.GetAccessor:
    case ts.SyntaxKind.SetAccessor:
      return "property";
    case ts.SyntaxKind.VariableDeclaration:
      return "variable";
    case ts.SyntaxKind.ModuleDeclaration:
      return ts.isModuleDeclaration(decl) && ts.isStringLiteral(decl.name) ? "module" : "namespace";
    default:
      return "other";
  }
}

/** Name of a node that contributes to a declaration's container path. */
function containerName(node: ts.Node): string | undefined {
  if (
    ts.isClassDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isModuleDeclaration(node) ||
    ts.isTypeAliasDeclaration(node)
  ) {
    return node.name ? node.name.text : "default";
  }
  return undefined;
}

function isPassThrough(node: ts.Node): boolean {
  return (
    ts.isVariableDeclarationList(node) ||
    ts.isVariableStatement(node) ||
    ts.isModuleBlock(node) ||
    ts.isTypeLiteralNode(node)
  );
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some((m) => m.kind === kind) ?? false;
}

function isExported(checker: ts.TypeChecker, decl: ts.Declaration, outermost: ts.Node, topName: string): boolean {
  if (hasModifier(decl, ts.SyntaxKind.PrivateKeyword)) return false;
  const sf = decl.getSourceFile();
  if (!ts.isExternalModule(sf)) return true;
  if (hasModifier(outermost, ts.SyntaxKind.ExportKeyword)) return true;
  const moduleSymbol = checker.getSymbolAtLocation(sf);
  const exports = moduleSymbol ? checker.getExportsOfModule(moduleSymbol) : [];
  return exports.some((s) => s.getName() === topName);
}

function declarationAt(
  checker: ts.TypeChecker,
  info: TypesInfo,
  sf: ts.SourceFile,
  path: readonly ts.Node[],
  offset: number,
): ts.Declaration | undefined {
  const innermost = path[0];
  if (!innermost || !ts.isIdentifier(innermost)) return undefined;
  const symbol = info.defs.get(innermost)?.symbol ?? checker.getSymbolAtLocation(innermost);
  return symbol?.declarations?.find(
    (decl) => decl.getSourceFile() === sf && declarationNamePos(decl).pos.offset === offset,
  );
}

/**
 * Definition info of the declaration whose name starts at `pos`.
 * `pathNodes` is the node chain of the request; it is reused when the
 * declaration lives in the requested file at the clicked identifier.
 * Declarations local to a function or block have none.
 */
export function defInfo(
  program: ts.Program,
  info: TypesInfo,
  pathNodes: readonly ts.Node[],
  pos: SourcePos,
): DefInfo {
  const sf = program.getSourceFile(pos.fileName);
  if (!sf) throw new Error(`no source file for ${pos.fileName}`);
  const checker = program.getTypeChecker();

  const reuse = pathNodes[0] !== undefined && pathNodes[0].getSourceFile() === sf && pathNodes[0].getStart(sf) === pos.offset;
  const path = reuse ? pathNodes : getPathNodesInFile(sf, pos.offset, pos.offset);
  const decl = declarationAt(checker, info, sf, path, pos.offset);
  if (!decl) throw new Error(`no declaration at ${pos.fileName}:${pos.offset}`);
  if (ts.isParameter(decl) || ts.isTypeParameterDeclaration(decl)) {
    throw new Error(`no definition info for ${ts.SyntaxKind[decl.kind]}`);
  }

  const container: string[] = [];
  let outermost: ts.Node = decl;
  for (let node = decl.parent; !ts.isSourceFile(node); node = node.parent) {
    const name = containerName(node);
    if (name !== undefined) {
      container.unshift(name);
      outermost = node;
      continue;
    }
    if (isPassThrough(node)) {
      if (!ts.isModuleBlock(node)) outermost = node;
      continue;
    }
    throw new Error(`no definition info for local declaration in ${ts.SyntaxKind[node.kind]}`);
  }

  const name = declarationNamePos(decl).name ?? "default";
  return {
    fileName: sf.fileName,
    name,
    kind: defKind(decl),
    container,
    exported: isExported(checker, decl, outermost, container[0] ?? name),
  };
}
