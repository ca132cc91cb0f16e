import ts from "typescript";
import {
  InvalidNodeError,
  getPathNodes,
  throwIfCancelled,
  type AnalyzedPackage,
  type CancellationSignal,
  type FindPackageFunc,
  type TextPosition,
} from "@tsnav/analysis";
import { enrichLocation } from "./enrich.js";
import { lookupIdentDefinition } from "./identifier.js";
import { declarationLocation, typeDeclarationLocation } from "./location.js";
import type { FoundDeclaration, ResolutionContext, SymbolLocationInformation } from "./types.js";

export interface ResolveParams {
  readonly uri: string;
  readonly position: TextPosition;
}

function isTypeDeclaration(
  node: ts.Node,
): node is ts.ClassDeclaration | ts.InterfaceDeclaration | ts.TypeAliasDeclaration | ts.EnumDeclaration {
  return (
    ts.isClassDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isEnumDeclaration(node)
  );
}

/** Identifier to resolve for the innermost node: itself, or a type declaration's name. */
function identifierFor(pkg: AnalyzedPackage, node: ts.Node): ts.Identifier {
  if (ts.isIdentifier(node)) return node;
  if (isTypeDeclaration(node) && node.name) return node.name;
  throw InvalidNodeError.forNode(pkg.sourceFile, node);
}

/**
 * Resolves the identifier at a position to its declaration, its type's
 * declaration and the declaration's symbol descriptor.
 *
 * Throws `InvalidNodeError` when the position is not on an identifier or a
 * type declaration; callers turn that into an empty result.
 */
export async function resolveDefinitions(
  ctx: ResolutionContext,
  params: ResolveParams,
  token?: CancellationSignal,
): Promise<SymbolLocationInformation[]> {
  const { pkg, pos } = ctx.typeCheck(params.uri, params.position, token);
  const pathNodes = getPathNodes(pkg, pos, pos);
  const innermost = pathNodes[0];
  if (!innermost) throw new InvalidNodeError(`invalid node: empty path at ${params.uri}`);

  const found = lookupIdentDefinition(pkg, identifierFor(pkg, innermost));
  if (found.length === 0) return [];

  const findPackage = ctx.getFindPackageFunc();
  const rootPath = ctx.workspaceRoot ?? process.cwd();
  const locs: SymbolLocationInformation[] = [];
  for (const decl of found) {
    locs.push(await locationInformation(ctx, pkg, pathNodes, decl, rootPath, findPackage, token));
  }
  return locs;
}

async function locationInformation(
  ctx: ResolutionContext,
  pkg: AnalyzedPackage,
  pathNodes: readonly ts.Node[],
  found: FoundDeclaration,
  rootPath: string,
  findPackage: FindPackageFunc,
  token: CancellationSignal | undefined,
): Promise<SymbolLocationInformation> {
  const location = declarationLocation(pkg.fileSet, found);
  const typeLocation = found.typ ? typeDeclarationLocation(pkg.fileSet, found.typ) : undefined;

  throwIfCancelled(token);
  const enrichment = await enrichLocation(pkg, pathNodes, found.ident.pos, rootPath, ctx.packageCache, findPackage, token);
  for (const diagnostic of enrichment.diagnostics) {
    ctx.logger.warn(`[definition] no symbol descriptor for ${found.ident.name}: ${diagnostic}`);
  }

  return {
    location,
    ...(typeLocation ? { typeLocation } : {}),
    ...(enrichment.descriptor ? { symbol: enrichment.descriptor } : {}),
  };
}
