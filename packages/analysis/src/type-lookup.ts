import ts from "typescript";
import { declarationNamePos, primaryDeclaration } from "./types-info.js";
import type { TypeNameObject } from "./types.js";

const NAMED_TYPE_FLAGS = ts.SymbolFlags.Class | ts.SymbolFlags.Interface | ts.SymbolFlags.Enum;

/** Symbol of the declared type behind `type`, if it has one. */
function namedTypeSymbol(checker: ts.TypeChecker, type: ts.Type): ts.Symbol | undefined {
  if (type.aliasSymbol && type.aliasSymbol.flags & ts.SymbolFlags.TypeAlias) return type.aliasSymbol;
  const symbol = type.getSymbol();
  if (symbol && symbol.flags & ts.SymbolFlags.EnumMember) {
    // a single enum member's literal type belongs to its enum
    const parent = symbol.declarations?.[0]?.parent;
    return parent && ts.isEnumDeclaration(parent) ? checker.getSymbolAtLocation(parent.name) : undefined;
  }
  if (!symbol || !(symbol.flags & NAMED_TYPE_FLAGS)) return undefined;
  return symbol;
}

/**
 * The named-type object behind a static type: a class, interface, enum or
 * type alias, seen through `T | null | undefined`. Anonymous object and
 * function types, primitives, unions and type parameters have none.
 * A named type declared only in the default library has a `null` position.
 */
export function typeLookup(
  program: ts.Program,
  checker: ts.TypeChecker,
  type: ts.Type | undefined,
): TypeNameObject | null {
  if (!type) return null;
  const symbol = namedTypeSymbol(checker, checker.getNonNullableType(type));
  if (!symbol) return null;
  const decl = primaryDeclaration(program, symbol);
  if (!decl) return { name: symbol.getName(), pos: null };
  const { pos, name, nameNode } = declarationNamePos(decl);
  if (!nameNode) return { name: name ?? symbol.getName(), pos };
  return {
    name: name ?? symbol.getName(),
    pos,
    end: { fileName: pos.fileName, offset: nameNode.getEnd() },
  };
}
