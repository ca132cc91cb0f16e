import type ts from "typescript";
import { DefinitionNotFoundError, typeLookup, type AnalyzedPackage, type ResolvedObject } from "@tsnav/analysis";
import type { FoundDeclaration } from "./types.js";

/** The object `ident` refers to, or failing that, the one it declares. */
function lookupObject(pkg: AnalyzedPackage, ident: ts.Identifier): ResolvedObject | undefined {
  return pkg.info.uses.get(ident) ?? pkg.info.defs.get(ident);
}

/**
 * Declaration of the object behind `ident`.
 *
 * Builtins have no source position and yield no declaration: they are not
 * navigable. An identifier that is in neither index is an error.
 */
export function lookupIdentDefinition(pkg: AnalyzedPackage, ident: ts.Identifier): FoundDeclaration[] {
  const obj = lookupObject(pkg, ident);
  if (!obj) throw new DefinitionNotFoundError(pkg.sourceFile.fileName);

  if (obj.pos === null) {
    // builtin
    return [];
  }

  return [
    {
      ident: { pos: obj.pos, name: obj.name },
      typ: typeLookup(pkg.program, pkg.checker, pkg.info.typeOf(ident)),
    },
  ];
}
