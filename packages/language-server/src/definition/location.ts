import type { Location } from "vscode-languageserver/node.js";
import type { FileSet, SourcePos, TypeNameObject } from "@tsnav/analysis";
import { toLspUri } from "../mapping/lsp-types.js";
import type { FoundDeclaration } from "./types.js";

export function buildLocation(fileSet: FileSet, start: SourcePos, end: SourcePos): Location {
  const from = fileSet.position(start);
  const to = fileSet.position(end);
  if (!from || !to) throw new Error(`no position information for ${start.fileName}`);
  return {
    uri: toLspUri(from.fileName),
    range: {
      start: { line: from.line, character: from.character },
      end: { line: to.line, character: to.character },
    },
  };
}

export function declarationLocation(fileSet: FileSet, found: FoundDeclaration): Location {
  const { pos, name } = found.ident;
  return buildLocation(fileSet, pos, { fileName: pos.fileName, offset: pos.offset + name.length });
}

/**
 * Location of a named type's declaration name. Without an exact end from
 * the analyzer the span is approximated as start + name length.
 */
export function typeDeclarationLocation(fileSet: FileSet, typ: TypeNameObject): Location | undefined {
  if (typ.pos === null) return undefined;
  const end = typ.end ?? { fileName: typ.pos.fileName, offset: typ.pos.offset + typ.name.length };
  return buildLocation(fileSet, typ.pos, end);
}
