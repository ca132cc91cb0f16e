import type { Location } from "vscode-languageserver/node.js";
import type {
  CancellationSignal,
  FindPackageFunc,
  Logger,
  PackageCache,
  SourcePos,
  SymbolDescriptor,
  TextPosition,
  TypeCheckResult,
  TypeNameObject,
} from "@tsnav/analysis";

/** A resolved declaration: the declaring identifier plus the named type of the clicked one. */
export interface FoundDeclaration {
  readonly ident: { readonly pos: SourcePos; readonly name: string };
  readonly typ: TypeNameObject | null;
}

export interface SymbolLocationInformation {
  readonly location: Location;
  /** Absent when the object's type has no declaration of its own. */
  readonly typeLocation?: Location;
  /** Absent when enrichment failed. */
  readonly symbol?: SymbolDescriptor;
}

export type TypeCheckFn = (uri: string, position: TextPosition, token?: CancellationSignal) => TypeCheckResult;

/** What the resolution pipeline needs from the server. */
export interface ResolutionContext {
  readonly logger: Logger;
  readonly packageCache: PackageCache;
  readonly workspaceRoot: string | null;
  typeCheck: TypeCheckFn;
  getFindPackageFunc(): FindPackageFunc;
}
