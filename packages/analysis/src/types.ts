import type ts from "typescript";
import type { FileSet } from "./file-set.js";
import type { TypesInfo } from "./types-info.js";

export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Analyzer-local position. `null` stands for the invalid position. */
export interface SourcePos {
  readonly fileName: string;
  readonly offset: number;
}

/**
 * The semantic entity an identifier refers to or introduces.
 * `pos` is `null` for compiler builtins: symbols without a declaration, or
 * declared only in a default library file.
 */
export interface ResolvedObject {
  readonly name: string;
  readonly pos: SourcePos | null;
  readonly symbol: ts.Symbol;
}

/** A type with a declaration site of its own. */
export interface TypeNameObject {
  readonly name: string;
  readonly pos: SourcePos | null;
  /** Exact end of the declaration name, when known. */
  readonly end?: SourcePos;
}

/** One type-checked source file together with the program it belongs to. */
export interface AnalyzedPackage {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly sourceFile: ts.SourceFile;
  readonly info: TypesInfo;
  readonly fileSet: FileSet;
}

export interface TypeCheckResult {
  readonly pkg: AnalyzedPackage;
  /** Offset of the requested position inside `pkg.sourceFile`. */
  readonly pos: number;
}
