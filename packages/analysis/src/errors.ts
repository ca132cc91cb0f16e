import ts from "typescript";

export const AnalysisErrorCode = {
  INVALID_NODE: "ANALYSIS_INVALID_NODE",
  NOT_FOUND: "ANALYSIS_DEFINITION_NOT_FOUND",
  NOT_IN_PROGRAM: "ANALYSIS_NOT_IN_PROGRAM",
  CANCELLED: "ANALYSIS_CANCELLED",
} as const;

export type AnalysisErrorCodeType = (typeof AnalysisErrorCode)[keyof typeof AnalysisErrorCode];

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: AnalysisErrorCodeType,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "AnalysisError";
  }
}

/**
 * The position does not land on a construct definition lookup understands
 * (comment, whitespace, punctuation, literal, ...). Callers treat it as "no results".
 */
export class InvalidNodeError extends AnalysisError {
  constructor(message: string, file?: string) {
    super(message, AnalysisErrorCode.INVALID_NODE, file);
    this.name = "InvalidNodeError";
  }

  static forNode(sourceFile: ts.SourceFile, node: ts.Node): InvalidNodeError {
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
    const kind = ts.SyntaxKind[node.kind];
    return new InvalidNodeError(
      `invalid node: ${kind} (${sourceFile.fileName}:${line + 1}:${character + 1})`,
      sourceFile.fileName,
    );
  }
}

export class DefinitionNotFoundError extends AnalysisError {
  constructor(file?: string) {
    super("definition not found", AnalysisErrorCode.NOT_FOUND, file);
    this.name = "DefinitionNotFoundError";
  }
}

export class RequestCancelledError extends AnalysisError {
  constructor() {
    super("request cancelled", AnalysisErrorCode.CANCELLED);
    this.name = "RequestCancelledError";
  }
}

export function isInvalidNodeError(e: unknown): e is InvalidNodeError {
  return e instanceof InvalidNodeError;
}

export function formatError(e: unknown): string {
  if (e instanceof Error) return e.stack ?? e.message;
  return String(e);
}

/** Minimal view of a cancellation token; structurally satisfied by the LSP one. */
export interface CancellationSignal {
  readonly isCancellationRequested: boolean;
}

export function throwIfCancelled(token: CancellationSignal | undefined): void {
  if (token?.isCancellationRequested) throw new RequestCancelledError();
}
