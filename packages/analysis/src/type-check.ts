import { URI } from "vscode-uri";
import { AnalysisError, AnalysisErrorCode, InvalidNodeError, throwIfCancelled, type CancellationSignal } from "./errors.js";
import { FileSet } from "./file-set.js";
import type { TsService } from "./ts-service.js";
import { TypesInfo } from "./types-info.js";
import type { TypeCheckResult } from "./types.js";

export interface TextPosition {
  /** Zero-based. */
  readonly line: number;
  /** Zero-based, in UTF-16 code units. */
  readonly character: number;
}

export function uriToFileName(uri: string): string {
  return URI.parse(uri).fsPath;
}

/**
 * Type-checks the program containing `uri` and maps `position` to an offset
 * in that file. A position outside the document is an invalid node.
 */
export function typeCheck(
  service: TsService,
  uri: string,
  position: TextPosition,
  token?: CancellationSignal,
): TypeCheckResult {
  throwIfCancelled(token);
  const fileName = service.canonical(uriToFileName(uri));
  const program = service.getProgram();
  const sourceFile = program?.getSourceFile(fileName);
  if (!program || !sourceFile) {
    throw new AnalysisError(`${fileName} is not part of the TypeScript program`, AnalysisErrorCode.NOT_IN_PROGRAM, fileName);
  }
  throwIfCancelled(token);

  const lineStarts = sourceFile.getLineStarts();
  const lineStart = lineStarts[position.line];
  if (lineStart === undefined || position.character < 0) {
    throw new InvalidNodeError(`invalid node: position ${position.line}:${position.character} outside of ${fileName}`, fileName);
  }
  let lineEnd = lineStarts[position.line + 1] ?? sourceFile.text.length;
  // the line break is not part of the line
  while (lineEnd > lineStart && (sourceFile.text[lineEnd - 1] === "\n" || sourceFile.text[lineEnd - 1] === "\r")) {
    lineEnd--;
  }
  const pos = lineStart + position.character;
  if (pos > lineEnd) {
    throw new InvalidNodeError(`invalid node: position ${position.line}:${position.character} outside of ${fileName}`, fileName);
  }

  const checker = program.getTypeChecker();
  return {
    pkg: {
      program,
      checker,
      sourceFile,
      info: new TypesInfo(program, checker, sourceFile),
      fileSet: new FileSet(program),
    },
    pos,
  };
}
