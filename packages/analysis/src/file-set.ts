import type ts from "typescript";
import type { SourcePos } from "./types.js";

export interface LineColumn {
  readonly fileName: string;
  /** Zero-based. */
  readonly line: number;
  /** Zero-based, in UTF-16 code units. */
  readonly character: number;
}

/** Position map of every file in a program. */
export class FileSet {
  constructor(private readonly program: ts.Program) {}

  file(fileName: string): ts.SourceFile | undefined {
    return this.program.getSourceFile(fileName);
  }

  position(pos: SourcePos): LineColumn | null {
    const sf = this.file(pos.fileName);
    if (!sf) return null;
    const offset = Math.min(Math.max(pos.offset, 0), sf.text.length);
    const { line, character } = sf.getLineAndCharacterOfPosition(offset);
    return { fileName: sf.fileName, line, character };
  }
}
