import ts from "typescript";
import { describe, test, expect } from "vitest";
import { InvalidNodeError, getPathNodesInFile } from "@tsnav/analysis";
import { MAIN_TS, SHAPES_TS, offsetAt } from "./helpers/workspace.js";

const main = ts.createSourceFile("/app/src/main.ts", MAIN_TS, ts.ScriptTarget.ES2022, true);
const shapes = ts.createSourceFile("/app/src/shapes.ts", SHAPES_TS, ts.ScriptTarget.ES2022, true);

function pathAt(sf: ts.SourceFile, line: number, character: number): ts.Node[] {
  const offset = offsetAt(sf, line, character);
  return getPathNodesInFile(sf, offset, offset);
}

describe("getPathNodesInFile", () => {
  test("innermost node is the identifier under the cursor", () => {
    const path = pathAt(main, 5, 28);
    const innermost = path[0];
    expect(innermost && ts.isIdentifier(innermost) ? innermost.text : null).toBe("origin");
    expect(path[1]?.kind).toBe(ts.SyntaxKind.NewExpression);
    expect(path[path.length - 1]).toBe(main);
  });

  test("chain runs innermost to outermost", () => {
    const path = pathAt(main, 3, 8);
    expect(path.map((n) => n.kind)).toEqual([
      ts.SyntaxKind.Identifier,
      ts.SyntaxKind.VariableDeclaration,
      ts.SyntaxKind.VariableDeclarationList,
      ts.SyntaxKind.VariableStatement,
      ts.SyntaxKind.SourceFile,
    ]);
  });

  test("cursor at the end of an identifier still resolves it", () => {
    // `Circle|(` in `new Circle(origin, count)`
    const innermost = pathAt(main, 5, 25)[0];
    expect(innermost && ts.isIdentifier(innermost) ? innermost.text : null).toBe("Circle");
  });

  test("keyword resolves to the declaration that owns it", () => {
    const innermost = pathAt(shapes, 0, 8)[0];
    expect(innermost?.kind).toBe(ts.SyntaxKind.InterfaceDeclaration);
  });

  test("comment is an invalid node", () => {
    expect(() => pathAt(main, 2, 5)).toThrow(InvalidNodeError);
  });

  test("blank line is an invalid node", () => {
    expect(() => pathAt(main, 1, 0)).toThrow(InvalidNodeError);
  });

  test("punctuation is an invalid node", () => {
    // `{` opening the object literal of `origin`
    expect(() => pathAt(main, 3, 22)).toThrow(InvalidNodeError);
  });

  test("end of file is an invalid node", () => {
    expect(() => getPathNodesInFile(main, main.text.length, main.text.length)).toThrow(InvalidNodeError);
  });

  test("range outside the file is an invalid node", () => {
    expect(() => getPathNodesInFile(main, -1, 0)).toThrow(InvalidNodeError);
    expect(() => getPathNodesInFile(main, 10, 5)).toThrow(InvalidNodeError);
    expect(() => getPathNodesInFile(main, 0, main.text.length + 1)).toThrow(InvalidNodeError);
  });

  test("a range inside one identifier resolves it", () => {
    const start = offsetAt(main, 11, 16);
    const innermost = getPathNodesInFile(main, start, start + 3)[0];
    expect(innermost && ts.isIdentifier(innermost) ? innermost.text : null).toBe("circle");
  });
});
