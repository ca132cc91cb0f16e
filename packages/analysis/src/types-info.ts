import ts from "typescript";
import type { ResolvedObject, SourcePos } from "./types.js";

/**
 * First declaration of `symbol` that lives outside the default library, or
 * `undefined` when the symbol is a builtin.
 */
export function primaryDeclaration(program: ts.Program, symbol: ts.Symbol): ts.Declaration | undefined {
  const candidates = symbol.valueDeclaration
    ? [symbol.valueDeclaration, ...(symbol.declarations ?? [])]
    : symbol.declarations ?? [];
  return candidates.find((decl) => !program.isSourceFileDefaultLibrary(decl.getSourceFile()));
}

/** Position of a declaration's name, or of the declaration itself when it has none. */
export function declarationNamePos(decl: ts.Declaration): { pos: SourcePos; name: string | null; nameNode: ts.Node | null } {
  const sf = decl.getSourceFile();
  const nameNode = ts.getNameOfDeclaration(decl) ?? null;
  const anchor = nameNode ?? decl;
  return {
    pos: { fileName: sf.fileName, offset: anchor.getStart(sf) },
    name: nameNode ? nameNode.getText(sf) : null,
    nameNode,
  };
}

export function toResolvedObject(program: ts.Program, symbol: ts.Symbol): ResolvedObject {
  const decl = primaryDeclaration(program, symbol);
  if (!decl) return { name: symbol.getName(), pos: null, symbol };
  const { pos, name } = declarationNamePos(decl);
  return { name: name ?? symbol.getName(), pos, symbol };
}

function isDeclarationName(symbol: ts.Symbol, ident: ts.Identifier): boolean {
  return symbol.declarations?.some((decl) => ts.getNameOfDeclaration(decl) === ident) ?? false;
}

function followAlias(checker: ts.TypeChecker, symbol: ts.Symbol): ts.Symbol {
  if (!(symbol.flags & ts.SymbolFlags.Alias)) return symbol;
  const target = checker.getAliasedSymbol(symbol);
  return target.declarations?.length ? target : symbol;
}

/**
 * Use and definition indexes of one source file.
 *
 * `defs` holds every identifier that is the name of a declaration, `uses`
 * every other identifier the checker binds to a symbol. Import aliases in
 * `uses` point at what they import.
 */
export class TypesInfo {
  readonly uses = new Map<ts.Identifier, ResolvedObject>();
  readonly defs = new Map<ts.Identifier, ResolvedObject>();

  constructor(
    private readonly program: ts.Program,
    private readonly checker: ts.TypeChecker,
    sourceFile: ts.SourceFile,
  ) {
    this.#index(sourceFile);
  }

  typeOf(node: ts.Node): ts.Type | undefined {
    return this.checker.getTypeAtLocation(node);
  }

  #index(sourceFile: ts.SourceFile): void {
    const visit = (node: ts.Node): void => {
      if (ts.isIdentifier(node)) {
        this.#record(node);
        return;
      }
      ts.forEachChild(node, visit);
    };
    ts.forEachChild(sourceFile, visit);
  }

  #record(ident: ts.Identifier): void {
    const symbol = this.checker.getSymbolAtLocation(ident);
    if (!symbol) return;
    if (isDeclarationName(symbol, ident)) {
      this.defs.set(ident, toResolvedObject(this.program, symbol));
      return;
    }
    this.uses.set(ident, toResolvedObject(this.program, followAlias(this.checker, symbol)));
  }
}
