import path from "node:path";
import type { DefInfo, DefKind } from "./def-info.js";
import { throwIfCancelled, type CancellationSignal } from "./errors.js";
import { isNodeModulesPath, type FindPackageFunc } from "./find-package.js";
import type { PackageCache } from "./package-cache.js";
import type { AnalyzedPackage } from "./types.js";

/** Cross-reference identity of a declaration. */
export interface SymbolDescriptor {
  readonly package: string;
  readonly packageVersion?: string;
  /** Declared in a dependency rather than in the workspace. */
  readonly vendor: boolean;
  /** Declaring file relative to its package, POSIX separators, no extension. */
  readonly module: string;
  readonly container: readonly string[];
  readonly name: string;
  readonly kind: DefKind;
  readonly exported: boolean;
  readonly id: string;
}

const SOURCE_EXTENSION = /(\.d)?\.[mc]?[jt]sx?$/;

export function moduleIdOf(packageDir: string, fileName: string): string {
  return path.relative(packageDir, fileName).split(path.sep).join("/").replace(SOURCE_EXTENSION, "");
}

export function symbolId(pkgName: string, module: string, container: readonly string[], name: string): string {
  return [pkgName, "-", module, ...container, name].join("/");
}

export async function describeSymbol(
  token: CancellationSignal | undefined,
  pkg: AnalyzedPackage,
  packageCache: PackageCache,
  rootPath: string,
  def: DefInfo,
  findPackage: FindPackageFunc,
): Promise<SymbolDescriptor> {
  throwIfCancelled(token);
  const owner = await findPackage(packageCache, def.fileName, rootPath);
  throwIfCancelled(token);

  const sf = pkg.program.getSourceFile(def.fileName);
  const vendor = (sf !== undefined && pkg.program.isSourceFileFromExternalLibrary(sf)) || isNodeModulesPath(def.fileName);
  const module = moduleIdOf(owner.dir, def.fileName);
  const descriptor: SymbolDescriptor = {
    package: owner.name,
    vendor,
    module,
    container: def.container,
    name: def.name,
    kind: def.kind,
    exported: def.exported,
    id: symbolId(owner.name, module, def.container, def.name),
  };
  return owner.version === undefined ? descriptor : { ...descriptor, packageVersion: owner.version };
}
