import type ts from "typescript";
import {
  RequestCancelledError,
  defInfo,
  describeSymbol,
  type AnalyzedPackage,
  type CancellationSignal,
  type DefInfo,
  type FindPackageFunc,
  type PackageCache,
  type SourcePos,
  type SymbolDescriptor,
} from "@tsnav/analysis";

/** Best-effort metadata: a descriptor when everything worked, otherwise only diagnostics. */
export interface EnrichmentResult {
  readonly descriptor?: SymbolDescriptor;
  readonly diagnostics: readonly string[];
}

function describeFailure(step: string, e: unknown): string {
  return `${step}: ${e instanceof Error ? e.message : String(e)}`;
}

/**
 * Looks up the symbol descriptor of the declaration at `pos`. Failures end
 * up in `diagnostics`; only cancellation escapes.
 */
export async function enrichLocation(
  pkg: AnalyzedPackage,
  pathNodes: readonly ts.Node[],
  pos: SourcePos,
  rootPath: string,
  packageCache: PackageCache,
  findPackage: FindPackageFunc,
  token?: CancellationSignal,
): Promise<EnrichmentResult> {
  let def: DefInfo;
  try {
    def = defInfo(pkg.program, pkg.info, pathNodes, pos);
  } catch (e) {
    return { diagnostics: [describeFailure("defInfo", e)] };
  }

  try {
    const descriptor = await describeSymbol(token, pkg, packageCache, rootPath, def, findPackage);
    return { descriptor, diagnostics: [] };
  } catch (e) {
    if (e instanceof RequestCancelledError) throw e;
    return { diagnostics: [describeFailure("describeSymbol", e)] };
  }
}
