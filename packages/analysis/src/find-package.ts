import path from "node:path";
import type { PackageCache, PackageInfo } from "./package-cache.js";

/** Resolves the package a declaring file belongs to. */
export type FindPackageFunc = (cache: PackageCache, fileName: string, rootPath: string) => Promise<PackageInfo>;

export type FindPackageMode = "nearest" | "workspace";

export const FIND_PACKAGE_MODES: readonly FindPackageMode[] = ["nearest", "workspace"];

export function isNodeModulesPath(fileName: string): boolean {
  return fileName.replace(/\\/g, "/").split("/").includes("node_modules");
}

/** Closest package.json above the file. */
export const findNearestPackage: FindPackageFunc = async (cache, fileName) => {
  let dir = path.dirname(path.resolve(fileName));
  for (;;) {
    const info = await cache.read(dir);
    if (info) return info;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new Error(`no package.json found for ${fileName}`);
};

/**
 * The workspace root's package for workspace sources; dependencies and files
 * outside the root fall back to the nearest package.
 */
export const findWorkspacePackage: FindPackageFunc = async (cache, fileName, rootPath) => {
  const rel = path.relative(path.resolve(rootPath), path.resolve(fileName));
  const inside = rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
  if (inside && !isNodeModulesPath(rel)) {
    const root = await cache.read(rootPath);
    if (root) return root;
  }
  return findNearestPackage(cache, fileName, rootPath);
};

export function createFindPackageFunc(mode: FindPackageMode): FindPackageFunc {
  return mode === "workspace" ? findWorkspacePackage : findNearestPackage;
}
