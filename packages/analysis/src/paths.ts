import path from "node:path";
import ts from "typescript";

export class PathUtils {
  constructor(private readonly caseSensitive: boolean) {}

  normalize(file: string): string {
    return file.replace(/\\/g, "/");
  }

  canonical(file: string): string {
    const normalized = this.normalize(file);
    return this.caseSensitive ? normalized : normalized.toLowerCase();
  }

  isCaseSensitive(): boolean {
    return this.caseSensitive;
  }

  /** True when `file` is `root` itself or lies below it. */
  isWithin(root: string, file: string): boolean {
    const rel = path.relative(this.canonical(path.resolve(root)), this.canonical(path.resolve(file)));
    return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
  }
}

export function createPathUtils(): PathUtils {
  return new PathUtils(ts.sys.useCaseSensitiveFileNames ?? false);
}
