import { URI } from "vscode-uri";
import type { PathUtils } from "@tsnav/analysis";

/**
 * True for `file:` URIs inside the workspace root; with no root every
 * `file:` URI is addressable.
 */
export function isWorkspaceUri(uri: string, workspaceRoot: string | null, paths: PathUtils): boolean {
  let parsed: URI;
  try {
    parsed = URI.parse(uri, true);
  } catch {
    return false;
  }
  if (parsed.scheme !== "file" || parsed.fsPath === "") return false;
  if (!workspaceRoot) return true;
  return paths.isWithin(workspaceRoot, parsed.fsPath);
}
