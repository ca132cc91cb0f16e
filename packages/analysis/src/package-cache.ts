import { promises as fsp } from "node:fs";
import path from "node:path";
import type { Logger } from "./types.js";

export interface PackageInfo {
  readonly name: string;
  readonly version?: string;
  /** Directory holding the package.json. */
  readonly dir: string;
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}

/**
 * package.json reads keyed by directory. Entries are promises so concurrent
 * requests for the same directory share one read; a directory without a
 * readable package.json caches `null`.
 */
export class PackageCache {
  #entries = new Map<string, Promise<PackageInfo | null>>();

  constructor(private readonly logger?: Logger) {}

  read(dir: string): Promise<PackageInfo | null> {
    const key = path.resolve(dir);
    let entry = this.#entries.get(key);
    if (!entry) {
      entry = this.#load(key);
      this.#entries.set(key, entry);
    }
    return entry;
  }

  get size(): number {
    return this.#entries.size;
  }

  clear(): void {
    this.#entries.clear();
  }

  async #load(dir: string): Promise<PackageInfo | null> {
    const file = path.join(dir, "package.json");
    let text: string;
    try {
      text = await fsp.readFile(file, "utf8");
    } catch (e) {
      if (!isMissing(e)) this.logger?.warn(`[packages] cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      this.logger?.warn(`[packages] invalid JSON in ${file}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
    if (json === null || typeof json !== "object") return null;
    const name = "name" in json && typeof json.name === "string" ? json.name : path.basename(dir);
    const version = "version" in json && typeof json.version === "string" ? json.version : undefined;
    return version === undefined ? { name, dir } : { name, version, dir };
  }
}
