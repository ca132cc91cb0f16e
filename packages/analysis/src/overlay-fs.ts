import * as fs from "node:fs";
import { PathUtils } from "./paths.js";

export interface Snapshot {
  text: string;
  version: number;
}

/**
 * In-memory contents of the editor's open documents, layered over disk.
 * Every overlay is also a script root of the TS program; the tsconfig's own
 * files are the base roots.
 */
export class OverlayFs {
  #paths: PathUtils;
  #files = new Map<string, Snapshot>();
  #baseRoots = new Set<string>();

  constructor(paths: PathUtils) {
    this.#paths = paths;
  }

  setBaseRoots(roots: readonly string[]): void {
    this.#baseRoots = new Set(roots.map((root) => this.#paths.canonical(root)));
  }

  has(file: string): boolean {
    return this.#files.has(this.#paths.canonical(file));
  }

  snapshot(file: string): Snapshot | undefined {
    return this.#files.get(this.#paths.canonical(file));
  }

  delete(fileAbs: string): void {
    this.#files.delete(this.#paths.canonical(fileAbs));
  }

  upsert(fileAbs: string, text: string): Snapshot {
    const key = this.#paths.canonical(fileAbs);
    const prev = this.#files.get(key);
    if (prev && prev.text === text) return prev;
    const next: Snapshot = { text, version: (prev?.version ?? 0) + 1 };
    this.#files.set(key, next);
    return next;
  }

  listScriptRoots(): string[] {
    const roots = new Set(this.#baseRoots);
    for (const key of this.#files.keys()) roots.add(key);
    return Array.from(roots);
  }

  fileExists(file: string): boolean {
    return this.has(file) || fs.existsSync(file);
  }

  readFile(file: string): string | undefined {
    const fromOverlay = this.snapshot(file);
    if (fromOverlay) return fromOverlay.text;
    return fs.existsSync(file) ? fs.readFileSync(file, "utf8") : undefined;
  }
}
