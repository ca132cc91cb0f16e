import * as fs from "node:fs";
import path from "node:path";
import ts from "typescript";
import type { Logger } from "./types.js";
import type { OverlayFs } from "./overlay-fs.js";
import type { PathUtils } from "./paths.js";

/** Used when the workspace has no tsconfig, and under whatever a tsconfig leaves unset. */
const FALLBACK_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  allowJs: true,
  skipLibCheck: true,
  resolveJsonModule: true,
  types: [],
};

export interface TsServiceConfig {
  readonly workspaceRoot?: string | null;
  /** Absolute, or relative to the workspace root. */
  readonly tsconfigPath?: string | null;
}

/** What a tsconfig contributes to the program. */
interface ProjectShape {
  readonly configPath: string | null;
  readonly options: ts.CompilerOptions;
  readonly roots: readonly string[];
}

function withFallbacks(options: ts.CompilerOptions): ts.CompilerOptions {
  return { ...FALLBACK_OPTIONS, ...options, types: options.types ?? FALLBACK_OPTIONS.types, noEmit: true };
}

function messageOf(diagnostic: ts.Diagnostic): string {
  return ts.flattenDiagnosticMessageText(diagnostic.messageText, " ");
}

/** Stable key of a project shape; equal keys need no new program. */
function shapeKey(shape: ProjectShape): string {
  const options = Object.keys(shape.options)
    .sort()
    .map((key) => [key, shape.options[key]]);
  return JSON.stringify([shape.configPath, options, [...shape.roots].sort()]);
}

/**
 * TypeScript language service over the workspace's tsconfig plus the
 * editor's open documents. Every change the program can observe moves the
 * project version; the service rebuilds its program lazily from that.
 */
export class TsService {
  readonly #overlay: OverlayFs;
  readonly #paths: PathUtils;
  readonly #logger: Logger;
  readonly #service: ts.LanguageService;
  #root: string | null = null;
  #shape: ProjectShape = { configPath: null, options: withFallbacks({}), roots: [] };
  #shapeKey = shapeKey(this.#shape);
  #version = 1;

  constructor(overlay: OverlayFs, paths: PathUtils, logger: Logger) {
    this.#overlay = overlay;
    this.#paths = paths;
    this.#logger = logger;
    this.#service = ts.createLanguageService(this.#host(), ts.createDocumentRegistry(paths.isCaseSensitive()));
  }

  /** Re-reads the tsconfig; a root of `null` keeps the current one. */
  configure(config: TsServiceConfig = {}): void {
    const root = config.workspaceRoot ? path.resolve(config.workspaceRoot) : this.#root;
    const shape = this.#readProject(root ?? process.cwd(), config.tsconfigPath ?? null);
    const key = shapeKey(shape);
    if (key === this.#shapeKey && root === this.#root) return;

    this.#root = root;
    this.#shape = shape;
    this.#shapeKey = key;
    this.#overlay.setBaseRoots(shape.roots);
    this.#version++;
    this.#logger.info(`[ts] project root=${root ?? "<cwd>"} config=${shape.configPath ?? "<none>"} version=${this.#version}`);
  }

  upsertOverlay(fileAbs: string, text: string): void {
    const before = this.#overlay.snapshot(fileAbs);
    if (this.#overlay.upsert(fileAbs, text) === before) return;
    this.#version++;
    this.#logger.log(`[ts] open document ${this.#paths.canonical(fileAbs)} (version=${this.#version})`);
  }

  deleteOverlay(fileAbs: string): void {
    if (!this.#overlay.has(fileAbs)) return;
    this.#overlay.delete(fileAbs);
    this.#version++;
    this.#logger.log(`[ts] closed document ${this.#paths.canonical(fileAbs)} (version=${this.#version})`);
  }

  getProjectVersion(): number {
    return this.#version;
  }

  getProgram(): ts.Program | undefined {
    return this.#service.getProgram();
  }

  canonical(fileAbs: string): string {
    return this.#paths.canonical(fileAbs);
  }

  dispose(): void {
    this.#service.dispose();
  }

  #host(): ts.LanguageServiceHost {
    const overlay = this.#overlay;
    return {
      getCompilationSettings: () => this.#shape.options,
      getCurrentDirectory: () => this.#root ?? process.cwd(),
      getDefaultLibFileName: (options) => ts.getDefaultLibFilePath(options),
      getProjectVersion: () => String(this.#version),
      useCaseSensitiveFileNames: () => this.#paths.isCaseSensitive(),
      getScriptFileNames: () => overlay.listScriptRoots(),
      getScriptVersion: (file) => String(overlay.snapshot(file)?.version ?? 0),
      getScriptSnapshot: (file) => {
        const text = overlay.readFile(file);
        return text === undefined ? undefined : ts.ScriptSnapshot.fromString(text);
      },
      fileExists: (file) => overlay.fileExists(file),
      readFile: (file) => overlay.readFile(file),
      readDirectory: (dir, extensions, excludes, includes, depth) =>
        ts.sys.readDirectory(dir, extensions, excludes, includes, depth),
      directoryExists: (dir) => ts.sys.directoryExists(dir),
      getDirectories: (dir) => ts.sys.getDirectories(dir),
      realpath: (file) => (overlay.has(file) || !fs.existsSync(file) ? file : fs.realpathSync.native(file)),
    };
  }

  #readProject(root: string, explicit: string | null): ProjectShape {
    const configPath = this.#locateTsconfig(root, explicit);
    if (!configPath) {
      this.#logger.warn(`[ts] no tsconfig found under ${root}; using defaults`);
      return { configPath: null, options: withFallbacks({}), roots: [] };
    }

    const canonicalPath = this.#paths.canonical(configPath);
    const json = ts.readConfigFile(configPath, ts.sys.readFile);
    if (json.error) {
      this.#logger.error(`[ts] cannot read ${configPath}: ${messageOf(json.error)}`);
      return { configPath: canonicalPath, options: withFallbacks({}), roots: [] };
    }

    const parsed = ts.parseJsonConfigFileContent(json.config, ts.sys, path.dirname(configPath), undefined, configPath);
    if (parsed.errors.length > 0) {
      this.#logger.warn(`[ts] ${configPath}: ${parsed.errors.map(messageOf).join("; ")}`);
    }
    return {
      configPath: canonicalPath,
      options: withFallbacks(parsed.options),
      roots: parsed.fileNames.map((file) => this.#paths.canonical(file)),
    };
  }

  #locateTsconfig(root: string, explicit: string | null): string | null {
    if (explicit) return path.resolve(root, explicit);
    const found = ts.findConfigFile(root, ts.sys.fileExists);
    // a tsconfig above the root belongs to another project
    return found && this.#paths.isWithin(root, found) ? found : null;
  }
}
