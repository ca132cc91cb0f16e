import type { Connection, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import {
  OverlayFs,
  PackageCache,
  TsService,
  createFindPackageFunc,
  createPathUtils,
  typeCheck,
  uriToFileName,
  type FindPackageFunc,
  type Logger,
  type PathUtils,
} from "@tsnav/analysis";
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from "./config.js";
import type { ResolutionContext, TypeCheckFn } from "./definition/types.js";

/**
 * Shared server context passed to all handlers.
 * Holds references to core services and the per-workspace state.
 */
export interface ServerContext extends ResolutionContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;
  readonly paths: PathUtils;
  readonly overlayFs: OverlayFs;
  readonly tsService: TsService;
  readonly packageCache: PackageCache;

  // Mutable state
  workspaceRoot: string | null;
  config: ServerConfig;

  syncDocument(doc: TextDocument): void;
  closeDocument(uri: string): void;
  reloadProject(reason: string): void;
}

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
}

/**
 * Creates the server context. Workspace root and configuration are set
 * during initialization.
 */
export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger } = init;
  const paths = createPathUtils();
  const overlayFs = new OverlayFs(paths);
  const tsService = new TsService(overlayFs, paths, logger);
  const packageCache = new PackageCache(logger);

  let workspaceRoot: string | null = null;
  let config: ServerConfig = DEFAULT_SERVER_CONFIG;
  let findPackage: FindPackageFunc = createFindPackageFunc(config.findPackage);

  const runTypeCheck: TypeCheckFn = (uri, position, token) => typeCheck(tsService, uri, position, token);

  function syncDocument(doc: TextDocument): void {
    tsService.upsertOverlay(uriToFileName(doc.uri), doc.getText());
  }

  function closeDocument(uri: string): void {
    tsService.deleteOverlay(uriToFileName(uri));
  }

  function reloadProject(reason: string): void {
    const before = tsService.getProjectVersion();
    tsService.configure({ workspaceRoot, tsconfigPath: config.tsconfigPath });
    packageCache.clear();
    const changed = tsService.getProjectVersion() !== before;
    logger.info(`[workspace] project reload (${reason}; version=${tsService.getProjectVersion()})${changed ? "" : " [no host change]"}`);
  }

  return {
    connection,
    documents,
    logger,
    paths,
    overlayFs,
    tsService,
    packageCache,

    get workspaceRoot() { return workspaceRoot; },
    set workspaceRoot(v) { workspaceRoot = v; },

    get config() { return config; },
    set config(v) {
      config = v;
      findPackage = createFindPackageFunc(v.findPackage);
    },

    typeCheck: runTypeCheck,
    getFindPackageFunc: () => findPackage,
    syncDocument,
    closeDocument,
    reloadProject,
  };
}
