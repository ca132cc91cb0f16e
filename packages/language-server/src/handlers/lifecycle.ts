/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import {
  TextDocumentSyncKind,
  type DidChangeConfigurationParams,
  type DidChangeWatchedFilesParams,
  type FileEvent,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import path from "node:path";
import { formatError } from "@tsnav/analysis";
import { parseServerConfig } from "../config.js";
import type { ServerContext } from "../context.js";

type ReloadKind = "project" | "packages" | null;

export function reloadKindForFileChanges(changes: readonly FileEvent[]): ReloadKind {
  let kind: ReloadKind = null;
  for (const change of changes) {
    const base = path.basename(URI.parse(change.uri).fsPath).toLowerCase();
    if (base === "jsconfig.json" || (base.startsWith("tsconfig") && base.endsWith(".json"))) return "project";
    if (base === "package.json") kind = "packages";
  }
  return kind;
}

function workspaceRootFrom(params: InitializeParams): string | null {
  if (params.rootUri) return URI.parse(params.rootUri).fsPath;
  const folder = params.workspaceFolders?.[0];
  if (folder) return URI.parse(folder.uri).fsPath;
  return null;
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.workspaceRoot = workspaceRootFrom(params);
  ctx.config = parseServerConfig(params.initializationOptions, ctx.logger);
  ctx.logger.info(
    `initialize: root=${ctx.workspaceRoot ?? "<cwd>"} findPackage=${ctx.config.findPackage} caseSensitive=${ctx.paths.isCaseSensitive()}`,
  );
  ctx.tsService.configure({ workspaceRoot: ctx.workspaceRoot, tsconfigPath: ctx.config.tsconfigPath });
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      definitionProvider: true,
      typeDefinitionProvider: true,
      experimental: { xdefinitionProvider: true },
    },
    serverInfo: { name: "tsnav" },
  };
}

export function handleDidChangeConfiguration(ctx: ServerContext, params: DidChangeConfigurationParams): void {
  const settings: unknown = params.settings;
  const section = settings !== null && typeof settings === "object" && "tsnav" in settings
    ? settings.tsnav
    : undefined;
  if (section !== undefined) {
    ctx.config = parseServerConfig(section, ctx.logger, ctx.config);
  }
  ctx.reloadProject("configuration change");
}

export function handleDidChangeWatchedFiles(ctx: ServerContext, params: DidChangeWatchedFilesParams): void {
  if (!params.changes.length) return;
  const kind = reloadKindForFileChanges(params.changes);
  if (kind === "project") {
    ctx.reloadProject("watched files");
  } else if (kind === "packages") {
    ctx.logger.log("didChangeWatchedFiles: package.json changed, clearing package cache");
    ctx.packageCache.clear();
  }
}

function syncDocument(ctx: ServerContext, doc: TextDocument, reason: "open" | "change"): void {
  try {
    ctx.syncDocument(doc);
  } catch (e) {
    ctx.logger.error(`[${reason}] sync failed for ${doc.uri}: ${formatError(e)}`);
  }
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params) => handleInitialize(ctx, params));

  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri}`);
    syncDocument(ctx, e.document, "open");
  });

  ctx.documents.onDidChangeContent((e) => {
    ctx.logger.log(`didChange ${e.document.uri}`);
    syncDocument(ctx, e.document, "change");
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
    ctx.closeDocument(e.document.uri);
  });

  ctx.connection.onDidChangeConfiguration((params) => {
    ctx.logger.log("didChangeConfiguration: reloading project");
    handleDidChangeConfiguration(ctx, params);
  });

  ctx.connection.onDidChangeWatchedFiles((params) => handleDidChangeWatchedFiles(ctx, params));
}
