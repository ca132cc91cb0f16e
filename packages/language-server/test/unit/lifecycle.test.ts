import path from "node:path";
import { afterEach, describe, test, expect, vi } from "vitest";
import { FileChangeType, TextDocumentSyncKind, type FileEvent } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import {
  handleDidChangeConfiguration,
  handleDidChangeWatchedFiles,
  handleInitialize,
  registerLifecycleHandlers,
  reloadKindForFileChanges,
} from "@tsnav/language-server";
import { createMockLogger, createTestServer, type TestServer } from "../helpers/workspace.js";

const servers: TestServer[] = [];

function server(initializationOptions?: unknown): TestServer {
  const s = createTestServer(initializationOptions);
  servers.push(s);
  return s;
}

afterEach(() => {
  for (const s of servers.splice(0)) s.dispose();
});

function changed(uri: string): FileEvent {
  return { uri, type: FileChangeType.Changed };
}

describe("reloadKindForFileChanges", () => {
  test("tsconfig and jsconfig changes reload the project", () => {
    expect(reloadKindForFileChanges([changed("file:///ws/tsconfig.json")])).toBe("project");
    expect(reloadKindForFileChanges([changed("file:///ws/tsconfig.build.json")])).toBe("project");
    expect(reloadKindForFileChanges([changed("file:///ws/jsconfig.json")])).toBe("project");
  });

  test("package.json changes clear package info", () => {
    expect(reloadKindForFileChanges([changed("file:///ws/package.json")])).toBe("packages");
    expect(reloadKindForFileChanges([changed("file:///ws/package.json"), changed("file:///ws/tsconfig.json")])).toBe(
      "project",
    );
  });

  test("source changes need no reload", () => {
    expect(reloadKindForFileChanges([changed("file:///ws/src/app.ts")])).toBeNull();
  });
});

describe("handleInitialize", () => {
  test("advertises the definition capabilities", () => {
    const { ctx } = server();
    const result = handleInitialize(ctx, { processId: null, rootUri: null, capabilities: {} });
    expect(result).toEqual({
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        definitionProvider: true,
        typeDefinitionProvider: true,
        experimental: { xdefinitionProvider: true },
      },
      serverInfo: { name: "tsnav" },
    });
  });

  test("takes the root from rootUri and the configuration from initializationOptions", () => {
    const s = server({ findPackage: "workspace" });
    expect(s.ctx.workspaceRoot).toBe(s.root);
    expect(s.ctx.config).toEqual({ findPackage: "workspace", tsconfigPath: null });
    expect(s.ctx.tsService.getProgram()?.getRootFileNames()).toContain(
      s.ctx.tsService.canonical(path.join(s.root, "src/app.ts")),
    );
  });

  test("falls back to the first workspace folder", () => {
    const { ctx, root, uri } = server();
    ctx.workspaceRoot = null;
    handleInitialize(ctx, {
      processId: null,
      rootUri: null,
      capabilities: {},
      workspaceFolders: [{ uri: uri(""), name: "fixture" }],
    });
    expect(ctx.workspaceRoot).toBe(root);
  });
});

describe("configuration and watched files", () => {
  test("didChangeConfiguration applies the tsnav section and reloads", () => {
    const { ctx, logger } = server();
    const before = ctx.getFindPackageFunc();
    handleDidChangeConfiguration(ctx, { settings: { tsnav: { findPackage: "workspace" } } });
    expect(ctx.config.findPackage).toBe("workspace");
    expect(ctx.getFindPackageFunc()).not.toBe(before);
    expect(logger.info).toHaveBeenCalledWith(expect.stringContaining("[workspace] project reload (configuration change;"));
  });

  test("settings without a tsnav section keep the configuration", () => {
    const { ctx } = server({ findPackage: "workspace" });
    handleDidChangeConfiguration(ctx, { settings: { editor: {} } });
    expect(ctx.config.findPackage).toBe("workspace");
  });

  test("package.json change clears the package cache without a reload", async () => {
    const { ctx, root, uri } = server();
    await ctx.packageCache.read(root);
    const reload = vi.spyOn(ctx, "reloadProject");
    handleDidChangeWatchedFiles(ctx, { changes: [changed(uri("package.json"))] });
    expect(ctx.packageCache.size).toBe(0);
    expect(reload).not.toHaveBeenCalled();
  });

  test("tsconfig change reloads the project", () => {
    const { ctx, uri } = server();
    const reload = vi.spyOn(ctx, "reloadProject");
    handleDidChangeWatchedFiles(ctx, { changes: [changed(uri("tsconfig.json"))] });
    expect(reload).toHaveBeenCalledWith("watched files");
  });
});

type DocumentHandler = (e: { document: TextDocument }) => void;

describe("registerLifecycleHandlers", () => {
  test("document events keep the overlay in sync", () => {
    const handlers: { open?: DocumentHandler; close?: DocumentHandler } = {};
    const documents = {
      onDidOpen: vi.fn((fn: DocumentHandler) => {
        handlers.open = fn;
      }),
      onDidChangeContent: vi.fn(),
      onDidClose: vi.fn((fn: DocumentHandler) => {
        handlers.close = fn;
      }),
    };
    const connection = {
      onInitialize: vi.fn(),
      onDidChangeConfiguration: vi.fn(),
      onDidChangeWatchedFiles: vi.fn(),
    };
    const logger = createMockLogger();
    const ctx = {
      connection,
      documents,
      logger,
      syncDocument: vi.fn(),
      closeDocument: vi.fn(),
    };

    registerLifecycleHandlers(ctx as never);
    const doc = TextDocument.create("file:///ws/src/app.ts", "typescript", 1, "export {};");
    expect(handlers.open).toBeDefined();
    handlers.open?.({ document: doc });
    handlers.close?.({ document: doc });

    expect(ctx.syncDocument).toHaveBeenCalledWith(doc);
    expect(ctx.closeDocument).toHaveBeenCalledWith("file:///ws/src/app.ts");
    expect(connection.onInitialize).toHaveBeenCalledTimes(1);
  });

  test("sync failure is logged instead of thrown", () => {
    const handlers: { open?: DocumentHandler } = {};
    const logger = createMockLogger();
    const ctx = {
      connection: { onInitialize: vi.fn(), onDidChangeConfiguration: vi.fn(), onDidChangeWatchedFiles: vi.fn() },
      documents: {
        onDidOpen: vi.fn((fn: DocumentHandler) => {
          handlers.open = fn;
        }),
        onDidChangeContent: vi.fn(),
        onDidClose: vi.fn(),
      },
      logger,
      syncDocument: vi.fn(() => {
        throw new Error("disk full");
      }),
      closeDocument: vi.fn(),
    };

    registerLifecycleHandlers(ctx as never);
    handlers.open?.({ document: TextDocument.create("file:///ws/a.ts", "typescript", 1, "") });
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("[open] sync failed for file:///ws/a.ts: Error: disk full"));
  });
});
