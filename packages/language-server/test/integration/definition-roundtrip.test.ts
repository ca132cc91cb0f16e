/**
 * Definition requests over a real JSON-RPC connection.
 */
import fs from "node:fs";
import path from "node:path";
import { afterAll, beforeAll, describe, test, expect } from "vitest";
import {
  DefinitionRequest,
  DidOpenTextDocumentNotification,
  ErrorCodes,
  InitializeRequest,
  InitializedNotification,
  ResponseError,
  ShutdownRequest,
  TypeDefinitionRequest,
} from "vscode-languageserver/node.js";
import { URI } from "vscode-uri";
import { XDefinitionRequest } from "@tsnav/language-server";
import { APP_TS, span, writeProject } from "../helpers/workspace.js";
import { startInProcessServer, type InProcessServer } from "./helpers/lsp-harness.js";

let root: string;
let server: InProcessServer;

function fileUri(rel: string): string {
  return URI.file(path.join(root, rel)).toString();
}

beforeAll(async () => {
  root = writeProject();
  server = startInProcessServer();
  const result = await server.client.sendRequest(InitializeRequest.type, {
    processId: null,
    rootUri: URI.file(root).toString(),
    capabilities: {},
    initializationOptions: { findPackage: "workspace" },
  });
  expect(result.capabilities.definitionProvider).toBe(true);
  await server.client.sendNotification(InitializedNotification.type, {});
});

afterAll(async () => {
  await server.client.sendRequest(ShutdownRequest.type);
  server.dispose();
  fs.rmSync(root, { recursive: true, force: true });
});

describe("definition round trip", () => {
  test("definition and typeDefinition answer from the open document", async () => {
    const uri = fileUri("src/app.ts");
    await server.client.sendNotification(DidOpenTextDocumentNotification.type, {
      textDocument: { uri, languageId: "typescript", version: 1, text: `\n${APP_TS}` },
    });

    const params = { textDocument: { uri }, position: { line: 5, character: 27 } };
    await expect(server.client.sendRequest(DefinitionRequest.type, params)).resolves.toEqual([
      { uri, range: span(4, 6, 4) },
    ]);
    await expect(server.client.sendRequest(TypeDefinitionRequest.type, params)).resolves.toEqual([
      { uri: fileUri("src/models.ts"), range: span(5, 13, 4) },
    ]);
  });

  test("xdefinition carries the symbol descriptor", async () => {
    const infos = await server.client.sendRequest(XDefinitionRequest, {
      textDocument: { uri: fileUri("src/models.ts") },
      position: { line: 6, character: 3 },
    });
    expect(infos).toEqual([
      {
        location: { uri: fileUri("src/models.ts"), range: span(6, 2, 4) },
        symbol: {
          package: "fixture-ls",
          packageVersion: "0.0.1",
          vendor: false,
          module: "src/models",
          container: ["Repo"],
          name: "find",
          kind: "method",
          exported: true,
          id: "fixture-ls/-/src/models/Repo/find",
        },
      },
    ]);
  });

  test("out-of-workspace request fails with InvalidParams", async () => {
    let caught: unknown;
    try {
      await server.client.sendRequest(DefinitionRequest.type, {
        textDocument: { uri: "file:///elsewhere/x.ts" },
        position: { line: 0, character: 0 },
      });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ResponseError);
    expect(caught instanceof ResponseError ? caught.code : null).toBe(ErrorCodes.InvalidParams);
  });

  test("server logs carry the tsnav prefix", () => {
    expect(server.logs.some((m) => m.startsWith("[tsnav] initialize: root="))).toBe(true);
  });
});
