/**
 * Definition handlers: textDocument/definition, textDocument/typeDefinition
 * and the textDocument/xdefinition extension.
 *
 * All three run the same resolution and project its results. A position that
 * is not on an identifier yields an empty list; other failures are logged and
 * reach the client as protocol errors.
 */
import {
  DefinitionRequest,
  RequestType,
  TypeDefinitionRequest,
  type CancellationToken,
  type Location,
  type TextDocumentPositionParams,
} from "vscode-languageserver/node.js";
import { formatError, isInvalidNodeError } from "@tsnav/analysis";
import type { ServerContext } from "../context.js";
import { resolveDefinitions } from "../definition/resolve.js";
import type { SymbolLocationInformation } from "../definition/types.js";
import { outOfWorkspaceError, toResponseError } from "../mapping/lsp-types.js";
import { isWorkspaceUri } from "../services/workspace-uri.js";

export const XDefinitionRequest = new RequestType<TextDocumentPositionParams, SymbolLocationInformation[], void>(
  "textDocument/xdefinition",
);

export async function handleXDefinition(
  ctx: ServerContext,
  params: TextDocumentPositionParams,
  token?: CancellationToken,
  method: string = XDefinitionRequest.method,
): Promise<SymbolLocationInformation[]> {
  const uri = params.textDocument.uri;
  if (!isWorkspaceUri(uri, ctx.workspaceRoot, ctx.paths)) {
    throw outOfWorkspaceError(method, uri);
  }

  try {
    return await resolveDefinitions(ctx, { uri, position: params.position }, token);
  } catch (e) {
    // Clicked on something that is not an identifier (comment, string, ...)
    if (isInvalidNodeError(e)) {
      ctx.logger.log(`[${method}] ${e.message}`);
      return [];
    }
    const response = toResponseError(e);
    ctx.logger.error(`[${method}] failed for ${uri}: ${formatError(e)}`);
    throw response ?? e;
  }
}

export async function handleDefinition(
  ctx: ServerContext,
  params: TextDocumentPositionParams,
  token?: CancellationToken,
): Promise<Location[]> {
  const res = await handleXDefinition(ctx, params, token, DefinitionRequest.method);
  return res.map((li) => li.location);
}

export async function handleTypeDefinition(
  ctx: ServerContext,
  params: TextDocumentPositionParams,
  token?: CancellationToken,
): Promise<Location[]> {
  const res = await handleXDefinition(ctx, params, token, TypeDefinitionRequest.method);
  const locs: Location[] = [];
  for (const li of res) {
    // not everything with a definition has a type definition
    if (li.typeLocation) locs.push(li.typeLocation);
  }
  return locs;
}

/**
 * Registers the definition handlers on the connection.
 */
export function registerFeatureHandlers(ctx: ServerContext): void {
  ctx.connection.onDefinition((params, token) => handleDefinition(ctx, params, token));
  ctx.connection.onTypeDefinition((params, token) => handleTypeDefinition(ctx, params, token));
  ctx.connection.onRequest(XDefinitionRequest, (params, token) => handleXDefinition(ctx, params, token));
}
