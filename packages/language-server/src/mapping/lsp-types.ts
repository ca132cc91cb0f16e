/**
 * Conversions between analyzer values and LSP values.
 */
import { ErrorCodes, LSPErrorCodes, ResponseError } from "vscode-languageserver/node.js";
import { URI } from "vscode-uri";
import { DefinitionNotFoundError, RequestCancelledError } from "@tsnav/analysis";

export function toLspUri(fileName: string): string {
  if (fileName.startsWith("file://")) return fileName;
  return URI.file(fileName).toString();
}

export function outOfWorkspaceError(method: string, uri: string): ResponseError<void> {
  return new ResponseError(
    ErrorCodes.InvalidParams,
    `${method} not yet supported for out-of-workspace URI (${JSON.stringify(uri)})`,
  );
}

/**
 * Protocol error for a known failure, or `null` when the error should
 * propagate as it is.
 */
export function toResponseError(e: unknown): ResponseError<void> | null {
  if (e instanceof ResponseError) return e;
  if (e instanceof DefinitionNotFoundError) return new ResponseError(LSPErrorCodes.RequestFailed, e.message);
  if (e instanceof RequestCancelledError) return new ResponseError(LSPErrorCodes.RequestCancelled, e.message);
  return null;
}
