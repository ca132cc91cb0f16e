import { TextDocuments, type Connection } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createServerContext, type ServerContext } from "./context.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";
import type { Logger } from "@tsnav/analysis";

export function createConnectionLogger(connection: Connection): Logger {
  return {
    log: (m: string) => connection.console.log(`[tsnav] ${m}`),
    info: (m: string) => connection.console.info(`[tsnav] ${m}`),
    warn: (m: string) => connection.console.warn(`[tsnav] ${m}`),
    error: (m: string) => connection.console.error(`[tsnav] ${m}`),
  };
}

/**
 * Wires the handlers onto `connection` and starts listening.
 */
export function startServer(connection: Connection): ServerContext {
  const documents = new TextDocuments(TextDocument);
  const ctx = createServerContext({
    connection,
    documents,
    logger: createConnectionLogger(connection),
  });

  registerLifecycleHandlers(ctx);
  registerFeatureHandlers(ctx);

  connection.onShutdown(() => {
    ctx.tsService.dispose();
  });

  documents.listen(connection);
  connection.listen();
  return ctx;
}
