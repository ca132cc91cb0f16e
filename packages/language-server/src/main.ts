/**
 * tsnav language server - entry point
 *
 * - context.ts            - ServerContext with shared services and workspace state
 * - definition/           - declaration lookup for a cursor position
 * - handlers/features.ts  - definition, typeDefinition and xdefinition requests
 * - handlers/lifecycle.ts - initialize, document and configuration events
 */
import { createConnection, ProposedFeatures } from "vscode-languageserver/node.js";
import { startServer } from "./server.js";

startServer(createConnection(ProposedFeatures.all));
