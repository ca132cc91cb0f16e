// Test-facing exports for language-server internals.
export * from "./config.js";
export * from "./context.js";
export * from "./server.js";
export * from "./definition/types.js";
export * from "./definition/identifier.js";
export * from "./definition/location.js";
export * from "./definition/enrich.js";
export * from "./definition/resolve.js";
export * from "./handlers/features.js";
export * from "./handlers/lifecycle.js";
export * from "./mapping/lsp-types.js";
export * from "./services/workspace-uri.js";
