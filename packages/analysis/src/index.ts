export * from "./types.js";
export * from "./errors.js";
export * from "./paths.js";
export * from "./overlay-fs.js";
export * from "./ts-service.js";
export * from "./file-set.js";
export * from "./types-info.js";
export * from "./type-check.js";
export * from "./path-nodes.js";
export * from "./type-lookup.js";
export * from "./def-info.js";
export * from "./package-cache.js";
export * from "./find-package.js";
export * from "./symbol-descriptor.js";
