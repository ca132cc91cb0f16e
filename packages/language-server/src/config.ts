import { FIND_PACKAGE_MODES, type FindPackageMode, type Logger } from "@tsnav/analysis";

export interface ServerConfig {
  /** How the package of a declaring file is found for symbol descriptors. */
  readonly findPackage: FindPackageMode;
  /** Explicit tsconfig, absolute or relative to the workspace root. */
  readonly tsconfigPath: string | null;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = Object.freeze({
  findPackage: "nearest",
  tsconfigPath: null,
});

function isFindPackageMode(value: unknown): value is FindPackageMode {
  return FIND_PACKAGE_MODES.some((mode) => mode === value);
}

/**
 * Reads `initializationOptions` (or the `tsnav` settings section). Unknown
 * keys are ignored; invalid values keep their defaults and are reported.
 */
export function parseServerConfig(raw: unknown, logger: Logger, base: ServerConfig = DEFAULT_SERVER_CONFIG): ServerConfig {
  if (raw === null || raw === undefined) return base;
  if (typeof raw !== "object") {
    logger.warn(`[config] ignoring non-object options: ${JSON.stringify(raw)}`);
    return base;
  }

  let findPackage = base.findPackage;
  if ("findPackage" in raw && raw.findPackage !== undefined) {
    if (isFindPackageMode(raw.findPackage)) {
      findPackage = raw.findPackage;
    } else {
      logger.warn(`[config] invalid findPackage ${JSON.stringify(raw.findPackage)}; expected one of ${FIND_PACKAGE_MODES.join(", ")}`);
    }
  }

  let tsconfigPath = base.tsconfigPath;
  if ("tsconfigPath" in raw && raw.tsconfigPath !== undefined) {
    if (raw.tsconfigPath === null || (typeof raw.tsconfigPath === "string" && raw.tsconfigPath.length > 0)) {
      tsconfigPath = raw.tsconfigPath;
    } else {
      logger.warn(`[config] invalid tsconfigPath ${JSON.stringify(raw.tsconfigPath)}`);
    }
  }

  return { findPackage, tsconfigPath };
}
