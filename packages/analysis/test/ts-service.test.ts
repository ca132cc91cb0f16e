import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, test, expect } from "vitest";
import { OverlayFs, TsService, createPathUtils } from "@tsnav/analysis";
import { FIXTURE_FILES, createLogger, makeTempDir, writeFiles } from "./helpers/workspace.js";

const paths = createPathUtils();
const cleanup: Array<() => void> = [];

afterEach(() => {
  for (const fn of cleanup.splice(0)) fn();
});

function service(): { svc: TsService; logger: ReturnType<typeof createLogger> } {
  const logger = createLogger();
  const svc = new TsService(new OverlayFs(paths), paths, logger);
  cleanup.push(() => svc.dispose());
  return { svc, logger };
}

function tempRoot(files: Record<string, string>): string {
  const root = makeTempDir("tsnav-service-");
  writeFiles(root, files);
  cleanup.push(() => fs.rmSync(root, { recursive: true, force: true }));
  return root;
}

describe("TsService", () => {
  test("configure reads the workspace tsconfig", () => {
    const root = tempRoot(FIXTURE_FILES);
    const { svc } = service();
    svc.configure({ workspaceRoot: root });
    const program = svc.getProgram();
    expect(new Set(program?.getRootFileNames())).toEqual(
      new Set([paths.canonical(path.join(root, "src/main.ts")), paths.canonical(path.join(root, "src/shapes.ts"))]),
    );
    expect(program?.getCompilerOptions().noEmit).toBe(true);
    expect(program?.getCompilerOptions().types).toEqual([]);
    expect(program?.getSourceFile(paths.canonical(path.join(root, "src/shapes.ts")))).toBeDefined();
  });

  test("explicit tsconfig path is resolved against the root", () => {
    const root = tempRoot({
      "config/tsconfig.app.json": JSON.stringify({ files: ["../only.ts"] }),
      "only.ts": "export const only = 1;\n",
      "other.ts": "export const other = 1;\n",
    });
    const { svc } = service();
    svc.configure({ workspaceRoot: root, tsconfigPath: "config/tsconfig.app.json" });
    expect(svc.getProgram()?.getRootFileNames()).toEqual([paths.canonical(path.join(root, "only.ts"))]);
  });

  test("missing tsconfig falls back to defaults with a warning", () => {
    const root = tempRoot({ "a.ts": "export {};\n" });
    const { svc, logger } = service();
    svc.configure({ workspaceRoot: root });
    expect(svc.getProgram()?.getRootFileNames()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining("no tsconfig found"));
  });

  test("unchanged configuration keeps the project version", () => {
    const root = tempRoot(FIXTURE_FILES);
    const { svc } = service();
    svc.configure({ workspaceRoot: root });
    const version = svc.getProjectVersion();
    svc.configure({ workspaceRoot: root });
    expect(svc.getProjectVersion()).toBe(version);
  });

  test("open documents join the program as roots", () => {
    const root = tempRoot(FIXTURE_FILES);
    const { svc } = service();
    svc.configure({ workspaceRoot: root });
    const scratch = paths.canonical(path.join(root, "scratch.ts"));
    svc.upsertOverlay(scratch, "export const scratch = 1;\n");
    expect(svc.getProgram()?.getRootFileNames()).toContain(scratch);
    svc.deleteOverlay(scratch);
    expect(svc.getProgram()?.getRootFileNames()).not.toContain(scratch);
  });

  test("overlay changes bump the project version only when the text changes", () => {
    const { svc } = service();
    const before = svc.getProjectVersion();
    svc.upsertOverlay("/ws/doc.ts", "export {};");
    svc.upsertOverlay("/ws/doc.ts", "export {};");
    expect(svc.getProjectVersion()).toBe(before + 1);
    svc.deleteOverlay("/ws/doc.ts");
    svc.deleteOverlay("/ws/doc.ts");
    expect(svc.getProjectVersion()).toBe(before + 2);
  });
});
