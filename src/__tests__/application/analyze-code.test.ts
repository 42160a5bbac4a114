import { describe, it, expect, vi, beforeEach } from "vitest";
import { AnalyzeCodeService } from "../../application/analyze-code.js";
import { InvalidInputError } from "../../domain/errors.js";
import type { FileSystem, Logger } from "../../domain/ports.js";

const ROOT = "/proj";

function createMockFs(files: Record<string, string>, unreadable: string[] = []): FileSystem {
  return {
    readFile: vi.fn(async (path: string) => {
      if (unreadable.includes(path)) throw new Error("EACCES");
      return files[path] ?? "";
    }),
    exists: vi.fn((path: string) => path === ROOT || path in files),
    glob: vi.fn().mockResolvedValue(
      [...Object.keys(files), ...unreadable]
        .filter((p) => !p.endsWith(".gitignore"))
        .map((p) => p.slice(ROOT.length + 1)),
    ),
  };
}

function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
}

describe("AnalyzeCodeService", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  function createService(fs: FileSystem, excludeFolders: string[] = []): AnalyzeCodeService {
    return new AnalyzeCodeService(fs, logger, { concurrency: 2, excludeFolders, excludeFiles: [] });
  }

  it("analyzes the files found under the root", async () => {
    const fs = createMockFs({
      "/proj/src/a.py": "from src.b import B\n",
      "/proj/src/b.py": "class B:\n    pass\n",
    });
    const session = await createService(fs).analyzeDirectory(ROOT);

    expect(session.files.map((f) => f.path)).toEqual(["src/a.py", "src/b.py"]);
    expect(session.graph.edges).toEqual([{ from: "src/a.py", to: "src/b.py", resolved: true, line: 1 }]);
    expect(fs.readFile).toHaveBeenCalledWith("/proj/src/a.py");
    expect(logger.info).toHaveBeenCalledWith("Found 2 files under /proj");
    expect(logger.info).toHaveBeenCalledWith("Analyzed 2 files: 1 symbols, 0 warnings, 1/1 imports resolved");
  });

  it("globs supported extensions and skips default and configured folders", async () => {
    const fs = createMockFs({});
    await createService(fs, ["generated"]).analyzeDirectory(ROOT, { excludeFolders: ["fixtures/"] });

    expect(fs.glob).toHaveBeenCalledWith(
      expect.arrayContaining(["**/*.py", "**/*.ts", "**/*.java", "**/*.kt"]),
      expect.objectContaining({
        cwd: ROOT,
        absolute: false,
        ignore: expect.arrayContaining(["**/node_modules/**", "**/generated/**", "**/fixtures/**"]),
      }),
    );
  });

  it("honours the root .gitignore", async () => {
    const fs = createMockFs({
      "/proj/.gitignore": "out/\n*.gen.ts\n",
      "/proj/out/c.py": "x = 1\n",
      "/proj/src/a.gen.ts": "export const a = 1;\n",
      "/proj/src/b.ts": "export const b = 1;\n",
    });
    const session = await createService(fs).analyzeDirectory(ROOT);
    expect(session.files.map((f) => f.path)).toEqual(["src/b.ts"]);
  });

  it("turns read failures into warnings", async () => {
    const fs = createMockFs({ "/proj/ok.py": "def ok():\n    pass\n" }, ["/proj/bad.py"]);
    const session = await createService(fs).analyzeDirectory(ROOT);

    const bad = session.files.find((f) => f.path === "bad.py");
    expect(bad?.warnings).toEqual([{ code: "parse-recoverable", message: "could not read file: EACCES" }]);
    expect(session.index.size).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("Could not read bad.py: EACCES");
  });

  it("rejects a missing root", async () => {
    const fs = createMockFs({});
    await expect(createService(fs).analyzeDirectory("/nowhere")).rejects.toThrow(InvalidInputError);
    expect(fs.glob).not.toHaveBeenCalled();
  });

  it("logs inputs rejected while building from sources", () => {
    const session = createService(createMockFs({})).analyzeSources(ROOT, [
      { path: "../x.py", text: "" },
      { path: "y.py", text: "" },
    ]);
    expect(session.files.map((f) => f.path)).toEqual(["y.py"]);
    expect(logger.warn).toHaveBeenCalledWith("Rejected ../x.py: outside the analysis root /proj");
  });

  describe("analyzeSingleFile", () => {
    it("reads and analyzes one file", async () => {
      const fs = createMockFs({ "/proj/pkg/m.py": "class M:\n    pass\n" });
      const file = await createService(fs).analyzeSingleFile(ROOT, "pkg/m.py");
      expect(file.path).toBe("pkg/m.py");
      expect(file.symbols.map((s) => s.id)).toEqual(["pkg/m.py#class:M"]);
    });

    it("refuses a path outside the root without reading it", async () => {
      const fs = createMockFs({});
      await expect(createService(fs).analyzeSingleFile(ROOT, "/etc/passwd.py")).rejects.toThrow(
        "Path is outside the analysis root /proj: /etc/passwd.py",
      );
      expect(fs.readFile).not.toHaveBeenCalled();
    });

    it("logs extraction warnings", async () => {
      const fs = createMockFs({ "/proj/notes.txt": "hi" });
      await createService(fs).analyzeSingleFile(ROOT, "notes.txt");
      expect(logger.warn).toHaveBeenCalledWith("notes.txt: No extractor for notes.txt");
    });
  });
});
