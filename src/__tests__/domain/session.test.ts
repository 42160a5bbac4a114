import { describe, it, expect } from "vitest";
import { analyzeFile, buildSession, serializeSession, summarizeSession, toSessionPath } from "../../domain/session.js";
import { InvalidInputError } from "../../domain/errors.js";
import type { SourceFile } from "../../domain/types.js";

const ROOT = "/proj";

const TWO_FILES: SourceFile[] = [
  { path: "b.py", text: "from a import Foo\n" },
  { path: "a.py", text: "class Foo:\n    def bar(self):\n        pass\n" },
];

describe("toSessionPath", () => {
  it("makes paths root-relative with forward slashes", () => {
    expect(toSessionPath(ROOT, "/proj/src/a.py")).toBe("src/a.py");
    expect(toSessionPath(ROOT, "./src/../lib/b.ts")).toBe("lib/b.ts");
  });

  it("rejects paths that leave the root", () => {
    expect(toSessionPath(ROOT, "/other/a.py")).toBeUndefined();
    expect(toSessionPath(ROOT, "../a.py")).toBeUndefined();
    expect(toSessionPath(ROOT, "")).toBeUndefined();
  });
});

describe("buildSession", () => {
  it("links a class, its method and the file that imports it", () => {
    const session = buildSession(ROOT, TWO_FILES);

    expect(session.files.map((f) => f.path)).toEqual(["a.py", "b.py"]);
    expect(session.graph.edges).toEqual([{ from: "b.py", to: "a.py", resolved: true, line: 1 }]);

    const foo = session.index.get("a.py#class:Foo");
    const bar = session.index.get("a.py#method:Foo.bar");
    expect(foo?.kind).toBe("class");
    expect(bar?.parentId).toBe(foo?.id);

    const detail = session.index.detail("a.py#class:Foo");
    expect(detail.found && detail.value.dependentFiles).toEqual(["b.py"]);
    expect(detail.found && detail.value.children.map((c) => c.id)).toEqual(["a.py#method:Foo.bar"]);
  });

  it("produces identical results for identical input", () => {
    const first = serializeSession(buildSession(ROOT, TWO_FILES));
    const second = serializeSession(buildSession(ROOT, [...TWO_FILES].reverse()));
    expect(second).toEqual(first);
  });

  it("records outside-root and duplicate inputs and keeps the rest", () => {
    const session = buildSession(ROOT, [
      { path: "a.py", text: "x = 1\n" },
      { path: "/elsewhere/b.py", text: "" },
      { path: "./a.py", text: "" },
    ]);
    expect(session.files.map((f) => f.path)).toEqual(["a.py"]);
    expect(session.rejected).toEqual([
      { path: "/elsewhere/b.py", reason: "outside the analysis root /proj" },
      { path: "./a.py", reason: "duplicate path" },
    ]);
    expect(summarizeSession(session).rejectedCount).toBe(2);
  });

  it("applies folder and file filters", () => {
    const session = buildSession(
      ROOT,
      [
        { path: "src/a.ts", text: "" },
        { path: "src/generated/b.ts", text: "" },
        { path: "src/a.test.ts", text: "" },
        { path: "docs/c.py", text: "" },
      ],
      { filters: { includeFolders: ["src"], excludeFolders: ["generated"], excludeFiles: ["*.test.ts"] } },
    );
    expect(session.files.map((f) => f.path)).toEqual(["src/a.ts"]);
  });

  it("warns about unsupported files and unreadable files", () => {
    const session = buildSession(ROOT, [
      { path: "notes.txt", text: "hello" },
      { path: "broken.py", text: "", readError: "EACCES" },
    ]);
    const warnings = Object.fromEntries(session.files.map((f) => [f.path, f.warnings]));
    expect(warnings["notes.txt"]).toEqual([{ code: "unsupported-language", message: "No extractor for notes.txt" }]);
    expect(warnings["broken.py"]).toEqual([{ code: "parse-recoverable", message: "could not read file: EACCES" }]);
  });

  it("keeps good files intact and folds a garbled file's problems into one warning", () => {
    const session = buildSession(ROOT, [
      { path: "a.py", text: "def a():\n    pass\n" },
      { path: "b.py", text: "class B:\n    pass\n" },
      { path: "c.py", text: "def c(:\n  'oops\nclass Z:\n  pass\n" },
    ]);
    expect(session.files.map((f) => f.symbols.map((s) => s.name))).toEqual([["a"], ["B"], ["Z"]]);
    expect(summarizeSession(session).warningCount).toBe(1);
    expect(session.files[2].warnings).toEqual([
      {
        code: "parse-recoverable",
        message: "2 problems: unclosed bracket in statement from line 1; unterminated string literal at line 2",
        line: 1,
      },
    ]);
  });

  it("summarizes counts and languages", () => {
    const session = buildSession(ROOT, [...TWO_FILES, { path: "c.ts", text: 'import "./missing";\n' }]);
    expect(summarizeSession(session)).toEqual({
      root: ROOT,
      filesAnalyzed: 3,
      symbolCount: 2,
      warningCount: 0,
      rejectedCount: 0,
      edgeCount: 2,
      resolvedEdgeCount: 1,
      languages: ["python", "typescript"],
    });
  });

  it("returns a frozen session", () => {
    const session = buildSession(ROOT, TWO_FILES);
    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.files[0].symbols[0])).toBe(true);
  });
});

describe("analyzeFile", () => {
  it("analyzes one file relative to the root", () => {
    const file = analyzeFile(ROOT, "/proj/pkg/mod.py", "def run():\n    pass\n");
    expect(file.path).toBe("pkg/mod.py");
    expect(file.symbols.map((s) => s.id)).toEqual(["pkg/mod.py#function:run"]);
  });

  it("throws for a path outside the root", () => {
    expect(() => analyzeFile(ROOT, "/tmp/mod.py", "")).toThrow(InvalidInputError);
  });

  it("returns zero symbols and zero warnings for an empty file", () => {
    const file = analyzeFile(ROOT, "empty.ts", "");
    expect(file.symbols).toEqual([]);
    expect(file.warnings).toEqual([]);
  });
});
