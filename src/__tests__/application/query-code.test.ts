import { describe, it, expect } from "vitest";
import { QueryCodeService } from "../../application/query-code.js";
import { buildSession } from "../../domain/session.js";

const session = buildSession("/proj", [
  { path: "pkg/util.py", text: "def helper():\n    pass\n\ndef help_me():\n    pass\n" },
  { path: "main.py", text: "from pkg.util import helper\n\nclass App:\n    def run(self):\n        pass\n" },
  { path: "web/app.ts", text: 'import x from "lodash";\nexport function helperTs() {}\n' },
]);

describe("QueryCodeService", () => {
  const service = new QueryCodeService({ searchLimit: 10 });

  describe("search", () => {
    it("runs the requested match mode in session order", () => {
      const names = service.search(session, "help", { mode: "prefix" }).map((s) => s.name);
      expect(names).toEqual(["helper", "help_me", "helperTs"]);
    });

    it("filters by language, kind and file", () => {
      expect(service.search(session, "help", { mode: "prefix", language: "python" }).map((s) => s.name)).toEqual([
        "helper",
        "help_me",
      ]);
      expect(service.search(session, "App", { mode: "exact", kind: "method" })).toEqual([]);
      expect(service.search(session, "help", { mode: "prefix", file: "/proj/web/app.ts" }).map((s) => s.name)).toEqual([
        "helperTs",
      ]);
    });

    it("applies the explicit limit, then the configured one", () => {
      expect(service.search(session, "help", { mode: "prefix", limit: 1 })).toHaveLength(1);
      const narrow = new QueryCodeService({ searchLimit: 2 });
      expect(narrow.search(session, "help", { mode: "prefix" })).toHaveLength(2);
    });
  });

  describe("detail", () => {
    it("looks symbols up by id or by name", () => {
      const byId = service.detail(session, "main.py#class:App");
      const byName = service.detail(session, "App");
      expect(byName).toEqual(byId);
      expect(byName.found && byName.value.children.map((c) => c.id)).toEqual(["main.py#method:App.run"]);
    });

    it("reports unknown symbols", () => {
      expect(service.detail(session, "Nope")).toEqual({ found: false, reason: "not-found", query: "Nope" });
    });

    it("lists the files importing a symbol's file", () => {
      const helper = service.detail(session, "helper");
      expect(helper.found && helper.value.dependentFiles).toEqual(["main.py"]);
    });
  });

  describe("symbolsInFile", () => {
    it("accepts absolute and relative paths", () => {
      const result = service.symbolsInFile(session, "/proj/pkg/util.py");
      expect(result.found && result.value.map((s) => s.name)).toEqual(["helper", "help_me"]);
    });

    it("reports files outside the session", () => {
      expect(service.symbolsInFile(session, "missing.py")).toEqual({
        found: false,
        reason: "not-found",
        query: "missing.py",
      });
    });
  });

  it("returns resolved edges unless external ones are requested", () => {
    expect(service.dependencyGraph(session)).toEqual([{ from: "main.py", to: "pkg/util.py", resolved: true, line: 1 }]);
    expect(service.dependencyGraph(session, { includeExternal: true })).toEqual([
      { from: "main.py", to: "pkg/util.py", resolved: true, line: 1 },
      { from: "web/app.ts", to: "lodash", resolved: false, line: 1 },
    ]);
  });

  it("exposes cycles, exports and the summary", () => {
    expect(service.cycles(session)).toEqual([]);
    expect(service.exportGraph(session, "dot").split("\n")).toContain('  "main.py" -> "pkg/util.py" [label="imports"];');
    expect(service.report(session, "markdown").split("\n")[0]).toBe("## Code Analysis Summary");
    expect(service.summary(session).filesAnalyzed).toBe(3);
  });
});
