import { describe, it, expect } from "vitest";
import {
  formatCycle,
  formatDetail,
  formatEdge,
  formatGraphEdge,
  formatStructured,
  formatSummary,
  formatSymbol,
  formatWarnings,
} from "../../adapters/cli/format.js";
import { buildGraph } from "../../domain/graph-export.js";
import { buildSession, summarizeSession } from "../../domain/session.js";

const session = buildSession("/proj", [
  { path: "models.py", text: 'class User(Base):\n    """A user."""\n\n    def save(self):\n        pass\n' },
  { path: "app.py", text: "from models import User\nimport flask\n" },
  { path: "README.txt", text: "" },
]);

describe("CLI formatting", () => {
  it("summarizes a session", () => {
    expect(formatSummary(summarizeSession(session))).toEqual([
      "Analyzed: /proj",
      "  Files:     3",
      "  Symbols:   2",
      "  Warnings:  1",
      "  Rejected:  0",
      "  Imports:   1/2 resolved",
      "  Languages: python",
    ]);
  });

  it("prints (none) when no language was analyzed", () => {
    const empty = buildSession("/proj", []);
    expect(formatSummary(summarizeSession(empty)).at(-1)).toBe("  Languages: (none)");
  });

  it("lists warnings with their codes", () => {
    expect(formatWarnings(session.files)).toEqual(["  README.txt [unsupported-language] No extractor for README.txt"]);
  });

  it("describes a symbol with members and importers", () => {
    const detail = session.index.detail("models.py#class:User");
    if (!detail.found) throw new Error("User not indexed");
    expect(formatDetail(detail.value)).toEqual([
      "class User",
      "  Id:         models.py#class:User",
      "  Location:   models.py:1-5",
      "  Signature:  class User(Base)",
      "  Visibility: public",
      "  Extends:    Base",
      '  Doc:        """A user."""',
      "  Members:",
      "    method User.save (models.py:4)",
      "  Imported by:",
      "    app.py",
    ]);
  });

  it("formats symbols, edges and cycles", () => {
    const save = session.index.get("models.py#method:User.save");
    expect(save && formatSymbol(save)).toBe("  method User.save (models.py:4)");
    expect(session.graph.edges.map(formatEdge)).toEqual([
      "  app.py → models.py (line 1)",
      "  app.py → flask (line 2) [external]",
    ]);
    expect(formatCycle(["a.ts", "b.ts", "a.ts"])).toBe("  a.ts → b.ts → a.ts");
  });

  it("formats class graph edges with their relation", () => {
    const graph = buildGraph(session, { graphType: "class", includeExternal: true });
    expect(graph.edges.map(formatGraphEdge)).toEqual([
      "  models.py#class:User → external:Base (inherits, line 1) [external]",
      "  models.py#class:User → models.py#method:User.save (contains, line 4)",
    ]);
  });

  it("renders structured output as JSON or YAML", () => {
    const value = { name: "User", kinds: ["class", "method"], line: 4 };
    expect(formatStructured(value, "json")).toBe('{\n  "name": "User",\n  "kinds": [\n    "class",\n    "method"\n  ],\n  "line": 4\n}');
    expect(formatStructured(value, "yaml")).toBe("name: User\nkinds:\n  - class\n  - method\nline: 4");
    expect(formatStructured([{ id: "models.py#class:User" }], "yaml")).toBe("- id: models.py#class:User");
  });
});
