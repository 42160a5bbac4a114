import { describe, it, expect } from "vitest";
import { normalizeExtraction } from "../../domain/normalizer.js";
import type { RawExtraction, RawSymbol } from "../../domain/types.js";

function raw(language: RawExtraction["language"], records: RawSymbol[]): RawExtraction {
  return { language, filePath: "src/mod", records, imports: [], warnings: [] };
}

function record(kind: RawSymbol["kind"], name: string, extra: Partial<RawSymbol> = {}): RawSymbol {
  return { kind, name, startLine: 1, endLine: 1, signature: name, modifiers: [], ...extra };
}

describe("normalizeExtraction", () => {
  it("maps functions nested in classes to methods and keeps free functions", () => {
    const result = normalizeExtraction(
      raw("typescript", [record("class", "A"), record("function", "run", { parentIndex: 0 }), record("function", "main")]),
    );
    expect(result.symbols.map((s) => s.kind)).toEqual(["class", "method", "function"]);
    expect(result.symbols[1].parentId).toBe("src/mod#class:A");
  });

  it("collapses records, objects and annotations with a tag", () => {
    const result = normalizeExtraction(
      raw("java", [record("record", "Point"), record("annotation", "Audit"), record("object", "Single")]),
    );
    expect(result.symbols.map((s) => [s.kind, s.modifiers])).toEqual([
      ["class", ["record"]],
      ["interface", ["annotation"]],
      ["class", ["object"]],
    ]);
  });

  it("qualifies members through namespaces without emitting them", () => {
    const result = normalizeExtraction(
      raw("typescript", [record("namespace", "Shapes"), record("class", "Square", { parentIndex: 0 })]),
    );
    expect(result.symbols).toHaveLength(1);
    expect(result.symbols[0].qualifiedName).toBe("Shapes.Square");
    expect(result.symbols[0].parentId).toBeUndefined();
  });

  it("orders shared tags canonically before language tags", () => {
    const result = normalizeExtraction(
      raw("kotlin", [record("function", "load", { modifiers: ["override", "inline", "suspend", "private"] })]),
    );
    expect(result.symbols[0].modifiers).toEqual(["private", "async", "override", "inline"]);
    expect(result.symbols[0].visibility).toBe("private");
  });

  it("keeps language words that only look like shared tags in Python", () => {
    const result = normalizeExtraction(raw("python", [record("function", "f", { modifiers: ["@final", "@static"] })]));
    expect(result.symbols[0].modifiers).toEqual(["final", "@static"]);
  });

  it("suffixes collisions that parameter lists cannot separate", () => {
    const result = normalizeExtraction(
      raw("python", [
        record("function", "f", { signature: "def f(x)" }),
        record("function", "f", { signature: "def f(x)" }),
        record("function", "f", { signature: "def f(y)" }),
      ]),
    );
    expect(result.symbols.map((s) => s.qualifiedName)).toEqual(["f(x)", "f(x)~2", "f(y)"]);
    expect(new Set(result.symbols.map((s) => s.id)).size).toBe(3);
  });

  it("never reports a range ending before it starts", () => {
    const result = normalizeExtraction(raw("javascript", [record("class", "C", { startLine: 5, endLine: 3 })]));
    expect(result.symbols[0].range).toEqual({ start: 5, end: 5 });
  });
});
