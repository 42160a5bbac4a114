import { describe, it, expect } from "vitest";
import { extractFile } from "../../domain/extractors/index.js";

const LOADER = `import { readFile } from "node:fs/promises";
import type { Config } from "./config.js";
import * as path from "path";

/** Loads things. */
export class Loader extends Base implements Disposable {
  private cache = new Map<string, string>();

  constructor(private readonly root: string) {
    super();
  }

  async load(name: string): Promise<string> {
    return readFile(path.join(this.root, name), "utf8");
  }

  get size(): number {
    return this.cache.size;
  }
}

export interface Store {
  get(key: string): string | undefined;
}

export type Handler = (input: string) => void;

export const DEFAULT_NAME = "loader";

export function createLoader(root: string): Loader {
  return new Loader(root);
}

export const format = (value: string): string => value.trim();
`;

describe("TypeScript extractor", () => {
  const result = extractFile(LOADER, "src/loader.ts");
  const find = (qualifiedName: string) => result.symbols.find((s) => s.qualifiedName === qualifiedName);

  it("extracts declarations in source order", () => {
    expect(result.language).toBe("typescript");
    expect(result.warnings).toEqual([]);
    expect(result.symbols.map((s) => `${s.kind} ${s.qualifiedName}`)).toEqual([
      "class Loader",
      "field Loader.cache",
      "method Loader.constructor",
      "method Loader.load",
      "method Loader.size",
      "interface Store",
      "method Store.get",
      "interface Handler",
      "field DEFAULT_NAME",
      "function createLoader",
      "function format",
    ]);
  });

  it("records class headers, ranges and doc comments", () => {
    const loader = find("Loader");
    expect(loader?.extends).toEqual(["Base"]);
    expect(loader?.implements).toEqual(["Disposable"]);
    expect(loader?.range).toEqual({ start: 6, end: 20 });
    expect(loader?.docComment).toBe("/** Loads things. */");
    expect(loader?.modifiers).toEqual(["exported"]);
    expect(loader?.signature).toBe("export class Loader extends Base implements Disposable");
  });

  it("maps member modifiers and visibility", () => {
    expect(find("Loader.cache")?.visibility).toBe("private");
    expect(find("Loader.load")?.modifiers).toEqual(["async"]);
    expect(find("Loader.load")?.signature).toBe("async load(name: string): Promise<string>");
    expect(find("Loader.load")?.range).toEqual({ start: 13, end: 15 });
    expect(find("Loader.size")?.modifiers).toEqual(["getter"]);
    expect(find("Loader.constructor")?.modifiers).toEqual(["constructor"]);
    expect(find("Loader.constructor")?.parentId).toBe("src/loader.ts#class:Loader");
  });

  it("reports type aliases as interfaces tagged type-alias", () => {
    const handler = find("Handler");
    expect(handler?.kind).toBe("interface");
    expect(handler?.modifiers).toEqual(["exported", "type-alias"]);
    expect(handler?.signature).toBe("export type Handler = (input: string) => void");
  });

  it("reports exported constants and arrow functions", () => {
    expect(find("DEFAULT_NAME")?.signature).toBe('export const DEFAULT_NAME = "loader"');
    expect(find("format")?.kind).toBe("function");
    expect(find("createLoader")?.range).toEqual({ start: 30, end: 32 });
  });

  it("records imports with their bound names", () => {
    expect(result.imports).toEqual([
      { text: 'import { readFile } from "node:fs/promises";', module: "node:fs/promises", names: ["readFile"], line: 1 },
      { text: 'import type { Config } from "./config.js";', module: "./config.js", names: ["Config"], line: 2 },
      { text: 'import * as path from "path";', module: "path", names: ["*"], line: 3 },
    ]);
  });
});

const WIDGET = `const fs = require("fs");
const { join, resolve: r } = require("path");

function* ids() {
  yield 1;
}

class Widget {
  #count = 0;
  static create() {
    return new Widget();
  }
  handle = (event) => {
    this.#count++;
  };
}

module.exports = { Widget };
`;

describe("JavaScript extractor", () => {
  const result = extractFile(WIDGET, "lib/widget.js");
  const find = (qualifiedName: string) => result.symbols.find((s) => s.qualifiedName === qualifiedName);

  it("skips local bindings and keeps declarations", () => {
    expect(result.language).toBe("javascript");
    expect(result.symbols.map((s) => `${s.kind} ${s.qualifiedName}`)).toEqual([
      "function ids",
      "class Widget",
      "field Widget.#count",
      "method Widget.create",
      "method Widget.handle",
    ]);
  });

  it("tags generators, statics and private names", () => {
    expect(find("ids")?.modifiers).toEqual(["generator"]);
    expect(find("ids")?.signature).toBe("function* ids()");
    expect(find("Widget.create")?.modifiers).toEqual(["static"]);
    expect(find("Widget.#count")?.visibility).toBe("private");
    expect(find("Widget.handle")?.range).toEqual({ start: 13, end: 15 });
    expect(find("Widget.handle")?.signature).toBe("handle = (event)");
  });

  it("records require calls with destructured names", () => {
    expect(result.imports).toEqual([
      { text: 'require("fs")', module: "fs", names: ["fs"], line: 1 },
      { text: 'require("path")', module: "path", names: ["join", "resolve"], line: 2 },
    ]);
  });

  it("does not see declarations inside template literals", () => {
    const source = "const html = `\n  function fake() {}\n  ${1 + 1}\n`;\nfunction real() {}\n";
    expect(extractFile(source, "t.js").symbols.map((s) => s.name)).toEqual(["real"]);
  });

  it("closes a parameter list left open when the body starts", () => {
    const source = "function broken(a, b {\n  return a;\n}\n\nexport class Good {\n  run() {}\n}\n";
    const file = extractFile(source, "broken.ts");
    expect(file.symbols.map((s) => s.qualifiedName)).toEqual(["broken", "Good", "Good.run"]);
    expect(file.warnings).toEqual([
      { code: "parse-recoverable", message: "unclosed parenthesis in declaration of broken at line 1", line: 1 },
    ]);
  });

  it("closes a parameter list left open when a declaration follows", () => {
    const source = "function broken(a, b\n\nexport class Good {\n  run() {}\n}\n";
    const file = extractFile(source, "open.ts");
    expect(file.symbols.map((s) => s.qualifiedName)).toEqual(["broken", "Good", "Good.run"]);
    expect(file.warnings).toEqual([
      { code: "parse-recoverable", message: "unclosed parenthesis before line 3", line: 3 },
    ]);
  });

  it("warns about an unterminated string and keeps going", () => {
    const source = 'const s = "open\nfunction after() {}\n';
    const file = extractFile(source, "u.js");
    expect(file.symbols.map((s) => s.name)).toEqual(["after"]);
    expect(file.warnings).toEqual([
      { code: "parse-recoverable", message: "unterminated string literal at line 1", line: 1 },
    ]);
  });
});
