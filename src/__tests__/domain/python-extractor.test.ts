import { describe, it, expect } from "vitest";
import { extractFile } from "../../domain/extractors/index.js";

const SERVICE = [
  '"""Module doc."""',
  "import os",
  "from .models import User, Group as G",
  "",
  "MAX_SIZE = 10",
  "",
  "@dataclass",
  "class Service(Base, metaclass=ABCMeta):",
  '    """Handles things."""',
  "",
  "    @staticmethod",
  "    def create(name: str) -> 'Service':",
  "        return Service()",
  "",
  "    async def _load(self):",
  "        pass",
  "",
  "def helper(x, y=1):",
  "    return x",
  "",
].join("\n");

describe("Python extractor", () => {
  const result = extractFile(SERVICE, "app/service.py");
  const byName = (name: string) => result.symbols.find((s) => s.name === name);

  it("extracts symbols in source order with parents before children", () => {
    expect(result.language).toBe("python");
    expect(result.warnings).toEqual([]);
    expect(result.symbols.map((s) => s.qualifiedName)).toEqual([
      "MAX_SIZE",
      "Service",
      "Service.create",
      "Service._load",
      "helper",
    ]);
  });

  it("builds ids from path, kind and qualified name", () => {
    expect(byName("Service")?.id).toBe("app/service.py#class:Service");
    expect(byName("create")?.id).toBe("app/service.py#method:Service.create");
    expect(byName("create")?.parentId).toBe("app/service.py#class:Service");
    expect(byName("helper")?.id).toBe("app/service.py#function:helper");
  });

  it("records bases, decorators and docstrings", () => {
    const service = byName("Service");
    expect(service?.extends).toEqual(["Base"]);
    expect(service?.modifiers).toEqual(["@dataclass"]);
    expect(service?.docComment).toBe('"""Handles things."""');
    expect(service?.signature).toBe("class Service(Base, metaclass=ABCMeta)");
    expect(service?.range).toEqual({ start: 8, end: 16 });
  });

  it("maps decorators and async to shared modifiers", () => {
    expect(byName("create")?.modifiers).toEqual(["static"]);
    expect(byName("create")?.signature).toBe("def create(name: str) -> 'Service'");
    expect(byName("create")?.range).toEqual({ start: 12, end: 13 });
    expect(byName("_load")?.modifiers).toEqual(["async"]);
  });

  it("derives visibility from leading underscores", () => {
    expect(byName("_load")?.visibility).toBe("private");
    expect(byName("helper")?.visibility).toBe("public");
  });

  it("reports module constants as fields", () => {
    const constant = byName("MAX_SIZE");
    expect(constant?.kind).toBe("field");
    expect(constant?.signature).toBe("MAX_SIZE = 10");
  });

  it("records imports with their names", () => {
    expect(result.imports).toEqual([
      { text: "import os", module: "os", names: ["os"], line: 2 },
      { text: "from .models import User, Group as G", module: ".models", names: ["User", "Group"], line: 3 },
    ]);
  });

  it("keeps earlier symbols when the file ends mid-declaration", () => {
    const garbled = extractFile("def ok():\n    pass\n\ndef broken(:\n", "bad.py");
    expect(garbled.symbols.map((s) => s.name)).toEqual(["ok"]);
    expect(garbled.symbols[0].range).toEqual({ start: 1, end: 2 });
    expect(garbled.warnings).toHaveLength(1);
    expect(garbled.warnings[0].code).toBe("parse-recoverable");
    expect(garbled.warnings[0].message).toBe(
      "unexpected end of file: unclosed bracket in statement from line 4",
    );
  });

  it("resumes at the next declaration after an unclosed bracket", () => {
    const file = extractFile("def broken(a, b:\n    pass\n\nclass Good:\n    def ok(self):\n        pass\n", "bad.py");
    expect(file.symbols.map((s) => s.qualifiedName)).toEqual(["Good", "Good.ok"]);
    expect(file.warnings).toEqual([
      { code: "parse-recoverable", message: "unclosed bracket in statement from line 1", line: 1 },
    ]);
  });

  it("returns nothing for an empty file", () => {
    const empty = extractFile("", "empty.py");
    expect(empty.symbols).toEqual([]);
    expect(empty.warnings).toEqual([]);
    expect(empty.imports).toEqual([]);
  });

  it("ignores declarations inside strings and comments", () => {
    const source = ['# def commented(): pass', 'TEXT = """', "def inside():", '"""', ""].join("\n");
    const names = extractFile(source, "strings.py").symbols.map((s) => s.name);
    expect(names).toEqual(["TEXT"]);
  });

  it("disambiguates redefinitions that share a signature", () => {
    const redefined = extractFile("def f(x):\n    pass\n\ndef f(x):\n    pass\n", "dup.py");
    expect(redefined.symbols.map((s) => s.qualifiedName)).toEqual(["f(x)", "f(x)~2"]);
  });
});
