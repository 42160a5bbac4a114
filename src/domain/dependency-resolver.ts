import { posix } from "node:path";
import type { DependencyEdge, DependencyGraph, FileAnalysis, ImportStatement, Language } from "./types.js";

const SCRIPT_EXTENSIONS = [".ts", ".tsx", ".d.ts", ".js", ".jsx", ".mjs", ".cjs", ".mts", ".cts"];

/** Compiled-output extensions written in imports, mapped to their sources. */
const EXTENSION_SWAPS: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

const JVM_EXTENSIONS = [".java", ".kt"];

function insideRoot(path: string): boolean {
  return path !== ".." && !path.startsWith("../") && !posix.isAbsolute(path);
}

function pythonModuleName(path: string): string {
  const withoutExt = path.replace(/\.pyi?$/, "");
  const parts = withoutExt.split("/");
  if (parts[parts.length - 1] === "__init__") parts.pop();
  return parts.join(".");
}

class Resolver {
  private readonly known: ReadonlySet<string>;
  private readonly pythonModules: { module: string; path: string }[];
  private readonly jvmFiles: string[];

  constructor(files: readonly FileAnalysis[]) {
    const paths = files.map((f) => f.path);
    this.known = new Set(paths);
    this.pythonModules = files
      .filter((f) => f.language === "python")
      .map((f) => ({ module: pythonModuleName(f.path), path: f.path }));
    this.jvmFiles = files.filter((f) => f.language === "java" || f.language === "kotlin").map((f) => f.path);
  }

  resolve(language: Language, from: string, imp: ImportStatement): string[] {
    switch (language) {
      case "python":
        return this.python(from, imp);
      case "javascript":
      case "typescript":
        return this.script(from, imp.module);
      case "java":
      case "kotlin":
        return this.jvm(imp.module);
    }
  }

  private first(candidates: string[]): string | undefined {
    return candidates.find((c) => insideRoot(c) && this.known.has(c));
  }

  private pythonFile(base: string): string | undefined {
    if (!insideRoot(base)) return undefined;
    const prefix = base === "." || base === "" ? "" : `${base}/`;
    if (prefix === "") return this.first(["__init__.py"]);
    return this.first([`${base}.py`, `${base}.pyi`, `${prefix}__init__.py`, `${prefix}__init__.pyi`]);
  }

  private python(from: string, imp: ImportStatement): string[] {
    const dir = posix.dirname(from);
    const isFrom = imp.text.startsWith("from ");
    const relative = /^(\.+)(.*)$/.exec(imp.module);

    if (relative) {
      let base = dir;
      for (let up = 1; up < relative[1].length; up++) base = posix.join(base, "..");
      base = posix.normalize(base);
      if (!insideRoot(base)) return [];
      const rest = relative[2].replace(/\./g, "/");
      const moduleBase = rest ? posix.join(base, rest) : base;
      if (rest) {
        const target = this.pythonFile(moduleBase);
        if (target) return [target];
      }
      const submodules = isFrom ? this.submodules(moduleBase, imp.names) : [];
      if (submodules.length > 0) return submodules;
      if (!rest) {
        const pkg = this.pythonFile(base);
        return pkg ? [pkg] : [];
      }
      return [];
    }

    const target = this.absolutePython(imp.module, dir);
    if (target) return [target];
    if (isFrom) {
      const found: string[] = [];
      for (const name of imp.names) {
        if (name === "*") continue;
        const sub = this.absolutePython(`${imp.module}.${name}`, dir);
        if (sub && !found.includes(sub)) found.push(sub);
      }
      return found;
    }
    return [];
  }

  private submodules(base: string, names: string[]): string[] {
    const found: string[] = [];
    for (const name of names) {
      if (name === "*") continue;
      const target = this.pythonFile(posix.join(base, name));
      if (target && !found.includes(target)) found.push(target);
    }
    return found;
  }

  private absolutePython(module: string, dir: string): string | undefined {
    const asPath = module.replace(/\./g, "/");
    const fromRoot = this.pythonFile(asPath);
    if (fromRoot) return fromRoot;
    if (dir !== ".") {
      const fromDir = this.pythonFile(posix.join(dir, asPath));
      if (fromDir) return fromDir;
    }
    // A bare top-level name is a stdlib or third-party module, never a nested file of the same name.
    if (!module.includes(".")) return undefined;
    const suffixMatches = this.pythonModules.filter((m) => m.module === module || m.module.endsWith(`.${module}`));
    if (suffixMatches.length === 1) return suffixMatches[0].path;
    // `pkg/mod.py` wins over `pkg/mod/__init__.py` when both end in the same module name.
    const plain = suffixMatches.filter((m) => !m.path.endsWith("__init__.py"));
    return plain.length === 1 ? plain[0].path : undefined;
  }

  private script(from: string, specifier: string): string[] {
    if (!specifier.startsWith("./") && !specifier.startsWith("../") && specifier !== "." && specifier !== "..") {
      return [];
    }
    const joined = posix.normalize(posix.join(posix.dirname(from), specifier));
    if (!insideRoot(joined)) return [];
    const ext = posix.extname(joined);
    const candidates = [joined, ...SCRIPT_EXTENSIONS.map((e) => `${joined}${e}`)];
    const swaps = EXTENSION_SWAPS[ext];
    if (swaps) {
      const stem = joined.slice(0, -ext.length);
      candidates.push(...swaps.map((e) => `${stem}${e}`));
    }
    candidates.push(...SCRIPT_EXTENSIONS.map((e) => `${joined}/index${e}`));
    const target = this.first(candidates);
    return target ? [target] : [];
  }

  private jvm(module: string): string[] {
    const segments = module.split(".");
    if (segments[segments.length - 1] === "*") {
      const dir = segments.slice(0, -1).join("/");
      return this.jvmFiles.filter((f) => {
        const parent = posix.dirname(f);
        return parent === dir || parent.endsWith(`/${dir}`);
      });
    }
    const direct = this.jvmSuffix(segments);
    if (direct) return [direct];
    if (segments.length > 2) {
      const outer = this.jvmSuffix(segments.slice(0, -1));
      if (outer) return [outer];
    }
    return [];
  }

  private jvmSuffix(segments: string[]): string | undefined {
    const stem = segments.join("/");
    for (const ext of JVM_EXTENSIONS) {
      const suffix = `${stem}${ext}`;
      const match = this.jvmFiles.find((f) => f === suffix || f.endsWith(`/${suffix}`));
      if (match) return match;
    }
    return undefined;
  }
}

/**
 * Builds the file dependency graph of a session from the raw imports of its
 * files. Resolution only consults the session's own paths.
 */
export function resolveDependencies(files: readonly FileAnalysis[]): DependencyGraph {
  const resolver = new Resolver(files);
  const edges: DependencyEdge[] = [];
  const seen = new Set<string>();
  const adjacency = new Map<string, string[]>();
  const importers = new Map<string, string[]>();

  const addEdge = (edge: DependencyEdge): void => {
    const key = `${edge.from}\u0000${edge.to}`;
    if (seen.has(key)) return;
    seen.add(key);
    edges.push(edge);
    if (!edge.resolved) return;
    const out = adjacency.get(edge.from);
    if (out) out.push(edge.to);
    else adjacency.set(edge.from, [edge.to]);
    const into = importers.get(edge.to);
    if (into) into.push(edge.from);
    else importers.set(edge.to, [edge.from]);
  };

  for (const file of files) {
    const { language } = file;
    if (!language) continue;
    for (const imp of file.imports) {
      const targets = resolver.resolve(language, file.path, imp);
      if (targets.length === 0) {
        addEdge({ from: file.path, to: imp.module, resolved: false, line: imp.line });
        continue;
      }
      for (const to of targets) addEdge({ from: file.path, to, resolved: true, line: imp.line });
    }
  }

  return { edges, adjacency, importers };
}

/**
 * Elementary cycles reachable by depth-first search, each listed from its
 * first visited file and closed by repeating it.
 */
export function findCycles(graph: DependencyGraph): string[][] {
  const cycles: string[][] = [];
  const seen = new Set<string>();
  const visited = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();

  const visit = (node: string): void => {
    visited.add(node);
    path.push(node);
    onPath.add(node);
    for (const next of graph.adjacency.get(node) ?? []) {
      if (onPath.has(next)) {
        const cycle = [...path.slice(path.indexOf(next)), next];
        const key = cycle.join("\u0000");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      } else if (!visited.has(next)) {
        visit(next);
      }
    }
    path.pop();
    onPath.delete(node);
  };

  for (const node of [...graph.adjacency.keys()].sort()) {
    if (!visited.has(node)) visit(node);
  }
  return cycles;
}
