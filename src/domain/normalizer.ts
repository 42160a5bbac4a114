import {
  SHARED_MODIFIERS,
  type CodeSymbol,
  type FileAnalysis,
  type Language,
  type RawExtraction,
  type RawSymbol,
  type RawSymbolKind,
  type SharedModifier,
  type SymbolKind,
  type Visibility,
} from "./types.js";
import { parameterList } from "./extractors/lexer.js";

const CLASS_LIKE: ReadonlySet<RawSymbolKind> = new Set(["class", "interface", "enum", "record", "annotation", "object"]);

/** Tags kept for raw kinds that collapse into a broader symbol kind. */
const KIND_TAGS: Partial<Record<RawSymbolKind, string>> = {
  record: "record",
  object: "object",
  annotation: "annotation",
  "type-alias": "type-alias",
  constructor: "constructor",
};

const SHARED_SET: ReadonlySet<string> = new Set(SHARED_MODIFIERS);

const MODIFIER_ALIASES: Record<Language, Record<string, SharedModifier>> = {
  python: {
    "@staticmethod": "static",
    "@abstractmethod": "abstract",
    "@abc.abstractmethod": "abstract",
    "@override": "override",
    "@typing.override": "override",
    "@final": "final",
    "@typing.final": "final",
    async: "async",
  },
  javascript: {
    export: "exported",
  },
  typescript: {
    export: "exported",
  },
  java: {
    "@Override": "override",
  },
  kotlin: {
    suspend: "async",
    "@JvmStatic": "static",
  },
};

/** Language words that look like shared tags but mean something else. */
const RENAMED: Partial<Record<Language, Record<string, string>>> = {
  java: { default: "default-method" },
};

function isShared(tag: string): tag is SharedModifier {
  return SHARED_SET.has(tag);
}

function mapModifiers(language: Language, raw: RawSymbol): string[] {
  const shared = new Set<SharedModifier>();
  const free: string[] = [];
  const aliases = MODIFIER_ALIASES[language];
  const renamed = RENAMED[language] ?? {};

  const add = (tag: string): void => {
    const alias = aliases[tag];
    if (alias) {
      shared.add(alias);
      return;
    }
    const rename = renamed[tag];
    if (rename !== undefined) {
      if (!free.includes(rename)) free.push(rename);
      return;
    }
    if (language !== "python" && isShared(tag)) {
      shared.add(tag);
      return;
    }
    if (!free.includes(tag)) free.push(tag);
  };

  raw.modifiers.forEach(add);
  const kindTag = KIND_TAGS[raw.kind];
  if (kindTag) add(kindTag);
  if ((language === "javascript" || language === "typescript") && raw.name.startsWith("#")) shared.add("private");

  return [...SHARED_MODIFIERS.filter((m) => shared.has(m)), ...free];
}

function deriveVisibility(language: Language, name: string, modifiers: string[], parent?: RawSymbol): Visibility {
  for (const v of ["private", "protected", "internal", "public"] as const) {
    if (modifiers.includes(v)) return v;
  }
  switch (language) {
    case "python":
      return name.startsWith("_") && !(name.startsWith("__") && name.endsWith("__")) ? "private" : "public";
    case "java":
      return parent && (parent.kind === "interface" || parent.kind === "annotation") ? "public" : "package";
    default:
      return "public";
  }
}

function mapKind(raw: RawSymbol, parent: RawSymbol | undefined): SymbolKind | undefined {
  switch (raw.kind) {
    case "function":
    case "method":
      return parent && CLASS_LIKE.has(parent.kind) ? "method" : "function";
    case "constructor":
      return "method";
    case "class":
    case "record":
    case "object":
      return "class";
    case "interface":
    case "annotation":
    case "type-alias":
      return "interface";
    case "enum":
      return "enum";
    case "field":
      return "field";
    case "namespace":
      return undefined;
  }
}

/**
 * Turns raw extractor records into canonical symbols: closed kinds, shared
 * modifier tags, visibility, qualified names, collision suffixes and ids.
 */
export function normalizeExtraction(raw: RawExtraction): FileAnalysis {
  const { records, language, filePath } = raw;
  const kinds = records.map((r) => mapKind(r, r.parentIndex === undefined ? undefined : records[r.parentIndex]));

  // Nearest enclosing record that becomes a symbol; namespaces only qualify.
  const symbolParent = records.map((r) => {
    let p = r.parentIndex;
    while (p !== undefined && kinds[p] === undefined) p = records[p].parentIndex;
    return p;
  });

  const depths: number[] = [];
  records.forEach((r, i) => {
    depths[i] = r.parentIndex === undefined ? 0 : depths[r.parentIndex] + 1;
  });

  // Qualified names are assigned level by level so children extend their
  // parent's final, disambiguated name.
  const qualified: string[] = new Array<string>(records.length).fill("");
  const maxDepth = depths.length > 0 ? Math.max(...depths) : -1;
  for (let depth = 0; depth <= maxDepth; depth++) {
    const level = records.map((_, i) => i).filter((i) => depths[i] === depth);
    const candidate = new Map<number, string>();
    for (const i of level) {
      const p = records[i].parentIndex;
      candidate.set(i, p === undefined ? records[i].name : `${qualified[p]}.${records[i].name}`);
    }
    const groups = new Map<string, number[]>();
    for (const i of level) {
      const key = `${kinds[i] ?? "namespace"}\u0000${candidate.get(i) ?? ""}`;
      const group = groups.get(key);
      if (group) group.push(i);
      else groups.set(key, [i]);
    }
    const taken = new Set<string>();
    for (const group of groups.values()) {
      for (const i of group) {
        const base = candidate.get(i) ?? records[i].name;
        let name = group.length > 1 ? `${base}${parameterList(records[i].signature)}` : base;
        const key = `${kinds[i] ?? "namespace"}\u0000${name}`;
        if (taken.has(key)) {
          let n = 2;
          while (taken.has(`${kinds[i] ?? "namespace"}\u0000${name}~${n}`)) n++;
          name = `${name}~${n}`;
        }
        taken.add(`${kinds[i] ?? "namespace"}\u0000${name}`);
        qualified[i] = name;
      }
    }
  }

  const ids = records.map((_, i) => {
    const kind = kinds[i];
    return kind ? `${filePath}#${kind}:${qualified[i]}` : undefined;
  });

  const symbols: CodeSymbol[] = [];
  records.forEach((r, i) => {
    const kind = kinds[i];
    const id = ids[i];
    if (!kind || !id) return;
    const parent = r.parentIndex === undefined ? undefined : records[r.parentIndex];
    const modifiers = mapModifiers(language, r);
    const parentIndex = symbolParent[i];
    const parentId = parentIndex === undefined ? undefined : ids[parentIndex];
    const symbol: CodeSymbol = {
      id,
      kind,
      name: r.name,
      qualifiedName: qualified[i],
      language,
      filePath,
      signature: r.signature,
      range: { start: r.startLine, end: Math.max(r.startLine, r.endLine) },
      modifiers,
      visibility: deriveVisibility(language, r.name, modifiers, parent),
      extends: [...(r.extends ?? [])],
      implements: [...(r.implements ?? [])],
    };
    if (parentId) symbol.parentId = parentId;
    if (r.docComment !== undefined) symbol.docComment = r.docComment;
    symbols.push(symbol);
  });

  return {
    path: filePath,
    language,
    symbols,
    imports: raw.imports.map((imp) => ({ ...imp, names: [...imp.names] })),
    warnings: raw.warnings.map((w) => ({ ...w })),
  };
}
