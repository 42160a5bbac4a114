import type { ImportStatement, LanguageExtractor, RawSymbolKind } from "../types.js";
import { extensionsFor } from "../languages.js";
import { baseTypeName, collapseWhitespace, splitTopLevel, type MaskedSource } from "./lexer.js";
import { scanBraceLanguage, type BraceGrammar, type DeclarationMatch, type HeaderParts, type ScopeRole } from "./brace-scanner.js";

const ID = "[A-Za-z_][\\w]*";
const VISIBILITY = "public|private|protected|internal";

const COMPANION = new RegExp(`^((?:(?:${VISIBILITY})\\s+)*)companion\\s+object(?:\\s+(${ID}))?`);
const CLASS = new RegExp(
  `^((?:(?:${VISIBILITY}|abstract|open|final|sealed|data|enum|annotation|inner|value|inline|expect|actual|external|fun)\\s+)*)(class|interface|object)\\s+(${ID})`,
);
const FUN = new RegExp(
  `^((?:(?:${VISIBILITY}|abstract|open|final|override|suspend|inline|operator|infix|tailrec|external|actual|expect)\\s+)*)fun\\s+(?:<[^>]*>\\s*)?(?:([\\w.<>?, ]+?)\\.)?(${ID})\\s*\\(`,
);
const CONSTRUCTOR = new RegExp(`^((?:(?:${VISIBILITY})\\s+)*)constructor\\s*\\(`);
const PROPERTY = new RegExp(
  `^((?:(?:${VISIBILITY}|const|override|lateinit|open|abstract|final|inline)\\s+)*)(?:val|var)\\s+(?:[\\w.<>?]+\\.)?(${ID})`,
);

function words(prefix: string | undefined): string[] {
  return (prefix ?? "").split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Supertypes follow the first `:` outside the primary constructor. Entries
 * written with a constructor call are superclasses; the rest are interfaces.
 */
function supertypes(interfaceLike: boolean) {
  return (masked: string): HeaderParts => {
    let depth = 0;
    let colon = -1;
    for (let i = 0; i < masked.length; i++) {
      const c = masked[i];
      if (c === "(" || c === "<") depth++;
      else if (c === ")" || c === ">") depth = Math.max(0, depth - 1);
      else if (c === ":" && depth === 0) {
        colon = i;
        break;
      }
    }
    if (colon === -1) return {};
    const list = masked.slice(colon + 1).split(/\bwhere\b/)[0];
    const ext: string[] = [];
    const impl: string[] = [];
    for (const entry of splitTopLevel(list)) {
      const name = baseTypeName(entry.replace(/\s+by\s+.*$/, ""));
      if (!name) continue;
      if (interfaceLike || /\(/.test(entry.replace(/<[^>]*>/g, ""))) ext.push(name);
      else impl.push(name);
    }
    return { extends: ext, implements: impl };
  };
}

function classKind(keyword: string, modifiers: string[]): RawSymbolKind {
  if (keyword === "interface") return "interface";
  if (keyword === "object") return "object";
  if (modifiers.includes("enum")) return "enum";
  if (modifiers.includes("annotation")) return "annotation";
  return "class";
}

function matchDeclaration(text: string, role: ScopeRole): DeclarationMatch | undefined {
  let m = COMPANION.exec(text);
  if (m) {
    return {
      kind: "object",
      name: m[2] ?? "Companion",
      modifiers: [...words(m[1]), "companion"],
      bodyRole: "type",
      terminator: "statement",
      header: supertypes(false),
    };
  }
  m = CLASS.exec(text);
  if (m) {
    const modifiers = words(m[1]);
    return {
      kind: classKind(m[2], modifiers),
      name: m[3],
      modifiers: modifiers.filter((w) => w !== "enum" && w !== "annotation"),
      bodyRole: "type",
      terminator: "statement",
      header: supertypes(m[2] === "interface"),
    };
  }
  m = FUN.exec(text);
  if (m) {
    const modifiers = words(m[1]);
    if (m[2]) modifiers.push("extension");
    return { kind: "function", name: m[3], modifiers, bodyRole: "opaque", terminator: "statement" };
  }
  if (role === "type") {
    m = CONSTRUCTOR.exec(text);
    if (m) {
      return { kind: "constructor", name: "constructor", modifiers: words(m[1]), bodyRole: "opaque", terminator: "statement" };
    }
  }
  m = PROPERTY.exec(text);
  if (m) {
    const modifiers = words(m[1]);
    const constant = modifiers.includes("const");
    return {
      kind: constant ? "field" : undefined,
      name: m[2],
      modifiers: modifiers.filter((w) => w !== "const"),
      bodyRole: "opaque",
      terminator: "statement",
    };
  }
  return undefined;
}

const IMPORT = /^\s*import\s+([\w.`]+?)(\.\*)?(?:\s+as\s+\w+)?\s*;?\s*$/;

function extractImports(masked: MaskedSource): ImportStatement[] {
  const imports: ImportStatement[] = [];
  masked.code.forEach((code, index) => {
    const m = IMPORT.exec(code);
    if (!m) return;
    const path = m[1].replace(/`/g, "");
    const segments = path.split(".");
    imports.push({
      text: collapseWhitespace(masked.lines[index]),
      module: m[2] ? `${path}.*` : path,
      names: [m[2] ? "*" : segments[segments.length - 1]],
      line: index + 1,
    });
  });
  return imports;
}

const KOTLIN: BraceGrammar = {
  language: "kotlin",
  lexer: { tripleQuotedStrings: true, stringTemplates: true },
  annotation: new RegExp(`^@(?:[a-z]+:)?(${ID}(?:\\.${ID})*)(?:\\s*\\([^()]*\\))?\\s*`),
  match(text: string, role: ScopeRole) {
    if (role === "module" || role === "type") return matchDeclaration(text, role);
    return undefined;
  },
  imports: extractImports,
};

export const kotlinExtractor: LanguageExtractor = {
  language: "kotlin",
  extensions: extensionsFor("kotlin"),
  extract: (source, filePath) => scanBraceLanguage(KOTLIN, source, filePath),
};
