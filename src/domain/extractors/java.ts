import type { ImportStatement, LanguageExtractor, RawSymbolKind } from "../types.js";
import { extensionsFor } from "../languages.js";
import { baseTypeName, collapseWhitespace, splitTopLevel, type MaskedSource } from "./lexer.js";
import { scanBraceLanguage, type BraceGrammar, type DeclarationMatch, type HeaderParts, type ScopeRole } from "./brace-scanner.js";

const ID = "[A-Za-z_$][\\w$]*";
const TYPE_REF = `[\\w$][\\w$.]*(?:\\s*<[^;{}()=]*>)?(?:\\s*\\[\\s*\\])*`;

const TYPE_DECLARATION = new RegExp(
  `^((?:(?:public|protected|private|static|abstract|final|sealed|non-sealed|strictfp)\\s+)*)(class|interface|enum|record|@interface)\\s+(${ID})`,
);
const CONSTRUCTOR = new RegExp(`^((?:(?:public|protected|private)\\s+)*)(?:<[^>]+>\\s*)?(${ID})\\s*\\(`);
const METHOD = new RegExp(
  `^((?:(?:public|protected|private|static|abstract|final|synchronized|native|default|strictfp)\\s+)*)(?:<[^>]+>\\s+)?(${TYPE_REF})\\s+(${ID})\\s*\\(`,
);
const FIELD = new RegExp(
  `^((?:(?:public|protected|private|static|final|transient|volatile)\\s+)*)(${TYPE_REF})\\s+(${ID})\\s*(?:=|;|\\[|,)`,
);

const NOT_A_TYPE = new Set(["new", "return", "throw", "else", "case", "package", "import", "yield"]);

const TYPE_KINDS: Record<string, RawSymbolKind> = {
  class: "class",
  interface: "interface",
  enum: "enum",
  record: "record",
  "@interface": "annotation",
};

function words(prefix: string | undefined): string[] {
  return (prefix ?? "").split(/\s+/).filter((w) => w.length > 0);
}

function namesOf(list: string): string[] {
  return splitTopLevel(list)
    .map(baseTypeName)
    .filter((n): n is string => n !== undefined);
}

function typeHeader(masked: string): HeaderParts {
  const ext = /\bextends\s+(.+?)(?=\s+implements\b|\s+permits\b|$)/.exec(masked);
  const impl = /\bimplements\s+(.+?)(?=\s+permits\b|$)/.exec(masked);
  return {
    extends: ext ? namesOf(ext[1]) : [],
    implements: impl ? namesOf(impl[1]) : [],
  };
}

function matchType(text: string): DeclarationMatch | undefined {
  const m = TYPE_DECLARATION.exec(text);
  if (!m) return undefined;
  return {
    kind: TYPE_KINDS[m[2]],
    name: m[3],
    modifiers: words(m[1]),
    bodyRole: "type",
    terminator: "block",
    header: typeHeader,
  };
}

function matchMember(text: string, enclosingName: string | undefined): DeclarationMatch | undefined {
  const type = matchType(text);
  if (type) return type;

  let m = CONSTRUCTOR.exec(text);
  if (m && m[2] === enclosingName) {
    return { kind: "constructor", name: m[2], modifiers: words(m[1]), bodyRole: "opaque", terminator: "block" };
  }
  m = METHOD.exec(text);
  if (m && !NOT_A_TYPE.has(m[2])) {
    return { kind: "method", name: m[3], modifiers: words(m[1]), bodyRole: "opaque", terminator: "block" };
  }
  m = FIELD.exec(text);
  if (m && !NOT_A_TYPE.has(m[2])) {
    const modifiers = words(m[1]);
    const constant = modifiers.includes("static") && modifiers.includes("final");
    return { kind: constant ? "field" : undefined, name: m[3], modifiers, bodyRole: "opaque", terminator: "block" };
  }
  return undefined;
}

const IMPORT = /^\s*import\s+(static\s+)?([\w$]+(?:\s*\.\s*[\w$]+)*)(\s*\.\s*\*)?\s*;/;

function extractImports(masked: MaskedSource): ImportStatement[] {
  const imports: ImportStatement[] = [];
  masked.code.forEach((code, index) => {
    const m = IMPORT.exec(code);
    if (!m) return;
    const path = m[2].replace(/\s+/g, "");
    const wildcard = m[3] !== undefined;
    const segments = path.split(".");
    imports.push({
      text: collapseWhitespace(masked.lines[index].slice(0, m[0].length)),
      module: wildcard ? `${path}.*` : path,
      names: [wildcard ? "*" : segments[segments.length - 1]],
      line: index + 1,
    });
  });
  return imports;
}

const JAVA: BraceGrammar = {
  language: "java",
  lexer: { tripleQuotedStrings: true },
  annotation: new RegExp(`^@(?!interface\\b)(${ID}(?:\\.${ID})*)(?:\\s*\\([^()]*\\))?\\s*`),
  match(text: string, role: ScopeRole, context) {
    if (role === "module") return matchType(text);
    if (role === "type") return matchMember(text, context.enclosingName);
    return undefined;
  },
  imports: extractImports,
};

export const javaExtractor: LanguageExtractor = {
  language: "java",
  extensions: extensionsFor("java"),
  extract: (source, filePath) => scanBraceLanguage(JAVA, source, filePath),
};
