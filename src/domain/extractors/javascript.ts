import type { ImportStatement, LanguageExtractor } from "../types.js";
import { extensionsFor } from "../languages.js";
import { baseTypeName, collapseWhitespace, splitTopLevel, type MaskedSource } from "./lexer.js";
import {
  lineAt,
  literalAt,
  scanBraceLanguage,
  type BraceGrammar,
  type DeclarationMatch,
  type HeaderParts,
  type MatchContext,
  type ScopeRole,
} from "./brace-scanner.js";

const ID = "[A-Za-z_$][\\w$]*";

const FUNCTION = new RegExp(
  `^((?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?(?:async\\s+)?)function\\s*(\\*)?\\s*(${ID})?\\s*[<(]`,
);
const CLASS = new RegExp(
  `^((?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?(?:abstract\\s+)?)class(?![\\w$])\\s*(${ID})?`,
);
const INTERFACE = new RegExp(`^((?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?)interface\\s+(${ID})`);
const ENUM = new RegExp(`^((?:export\\s+)?(?:declare\\s+)?(?:const\\s+)?)enum\\s+(${ID})`);
const TYPE_ALIAS = new RegExp(`^((?:export\\s+)?(?:declare\\s+)?)type\\s+(${ID})\\s*(?:<[^=]*>)?\\s*=`);
const NAMESPACE = new RegExp(`^((?:export\\s+)?(?:declare\\s+)?)(?:namespace|module)\\s+(${ID}(?:\\.${ID})*)\\s*(?:\\{|$)`);
const VARIABLE = new RegExp(
  `^((?:export\\s+)?(?:declare\\s+)?)(const|let|var)\\s+(${ID})\\s*!?\\s*(?::[^=]*?)?=(?!=)\\s*(.*)$`,
);

const FUNCTION_VALUE = /^(?:async\s+)?function\b/;
const ARROW_VALUE = new RegExp(
  `^(async\\s+)?(?:<[^>]*>\\s*)?(?:\\([^()]*(?:\\([^()]*\\)[^()]*)*\\)|${ID})\\s*(?::\\s*[^=]+?)?\\s*=>`,
);
const OPEN_PARAMS_VALUE = /^(?:async\s+)?(?:<[^>]*>\s*)?\(\s*$/;
const CLASS_VALUE = /^class\b/;

const MEMBER_MODIFIERS = "public|private|protected|static|abstract|override|async|declare|readonly|accessor|get|set";
const CONSTRUCTOR = /^((?:(?:public|private|protected)\s+)*)constructor\s*\(/;
const METHOD = new RegExp(`^((?:(?:${MEMBER_MODIFIERS})\\s+)*)(\\*\\s*)?(#?${ID})\\s*[?!]?\\s*(?:<[^>]*>\\s*)?\\(`);
const PROPERTY = new RegExp(
  `^((?:(?:public|private|protected|static|abstract|override|readonly|declare|accessor)\\s+)*)(#?${ID})\\s*[?!]?\\s*(?=[:=;]|$)(.*)$`,
);
const SIGNATURE_MEMBER = new RegExp(`^((?:readonly\\s+)?)(${ID})\\s*\\??\\s*(?:<[^>]*>\\s*)?\\(`);

const MEMBER_KEYWORDS = new Set(["if", "for", "while", "switch", "catch", "return", "function", "new", "super", "this"]);

function words(prefix: string | undefined): string[] {
  return (prefix ?? "").split(/\s+/).filter((w) => w.length > 0);
}

function namesOf(list: string): string[] {
  return splitTopLevel(list)
    .map(baseTypeName)
    .filter((n): n is string => n !== undefined);
}

function classHeader(masked: string): HeaderParts {
  const ext = /\bextends\s+(.+?)(?=\s+implements\b|\s*\{|$)/.exec(masked);
  const impl = /\bimplements\s+(.+?)\s*\{?$/.exec(masked);
  return {
    extends: ext ? namesOf(ext[1]) : [],
    implements: impl ? namesOf(impl[1]) : [],
  };
}

function interfaceHeader(masked: string): HeaderParts {
  const ext = /\bextends\s+(.+?)\s*\{?$/.exec(masked);
  return { extends: ext ? namesOf(ext[1]) : [] };
}

function matchModule(text: string, context: MatchContext, typescript: boolean): DeclarationMatch | undefined {
  let m = FUNCTION.exec(text);
  if (m) {
    const modifiers = words(m[1]);
    const name = m[3] ?? (modifiers.includes("default") ? "default" : undefined);
    if (!name) return undefined;
    if (m[2]) modifiers.push("generator");
    return { kind: "function", name, modifiers, bodyRole: "callable", terminator: "block" };
  }
  m = CLASS.exec(text);
  if (m) {
    const modifiers = words(m[1]);
    const name = m[2] ?? (modifiers.includes("default") ? "default" : undefined);
    if (!name) return undefined;
    return { kind: "class", name, modifiers, bodyRole: "class", terminator: "block", header: classHeader };
  }
  if (typescript) {
    m = INTERFACE.exec(text);
    if (m) {
      return {
        kind: "interface",
        name: m[2],
        modifiers: words(m[1]),
        bodyRole: "interface",
        terminator: "block",
        header: interfaceHeader,
      };
    }
    m = ENUM.exec(text);
    if (m) return { kind: "enum", name: m[2], modifiers: words(m[1]), bodyRole: "opaque", terminator: "block" };
    m = TYPE_ALIAS.exec(text);
    if (m) return { kind: "type-alias", name: m[2], modifiers: words(m[1]), bodyRole: "opaque", terminator: "statement" };
    m = NAMESPACE.exec(text);
    if (m) return { kind: "namespace", name: m[2], modifiers: words(m[1]), bodyRole: "module", terminator: "block" };
  }
  m = VARIABLE.exec(text);
  if (m) {
    const modifiers = words(m[1]);
    const name = m[3];
    const value = m[4];
    if (FUNCTION_VALUE.test(value) || ARROW_VALUE.test(value) || OPEN_PARAMS_VALUE.test(value)) {
      if (/^async\b/.test(value)) modifiers.push("async");
      return { kind: "function", name, modifiers, bodyRole: "callable", terminator: "statement" };
    }
    if (CLASS_VALUE.test(value)) {
      return { kind: "class", name, modifiers, bodyRole: "class", terminator: "statement", header: classHeader };
    }
    const reported = context.topLevel && m[2] === "const" && (modifiers.includes("export") || /^[A-Z][A-Z0-9_]*$/.test(name));
    return {
      kind: reported ? "field" : undefined,
      name,
      modifiers,
      bodyRole: "opaque",
      terminator: "statement",
    };
  }
  return undefined;
}

function matchClassMember(text: string): DeclarationMatch | undefined {
  let m = CONSTRUCTOR.exec(text);
  if (m) {
    return { kind: "constructor", name: "constructor", modifiers: words(m[1]), bodyRole: "callable", terminator: "block" };
  }
  m = METHOD.exec(text);
  if (m && !MEMBER_KEYWORDS.has(m[3])) {
    const modifiers = words(m[1]).map((w) => (w === "get" ? "getter" : w === "set" ? "setter" : w));
    if (m[2]) modifiers.push("generator");
    return { kind: "method", name: m[3], modifiers, bodyRole: "callable", terminator: "block" };
  }
  m = PROPERTY.exec(text);
  if (m && !MEMBER_KEYWORDS.has(m[2])) {
    const modifiers = words(m[1]);
    const value = /^\s*(?::[^=]*?)?=(?!=)\s*(.*)$/.exec(m[3]);
    if (value && (FUNCTION_VALUE.test(value[1]) || ARROW_VALUE.test(value[1]) || OPEN_PARAMS_VALUE.test(value[1]))) {
      if (/^async\b/.test(value[1])) modifiers.push("async");
      return { kind: "method", name: m[2], modifiers, bodyRole: "callable", terminator: "statement" };
    }
    return { kind: "field", name: m[2], modifiers, bodyRole: "opaque", terminator: "statement" };
  }
  return undefined;
}

function matchInterfaceMember(text: string): DeclarationMatch | undefined {
  const m = SIGNATURE_MEMBER.exec(text);
  if (!m) return undefined;
  return { kind: "method", name: m[2], modifiers: words(m[1]), bodyRole: "opaque", terminator: "statement" };
}

// ── Imports ─────────────────────────────────────────────────────

const IMPORT_FROM = /(^|[;\n}])\s*import\s+(type\s+)?([\w$\s{},*]*?)\s*from\s*(["'])/g;
const IMPORT_BARE = /(^|[;\n}])\s*import\s*(["'])/g;
const EXPORT_FROM = /(^|[;\n}])\s*export\s+(type\s+)?([\w$\s{},*]*?)\s*from\s*(["'])/g;
const REQUIRE = /\brequire\s*\(\s*(["'])/g;
const DYNAMIC_IMPORT = /\bimport\s*\(\s*(["'])/g;
const REQUIRE_BINDING = /(?:const|let|var)\s+([\w$]+|\{[^}]*\})\s*=\s*$/;

/** `a, { b as c, type D }, * as ns` → `["a", "b", "D", "*"]` */
function clauseNames(clause: string): string[] {
  const names: string[] = [];
  const braces = /\{([^}]*)\}/.exec(clause);
  const outside = clause.replace(/\{[^}]*\}/, "");
  for (const part of outside.split(",")) {
    const p = part.trim();
    if (p === "") continue;
    names.push(p.startsWith("*") ? "*" : p);
  }
  if (braces) {
    for (const part of braces[1].split(",")) {
      const p = part.trim().replace(/^type\s+/, "");
      if (p === "") continue;
      names.push(p.split(/\s+as\s+/)[0].trim());
    }
  }
  return names;
}

function extractImports(masked: MaskedSource): ImportStatement[] {
  const maskedText = masked.code.join("\n");
  const original = masked.lines.join("\n");
  const found: { at: number; statement: ImportStatement }[] = [];

  const add = (at: number, quoteAt: number, names: string[]): void => {
    const literal = literalAt(maskedText, original, quoteAt);
    if (!literal) return;
    let end = literal.end;
    if (maskedText[end] === ";") end++;
    found.push({
      at,
      statement: {
        text: collapseWhitespace(original.slice(at, end)),
        module: literal.value,
        names,
        line: lineAt(original, at),
      },
    });
  };

  const statementStart = (m: RegExpExecArray): number => {
    const lead = m[1] ?? "";
    let at = m.index + lead.length;
    while (/\s/.test(maskedText[at])) at++;
    return at;
  };

  for (const m of maskedText.matchAll(IMPORT_FROM)) {
    add(statementStart(m), (m.index ?? 0) + m[0].length - 1, clauseNames(m[3]));
  }
  for (const m of maskedText.matchAll(IMPORT_BARE)) {
    add(statementStart(m), (m.index ?? 0) + m[0].length - 1, []);
  }
  for (const m of maskedText.matchAll(EXPORT_FROM)) {
    add(statementStart(m), (m.index ?? 0) + m[0].length - 1, clauseNames(m[3]));
  }
  for (const m of maskedText.matchAll(REQUIRE)) {
    const at = m.index ?? 0;
    const lineStart = maskedText.lastIndexOf("\n", at) + 1;
    const binding = REQUIRE_BINDING.exec(maskedText.slice(lineStart, at));
    const names = binding ? clauseNames(binding[1].replace(/:\s*[\w$]+/g, "")) : [];
    const literal = literalAt(maskedText, original, at + m[0].length - 1);
    if (!literal) continue;
    const close = maskedText.indexOf(")", literal.end);
    const end = close === -1 ? literal.end : close + 1;
    found.push({
      at,
      statement: {
        text: collapseWhitespace(original.slice(at, end)),
        module: literal.value,
        names,
        line: lineAt(original, at),
      },
    });
  }
  for (const m of maskedText.matchAll(DYNAMIC_IMPORT)) {
    const at = m.index ?? 0;
    const literal = literalAt(maskedText, original, at + m[0].length - 1);
    if (!literal) continue;
    const close = maskedText.indexOf(")", literal.end);
    const end = close === -1 ? literal.end : close + 1;
    found.push({
      at,
      statement: {
        text: collapseWhitespace(original.slice(at, end)),
        module: literal.value,
        names: [],
        line: lineAt(original, at),
      },
    });
  }

  return found.sort((a, b) => a.at - b.at).map((f) => f.statement);
}

function grammarFor(typescript: boolean): BraceGrammar {
  return {
    language: typescript ? "typescript" : "javascript",
    lexer: { templateLiterals: true, regexLiterals: true },
    annotation: new RegExp(`^@(${ID}(?:\\.${ID})*)(?:\\s*\\([^()]*\\))?\\s*`),
    match(text: string, role: ScopeRole, context: MatchContext) {
      switch (role) {
        case "class":
          return matchClassMember(text);
        case "interface":
          return typescript ? matchInterfaceMember(text) : undefined;
        case "module":
        case "callable":
          return matchModule(text, context, typescript);
        default:
          return undefined;
      }
    },
    imports: extractImports,
  };
}

const JAVASCRIPT = grammarFor(false);
const TYPESCRIPT = grammarFor(true);

export const javascriptExtractor: LanguageExtractor = {
  language: "javascript",
  extensions: extensionsFor("javascript"),
  extract: (source, filePath) => scanBraceLanguage(JAVASCRIPT, source, filePath),
};

export const typescriptExtractor: LanguageExtractor = {
  language: "typescript",
  extensions: extensionsFor("typescript"),
  extract: (source, filePath) => scanBraceLanguage(TYPESCRIPT, source, filePath),
};
