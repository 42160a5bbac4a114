import type { ExtractionWarning } from "../types.js";

export interface LexerOptions {
  /** Backtick template literals with `${}` interpolation. */
  templateLiterals?: boolean;
  /** `/.../flags` regular expression literals. */
  regexLiterals?: boolean;
  /** `"""` text blocks and raw strings. */
  tripleQuotedStrings?: boolean;
  /** `${}` interpolation inside double-quoted and triple-quoted strings. */
  stringTemplates?: boolean;
}

/**
 * Source text with string and comment contents blanked out. Line structure and
 * column offsets are preserved, so a position in `code` addresses the same
 * character in `lines`. String delimiters stay in place.
 */
export interface MaskedSource {
  lines: string[];
  code: string[];
  /** `/** ... *\/` comments keyed by the line they end on. */
  docComments: Map<number, string>;
  warnings: ExtractionWarning[];
  /** Constructs left open when the input ended. */
  eofProblems: string[];
}

type StringKind = "single" | "double" | "template" | "triple";

const CLOSERS: Record<StringKind, string> = {
  single: "'",
  double: '"',
  template: "`",
  triple: '"""',
};

const REGEX_PRECEDING_WORDS = new Set([
  "return",
  "typeof",
  "instanceof",
  "case",
  "do",
  "else",
  "in",
  "of",
  "new",
  "delete",
  "void",
  "throw",
  "yield",
  "await",
]);

export function normalizeNewlines(source: string): string {
  return source.replace(/\r\n?/g, "\n");
}

export function maskSource(source: string, options: LexerOptions = {}): MaskedSource {
  const text = normalizeNewlines(source);
  const n = text.length;
  const out = text.split("");
  const warnings: ExtractionWarning[] = [];
  const eofProblems: string[] = [];
  const docComments = new Map<number, string>();
  const interpolations: { resume: StringKind; depth: number }[] = [];

  let i = 0;
  let line = 1;

  const blank = (j: number): void => {
    if (out[j] !== "\n") out[j] = " ";
  };

  // Scans string contents from `i` until the closing delimiter, an
  // interpolation opener, or (for one-line strings) the end of the line.
  const scanString = (kind: StringKind, openLine: number): void => {
    const closer = CLOSERS[kind];
    const interpolates =
      kind === "template" || (options.stringTemplates === true && (kind === "double" || kind === "triple"));
    while (i < n) {
      const c = text[i];
      if (c === "\\" && kind !== "triple") {
        blank(i);
        if (i + 1 < n) {
          if (text[i + 1] === "\n") line++;
          blank(i + 1);
        }
        i += 2;
        continue;
      }
      if (c === "\n") {
        if (kind === "single" || kind === "double") {
          warnings.push({
            code: "parse-recoverable",
            message: `unterminated string literal at line ${line}`,
            line,
          });
          return;
        }
        line++;
        i++;
        continue;
      }
      if (text.startsWith(closer, i)) {
        i += closer.length;
        return;
      }
      if (interpolates && c === "$" && text[i + 1] === "{") {
        blank(i);
        blank(i + 1);
        i += 2;
        interpolations.push({ resume: kind, depth: 0 });
        return;
      }
      blank(i);
      i++;
    }
    if (kind === "single" || kind === "double") {
      warnings.push({
        code: "parse-recoverable",
        message: `unterminated string literal at line ${openLine}`,
        line: openLine,
      });
    } else {
      eofProblems.push(`unterminated ${kind === "template" ? "template literal" : "text block"} from line ${openLine}`);
    }
  };

  const startsRegex = (): boolean => {
    let j = i - 1;
    while (j >= 0 && (out[j] === " " || out[j] === "\t" || out[j] === "\n")) j--;
    if (j < 0) return true;
    const prev = out[j];
    if (/[\w$]/.test(prev)) {
      let k = j;
      while (k >= 0 && /[\w$]/.test(out[k])) k--;
      return REGEX_PRECEDING_WORDS.has(out.slice(k + 1, j + 1).join(""));
    }
    return "(,=:[!&|?{};+-*%<>~^".includes(prev);
  };

  // Returns the index just past the closing slash, or -1 when the line ends first.
  const regexEnd = (): number => {
    let inClass = false;
    for (let j = i + 1; j < n; j++) {
      const c = text[j];
      if (c === "\n") return -1;
      if (c === "\\") {
        j++;
        continue;
      }
      if (c === "[") inClass = true;
      else if (c === "]") inClass = false;
      else if (c === "/" && !inClass) return j + 1;
    }
    return -1;
  };

  while (i < n) {
    const c = text[i];
    if (c === "\n") {
      line++;
      i++;
      continue;
    }

    const top = interpolations[interpolations.length - 1];
    if (top && c === "{") {
      top.depth++;
      i++;
      continue;
    }
    if (top && c === "}") {
      if (top.depth === 0) {
        blank(i);
        i++;
        interpolations.pop();
        scanString(top.resume, line);
        continue;
      }
      top.depth--;
      i++;
      continue;
    }

    if (c === "/" && text[i + 1] === "/") {
      while (i < n && text[i] !== "\n") blank(i++);
      continue;
    }

    if (c === "/" && text[i + 1] === "*") {
      const start = i;
      const close = text.indexOf("*/", i + 2);
      const end = close === -1 ? n : close + 2;
      if (close === -1) eofProblems.push(`unterminated block comment from line ${line}`);
      for (; i < end; i++) {
        if (text[i] === "\n") line++;
        blank(i);
      }
      const comment = text.slice(start, end);
      if (close !== -1 && comment.startsWith("/**") && comment !== "/**/") {
        docComments.set(line, comment);
      }
      continue;
    }

    if (options.tripleQuotedStrings && text.startsWith('"""', i)) {
      const openLine = line;
      i += 3;
      scanString("triple", openLine);
      continue;
    }

    if (c === '"' || c === "'") {
      const openLine = line;
      i++;
      scanString(c === '"' ? "double" : "single", openLine);
      continue;
    }

    if (c === "`" && options.templateLiterals) {
      const openLine = line;
      i++;
      scanString("template", openLine);
      continue;
    }

    if (c === "/" && options.regexLiterals && startsRegex()) {
      const end = regexEnd();
      if (end !== -1) {
        for (let j = i + 1; j < end - 1; j++) blank(j);
        i = end;
        while (i < n && /[a-z]/.test(text[i])) i++;
        continue;
      }
    }

    i++;
  }

  return {
    lines: text.split("\n"),
    code: out.join("").split("\n"),
    docComments,
    warnings,
    eofProblems,
  };
}

/** Collapse runs of whitespace to single spaces. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Split on a separator that is not nested inside (), [], {} or <>.
 * Empty pieces are dropped.
 */
export function splitTopLevel(text: string, separator = ","): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if ("([{<".includes(c)) depth++;
    else if (")]}>".includes(c) && !(c === ">" && text[i - 1] === "-")) depth = Math.max(0, depth - 1);
    if (c === separator && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += c;
  }
  parts.push(current);
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/** `Base<T>(args)` → `Base`; `pkg.Base[int]` → `pkg.Base`. */
export function baseTypeName(text: string): string | undefined {
  const match = /^[A-Za-z_$][\w$]*(?:\s*\.\s*[A-Za-z_$][\w$]*)*/.exec(text.trim());
  return match ? match[0].replace(/\s+/g, "") : undefined;
}

/** The first balanced parenthesized group of a text, whitespace collapsed. */
export function parameterList(signature: string): string {
  const open = signature.indexOf("(");
  if (open === -1) return "";
  let depth = 0;
  for (let i = open; i < signature.length; i++) {
    if (signature[i] === "(") depth++;
    else if (signature[i] === ")") {
      depth--;
      if (depth === 0) return collapseWhitespace(signature.slice(open, i + 1));
    }
  }
  return collapseWhitespace(signature.slice(open));
}

/** Offset of the `)` matching the `(` at `open`, or -1. */
export function matchingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === "(") depth++;
    else if (text[i] === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

export function summarizeEofProblems(problems: string[], line: number): ExtractionWarning | undefined {
  if (problems.length === 0) return undefined;
  return {
    code: "parse-recoverable",
    message: `unexpected end of file: ${problems.join("; ")}`,
    line,
  };
}
