import type { ExtractionWarning, ImportStatement, LanguageExtractor, RawExtraction, RawSymbol } from "../types.js";
import { extensionsFor } from "../languages.js";
import { baseTypeName, collapseWhitespace, matchingParen, normalizeNewlines, splitTopLevel, summarizeEofProblems } from "./lexer.js";

interface PythonMask {
  lines: string[];
  code: string[];
  /** Per line: true when the line begins inside a multi-line string. */
  startsInString: boolean[];
  warnings: ExtractionWarning[];
  eofProblems: string[];
}

/** Blanks string contents and `#` comments; keeps quotes and line structure. */
function maskPython(source: string): PythonMask {
  const text = normalizeNewlines(source);
  const n = text.length;
  const out = text.split("");
  const warnings: ExtractionWarning[] = [];
  const eofProblems: string[] = [];
  const lineCount = text.split("\n").length;
  const startsInString: boolean[] = new Array<boolean>(lineCount).fill(false);
  const blank = (j: number): void => {
    if (out[j] !== "\n") out[j] = " ";
  };

  let i = 0;
  let line = 1;
  while (i < n) {
    const c = text[i];
    if (c === "\n") {
      line++;
      i++;
      continue;
    }
    if (c === "#") {
      while (i < n && text[i] !== "\n") blank(i++);
      continue;
    }
    if (c !== '"' && c !== "'") {
      i++;
      continue;
    }
    const triple = text.startsWith(c.repeat(3), i);
    const closer = triple ? c.repeat(3) : c;
    const openLine = line;
    i += closer.length;
    let closed = false;
    while (i < n) {
      const d = text[i];
      if (d === "\\") {
        blank(i);
        if (i + 1 < n) {
          if (text[i + 1] === "\n") {
            line++;
            startsInString[line - 1] = true;
          }
          blank(i + 1);
        }
        i += 2;
        continue;
      }
      if (d === "\n") {
        if (!triple) break;
        line++;
        startsInString[line - 1] = true;
        i++;
        continue;
      }
      if (text.startsWith(closer, i)) {
        i += closer.length;
        closed = true;
        break;
      }
      blank(i);
      i++;
    }
    if (!closed) {
      if (triple) eofProblems.push(`unterminated triple-quoted string from line ${openLine}`);
      else warnings.push({ code: "parse-recoverable", message: `unterminated string literal at line ${openLine}`, line: openLine });
    }
  }

  return { lines: text.split("\n"), code: out.join("").split("\n"), startsInString, warnings, eofProblems };
}

interface LogicalLine {
  start: number;
  end: number;
  code: string;
  text: string;
  indent: number;
  /** A bracket was still open where the line ended. */
  truncated: boolean;
}

function indentWidth(line: string): number {
  let width = 0;
  for (const c of line) {
    if (c === " ") width++;
    else if (c === "\t") width = width - (width % 8) + 8;
    else break;
  }
  return width;
}

function bracketDelta(code: string, depth: number): number {
  let d = depth;
  for (const c of code) {
    if (c === "(" || c === "[" || c === "{") d++;
    else if (c === ")" || c === "]" || c === "}") d = Math.max(0, d - 1);
  }
  return d;
}

// A line that can only start a new statement; ends a bracket left open above it.
const STATEMENT_BOUNDARY = /^(?:(?:async\s+)?def|class|import|from)\b|^@/;

function logicalLines(mask: PythonMask, problems: string[], warnings: ExtractionWarning[]): LogicalLine[] {
  const result: LogicalLine[] = [];
  const { code, lines, startsInString } = mask;
  let idx = 0;
  while (idx < code.length) {
    const start = idx;
    const indent = indentWidth(lines[start]);
    let depth = bracketDelta(code[idx], 0);
    let recovered = false;
    while (
      idx + 1 < code.length &&
      (depth > 0 || /\\\s*$/.test(code[idx]) || startsInString[idx + 1])
    ) {
      if (depth > 0 && indentWidth(lines[idx + 1]) <= indent && STATEMENT_BOUNDARY.test(code[idx + 1].trimStart())) {
        recovered = true;
        break;
      }
      idx++;
      depth = bracketDelta(code[idx], depth);
    }
    if (recovered) {
      warnings.push({
        code: "parse-recoverable",
        message: `unclosed bracket in statement from line ${start + 1}`,
        line: start + 1,
      });
    }
    const truncated = depth > 0;
    if (truncated && !recovered) problems.push(`unclosed bracket in statement from line ${start + 1}`);
    const joinedCode = code.slice(start, idx + 1).join("\n");
    if (joinedCode.trim() !== "" && !startsInString[start]) {
      result.push({
        start: start + 1,
        end: idx + 1,
        code: joinedCode,
        text: lines.slice(start, idx + 1).join("\n"),
        indent,
        truncated,
      });
    }
    idx++;
  }
  return result;
}

const DEF = /^(async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;
const CLASS = /^class\s+([A-Za-z_]\w*)\s*(?=[(:\[])/;
const DECORATOR = /^@\s*([\w.]+)/;
const CONSTANT = /^([A-Z_][A-Z0-9_]*)\s*(?::[^=]+)?=(?!=)/;
const IMPORT = /^import\s+([\s\S]+)$/;
const FROM_IMPORT = /^from\s+(\.+[\w.]*|[\w.]+)\s+import\s+([\s\S]+)$/;
const DOCSTRING = /^[rRuUbBfF]{0,2}("""|'''|"|')/;

interface OpenScope {
  indent: number;
  recordIndex: number;
  lastLine: number;
}

function importedNames(list: string): string[] {
  return list
    .replace(/[()\\]/g, " ")
    .split(",")
    .map((part) => part.trim().split(/\s+as\s+/)[0].trim())
    .filter((name) => name.length > 0);
}

function bases(text: string): string[] {
  return splitTopLevel(text)
    .filter((entry) => !entry.includes("=") && !entry.startsWith("*"))
    .map(baseTypeName)
    .filter((n): n is string => n !== undefined);
}

export function extractPython(source: string, filePath: string): RawExtraction {
  const mask = maskPython(source);
  const problems = [...mask.eofProblems];
  const warnings: ExtractionWarning[] = [...mask.warnings];
  const records: RawSymbol[] = [];
  const imports: ImportStatement[] = [];
  const stack: OpenScope[] = [];
  let decorators: string[] = [];
  let docstringFor: OpenScope | undefined;

  const closeScopes = (indent: number): void => {
    while (stack.length > 0 && stack[stack.length - 1].indent >= indent) {
      const scope = stack.pop();
      if (scope) records[scope.recordIndex].endLine = scope.lastLine;
    }
  };

  for (const logical of logicalLines(mask, problems, warnings)) {
    if (logical.truncated) continue;
    const code = logical.code.trimStart();
    const text = logical.text.trimStart();

    if (docstringFor) {
      const owner = docstringFor;
      docstringFor = undefined;
      if (logical.indent > owner.indent && DOCSTRING.test(code)) {
        records[owner.recordIndex].docComment = logical.text.trim();
      }
    }

    closeScopes(logical.indent);
    for (const scope of stack) scope.lastLine = logical.end;
    const parentIndex = stack.length > 0 ? stack[stack.length - 1].recordIndex : undefined;

    const decorator = DECORATOR.exec(code);
    if (decorator) {
      decorators.push(`@${decorator[1]}`);
      continue;
    }

    const def = DEF.exec(code);
    const cls = def ? null : CLASS.exec(code);
    if (def || cls) {
      let header: string | undefined;
      let extendsList: string[] = [];
      if (def) {
        const open = def[0].length - 1;
        const close = matchingParen(code, open);
        const tail = close === -1 ? null : /^\s*(?:->\s*[^:]+?)?\s*:/.exec(code.slice(close + 1));
        if (close !== -1 && tail) header = text.slice(0, close + 1 + tail[0].length - 1);
      } else if (cls) {
        let after = cls[0].length;
        if (code[after] === "[") {
          const close = code.indexOf("]", after);
          after = close === -1 ? code.length : close + 1;
        }
        if (code[after] === "(") {
          const close = matchingParen(code, after);
          const tail = close === -1 ? null : /^\s*:/.exec(code.slice(close + 1));
          if (close !== -1 && tail) {
            extendsList = bases(code.slice(after + 1, close));
            header = text.slice(0, close + 1);
          }
        } else {
          const tail = /^\s*:/.exec(code.slice(after));
          if (tail) header = text.slice(0, after);
        }
      }

      if (header === undefined) {
        warnings.push({
          code: "parse-recoverable",
          message: `could not parse declaration at line ${logical.start}`,
          line: logical.start,
        });
        decorators = [];
        continue;
      }

      const record: RawSymbol = {
        kind: def ? "function" : "class",
        name: def ? def[2] : (cls?.[1] ?? ""),
        parentIndex,
        startLine: logical.start,
        endLine: logical.end,
        signature: collapseWhitespace(header),
        modifiers: def?.[1] ? [...decorators, "async"] : decorators,
      };
      if (extendsList.length > 0) record.extends = extendsList;
      records.push(record);
      decorators = [];
      const scope: OpenScope = { indent: logical.indent, recordIndex: records.length - 1, lastLine: logical.end };
      stack.push(scope);
      docstringFor = scope;
      continue;
    }
    decorators = [];

    if (/^(?:async\s+)?def\b|^class\b/.test(code)) {
      warnings.push({
        code: "parse-recoverable",
        message: `could not parse declaration at line ${logical.start}`,
        line: logical.start,
      });
      continue;
    }

    const from = FROM_IMPORT.exec(code);
    if (from) {
      imports.push({
        text: collapseWhitespace(text),
        module: from[1],
        names: importedNames(from[2]),
        line: logical.start,
      });
      continue;
    }
    const plain = IMPORT.exec(code);
    if (plain) {
      for (const module of importedNames(plain[1])) {
        imports.push({ text: collapseWhitespace(text), module, names: [module], line: logical.start });
      }
      continue;
    }

    const constant = stack.length === 0 && logical.indent === 0 ? CONSTANT.exec(code) : null;
    if (constant && /[A-Z]/.test(constant[1])) {
      records.push({
        kind: "field",
        name: constant[1],
        startLine: logical.start,
        endLine: logical.end,
        signature: collapseWhitespace(mask.lines[logical.start - 1]),
        modifiers: [],
      });
    }
  }

  closeScopes(-1);
  const lastLine = Math.max(1, mask.code.length);
  const eof = summarizeEofProblems(problems, lastLine);
  if (eof) warnings.push(eof);

  return { language: "python", filePath, records, imports, warnings };
}

export const pythonExtractor: LanguageExtractor = {
  language: "python",
  extensions: extensionsFor("python"),
  extract: extractPython,
};
