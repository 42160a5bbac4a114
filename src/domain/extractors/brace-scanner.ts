import type { ExtractionWarning, ImportStatement, Language, RawExtraction, RawSymbol, RawSymbolKind } from "../types.js";
import { collapseWhitespace, maskSource, summarizeEofProblems, type LexerOptions, type MaskedSource } from "./lexer.js";

/**
 * Declaration scanner shared by the brace-delimited languages. A grammar
 * recognizes declaration headers at statement starts; the scanner tracks
 * braces and parentheses on the masked text, opens a scope for every body and
 * closes it when the matching brace is seen.
 */

export type ScopeRole = "module" | "callable" | "class" | "interface" | "type" | "opaque";

export interface MatchContext {
  /** Name of the innermost enclosing declaration, if any. */
  enclosingName?: string;
  /** True when no declaration other than a namespace encloses the statement. */
  topLevel: boolean;
}

export interface HeaderParts {
  extends?: string[];
  implements?: string[];
}

export interface DeclarationMatch {
  /** Omitted for declarations that are tracked but not reported. */
  kind?: RawSymbolKind;
  name: string;
  modifiers: string[];
  bodyRole: ScopeRole;
  /**
   * `block`: the declaration runs to its `{ ... }` body, or to `;` when it has none.
   * `statement`: it may also end at the end of a line that does not continue.
   */
  terminator: "block" | "statement";
  /** Derives base types from the masked header text. */
  header?: (maskedHeader: string) => HeaderParts;
}

export interface BraceGrammar {
  language: Language;
  lexer: LexerOptions;
  /** Sticky-free regex matching one annotation or decorator at the start of the text. */
  annotation?: RegExp;
  match(text: string, role: ScopeRole, context: MatchContext): DeclarationMatch | undefined;
  imports(masked: MaskedSource): ImportStatement[];
}

interface Scope {
  role: ScopeRole;
  /** Brace depth outside this scope. */
  depth: number;
  /** Parenthesis depth when the scope opened. */
  paren: number;
  recordIndex?: number;
}

interface Pending {
  match: DeclarationMatch;
  startLine: number;
  startCol: number;
  paren: number;
  depth: number;
  annotations: string[];
  docComment?: string;
  parentIndex?: number;
}

const CONTINUATION_END = /(?:[=,(\[:|&+\-*/?.<]|=>|->)\s*$/;
const CONTINUATION_START = /^\s*(?:[{.?:|&=)\]]|=>|->|where\b|extends\b|implements\b|throws\b)/;
const ANNOTATION_LINE = /^(?:@[\w$.:]+(?:\s*\([^)]*\))?\s*)+$/;
const CALLABLE_KINDS: ReadonlySet<RawSymbolKind | undefined> = new Set(["function", "method", "constructor"]);

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

export function scanBraceLanguage(grammar: BraceGrammar, source: string, filePath: string): RawExtraction {
  const masked = maskSource(source, grammar.lexer);
  const { code, lines } = masked;
  const records: RawSymbol[] = [];
  const warnings: ExtractionWarning[] = [...masked.warnings];
  const stack: Scope[] = [{ role: "module", depth: -1, paren: 0 }];

  let depth = 0;
  let paren = 0;
  /** Indentation of the line that opened the outermost parenthesis of the current scope. */
  let parenIndent = 0;
  let pending: Pending | undefined;
  let annotations: string[] = [];

  const currentScope = (): Scope => stack[stack.length - 1];

  const innermostRecord = (): number | undefined => {
    for (let k = stack.length - 1; k >= 0; k--) {
      const index = stack[k].recordIndex;
      if (index !== undefined) return index;
    }
    return undefined;
  };

  const findDoc = (lineNo: number, col: number): string | undefined => {
    const sameLine = masked.docComments.get(lineNo);
    if (sameLine && code[lineNo - 1].slice(0, col).trim() === "") return sameLine;
    for (let k = lineNo - 1; k >= 1; k--) {
      const doc = masked.docComments.get(k);
      if (doc) return doc;
      const t = code[k - 1].trim();
      if (t === "" || ANNOTATION_LINE.test(t)) continue;
      return undefined;
    }
    return undefined;
  };

  const headerText = (p: Pending, endLine: number, endCol: number, from: string[]): string => {
    if (p.startLine === endLine) return from[endLine - 1].slice(p.startCol, endCol);
    const parts = [from[p.startLine - 1].slice(p.startCol)];
    for (let k = p.startLine; k < endLine - 1; k++) parts.push(from[k]);
    parts.push(from[endLine - 1].slice(0, endCol));
    return parts.join("\n");
  };

  // Turns the pending declaration into a record; returns its index when emitted.
  const finalize = (p: Pending, endLine: number, endCol: number): number | undefined => {
    const { match } = p;
    if (!match.kind) return undefined;
    const signature = collapseWhitespace(headerText(p, endLine, endCol, lines))
      .replace(/\s*(?:=>|=)$/, "")
      .trim();
    const parts = match.header ? match.header(collapseWhitespace(headerText(p, endLine, endCol, code))) : {};
    const record: RawSymbol = {
      kind: match.kind,
      name: match.name,
      parentIndex: p.parentIndex,
      startLine: p.startLine,
      endLine,
      signature,
      modifiers: [...match.modifiers, ...p.annotations],
    };
    if (parts.extends && parts.extends.length > 0) record.extends = parts.extends;
    if (parts.implements && parts.implements.length > 0) record.implements = parts.implements;
    if (p.docComment) record.docComment = p.docComment;
    records.push(record);
    return records.length - 1;
  };

  const recover = (message: string, lineNo: number, resumeParen: number): void => {
    warnings.push({ code: "parse-recoverable", message, line: lineNo });
    paren = resumeParen;
  };

  // Strips leading annotations; `found` collects them.
  const skipAnnotations = (text: string, found: string[]): { text: string; skipped: number } => {
    let rest = text;
    let skipped = 0;
    if (grammar.annotation) {
      for (let m = grammar.annotation.exec(rest); m; m = grammar.annotation.exec(rest)) {
        found.push(`@${m[1]}`);
        skipped += m[0].length;
        rest = rest.slice(m[0].length);
      }
    }
    return { text: rest, skipped };
  };

  const matchAt = (text: string): DeclarationMatch | undefined => {
    const parentIndex = innermostRecord();
    const enclosingName = parentIndex === undefined ? undefined : records[parentIndex].name;
    const topLevel = parentIndex === undefined || records[parentIndex].kind === "namespace";
    return grammar.match(text, currentScope().role, { enclosingName, topLevel });
  };

  const declarationAt = (lineNo: number, col: number): boolean => {
    if (currentScope().role === "opaque") return false;
    const { text } = skipAnnotations(code[lineNo - 1].slice(col), []);
    if (text.trim() === "" || text.startsWith("(")) return false;
    return matchAt(text) !== undefined;
  };

  // A callable header whose parameter list never closed, reaching its body.
  const unclosedHeader = (lineNo: number, col: number): boolean => {
    if (!pending || !CALLABLE_KINDS.has(pending.match.kind)) return false;
    if (depth !== pending.depth || paren !== pending.paren + 1) return false;
    const header = headerText(pending, lineNo, col, code).trimEnd();
    const params = header.slice(header.indexOf("(") + 1);
    // `= run {` inside a parameter list is a default value, not a body.
    return header.includes("(") && !/[()=]/.test(params) && /[\w$]$/.test(params);
  };

  const tryMatch = (lineNo: number, col: number): void => {
    const scope = currentScope();
    if (scope.role === "opaque") return;
    const stripped = skipAnnotations(code[lineNo - 1].slice(col), annotations);
    const start = col + stripped.skipped;
    const { text } = stripped;
    if (grammar.annotation && (text.trim() === "" || text.startsWith("("))) return;
    const parentIndex = innermostRecord();
    const match = matchAt(text);
    if (!match) {
      annotations = [];
      return;
    }
    if (pending) {
      finalize(pending, Math.max(pending.startLine, lineNo - 1), lines[Math.max(pending.startLine, lineNo - 1) - 1].length);
    }
    pending = {
      match,
      startLine: lineNo,
      startCol: start,
      paren,
      depth,
      annotations,
      docComment: findDoc(lineNo, start),
      parentIndex,
    };
    annotations = [];
  };

  const nextCodeLine = (index: number): string | undefined => {
    for (let k = index + 1; k < code.length; k++) {
      if (code[k].trim() !== "") return code[k];
    }
    return undefined;
  };

  for (let idx = 0; idx < code.length; idx++) {
    const lineNo = idx + 1;
    const text = code[idx];
    const indent = indentOf(text);
    const scopeParen = currentScope().paren;
    if (paren > scopeParen && indent < text.length && indent <= parenIndent && declarationAt(lineNo, indent)) {
      recover(`unclosed parenthesis before line ${lineNo}`, lineNo, scopeParen);
    }
    let statementStart = paren === 0;

    for (let col = 0; col < text.length; col++) {
      const ch = text[col];
      if (ch === " " || ch === "\t") continue;
      if (statementStart) {
        statementStart = false;
        if (paren === 0) tryMatch(lineNo, col);
      }
      switch (ch) {
        case "(":
        case "[":
          if (paren === currentScope().paren) parenIndent = indent;
          paren++;
          break;
        case ")":
        case "]":
          paren = Math.max(0, paren - 1);
          break;
        case "{": {
          const scope = currentScope();
          if (unclosedHeader(lineNo, col) && pending) {
            recover(`unclosed parenthesis in declaration of ${pending.match.name} at line ${lineNo}`, lineNo, pending.paren);
          }
          if (pending && paren === pending.paren && depth === pending.depth) {
            const p = pending;
            pending = undefined;
            const recordIndex = finalize(p, lineNo, col);
            stack.push({ role: p.match.bodyRole, depth, paren, recordIndex });
          } else {
            stack.push({ role: scope.role, depth, paren });
          }
          depth++;
          statementStart = true;
          break;
        }
        case "}": {
          if (depth === 0) {
            warnings.push({ code: "parse-recoverable", message: `unmatched closing brace at line ${lineNo}`, line: lineNo });
            break;
          }
          depth--;
          if (pending && depth < pending.depth) {
            finalize(pending, lineNo, col);
            pending = undefined;
          }
          let closedParen = paren;
          while (stack.length > 1 && currentScope().depth >= depth) {
            const closed = stack.pop();
            if (closed?.recordIndex !== undefined) records[closed.recordIndex].endLine = lineNo;
            if (closed) closedParen = closed.paren;
          }
          if (paren > closedParen) recover(`unclosed parenthesis before line ${lineNo}`, lineNo, closedParen);
          annotations = [];
          statementStart = true;
          break;
        }
        case ";":
          if (pending && paren === pending.paren && depth === pending.depth) {
            finalize(pending, lineNo, col);
            pending = undefined;
          }
          if (paren === 0) statementStart = true;
          break;
        default:
          break;
      }
    }

    if (pending && pending.match.terminator === "statement" && paren === pending.paren && depth === pending.depth) {
      const next = nextCodeLine(idx);
      const continues = CONTINUATION_END.test(text) || (next !== undefined && CONTINUATION_START.test(next));
      if (!continues) {
        finalize(pending, lineNo, text.length);
        pending = undefined;
      }
    }
  }

  const lastLine = Math.max(1, code.length);
  const problems = [...masked.eofProblems];
  if (pending) {
    problems.push(`incomplete declaration of ${pending.match.name} from line ${pending.startLine}`);
    finalize(pending, lastLine, lines[lastLine - 1].length);
  }
  const unclosed = stack.length - 1;
  while (stack.length > 1) {
    const closed = stack.pop();
    if (closed?.recordIndex !== undefined) records[closed.recordIndex].endLine = lastLine;
  }
  if (unclosed > 0) problems.push(`${unclosed} unclosed block${unclosed === 1 ? "" : "s"}`);
  if (paren > 0) problems.push("unclosed parenthesis");
  const eof = summarizeEofProblems(problems, lastLine);
  if (eof) warnings.push(eof);

  return {
    language: grammar.language,
    filePath,
    records,
    imports: grammar.imports(masked),
    warnings,
  };
}

// ── Import helpers ──────────────────────────────────────────────

/** Line number (1-based) of an offset into newline-joined text. */
export function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Reads the string literal whose opening quote sits at `quoteAt` in the
 * masked text; the contents come from the original text at the same offsets.
 */
export function literalAt(
  maskedText: string,
  originalText: string,
  quoteAt: number,
): { value: string; end: number } | undefined {
  const quote = maskedText[quoteAt];
  const close = maskedText.indexOf(quote, quoteAt + 1);
  if (close === -1) return undefined;
  return { value: originalText.slice(quoteAt + 1, close), end: close + 1 };
}
