// ── Languages and symbol vocabulary ─────────────────────────────

export type Language = "python" | "javascript" | "typescript" | "java" | "kotlin";

export const SUPPORTED_LANGUAGES: readonly Language[] = [
  "python",
  "javascript",
  "typescript",
  "java",
  "kotlin",
];

export type SymbolKind = "function" | "class" | "method" | "interface" | "enum" | "field";

export const SYMBOL_KINDS: readonly SymbolKind[] = [
  "function",
  "class",
  "method",
  "interface",
  "enum",
  "field",
];

/** Modifier tags shared by every language, in canonical output order. */
export const SHARED_MODIFIERS = [
  "exported",
  "default",
  "public",
  "protected",
  "private",
  "internal",
  "static",
  "abstract",
  "async",
  "final",
  "override",
  "readonly",
] as const;

export type SharedModifier = (typeof SHARED_MODIFIERS)[number];

export type Visibility = "public" | "protected" | "private" | "internal" | "package";

export interface LineRange {
  start: number;
  end: number;
}

// ── Canonical symbol model ──────────────────────────────────────

export interface CodeSymbol {
  id: string;
  kind: SymbolKind;
  name: string;
  qualifiedName: string;
  language: Language;
  filePath: string;
  signature: string;
  range: LineRange;
  modifiers: string[];
  visibility: Visibility;
  extends: string[];
  implements: string[];
  parentId?: string;
  docComment?: string;
}

export type WarningCode = "unsupported-language" | "parse-recoverable";

export interface ExtractionWarning {
  code: WarningCode;
  message: string;
  line?: number;
}

export interface ImportStatement {
  /** The statement as written, whitespace collapsed. */
  text: string;
  module: string;
  names: string[];
  line: number;
}

export interface FileAnalysis {
  path: string;
  language?: Language;
  /** Pre-order: a parent always precedes its children. */
  symbols: CodeSymbol[];
  imports: ImportStatement[];
  warnings: ExtractionWarning[];
}

// ── Raw extractor output (input of the normalizer) ──────────────

export type RawSymbolKind =
  | "function"
  | "method"
  | "constructor"
  | "class"
  | "interface"
  | "enum"
  | "record"
  | "annotation"
  | "object"
  | "type-alias"
  | "namespace"
  | "field";

export interface RawSymbol {
  kind: RawSymbolKind;
  name: string;
  /** Index of the enclosing record in the same extraction, if any. */
  parentIndex?: number;
  startLine: number;
  endLine: number;
  signature: string;
  /** Language-specific modifier vocabulary as written. */
  modifiers: string[];
  extends?: string[];
  implements?: string[];
  docComment?: string;
}

export interface RawExtraction {
  language: Language;
  filePath: string;
  records: RawSymbol[];
  imports: ImportStatement[];
  warnings: ExtractionWarning[];
}

export interface LanguageExtractor {
  readonly language: Language;
  readonly extensions: readonly string[];
  extract(source: string, filePath: string): RawExtraction;
}

// ── Dependency graph ────────────────────────────────────────────

export interface DependencyEdge {
  from: string;
  /** A session file path when resolved, else the module string as written. */
  to: string;
  resolved: boolean;
  line: number;
}

export interface DependencyGraph {
  edges: DependencyEdge[];
  /** Resolved targets per importing file. */
  adjacency: ReadonlyMap<string, readonly string[]>;
  /** Importing files per resolved target. */
  importers: ReadonlyMap<string, readonly string[]>;
}

// ── Session ─────────────────────────────────────────────────────

export interface AnalysisFilters {
  /** When non-empty, only files under one of these folders are analyzed. */
  includeFolders?: string[];
  excludeFolders?: string[];
  /** gitignore-style file name patterns. */
  excludeFiles?: string[];
}

export interface SourceFile {
  path: string;
  text: string;
  /** Set when the file could not be read; the text is then empty. */
  readError?: string;
}

export interface RejectedInput {
  path: string;
  reason: string;
}

export type SearchMode = "exact" | "prefix" | "fuzzy";

export interface SymbolFilter {
  kind?: SymbolKind;
  language?: Language;
}

export interface SymbolDetail {
  symbol: CodeSymbol;
  children: CodeSymbol[];
  dependents: CodeSymbol[];
  dependentFiles: string[];
}

export type Lookup<T> =
  | { found: true; value: T }
  | { found: false; reason: "not-found"; query: string };

export interface SymbolStatistics {
  totalSymbols: number;
  byKind: Partial<Record<SymbolKind, number>>;
  byLanguage: Partial<Record<Language, number>>;
  byVisibility: Partial<Record<Visibility, number>>;
}

export interface SymbolIndexView {
  readonly size: number;
  all(): readonly CodeSymbol[];
  get(id: string): CodeSymbol | undefined;
  hasFile(path: string): boolean;
  findByName(query: string, mode: SearchMode): CodeSymbol[];
  filter(filter: SymbolFilter): CodeSymbol[];
  symbolsInFile(path: string): CodeSymbol[];
  detail(id: string): Lookup<SymbolDetail>;
  statistics(): SymbolStatistics;
}

export interface AnalysisSession {
  root: string;
  files: readonly FileAnalysis[];
  index: SymbolIndexView;
  graph: DependencyGraph;
  rejected: readonly RejectedInput[];
}

export interface SessionSummary {
  root: string;
  filesAnalyzed: number;
  symbolCount: number;
  warningCount: number;
  rejectedCount: number;
  edgeCount: number;
  resolvedEdgeCount: number;
  languages: Language[];
}
