import type {
  AnalysisFilters,
  AnalysisSession,
  CodeSymbol,
  DependencyEdge,
  FileAnalysis,
  Language,
  Lookup,
  SearchMode,
  SessionSummary,
  SourceFile,
  SymbolDetail,
  SymbolKind,
} from "./types.js";
import type { CodeGraph, GraphExportOptions, GraphFormat } from "./graph-export.js";
import type { ReportFormat, ReportOptions } from "./report.js";

// ── Outbound ports ──────────────────────────────────────────────

export interface GlobOptions {
  cwd: string;
  absolute?: boolean;
  ignore?: string[];
  dot?: boolean;
}

export interface FileSystem {
  readFile(filePath: string): Promise<string>;
  exists(filePath: string): boolean;
  glob(patterns: string[], options: GlobOptions): Promise<string[]>;
}

export interface Logger {
  info(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

export interface StoredSession {
  id: string;
  createdAt: string;
  session: AnalysisSession;
}

export interface SessionStore {
  create(session: AnalysisSession): StoredSession;
  get(id: string): StoredSession | undefined;
  getAll(): StoredSession[];
  delete(id: string): boolean;
}

// ── Inbound ports (use cases) ───────────────────────────────────

export interface AnalyzeCode {
  analyzeDirectory(root: string, filters?: AnalysisFilters): Promise<AnalysisSession>;
  analyzeSources(root: string, sources: Iterable<SourceFile>, filters?: AnalysisFilters): AnalysisSession;
  analyzeSingleFile(root: string, filePath: string): Promise<FileAnalysis>;
}

export interface SearchOptions {
  mode?: SearchMode;
  kind?: SymbolKind;
  language?: Language;
  /** Restrict results to one session file. */
  file?: string;
  limit?: number;
}

export interface DependencyGraphOptions {
  includeExternal?: boolean;
}

export interface QueryCode {
  search(session: AnalysisSession, query: string, options?: SearchOptions): CodeSymbol[];
  detail(session: AnalysisSession, symbolRef: string): Lookup<SymbolDetail>;
  symbolsInFile(session: AnalysisSession, path: string): Lookup<CodeSymbol[]>;
  dependencyGraph(session: AnalysisSession, options?: DependencyGraphOptions): DependencyEdge[];
  /** File, module or class graph as nodes and edges. */
  graph(session: AnalysisSession, options?: GraphExportOptions): CodeGraph;
  cycles(session: AnalysisSession): string[][];
  exportGraph(session: AnalysisSession, format: GraphFormat, options?: GraphExportOptions): string;
  report(session: AnalysisSession, format: ReportFormat, options?: ReportOptions): string;
  summary(session: AnalysisSession): SessionSummary;
}
