// Public API exports

// ── Domain types ────────────────────────────────────────────────
export type {
  Language,
  SymbolKind,
  Visibility,
  LineRange,
  CodeSymbol,
  WarningCode,
  ExtractionWarning,
  ImportStatement,
  FileAnalysis,
  RawSymbolKind,
  RawSymbol,
  RawExtraction,
  LanguageExtractor,
  DependencyEdge,
  DependencyGraph,
  AnalysisFilters,
  SourceFile,
  RejectedInput,
  SearchMode,
  SymbolFilter,
  SymbolDetail,
  Lookup,
  SymbolStatistics,
  SymbolIndexView,
  AnalysisSession,
  SessionSummary,
} from "./domain/types.js";
export { SUPPORTED_LANGUAGES, SYMBOL_KINDS, SHARED_MODIFIERS } from "./domain/types.js";

// ── Domain ports ────────────────────────────────────────────────
export type {
  FileSystem,
  GlobOptions,
  Logger,
  StoredSession,
  SessionStore,
  AnalyzeCode,
  QueryCode,
  SearchOptions,
  DependencyGraphOptions,
} from "./domain/ports.js";

// ── Domain ──────────────────────────────────────────────────────
export { InvalidInputError, isInvalidInputError } from "./domain/errors.js";
export { detectLanguage, supportedExtensions } from "./domain/languages.js";
export { EXTRACTORS, extractFile } from "./domain/extractors/index.js";
export { normalizeExtraction } from "./domain/normalizer.js";
export { resolveDependencies, findCycles } from "./domain/dependency-resolver.js";
export { SymbolIndex } from "./domain/symbol-index.js";
export { fuzzyScore } from "./domain/fuzzy.js";
export { analyzeFile, buildSession, summarizeSession, serializeSession, toSessionPath } from "./domain/session.js";
export type { SessionOptions, SerializedSession } from "./domain/session.js";
export { buildGraph, exportGraph, GRAPH_FORMATS, GRAPH_TYPES } from "./domain/graph-export.js";
export type {
  CodeGraph,
  EdgeRelation,
  GraphEdge,
  GraphExportOptions,
  GraphFormat,
  GraphNode,
  GraphType,
} from "./domain/graph-export.js";
export { generateReport, buildReportData, REPORT_FORMATS } from "./domain/report.js";
export type { ReportFormat, ReportOptions, ReportData } from "./domain/report.js";

// ── Application ─────────────────────────────────────────────────
export { AnalyzeCodeService } from "./application/analyze-code.js";
export { QueryCodeService } from "./application/query-code.js";
export { InMemorySessionStore } from "./application/session-store.js";

// ── Infrastructure ──────────────────────────────────────────────
export { NodeFileSystem } from "./infrastructure/node-filesystem.js";
export { ConsoleLogger } from "./infrastructure/console-logger.js";

// ── Composition ─────────────────────────────────────────────────
export { createAppServices } from "./composition-root.js";
export type { AppServices } from "./composition-root.js";
export { loadConfig, parseConfig } from "./config.js";
export type { AppConfig } from "./config.js";
