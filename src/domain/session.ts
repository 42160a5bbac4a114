import { isAbsolute, posix, relative, sep } from "node:path";
import type {
  AnalysisFilters,
  AnalysisSession,
  CodeSymbol,
  DependencyEdge,
  FileAnalysis,
  Language,
  RejectedInput,
  SessionSummary,
  SourceFile,
  SymbolStatistics,
} from "./types.js";
import { InvalidInputError } from "./errors.js";
import { detectLanguage } from "./languages.js";
import { extractFile } from "./extractors/index.js";
import { resolveDependencies } from "./dependency-resolver.js";
import { SymbolIndex } from "./symbol-index.js";
import { createPathFilter } from "./path-filter.js";
import { deepFreeze } from "./utils.js";

export interface SessionOptions {
  filters?: AnalysisFilters;
  fuzzyThreshold?: number;
}

/**
 * Converts a path to its session form: relative to the root, POSIX
 * separators. Returns undefined for paths that leave the root.
 */
export function toSessionPath(root: string, path: string): string | undefined {
  if (path.trim() === "") return undefined;
  const rel = isAbsolute(path) ? relative(root, path) : path;
  const normalized = posix.normalize(rel.split(sep).join("/").replace(/\\/g, "/"));
  if (normalized === "." || normalized === ".." || normalized.startsWith("../") || posix.isAbsolute(normalized)) {
    return undefined;
  }
  return normalized.replace(/^\.\//, "");
}

function analyzeSource(path: string, source: SourceFile): FileAnalysis {
  if (source.readError === undefined) return extractFile(source.text, path);
  return {
    path,
    language: detectLanguage(path),
    symbols: [],
    imports: [],
    warnings: [{ code: "parse-recoverable", message: `could not read file: ${source.readError}` }],
  };
}

/**
 * Analyzes one file on its own. Throws InvalidInputError when the path lies
 * outside the root; source problems are reported as warnings.
 */
export function analyzeFile(root: string, path: string, text: string): FileAnalysis {
  const sessionPath = toSessionPath(root, path);
  if (sessionPath === undefined) {
    throw new InvalidInputError(`Path is outside the analysis root ${root}: ${path}`, path);
  }
  return deepFreeze(extractFile(text, sessionPath));
}

/**
 * Builds an immutable analysis session. Inputs outside the root or given
 * twice are recorded as rejected; filtered-out files are skipped silently.
 */
export function buildSession(
  root: string,
  sources: Iterable<SourceFile>,
  options: SessionOptions = {},
): AnalysisSession {
  const accept = createPathFilter(options.filters);
  const rejected: RejectedInput[] = [];
  const files: FileAnalysis[] = [];
  const seen = new Set<string>();

  for (const source of sources) {
    const path = toSessionPath(root, source.path);
    if (path === undefined) {
      rejected.push({ path: source.path, reason: `outside the analysis root ${root}` });
      continue;
    }
    if (seen.has(path)) {
      rejected.push({ path: source.path, reason: "duplicate path" });
      continue;
    }
    seen.add(path);
    if (!accept(path)) continue;
    files.push(analyzeSource(path, source));
  }

  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const graph = resolveDependencies(files);
  deepFreeze(files);
  deepFreeze(graph.edges);
  const index = new SymbolIndex(files, graph, { fuzzyThreshold: options.fuzzyThreshold });

  return Object.freeze({
    root,
    files: Object.freeze(files),
    index,
    graph: Object.freeze(graph),
    rejected: deepFreeze(rejected),
  });
}

export function summarizeSession(session: AnalysisSession): SessionSummary {
  const languages = [...new Set(session.files.flatMap((f) => (f.language ? [f.language] : [])))].sort();
  return {
    root: session.root,
    filesAnalyzed: session.files.length,
    symbolCount: session.index.size,
    warningCount: session.files.reduce((n, f) => n + f.warnings.length, 0),
    rejectedCount: session.rejected.length,
    edgeCount: session.graph.edges.length,
    resolvedEdgeCount: session.graph.edges.filter((e) => e.resolved).length,
    languages,
  };
}

/** Plain JSON form of a session, for the CLI's structured output and MCP payloads. */
export interface SerializedSession {
  summary: SessionSummary;
  statistics: SymbolStatistics;
  files: {
    path: string;
    language?: Language;
    symbols: CodeSymbol[];
    imports: FileAnalysis["imports"];
    warnings: FileAnalysis["warnings"];
  }[];
  dependencies: DependencyEdge[];
  rejected: RejectedInput[];
}

export function serializeSession(session: AnalysisSession): SerializedSession {
  return {
    summary: summarizeSession(session),
    statistics: session.index.statistics(),
    files: session.files.map((f) => ({
      path: f.path,
      language: f.language,
      symbols: [...f.symbols],
      imports: [...f.imports],
      warnings: [...f.warnings],
    })),
    dependencies: [...session.graph.edges],
    rejected: [...session.rejected],
  };
}
