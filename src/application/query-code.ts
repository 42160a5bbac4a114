import type { DependencyGraphOptions, QueryCode, SearchOptions } from "../domain/ports.js";
import type { AnalysisSession, CodeSymbol, DependencyEdge, Lookup, SessionSummary, SymbolDetail } from "../domain/types.js";
import { findCycles } from "../domain/dependency-resolver.js";
import { buildGraph, exportGraph, type CodeGraph, type GraphExportOptions, type GraphFormat } from "../domain/graph-export.js";
import { generateReport, type ReportFormat, type ReportOptions } from "../domain/report.js";
import { summarizeSession, toSessionPath } from "../domain/session.js";

export interface QueryCodeOptions {
  searchLimit: number;
}

export class QueryCodeService implements QueryCode {
  constructor(private readonly options: QueryCodeOptions) {}

  search(session: AnalysisSession, query: string, options: SearchOptions = {}): CodeSymbol[] {
    const limit = options.limit ?? this.options.searchLimit;
    const file = options.file === undefined ? undefined : (toSessionPath(session.root, options.file) ?? options.file);
    return session.index
      .findByName(query, options.mode ?? "fuzzy")
      .filter(
        (s) =>
          (!options.kind || s.kind === options.kind) &&
          (!options.language || s.language === options.language) &&
          (!file || s.filePath === file),
      )
      .slice(0, limit);
  }

  /** Looks a symbol up by id, then by exact name or qualified name. */
  detail(session: AnalysisSession, symbolRef: string): Lookup<SymbolDetail> {
    const byId = session.index.detail(symbolRef);
    if (byId.found) return byId;
    const [match] = session.index.findByName(symbolRef, "exact");
    return match ? session.index.detail(match.id) : byId;
  }

  symbolsInFile(session: AnalysisSession, path: string): Lookup<CodeSymbol[]> {
    const sessionPath = toSessionPath(session.root, path) ?? path;
    if (!session.index.hasFile(sessionPath)) return { found: false, reason: "not-found", query: path };
    return { found: true, value: session.index.symbolsInFile(sessionPath) };
  }

  dependencyGraph(session: AnalysisSession, options: DependencyGraphOptions = {}): DependencyEdge[] {
    return session.graph.edges.filter((e) => e.resolved || options.includeExternal === true);
  }

  graph(session: AnalysisSession, options: GraphExportOptions = {}): CodeGraph {
    return buildGraph(session, options);
  }

  cycles(session: AnalysisSession): string[][] {
    return findCycles(session.graph);
  }

  exportGraph(session: AnalysisSession, format: GraphFormat, options: GraphExportOptions = {}): string {
    return exportGraph(session, format, options);
  }

  report(session: AnalysisSession, format: ReportFormat, options: ReportOptions = {}): string {
    return generateReport(session, format, options);
  }

  summary(session: AnalysisSession): SessionSummary {
    return summarizeSession(session);
  }
}
