import type {
  CodeSymbol,
  DependencyGraph,
  FileAnalysis,
  Lookup,
  SearchMode,
  SymbolDetail,
  SymbolFilter,
  SymbolIndexView,
  SymbolStatistics,
} from "./types.js";
import { DEFAULT_FUZZY_THRESHOLD, fuzzyScore } from "./fuzzy.js";

export interface SymbolIndexOptions {
  fuzzyThreshold?: number;
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Read-only lookup structure over the symbols of one session. Iteration order
 * is session order: files by path, then extraction order within a file.
 */
export class SymbolIndex implements SymbolIndexView {
  private readonly symbols: readonly CodeSymbol[];
  private readonly byId = new Map<string, CodeSymbol>();
  private readonly byFile = new Map<string, CodeSymbol[]>();
  private readonly children = new Map<string, CodeSymbol[]>();
  private readonly fuzzyThreshold: number;

  constructor(
    files: readonly FileAnalysis[],
    private readonly graph: DependencyGraph,
    options: SymbolIndexOptions = {},
  ) {
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
    for (const file of files) this.byFile.set(file.path, []);
    this.symbols = files.flatMap((file) => file.symbols);
    for (const symbol of this.symbols) {
      this.byId.set(symbol.id, symbol);
      this.byFile.get(symbol.filePath)?.push(symbol);
      if (symbol.parentId) {
        const siblings = this.children.get(symbol.parentId);
        if (siblings) siblings.push(symbol);
        else this.children.set(symbol.parentId, [symbol]);
      }
    }
  }

  get size(): number {
    return this.symbols.length;
  }

  all(): readonly CodeSymbol[] {
    return this.symbols;
  }

  get(id: string): CodeSymbol | undefined {
    return this.byId.get(id);
  }

  hasFile(path: string): boolean {
    return this.byFile.has(path);
  }

  /** A blank query matches nothing in every mode. */
  findByName(query: string, mode: SearchMode): CodeSymbol[] {
    if (query.trim() === "") return [];
    switch (mode) {
      case "exact":
        return this.symbols.filter((s) => s.name === query || s.qualifiedName === query);
      case "prefix": {
        const prefix = query.toLowerCase();
        return this.symbols.filter(
          (s) => s.name.toLowerCase().startsWith(prefix) || s.qualifiedName.toLowerCase().startsWith(prefix),
        );
      }
      case "fuzzy":
        return this.fuzzy(query);
    }
  }

  private fuzzy(query: string): CodeSymbol[] {
    const scored: { symbol: CodeSymbol; score: number }[] = [];
    for (const symbol of this.symbols) {
      const score = Math.max(fuzzyScore(query, symbol.name), fuzzyScore(query, symbol.qualifiedName));
      if (score >= this.fuzzyThreshold) scored.push({ symbol, score });
    }
    scored.sort(
      (a, b) =>
        b.score - a.score ||
        compareCodeUnits(a.symbol.qualifiedName, b.symbol.qualifiedName) ||
        compareCodeUnits(a.symbol.filePath, b.symbol.filePath),
    );
    return scored.map((entry) => entry.symbol);
  }

  filter(filter: SymbolFilter): CodeSymbol[] {
    return this.symbols.filter(
      (s) => (!filter.kind || s.kind === filter.kind) && (!filter.language || s.language === filter.language),
    );
  }

  symbolsInFile(path: string): CodeSymbol[] {
    return [...(this.byFile.get(path) ?? [])];
  }

  detail(id: string): Lookup<SymbolDetail> {
    const symbol = this.byId.get(id);
    if (!symbol) return { found: false, reason: "not-found", query: id };
    const dependentFiles = (this.graph.importers.get(symbol.filePath) ?? []).filter((f) => f !== symbol.filePath);
    return {
      found: true,
      value: {
        symbol,
        children: [...(this.children.get(id) ?? [])],
        dependents: dependentFiles.flatMap((f) => this.byFile.get(f) ?? []),
        dependentFiles: [...dependentFiles],
      },
    };
  }

  statistics(): SymbolStatistics {
    const stats: SymbolStatistics = { totalSymbols: this.symbols.length, byKind: {}, byLanguage: {}, byVisibility: {} };
    for (const s of this.symbols) {
      increment(stats.byKind, s.kind);
      increment(stats.byLanguage, s.language);
      increment(stats.byVisibility, s.visibility);
    }
    return stats;
  }
}
