#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { resolve } from "node:path";
import { loadConfig } from "../../config.js";
import { createAppServices } from "../../composition-root.js";
import { serializeSession } from "../../domain/session.js";
import { GRAPH_FORMATS, GRAPH_TYPES, type GraphFormat, type GraphType } from "../../domain/graph-export.js";
import { REPORT_FORMATS, type ReportFormat } from "../../domain/report.js";
import { SUPPORTED_LANGUAGES, SYMBOL_KINDS } from "../../domain/types.js";
import type { AnalysisFilters, AnalysisSession, Language, SearchMode, SymbolKind } from "../../domain/types.js";
import { startMCPServer } from "../mcp/server.js";
import {
  formatCycle,
  formatDetail,
  formatEdge,
  formatGraphEdge,
  formatStructured,
  formatSummary,
  formatSymbol,
  formatWarnings,
  OUTPUT_FORMATS,
  type OutputFormat,
} from "./format.js";

const config = loadConfig();
const services = createAppServices(config);
const { analyzeCode, queryCode } = services;

interface FilterOptions {
  includeFolder: string[];
  excludeFolder: string[];
  excludeFile: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function outputOption(): Option {
  return new Option("-o, --output <format>", "Output format").choices(OUTPUT_FORMATS).default("text");
}

function jsonOption(): Option {
  return new Option("--json", "Shorthand for --output json").implies({ output: "json" });
}

function withFilters(command: Command): Command {
  return command
    .option("--include-folder <folder>", "Only analyze files under this folder (repeatable)", collect, [])
    .option("--exclude-folder <folder>", "Skip files under this folder (repeatable)", collect, [])
    .option("--exclude-file <pattern>", "Skip files matching this gitignore-style pattern (repeatable)", collect, []);
}

function toFilters(opts: FilterOptions): AnalysisFilters {
  return {
    includeFolders: opts.includeFolder,
    excludeFolders: opts.excludeFolder,
    excludeFiles: opts.excludeFile,
  };
}

function analyzeRoot(path: string, opts: FilterOptions): Promise<AnalysisSession> {
  return analyzeCode.analyzeDirectory(resolve(path), toFilters(opts));
}

function fail(err: unknown): void {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}

const kindOption = () => new Option("-t, --type <kind>", "Symbol kind").choices(SYMBOL_KINDS);
const languageOption = () => new Option("--lang <language>", "Source language").choices(SUPPORTED_LANGUAGES);

const program = new Command();

program
  .name("codescope")
  .description("Extract symbols and dependencies from Python, JavaScript, TypeScript, Java and Kotlin sources")
  .version("0.1.0");

// ── analyze ─────────────────────────────────────────────────────

withFilters(
  program
    .command("analyze")
    .description("Analyze a directory and print a summary")
    .argument("[path]", "Directory to analyze", ".")
    .addOption(kindOption())
    .addOption(languageOption())
    .addOption(outputOption())
    .addOption(jsonOption())
    .option("--show-deps", "List resolved imports between files"),
).action(
  async (
    path: string,
    opts: FilterOptions & { type?: SymbolKind; lang?: Language; output: OutputFormat; showDeps?: boolean },
  ) => {
    try {
      const session = await analyzeRoot(path, opts);
      if (opts.output !== "text") {
        console.log(formatStructured(serializeSession(session), opts.output));
        return;
      }

      for (const line of formatSummary(queryCode.summary(session))) console.log(line);
      const warnings = formatWarnings(session.files);
      if (warnings.length > 0) {
        console.log("\nWarnings:");
        for (const line of warnings) console.log(line);
      }

      if (opts.type || opts.lang) {
        const symbols = session.index.filter({ kind: opts.type, language: opts.lang });
        console.log(`\nSymbols (${symbols.length}):`);
        for (const symbol of symbols) console.log(formatSymbol(symbol));
      }

      if (opts.showDeps) {
        const edges = queryCode.dependencyGraph(session);
        console.log(`\nDependencies (${edges.length}):`);
        for (const edge of edges) console.log(formatEdge(edge));
      }
    } catch (err) {
      fail(err);
    }
  },
);

// ── search ──────────────────────────────────────────────────────

withFilters(
  program
    .command("search")
    .description("Search symbols by name")
    .argument("<query>", "Symbol name or fragment")
    .argument("[path]", "Directory to analyze", ".")
    .addOption(new Option("-m, --mode <mode>", "Match mode").choices(["exact", "prefix", "fuzzy"]).default("fuzzy"))
    .addOption(kindOption())
    .addOption(languageOption())
    .option("-l, --limit <n>", "Max results", positiveInt, config.searchLimit)
    .addOption(outputOption())
    .addOption(jsonOption()),
).action(
  async (
    query: string,
    path: string,
    opts: FilterOptions & { mode: SearchMode; type?: SymbolKind; lang?: Language; limit: number; output: OutputFormat },
  ) => {
    try {
      const session = await analyzeRoot(path, opts);
      const results = queryCode.search(session, query, {
        mode: opts.mode,
        kind: opts.type,
        language: opts.lang,
        limit: opts.limit,
      });

      if (opts.output !== "text") {
        console.log(formatStructured(results, opts.output));
      } else if (results.length === 0) {
        console.log(`No symbols found for "${query}".`);
      } else {
        console.log(`Results for "${query}":`);
        for (const symbol of results) console.log(formatSymbol(symbol));
      }
    } catch (err) {
      fail(err);
    }
  },
);

// ── info ────────────────────────────────────────────────────────

withFilters(
  program
    .command("info")
    .description("Show details of a symbol")
    .argument("<symbol>", "Symbol id, name or qualified name")
    .argument("[path]", "Directory to analyze", ".")
    .addOption(outputOption())
    .addOption(jsonOption()),
).action(async (symbolRef: string, path: string, opts: FilterOptions & { output: OutputFormat }) => {
  try {
    const session = await analyzeRoot(path, opts);
    const result = queryCode.detail(session, symbolRef);
    if (!result.found) {
      console.log(`Symbol not found: ${result.query}`);
      process.exitCode = 1;
      return;
    }
    if (opts.output !== "text") {
      console.log(formatStructured(result.value, opts.output));
      return;
    }
    for (const line of formatDetail(result.value)) console.log(line);
  } catch (err) {
    fail(err);
  }
});

// ── symbols ─────────────────────────────────────────────────────

withFilters(
  program
    .command("symbols")
    .description("List the symbols declared in one file")
    .argument("<file>", "File path, relative to the analyzed directory")
    .argument("[path]", "Directory to analyze", ".")
    .addOption(outputOption())
    .addOption(jsonOption()),
).action(async (file: string, path: string, opts: FilterOptions & { output: OutputFormat }) => {
  try {
    const session = await analyzeRoot(path, opts);
    const result = queryCode.symbolsInFile(session, resolve(path, file));
    if (!result.found) {
      console.log(`File not analyzed: ${file}`);
      process.exitCode = 1;
      return;
    }
    if (opts.output !== "text") {
      console.log(formatStructured(result.value, opts.output));
    } else if (result.value.length === 0) {
      console.log(`No symbols in ${file}.`);
    } else {
      for (const symbol of result.value) console.log(formatSymbol(symbol));
    }
  } catch (err) {
    fail(err);
  }
});

// ── deps ────────────────────────────────────────────────────────

withFilters(
  program
    .command("deps")
    .description("Print the file, module or class dependency graph")
    .argument("[path]", "Directory to analyze", ".")
    .addOption(new Option("-f, --format <format>", "Output format").choices(GRAPH_FORMATS))
    .addOption(new Option("-g, --graph-type <type>", "Graph granularity").choices(GRAPH_TYPES).default("file"))
    .option("-d, --depth <n>", "Keep nodes within this many edges of a root", nonNegativeInt)
    .option("--external", "Include unresolved imports and unknown base types as external nodes")
    .option("--cycles", "Report import cycles between files"),
).action(
  async (
    path: string,
    opts: FilterOptions & {
      format?: GraphFormat;
      graphType: GraphType;
      depth?: number;
      external?: boolean;
      cycles?: boolean;
    },
  ) => {
    try {
      const session = await analyzeRoot(path, opts);
      const includeExternal = opts.external === true;
      const graphOptions = { graphType: opts.graphType, maxDepth: opts.depth, includeExternal };

      if (opts.cycles) {
        const cycles = queryCode.cycles(session);
        if (cycles.length === 0) {
          console.log("No import cycles found.");
        } else {
          console.log(`Import cycles (${cycles.length}):`);
          for (const cycle of cycles) console.log(formatCycle(cycle));
        }
        return;
      }

      if (opts.format) {
        console.log(queryCode.exportGraph(session, opts.format, graphOptions));
        return;
      }

      if (opts.graphType === "file" && opts.depth === undefined) {
        const edges = queryCode.dependencyGraph(session, { includeExternal });
        if (edges.length === 0) {
          console.log("No dependencies found.");
        } else {
          for (const edge of edges) console.log(formatEdge(edge));
        }
        return;
      }

      const graph = queryCode.graph(session, graphOptions);
      if (graph.edges.length === 0) {
        console.log("No dependencies found.");
      } else {
        for (const edge of graph.edges) console.log(formatGraphEdge(edge));
      }
    } catch (err) {
      fail(err);
    }
  },
);

// ── report ──────────────────────────────────────────────────────

withFilters(
  program
    .command("report")
    .description("Generate an analysis report")
    .argument("[path]", "Directory to analyze", ".")
    .addOption(new Option("-f, --format <format>", "Report format").choices(REPORT_FORMATS).default("markdown"))
    .option("--no-mermaid", "Leave out the class hierarchy diagram"),
).action(async (path: string, opts: FilterOptions & { format: ReportFormat; mermaid: boolean }) => {
  try {
    const session = await analyzeRoot(path, opts);
    console.log(queryCode.report(session, opts.format, { includeMermaid: opts.mermaid }));
  } catch (err) {
    fail(err);
  }
});

// ── mcp ─────────────────────────────────────────────────────────

program
  .command("mcp")
  .description("Start the MCP server (stdio transport)")
  .action(async () => {
    try {
      await startMCPServer(services);
    } catch (err) {
      console.error("MCP server error:", err);
      process.exitCode = 1;
    }
  });

// ── Run ─────────────────────────────────────────────────────────

await program.parseAsync();
