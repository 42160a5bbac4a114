import { resolve } from "node:path";
import { z } from "zod";
import type { AppServices } from "../../composition-root.js";
import type { StoredSession } from "../../domain/ports.js";
import { InvalidInputError } from "../../domain/errors.js";
import { GRAPH_FORMATS, GRAPH_TYPES } from "../../domain/graph-export.js";
import { REPORT_FORMATS } from "../../domain/report.js";
import { SUPPORTED_LANGUAGES, SYMBOL_KINDS } from "../../domain/types.js";

// ── Tool definitions ────────────────────────────────────────────

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

const sessionId = { type: "string", description: "Session id returned by analyze_code" };

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "analyze_code",
    description:
      "Analyze a directory of Python, JavaScript, TypeScript, Java and Kotlin sources. Returns a session id and a summary.",
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "Absolute path to the directory to analyze" },
        include_folders: { type: "array", items: { type: "string" }, description: "Only analyze files under these folders" },
        exclude_folders: { type: "array", items: { type: "string" }, description: "Folders to skip" },
        exclude_files: { type: "array", items: { type: "string" }, description: "gitignore-style file patterns to skip" },
      },
      required: ["path"],
    },
  },
  {
    name: "search_symbols",
    description: "Search the symbols of an analysis session by name (exact, prefix or fuzzy).",
    inputSchema: {
      type: "object",
      properties: {
        session_id: sessionId,
        query: { type: "string", description: "Symbol name or fragment" },
        mode: { type: "string", enum: ["exact", "prefix", "fuzzy"], default: "fuzzy" },
        kind: { type: "string", enum: [...SYMBOL_KINDS] },
        language: { type: "string", enum: [...SUPPORTED_LANGUAGES] },
        file: { type: "string", description: "Restrict results to this file" },
        limit: { type: "number", description: "Maximum results to return", default: 20 },
      },
      required: ["session_id", "query"],
    },
  },
  {
    name: "get_symbol_detail",
    description: "Show a symbol with its members and the files that import its file.",
    inputSchema: {
      type: "object",
      properties: {
        session_id: sessionId,
        symbol: { type: "string", description: "Symbol id, name or qualified name" },
      },
      required: ["session_id", "symbol"],
    },
  },
  {
    name: "list_file_symbols",
    description: "List the symbols declared in one file, in source order.",
    inputSchema: {
      type: "object",
      properties: {
        session_id: sessionId,
        path: { type: "string", description: "File path relative to the analysis root" },
      },
      required: ["session_id", "path"],
    },
  },
  {
    name: "get_dependency_graph",
    description:
      "File, module or class graph as edges, or exported as JSON Graph Format, DOT or GraphML. Can list import cycles.",
    inputSchema: {
      type: "object",
      properties: {
        session_id: sessionId,
        format: { type: "string", enum: ["edges", ...GRAPH_FORMATS], default: "edges" },
        graph_type: {
          type: "string",
          enum: [...GRAPH_TYPES],
          description: "file: imports between files; module: imports between directories; class: inheritance and members",
          default: "file",
        },
        max_depth: { type: "integer", minimum: 0, description: "Keep nodes within this many edges of a root" },
        include_external: { type: "boolean", default: false },
        cycles: { type: "boolean", description: "Also return import cycles", default: false },
      },
      required: ["session_id"],
    },
  },
  {
    name: "get_analysis_report",
    description: "Markdown or JSON report: symbol statistics, public API, class hierarchy and dependencies.",
    inputSchema: {
      type: "object",
      properties: {
        session_id: sessionId,
        format: { type: "string", enum: [...REPORT_FORMATS], default: "markdown" },
        include_mermaid: { type: "boolean", default: true },
      },
      required: ["session_id"],
    },
  },
  {
    name: "list_sessions",
    description: "List the analysis sessions held by this server.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "drop_session",
    description: "Discard an analysis session.",
    inputSchema: {
      type: "object",
      properties: { session_id: sessionId },
      required: ["session_id"],
    },
  },
];

// ── Argument schemas ────────────────────────────────────────────

const SessionArgs = z.object({ session_id: z.string().min(1) });

const AnalyzeArgs = z.object({
  path: z.string().min(1),
  include_folders: z.array(z.string()).optional(),
  exclude_folders: z.array(z.string()).optional(),
  exclude_files: z.array(z.string()).optional(),
});

const SearchArgs = SessionArgs.extend({
  query: z.string().min(1),
  mode: z.enum(["exact", "prefix", "fuzzy"]).default("fuzzy"),
  kind: z.enum(["function", "class", "method", "interface", "enum", "field"]).optional(),
  language: z.enum(["python", "javascript", "typescript", "java", "kotlin"]).optional(),
  file: z.string().optional(),
  limit: z.number().int().positive().optional(),
});

const DetailArgs = SessionArgs.extend({ symbol: z.string().min(1) });

const FileArgs = SessionArgs.extend({ path: z.string().min(1) });

const GraphArgs = SessionArgs.extend({
  format: z.enum(["edges", "json", "dot", "graphml"]).default("edges"),
  graph_type: z.enum(["file", "module", "class"]).default("file"),
  max_depth: z.number().int().min(0).optional(),
  include_external: z.boolean().default(false),
  cycles: z.boolean().default(false),
});

const ReportArgs = SessionArgs.extend({
  format: z.enum(["markdown", "json"]).default("markdown"),
  include_mermaid: z.boolean().default(true),
});

function parseArgs<T extends z.ZodTypeAny>(schema: T, tool: string, args: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
    throw new InvalidInputError(`Invalid arguments for ${tool}: ${issues}`);
  }
  return parsed.data;
}

// ── Tool handler factory ────────────────────────────────────────

export function createToolHandler(services: AppServices) {
  const { analyzeCode, queryCode, sessions } = services;

  function requireSession(id: string): StoredSession {
    const stored = sessions.get(id);
    if (!stored) throw new InvalidInputError(`Unknown session: ${id}`, id);
    return stored;
  }

  return async function handleToolCall(name: string, args: Record<string, unknown>): Promise<unknown> {
    switch (name) {
      case "analyze_code": {
        const a = parseArgs(AnalyzeArgs, name, args);
        const session = await analyzeCode.analyzeDirectory(resolve(a.path), {
          includeFolders: a.include_folders,
          excludeFolders: a.exclude_folders,
          excludeFiles: a.exclude_files,
        });
        const stored = sessions.create(session);
        return { session_id: stored.id, summary: queryCode.summary(session), rejected: session.rejected };
      }

      case "search_symbols": {
        const a = parseArgs(SearchArgs, name, args);
        const { session } = requireSession(a.session_id);
        return queryCode.search(session, a.query, {
          mode: a.mode,
          kind: a.kind,
          language: a.language,
          file: a.file,
          limit: a.limit,
        });
      }

      case "get_symbol_detail": {
        const a = parseArgs(DetailArgs, name, args);
        return queryCode.detail(requireSession(a.session_id).session, a.symbol);
      }

      case "list_file_symbols": {
        const a = parseArgs(FileArgs, name, args);
        return queryCode.symbolsInFile(requireSession(a.session_id).session, a.path);
      }

      case "get_dependency_graph": {
        const a = parseArgs(GraphArgs, name, args);
        const { session } = requireSession(a.session_id);
        const options = { graphType: a.graph_type, maxDepth: a.max_depth, includeExternal: a.include_external };
        // Plain file edges keep their compact form; other graphs come back with their nodes.
        const graph =
          a.format !== "edges"
            ? queryCode.exportGraph(session, a.format, options)
            : a.graph_type === "file" && a.max_depth === undefined
              ? queryCode.dependencyGraph(session, { includeExternal: a.include_external })
              : queryCode.graph(session, options);
        return a.cycles ? { graph, cycles: queryCode.cycles(session) } : { graph };
      }

      case "get_analysis_report": {
        const a = parseArgs(ReportArgs, name, args);
        const { session } = requireSession(a.session_id);
        return { report: queryCode.report(session, a.format, { includeMermaid: a.include_mermaid }) };
      }

      case "list_sessions": {
        return sessions.getAll().map((s) => ({
          session_id: s.id,
          created_at: s.createdAt,
          summary: queryCode.summary(s.session),
        }));
      }

      case "drop_session": {
        const a = parseArgs(SessionArgs, name, args);
        if (!sessions.delete(a.session_id)) throw new InvalidInputError(`Unknown session: ${a.session_id}`, a.session_id);
        return { status: "dropped", session_id: a.session_id };
      }

      default:
        throw new InvalidInputError(`Unknown tool: ${name}`, name);
    }
  };
}
