import { InvalidInputError } from "./errors.js";
import type { AnalysisSession, CodeSymbol, Language, SymbolKind } from "./types.js";

export type GraphFormat = "json" | "dot" | "graphml";

export const GRAPH_FORMATS: readonly GraphFormat[] = ["json", "dot", "graphml"];

/**
 * `file`: one node per analyzed file, joined by imports.
 * `module`: files grouped by directory, imports aggregated between directories.
 * `class`: classes, interfaces and enums with their inheritance and members.
 */
export type GraphType = "file" | "module" | "class";

export const GRAPH_TYPES: readonly GraphType[] = ["file", "module", "class"];

export interface GraphExportOptions {
  graphType?: GraphType;
  /** Include unresolved imports and unknown base types as external nodes. */
  includeExternal?: boolean;
  /** Keep only nodes within this many edges of a root (a node nothing points at). */
  maxDepth?: number;
  id?: string;
  label?: string;
}

export type GraphNodeType =
  | "file"
  | "module"
  | "class"
  | "interface"
  | "enum"
  | "method"
  | "external_module"
  | "external_type";

export type EdgeRelation = "imports" | "inherits" | "implements" | "contains";

export interface GraphNode {
  id: string;
  label: string;
  type: GraphNodeType;
  language?: Language;
  symbolCount?: number;
  /** Declaring file of a symbol node. */
  file?: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  relation: EdgeRelation;
  /** Source line of the import or declaration; absent on aggregated edges. */
  line?: number;
  external: boolean;
}

export interface CodeGraph {
  id: string;
  label: string;
  graphType: GraphType;
  nodes: GraphNode[];
  edges: GraphEdge[];
}

const NODE_COLORS: Record<GraphNodeType, string> = {
  file: "#e8e8e8",
  module: "#cce5ff",
  class: "#d4edda",
  interface: "#fff3cd",
  enum: "#e2d9f3",
  method: "#f8f9fa",
  external_module: "#ffcccc",
  external_type: "#ffcccc",
};

const TYPE_KINDS: ReadonlySet<SymbolKind> = new Set(["class", "interface", "enum"]);

function basename(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

function dirname(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash === -1 ? "." : path.slice(0, slash);
}

class GraphBuilder {
  readonly nodes: GraphNode[] = [];
  readonly edges: GraphEdge[] = [];
  private readonly nodeIds = new Set<string>();
  private readonly edgeKeys = new Set<string>();

  hasNode(id: string): boolean {
    return this.nodeIds.has(id);
  }

  addNode(node: GraphNode): void {
    if (this.nodeIds.has(node.id)) return;
    this.nodeIds.add(node.id);
    this.nodes.push(node);
  }

  addEdge(edge: GraphEdge): void {
    const key = `${edge.source}\u0000${edge.target}\u0000${edge.relation}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);
    this.edges.push(edge);
  }
}

function buildFileLevel(session: AnalysisSession, includeExternal: boolean, graph: GraphBuilder): void {
  for (const f of session.files) {
    graph.addNode({ id: f.path, label: basename(f.path), type: "file", language: f.language, symbolCount: f.symbols.length });
  }
  for (const edge of session.graph.edges) {
    if (!edge.resolved && !includeExternal) continue;
    if (!edge.resolved) graph.addNode({ id: edge.to, label: edge.to, type: "external_module" });
    graph.addEdge({ source: edge.from, target: edge.to, relation: "imports", line: edge.line, external: !edge.resolved });
  }
}

function buildModuleLevel(session: AnalysisSession, includeExternal: boolean, graph: GraphBuilder): void {
  const modules = new Map<string, { languages: Set<Language | undefined>; symbolCount: number }>();
  for (const f of session.files) {
    const dir = dirname(f.path);
    const entry = modules.get(dir) ?? { languages: new Set<Language | undefined>(), symbolCount: 0 };
    entry.languages.add(f.language);
    entry.symbolCount += f.symbols.length;
    modules.set(dir, entry);
  }
  for (const [dir, entry] of modules) {
    const node: GraphNode = { id: dir, label: basename(dir), type: "module", symbolCount: entry.symbolCount };
    // A directory mixing languages carries none.
    if (entry.languages.size === 1) node.language = [...entry.languages][0];
    graph.addNode(node);
  }
  for (const edge of session.graph.edges) {
    const source = dirname(edge.from);
    if (edge.resolved) {
      const target = dirname(edge.to);
      if (target !== source) graph.addEdge({ source, target, relation: "imports", external: false });
    } else if (includeExternal) {
      graph.addNode({ id: edge.to, label: edge.to, type: "external_module" });
      graph.addEdge({ source, target: edge.to, relation: "imports", external: true });
    }
  }
}

/** `pkg.Base<T>` names the type `Base`. */
function simpleTypeName(ref: string): string {
  const bare = ref.replace(/<.*$/s, "").replace(/\(.*$/s, "").trim();
  return bare.slice(bare.lastIndexOf(".") + 1);
}

function nodeTypeOf(kind: SymbolKind): GraphNodeType {
  switch (kind) {
    case "interface":
    case "enum":
    case "method":
      return kind;
    default:
      return "class";
  }
}

function buildClassLevel(session: AnalysisSession, includeExternal: boolean, graph: GraphBuilder): void {
  const symbols = session.files.flatMap((f) => f.symbols);
  const types = symbols.filter((s) => TYPE_KINDS.has(s.kind));
  const typeIds = new Set(types.map((s) => s.id));
  const isMember = (s: CodeSymbol): boolean =>
    s.kind === "method" && s.parentId !== undefined && typeIds.has(s.parentId);

  for (const s of symbols) {
    if (!typeIds.has(s.id) && !isMember(s)) continue;
    graph.addNode({ id: s.id, label: s.qualifiedName, type: nodeTypeOf(s.kind), language: s.language, file: s.filePath });
  }

  // A base declared in the same file wins over one of the same name elsewhere.
  const resolveType = (ref: string, from: CodeSymbol): string | undefined => {
    const name = simpleTypeName(ref);
    const candidates = types.filter((t) => t.name === name && t.id !== from.id);
    return (candidates.find((t) => t.filePath === from.filePath) ?? candidates[0])?.id;
  };

  const link = (from: CodeSymbol, refs: readonly string[], relation: "inherits" | "implements"): void => {
    for (const ref of refs) {
      const target = resolveType(ref, from);
      if (target) {
        graph.addEdge({ source: from.id, target, relation, line: from.range.start, external: false });
      } else if (includeExternal) {
        const name = simpleTypeName(ref);
        const id = `external:${name}`;
        graph.addNode({ id, label: name, type: "external_type" });
        graph.addEdge({ source: from.id, target: id, relation, line: from.range.start, external: true });
      }
    }
  };

  for (const s of symbols) {
    if (!graph.hasNode(s.id)) continue;
    if (s.parentId !== undefined && typeIds.has(s.parentId)) {
      graph.addEdge({ source: s.parentId, target: s.id, relation: "contains", line: s.range.start, external: false });
    }
    if (s.kind !== "method") {
      link(s, s.extends, "inherits");
      link(s, s.implements, "implements");
    }
  }
}

/**
 * Breadth-first from the roots, keeping nodes at most `maxDepth` edges away.
 * When every node has an incoming edge, every node starts a walk.
 */
function limitDepth(graph: GraphBuilder, maxDepth: number): { nodes: GraphNode[]; edges: GraphEdge[] } {
  const targets = new Set(graph.edges.map((e) => e.target));
  let level = graph.nodes.map((n) => n.id).filter((id) => !targets.has(id));
  if (level.length === 0) level = graph.nodes.map((n) => n.id);
  const reachable = new Set<string>();
  for (let depth = 0; depth <= maxDepth && level.length > 0; depth++) {
    for (const id of level) reachable.add(id);
    const next = new Set<string>();
    for (const edge of graph.edges) {
      if (level.includes(edge.source) && !reachable.has(edge.target)) next.add(edge.target);
    }
    level = [...next];
  }
  return {
    nodes: graph.nodes.filter((n) => reachable.has(n.id)),
    edges: graph.edges.filter((e) => reachable.has(e.source) && reachable.has(e.target)),
  };
}

export function buildGraph(session: AnalysisSession, options: GraphExportOptions = {}): CodeGraph {
  const graphType = options.graphType ?? "file";
  const { maxDepth } = options;
  if (maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
    throw new InvalidInputError(`maxDepth must be a non-negative integer, got ${maxDepth}`, String(maxDepth));
  }
  const includeExternal = options.includeExternal === true;
  const builder = new GraphBuilder();
  switch (graphType) {
    case "file":
      buildFileLevel(session, includeExternal, builder);
      break;
    case "module":
      buildModuleLevel(session, includeExternal, builder);
      break;
    case "class":
      buildClassLevel(session, includeExternal, builder);
      break;
  }
  const { nodes, edges } = maxDepth === undefined ? builder : limitDepth(builder, maxDepth);
  return {
    id: options.id ?? "dependencies",
    label: options.label ?? `Dependencies of ${session.root}`,
    graphType,
    nodes,
    edges,
  };
}

/** JSON Graph Format document. */
export function toJsonGraph(graph: CodeGraph): string {
  const nodes: Record<string, { label: string; metadata: Record<string, string | number> }> = {};
  for (const node of graph.nodes) {
    const metadata: Record<string, string | number> = { type: node.type };
    if (node.language) metadata.language = node.language;
    if (node.symbolCount !== undefined) metadata.symbol_count = node.symbolCount;
    if (node.file) metadata.file = node.file;
    nodes[node.id] = { label: node.label, metadata };
  }
  const jgf = {
    graph: {
      id: graph.id,
      type: "code-dependency-graph",
      label: graph.label,
      directed: true,
      metadata: { graph_type: graph.graphType, node_count: graph.nodes.length, edge_count: graph.edges.length },
      nodes,
      edges: graph.edges.map((e) => ({
        source: e.source,
        target: e.target,
        relation: e.relation,
        directed: true,
        metadata: e.line === undefined ? { is_external: e.external } : { line: e.line, is_external: e.external },
      })),
    },
  };
  return JSON.stringify(jgf, null, 2);
}

export function dotEscape(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

export function toDot(graph: CodeGraph): string {
  const lines = [
    `digraph "${dotEscape(graph.id)}" {`,
    "  rankdir=TB;",
    '  node [shape=box, style="rounded,filled", fontname="Helvetica"];',
    '  edge [fontname="Helvetica", fontsize=10];',
    "",
  ];
  for (const node of graph.nodes) {
    const label = `${dotEscape(node.label)}\\n(${node.type})`;
    lines.push(`  "${dotEscape(node.id)}" [label="${label}", fillcolor="${NODE_COLORS[node.type]}"];`);
  }
  lines.push("");
  for (const edge of graph.edges) {
    const style = edge.external ? ', style=dotted, color="#999999"' : "";
    lines.push(`  "${dotEscape(edge.source)}" -> "${dotEscape(edge.target)}" [label="${edge.relation}"${style}];`);
  }
  lines.push("}");
  return lines.join("\n");
}

export function xmlEscape(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function toGraphml(graph: CodeGraph): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns"',
    '         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"',
    '         xsi:schemaLocation="http://graphml.graphdrawing.org/xmlns',
    '         http://graphml.graphdrawing.org/xmlns/1.0/graphml.xsd">',
    '  <key id="label" for="node" attr.name="label" attr.type="string"/>',
    '  <key id="type" for="node" attr.name="type" attr.type="string"/>',
    '  <key id="language" for="node" attr.name="language" attr.type="string"/>',
    '  <key id="symbol_count" for="node" attr.name="symbol_count" attr.type="int"/>',
    '  <key id="file" for="node" attr.name="file" attr.type="string"/>',
    '  <key id="relation" for="edge" attr.name="relation" attr.type="string"/>',
    '  <key id="line" for="edge" attr.name="line" attr.type="int"/>',
    `  <graph id="${xmlEscape(graph.id)}" edgedefault="directed">`,
  ];
  for (const node of graph.nodes) {
    lines.push(`    <node id="${xmlEscape(node.id)}">`);
    lines.push(`      <data key="label">${xmlEscape(node.label)}</data>`);
    lines.push(`      <data key="type">${node.type}</data>`);
    if (node.language) lines.push(`      <data key="language">${node.language}</data>`);
    if (node.symbolCount !== undefined) lines.push(`      <data key="symbol_count">${node.symbolCount}</data>`);
    if (node.file) lines.push(`      <data key="file">${xmlEscape(node.file)}</data>`);
    lines.push("    </node>");
  }
  graph.edges.forEach((edge, i) => {
    lines.push(`    <edge id="e${i}" source="${xmlEscape(edge.source)}" target="${xmlEscape(edge.target)}">`);
    lines.push(`      <data key="relation">${edge.relation}</data>`);
    if (edge.line !== undefined) lines.push(`      <data key="line">${edge.line}</data>`);
    lines.push("    </edge>");
  });
  lines.push("  </graph>");
  lines.push("</graphml>");
  return lines.join("\n");
}

export function exportGraph(session: AnalysisSession, format: GraphFormat, options: GraphExportOptions = {}): string {
  const graph = buildGraph(session, options);
  switch (format) {
    case "json":
      return toJsonGraph(graph);
    case "dot":
      return toDot(graph);
    case "graphml":
      return toGraphml(graph);
  }
}
