import type { AnalysisSession, CodeSymbol, SessionSummary, SymbolStatistics } from "./types.js";
import { summarizeSession } from "./session.js";

export type ReportFormat = "markdown" | "json";

export const REPORT_FORMATS: readonly ReportFormat[] = ["markdown", "json"];

export interface ReportOptions {
  includeMermaid?: boolean;
}

const LIST_LIMIT = 15;
const MERMAID_METHOD_LIMIT = 5;
const SIGNATURE_LIMIT = 80;

export interface ApiEntry {
  name: string;
  signature: string;
  file: string;
}

export interface HierarchyEntry {
  name: string;
  kind: CodeSymbol["kind"];
  extends: string[];
  implements: string[];
}

export interface ReportData {
  summary: SessionSummary;
  statistics: SymbolStatistics;
  publicApi: { classes: ApiEntry[]; functions: ApiEntry[]; interfaces: string[]; enums: string[] };
  hierarchy: HierarchyEntry[];
  dependencies: { internal: number; external: { module: string; files: number }[] };
}

function byCountThenKey(a: [string, number], b: [string, number]): number {
  return b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0);
}

function byName(a: CodeSymbol, b: CodeSymbol): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0;
}

function lastSegment(name: string): string {
  return name.slice(name.lastIndexOf(".") + 1);
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit - 3)}...` : text;
}

function externalModules(session: AnalysisSession): { module: string; files: number }[] {
  const importers = new Map<string, Set<string>>();
  for (const edge of session.graph.edges) {
    if (edge.resolved) continue;
    const files = importers.get(edge.to) ?? new Set<string>();
    files.add(edge.from);
    importers.set(edge.to, files);
  }
  return [...importers.entries()]
    .map(([module, files]): [string, number] => [module, files.size])
    .sort(byCountThenKey)
    .map(([module, files]) => ({ module, files }));
}

export function buildReportData(session: AnalysisSession): ReportData {
  const symbols = session.index.all();
  const publicOf = (kind: CodeSymbol["kind"]) =>
    symbols.filter((s) => s.kind === kind && s.visibility === "public").sort(byName);
  const toEntry = (s: CodeSymbol): ApiEntry => ({ name: s.name, signature: s.signature, file: s.filePath });

  return {
    summary: summarizeSession(session),
    statistics: session.index.statistics(),
    publicApi: {
      classes: publicOf("class").map(toEntry),
      functions: publicOf("function").map(toEntry),
      interfaces: symbols.filter((s) => s.kind === "interface").sort(byName).map((s) => s.name),
      enums: symbols.filter((s) => s.kind === "enum").sort(byName).map((s) => s.name),
    },
    hierarchy: symbols
      .filter((s) => s.kind === "class" || s.kind === "interface" || s.kind === "enum")
      .map((s) => ({ name: s.name, kind: s.kind, extends: [...s.extends], implements: [...s.implements] })),
    dependencies: {
      internal: session.graph.edges.filter((e) => e.resolved).length,
      external: externalModules(session),
    },
  };
}

function statisticsSection(stats: SymbolStatistics): string[] {
  const lines = ["### Symbol Statistics", "", `**Total symbols:** ${stats.totalSymbols}`, ""];
  lines.push("| Kind | Count |", "|------|-------|");
  const kinds = Object.entries(stats.byKind).flatMap(([k, v]): [string, number][] => (v ? [[k, v]] : []));
  for (const [kind, count] of kinds.sort(byCountThenKey)) lines.push(`| ${kind} | ${count} |`);
  lines.push("");

  const languages = Object.entries(stats.byLanguage).flatMap(([k, v]): [string, number][] => (v ? [[k, v]] : []));
  if (languages.length > 1) {
    lines.push("**By language:**");
    for (const [language, count] of languages.sort(byCountThenKey)) lines.push(`- ${language}: ${count}`);
    lines.push("");
  }

  const publicCount = stats.byVisibility.public ?? 0;
  const hidden = (stats.byVisibility.private ?? 0) + (stats.byVisibility.protected ?? 0);
  if (hidden > 0) {
    lines.push(`**Visibility:** ${publicCount} public, ${hidden} private/protected`, "");
  }
  return lines;
}

/** Mermaid class diagram of the classes, interfaces and enums with their bases. */
export function hierarchyDiagram(symbols: readonly CodeSymbol[]): string[] | undefined {
  const types = symbols.filter((s) => s.kind === "class" || s.kind === "interface" || s.kind === "enum");
  if (types.length === 0) return undefined;

  const body: string[] = [];
  const relationships: string[] = [];
  for (const type of types) {
    if (type.kind === "interface" || type.kind === "enum") {
      body.push(`    class ${type.name} {`, `        <<${type.kind === "enum" ? "enumeration" : "interface"}>>`, "    }");
    } else {
      const methods = symbols.filter((s) => s.parentId === type.id && s.kind === "method" && s.visibility === "public");
      if (methods.length > 0) {
        body.push(`    class ${type.name} {`);
        for (const method of methods.slice(0, MERMAID_METHOD_LIMIT)) body.push(`        +${method.name}()`);
        if (methods.length > MERMAID_METHOD_LIMIT) body.push(`        +... ${methods.length - MERMAID_METHOD_LIMIT} more`);
        body.push("    }");
      }
    }
    for (const base of type.extends) relationships.push(`    ${lastSegment(base)} <|-- ${type.name}`);
    for (const iface of type.implements) relationships.push(`    ${lastSegment(iface)} <|.. ${type.name}`);
  }

  if (relationships.length === 0 && types.length < 2) return undefined;
  return ["### Class Hierarchy", "", "```mermaid", "classDiagram", ...body, ...relationships, "```", ""];
}

function listSection(title: string, items: string[], noun: string): string[] {
  if (items.length === 0) return [];
  const lines = [`**${title}:**`, "", ...items.slice(0, LIST_LIMIT)];
  if (items.length > LIST_LIMIT) lines.push(`- ... and ${items.length - LIST_LIMIT} more ${noun}`);
  lines.push("");
  return lines;
}

function apiSection(data: ReportData, symbols: readonly CodeSymbol[]): string[] {
  const docs = new Map(symbols.filter((s) => s.kind === "class").map((s) => [`${s.filePath}\u0000${s.name}`, s.docComment]));
  const classes = data.publicApi.classes.map((c) => {
    const doc = docs.get(`${c.file}\u0000${c.name}`);
    const preview = doc ? ` - ${truncate(doc.replace(/\s+/g, " "), 60)}` : "";
    return `- \`${c.signature || `class ${c.name}`}\`${preview}`;
  });
  const functions = data.publicApi.functions.map((f) => `- \`${truncate(f.signature || f.name, SIGNATURE_LIMIT)}\``);
  return [
    "### Public API",
    "",
    ...listSection("Classes", classes, "classes"),
    ...listSection("Functions", functions, "functions"),
    ...listSection("Interfaces", data.publicApi.interfaces.map((n) => `- \`${n}\``), "interfaces"),
    ...listSection("Enums", data.publicApi.enums.map((n) => `- \`${n}\``), "enums"),
  ];
}

function dependencySection(data: ReportData): string[] {
  const { internal, external } = data.dependencies;
  if (internal === 0 && external.length === 0) return [];
  const lines = ["### Dependencies", "", `**Internal imports:** ${internal}`, ""];
  if (external.length > 0) {
    lines.push("**External imports:**", "");
    for (const { module, files } of external.slice(0, LIST_LIMIT)) {
      lines.push(`- \`${module}\`${files > 1 ? ` (${files} files)` : ""}`);
    }
    if (external.length > LIST_LIMIT) lines.push(`- ... and ${external.length - LIST_LIMIT} more`);
    lines.push("");
  }
  return lines;
}

export function generateMarkdownReport(session: AnalysisSession, options: ReportOptions = {}): string {
  const data = buildReportData(session);
  const symbols = session.index.all();
  const sections = ["## Code Analysis Summary", "", ...statisticsSection(data.statistics)];
  if (options.includeMermaid !== false) sections.push(...(hierarchyDiagram(symbols) ?? []));
  sections.push(...apiSection(data, symbols), ...dependencySection(data));
  return sections.join("\n");
}

export function generateReport(session: AnalysisSession, format: ReportFormat, options: ReportOptions = {}): string {
  return format === "json"
    ? JSON.stringify(buildReportData(session), null, 2)
    : generateMarkdownReport(session, options);
}
