import { stringify } from "yaml";
import type { GraphEdge } from "../../domain/graph-export.js";
import type { CodeSymbol, DependencyEdge, FileAnalysis, SessionSummary, SymbolDetail } from "../../domain/types.js";

export type OutputFormat = "text" | "json" | "yaml";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json", "yaml"];

/** Machine-readable rendering of a command result. */
export function formatStructured(value: unknown, format: "json" | "yaml"): string {
  return format === "json" ? JSON.stringify(value, null, 2) : stringify(value).trimEnd();
}

function location(symbol: CodeSymbol): string {
  return `${symbol.filePath}:${symbol.range.start}`;
}

export function formatSummary(summary: SessionSummary): string[] {
  return [
    `Analyzed: ${summary.root}`,
    `  Files:     ${summary.filesAnalyzed}`,
    `  Symbols:   ${summary.symbolCount}`,
    `  Warnings:  ${summary.warningCount}`,
    `  Rejected:  ${summary.rejectedCount}`,
    `  Imports:   ${summary.resolvedEdgeCount}/${summary.edgeCount} resolved`,
    `  Languages: ${summary.languages.length > 0 ? summary.languages.join(", ") : "(none)"}`,
  ];
}

export function formatSymbol(symbol: CodeSymbol): string {
  return `  ${symbol.kind} ${symbol.qualifiedName} (${location(symbol)})`;
}

export function formatWarnings(files: readonly FileAnalysis[]): string[] {
  return files.flatMap((file) =>
    file.warnings.map((w) => `  ${file.path}${w.line !== undefined ? `:${w.line}` : ""} [${w.code}] ${w.message}`),
  );
}

export function formatDetail(detail: SymbolDetail): string[] {
  const { symbol } = detail;
  const lines = [
    `${symbol.kind} ${symbol.qualifiedName}`,
    `  Id:         ${symbol.id}`,
    `  Location:   ${symbol.filePath}:${symbol.range.start}-${symbol.range.end}`,
    `  Signature:  ${symbol.signature}`,
    `  Visibility: ${symbol.visibility}`,
  ];
  if (symbol.modifiers.length > 0) lines.push(`  Modifiers:  ${symbol.modifiers.join(", ")}`);
  if (symbol.extends.length > 0) lines.push(`  Extends:    ${symbol.extends.join(", ")}`);
  if (symbol.implements.length > 0) lines.push(`  Implements: ${symbol.implements.join(", ")}`);
  if (symbol.docComment) lines.push(`  Doc:        ${symbol.docComment.split("\n")[0]}`);
  if (detail.children.length > 0) {
    lines.push("  Members:");
    for (const child of detail.children) lines.push(`  ${formatSymbol(child)}`);
  }
  if (detail.dependentFiles.length > 0) {
    lines.push("  Imported by:");
    for (const file of detail.dependentFiles) lines.push(`    ${file}`);
  }
  return lines;
}

export function formatEdge(edge: DependencyEdge): string {
  return `  ${edge.from} → ${edge.to} (line ${edge.line})${edge.resolved ? "" : " [external]"}`;
}

export function formatGraphEdge(edge: GraphEdge): string {
  const line = edge.line === undefined ? "" : `, line ${edge.line}`;
  return `  ${edge.source} → ${edge.target} (${edge.relation}${line})${edge.external ? " [external]" : ""}`;
}

export function formatCycle(cycle: readonly string[]): string {
  return `  ${cycle.join(" → ")}`;
}
