import type { ExtractionWarning, FileAnalysis, Language, LanguageExtractor } from "../types.js";
import { detectLanguage } from "../languages.js";
import { normalizeExtraction } from "../normalizer.js";
import { javaExtractor } from "./java.js";
import { javascriptExtractor, typescriptExtractor } from "./javascript.js";
import { kotlinExtractor } from "./kotlin.js";
import { pythonExtractor } from "./python.js";

export const EXTRACTORS: Record<Language, LanguageExtractor> = {
  python: pythonExtractor,
  javascript: javascriptExtractor,
  typescript: typescriptExtractor,
  java: javaExtractor,
  kotlin: kotlinExtractor,
};

export function unsupportedFile(filePath: string): FileAnalysis {
  return {
    path: filePath,
    symbols: [],
    imports: [],
    warnings: [{ code: "unsupported-language", message: `No extractor for ${filePath}` }],
  };
}

/** Folds every `parse-recoverable` warning of one file into the first, in line order. */
export function foldRecoverable(warnings: readonly ExtractionWarning[]): ExtractionWarning[] {
  const recoverable = warnings.filter((w) => w.code === "parse-recoverable");
  if (recoverable.length < 2) return [...warnings];
  const ordered = [...recoverable].sort((a, b) => (a.line ?? Infinity) - (b.line ?? Infinity));
  const folded: ExtractionWarning = {
    code: "parse-recoverable",
    message: `${ordered.length} problems: ${ordered.map((w) => w.message).join("; ")}`,
  };
  if (ordered[0].line !== undefined) folded.line = ordered[0].line;
  return [...warnings.filter((w) => w.code !== "parse-recoverable"), folded];
}

/**
 * Extract and normalize the symbols of one file. Never throws for source
 * content: problems surface as at most one `parse-recoverable` warning.
 */
export function extractFile(source: string, filePath: string): FileAnalysis {
  const language = detectLanguage(filePath);
  if (!language) return unsupportedFile(filePath);
  const analysis = normalizeExtraction(EXTRACTORS[language].extract(source, filePath));
  return { ...analysis, warnings: foldRecoverable(analysis.warnings) };
}
