import ignore from "ignore";
import type { AnalysisFilters } from "./types.js";

export type IgnoreMatcher = ReturnType<typeof ignore.default>;

/** Folders never worth analyzing, wherever they appear in the tree. */
export const DEFAULT_EXCLUDED_FOLDERS = [
  "node_modules",
  ".git",
  "dist",
  "build",
  "vendor",
  "coverage",
  "__pycache__",
  ".venv",
  "venv",
];

export function createIgnore(patterns: readonly string[] = []): IgnoreMatcher {
  return ignore.default().add([...patterns]);
}

function trimFolder(folder: string): string {
  return folder.replace(/\\/g, "/").replace(/^\.\//, "").replace(/\/+$/, "");
}

/**
 * Predicate over session-relative POSIX paths. Excluded folders match at any
 * depth by name, or from the root when written with a slash; excluded files
 * are gitignore-style patterns. A non-empty include list keeps only files
 * under one of its folders.
 */
export function createPathFilter(filters: AnalysisFilters = {}): (path: string) => boolean {
  const folders = (filters.excludeFolders ?? []).map(trimFolder).filter((f) => f.length > 0);
  const ig = createIgnore([...folders.map((f) => `${f}/`), ...(filters.excludeFiles ?? [])]);
  const includes = (filters.includeFolders ?? []).map(trimFolder).filter((f) => f.length > 0);

  return (path: string): boolean => {
    if (ig.ignores(path)) return false;
    if (includes.length === 0) return true;
    return includes.some((folder) => folder === "." || path === folder || path.startsWith(`${folder}/`));
  };
}
