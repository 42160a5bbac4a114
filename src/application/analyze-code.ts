import { resolve } from "node:path";
import type { AnalyzeCode, FileSystem, Logger } from "../domain/ports.js";
import type { AnalysisFilters, AnalysisSession, FileAnalysis, SourceFile } from "../domain/types.js";
import { InvalidInputError } from "../domain/errors.js";
import { supportedExtensions } from "../domain/languages.js";
import { createIgnore, DEFAULT_EXCLUDED_FOLDERS } from "../domain/path-filter.js";
import { analyzeFile, buildSession, summarizeSession, toSessionPath } from "../domain/session.js";
import { mapWithConcurrency } from "../domain/utils.js";

export interface AnalyzeCodeOptions {
  concurrency: number;
  /** Added to every request's excluded folders. */
  excludeFolders: string[];
  excludeFiles: string[];
  fuzzyThreshold?: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class AnalyzeCodeService implements AnalyzeCode {
  constructor(
    private readonly fs: FileSystem,
    private readonly logger: Logger,
    private readonly options: AnalyzeCodeOptions,
  ) {}

  async analyzeDirectory(root: string, filters: AnalysisFilters = {}): Promise<AnalysisSession> {
    const absRoot = resolve(root);
    if (!this.fs.exists(absRoot)) {
      throw new InvalidInputError(`Analysis root does not exist: ${absRoot}`, root);
    }

    const merged = this.mergeFilters(filters);
    const files = await this.collectFiles(absRoot, merged);
    this.logger.info(`Found ${files.length} files under ${absRoot}`);

    const sources = await mapWithConcurrency(files, this.options.concurrency, async (rel): Promise<SourceFile> => {
      try {
        return { path: rel, text: await this.fs.readFile(resolve(absRoot, rel)) };
      } catch (err) {
        this.logger.warn(`Could not read ${rel}: ${errorMessage(err)}`);
        return { path: rel, text: "", readError: errorMessage(err) };
      }
    });

    return this.build(absRoot, sources, merged);
  }

  analyzeSources(root: string, sources: Iterable<SourceFile>, filters: AnalysisFilters = {}): AnalysisSession {
    return this.build(root, sources, this.mergeFilters(filters));
  }

  async analyzeSingleFile(root: string, filePath: string): Promise<FileAnalysis> {
    const absRoot = resolve(root);
    const absPath = resolve(absRoot, filePath);
    if (toSessionPath(absRoot, absPath) === undefined) {
      throw new InvalidInputError(`Path is outside the analysis root ${absRoot}: ${filePath}`, filePath);
    }
    const text = await this.fs.readFile(absPath);
    const analysis = analyzeFile(absRoot, absPath, text);
    for (const warning of analysis.warnings) this.logger.warn(`${analysis.path}: ${warning.message}`);
    return analysis;
  }

  /** Supported source files under the root, relative POSIX paths, sorted. */
  async collectFiles(absRoot: string, filters: AnalysisFilters): Promise<string[]> {
    const patterns = supportedExtensions().map((ext) => `**/*${ext}`);
    const folders = filters.excludeFolders ?? [];

    const ig = createIgnore();
    const gitignorePath = resolve(absRoot, ".gitignore");
    if (this.fs.exists(gitignorePath)) {
      ig.add(await this.fs.readFile(gitignorePath));
    }

    const files = await this.fs.glob(patterns, {
      cwd: absRoot,
      absolute: false,
      ignore: folders.map((f) => `**/${f.replace(/\/+$/, "")}/**`),
    });

    return files
      .map((f) => f.replace(/\\/g, "/"))
      .filter((f) => !ig.ignores(f))
      .sort();
  }

  private mergeFilters(filters: AnalysisFilters): AnalysisFilters {
    const unique = (items: string[]) => [...new Set(items)];
    return {
      includeFolders: filters.includeFolders,
      excludeFolders: unique([
        ...DEFAULT_EXCLUDED_FOLDERS,
        ...this.options.excludeFolders,
        ...(filters.excludeFolders ?? []),
      ]),
      excludeFiles: unique([...this.options.excludeFiles, ...(filters.excludeFiles ?? [])]),
    };
  }

  private build(root: string, sources: Iterable<SourceFile>, filters: AnalysisFilters): AnalysisSession {
    const session = buildSession(root, sources, { filters, fuzzyThreshold: this.options.fuzzyThreshold });
    const summary = summarizeSession(session);
    for (const rejected of session.rejected) {
      this.logger.warn(`Rejected ${rejected.path}: ${rejected.reason}`);
    }
    this.logger.info(
      `Analyzed ${summary.filesAnalyzed} files: ${summary.symbolCount} symbols, ` +
        `${summary.warningCount} warnings, ${summary.resolvedEdgeCount}/${summary.edgeCount} imports resolved`,
    );
    return session;
  }
}
