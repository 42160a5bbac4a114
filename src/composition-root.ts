import type { AppConfig } from "./config.js";
import type { AnalyzeCode, FileSystem, Logger, QueryCode, SessionStore } from "./domain/ports.js";
import { NodeFileSystem } from "./infrastructure/node-filesystem.js";
import { ConsoleLogger } from "./infrastructure/console-logger.js";
import { InMemorySessionStore } from "./application/session-store.js";
import { AnalyzeCodeService } from "./application/analyze-code.js";
import { QueryCodeService } from "./application/query-code.js";

export interface AppServices {
  analyzeCode: AnalyzeCode;
  queryCode: QueryCode;
  sessions: SessionStore;
  logger: Logger;
  config: AppConfig;
}

export interface AppOverrides {
  fs?: FileSystem;
  logger?: Logger;
}

export function createAppServices(config: AppConfig, overrides: AppOverrides = {}): AppServices {
  const logger = overrides.logger ?? new ConsoleLogger(config.logLevel);
  const fs = overrides.fs ?? new NodeFileSystem();

  const analyzeCode = new AnalyzeCodeService(fs, logger, {
    concurrency: config.concurrency,
    excludeFolders: config.excludeFolders,
    excludeFiles: config.excludeFiles,
    fuzzyThreshold: config.fuzzyThreshold,
  });
  const queryCode = new QueryCodeService({ searchLimit: config.searchLimit });
  const sessions = new InMemorySessionStore();

  return { analyzeCode, queryCode, sessions, logger, config };
}
