import { homedir } from "node:os";
import { join } from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import type { LogLevel } from "./infrastructure/console-logger.js";

export interface AppConfig {
  concurrency: number;
  excludeFolders: string[];
  excludeFiles: string[];
  fuzzyThreshold: number;
  searchLimit: number;
  logLevel: LogLevel;
}

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const EnvSchema = z.object({
  CODESCOPE_CONCURRENCY: z.coerce.number().int().min(1).max(256).default(8),
  CODESCOPE_EXCLUDE_FOLDERS: commaList,
  CODESCOPE_EXCLUDE_FILES: commaList,
  CODESCOPE_FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.4),
  CODESCOPE_SEARCH_LIMIT: z.coerce.number().int().min(1).default(20),
  CODESCOPE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

/** Validates raw environment variables into an AppConfig. */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    concurrency: e.CODESCOPE_CONCURRENCY,
    excludeFolders: e.CODESCOPE_EXCLUDE_FOLDERS,
    excludeFiles: e.CODESCOPE_EXCLUDE_FILES,
    fuzzyThreshold: e.CODESCOPE_FUZZY_THRESHOLD,
    searchLimit: e.CODESCOPE_SEARCH_LIMIT,
    logLevel: e.CODESCOPE_LOG_LEVEL,
  };
}

export function loadConfig(): AppConfig {
  // Neither file overrides variables already set, so the local .env wins over the global one
  dotenv.config();
  dotenv.config({ path: join(homedir(), ".codescope", ".env") });

  return parseConfig(process.env);
}
