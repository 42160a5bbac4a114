import { extname } from "node:path";
import type { Language } from "./types.js";

const EXTENSION_LANGUAGES: Record<string, Language> = {
  ".py": "python",
  ".pyi": "python",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".java": "java",
  ".kt": "kotlin",
  ".kts": "kotlin",
};

/** Detect the language of a file from its extension. */
export function detectLanguage(filePath: string): Language | undefined {
  return EXTENSION_LANGUAGES[extname(filePath).toLowerCase()];
}

export function extensionsFor(language: Language): string[] {
  return Object.keys(EXTENSION_LANGUAGES).filter((ext) => EXTENSION_LANGUAGES[ext] === language);
}

export function supportedExtensions(): string[] {
  return Object.keys(EXTENSION_LANGUAGES);
}
