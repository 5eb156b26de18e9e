/**
 * File System Utilities
 *
 * Glob discovery and language detection for source files.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

// =============================================================================
// Types
// =============================================================================

export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Directories never worth indexing
 */
export const DEFAULT_IGNORE_PATTERNS = [
  "**/node_modules/**",
  "**/.git/**",
  "**/dist/**",
  "**/build/**",
  "**/target/**",
  "**/__pycache__/**",
  "**/.venv/**",
  "**/coverage/**",
  "**/.codegraph/**",
];

// =============================================================================
// Discovery
// =============================================================================

/**
 * Find files matching glob patterns, sorted so repeated runs visit files in
 * the same order
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = false } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore: [...DEFAULT_IGNORE_PATTERNS, ...ignore],
    dot: false,
  });
  return files.sort();
}

/**
 * Glob patterns for a list of extensions (".java" or "java")
 */
export function extensionPatterns(extensions: string[]): string[] {
  if (extensions.length === 0) return ["**/*"];
  const normalized = extensions.map((ext) => ext.replace(/^\./, "").toLowerCase());
  return normalized.length === 1
    ? [`**/*.${normalized[0]}`]
    : [`**/*.{${normalized.join(",")}}`];
}

export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf-8");
}

/**
 * Content that holds a NUL, or whose characters are under 70% printable,
 * is treated as binary. U+FFFD counts as unprintable: it is what undecodable
 * bytes become when read as UTF-8.
 */
export function isLikelyBinary(content: string): boolean {
  if (content.includes("\0")) return true;
  const total = [...content].length;
  if (total === 0) return false;
  const unprintable = content.match(/[^\P{C}\s]|\uFFFD/gu)?.length ?? 0;
  return (total - unprintable) / total < 0.7;
}

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

// =============================================================================
// Language Detection
// =============================================================================

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".py": "python",
  ".go": "go",
  ".rs": "rust",
  ".java": "java",
  ".rb": "ruby",
  ".php": "php",
  ".c": "c",
  ".cpp": "cpp",
  ".h": "c",
  ".hpp": "cpp",
  ".cs": "csharp",
  ".swift": "swift",
  ".kt": "kotlin",
  ".scala": "scala",
  ".sql": "sql",
  ".dart": "dart",
  ".lua": "lua",
  ".sh": "bash",
};

/**
 * Language name for a file path, "unknown" when the extension is not mapped
 */
export function detectLanguage(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return LANGUAGE_BY_EXTENSION[ext] ?? "unknown";
}

/**
 * Extension of a file path without the leading dot, lower-cased
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).replace(/^\./, "").toLowerCase();
}
