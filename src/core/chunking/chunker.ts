/**
 * Chunker
 *
 * Splits source files into overlapping, line-aligned text windows. Output is
 * a plain array so callers can iterate it as often as they like.
 *
 * @module
 */

import * as path from "node:path";
import type { ChunkRecord, FileRecord, SourceFile } from "../../types/index.js";
import { detectLanguage, fileExtension, toPosixPath } from "../../utils/fs.js";
import { ConfigurationError, ErrorCode } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export interface ChunkerOptions {
  /** Character budget per chunk */
  chunkSize: number;
  /** Characters of trailing lines carried into the next chunk */
  chunkOverlap: number;
  /** Language names or extensions to keep; empty keeps everything */
  allowedLanguages?: string[];
}

interface Segment {
  line: number;
  text: string;
}

// =============================================================================
// Chunker
// =============================================================================

export class Chunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly allowed: Set<string>;

  constructor(options: ChunkerOptions) {
    validateChunkerOptions(options);
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.allowed = new Set(
      (options.allowedLanguages ?? []).map((entry) => entry.trim().replace(/^\./, "").toLowerCase())
    );
  }

  /**
   * Whether a file passes the language filter
   */
  accepts(file: SourceFile): boolean {
    if (this.allowed.size === 0) return true;
    const language = (file.language ?? detectLanguage(file.filePath)).toLowerCase();
    return this.allowed.has(language) || this.allowed.has(fileExtension(file.filePath));
  }

  /**
   * Chunk every file in order. Filtered and blank files contribute nothing.
   */
  chunkAll(files: readonly SourceFile[]): ChunkRecord[] {
    return files.flatMap((file) => this.chunk(file));
  }

  /**
   * Chunk one file. Chunk ids restart at 0 for every file.
   */
  chunk(file: SourceFile): ChunkRecord[] {
    if (!this.accepts(file) || file.content.trim().length === 0) {
      return [];
    }

    const filePath = toPosixPath(file.filePath);
    const language = file.language ?? detectLanguage(filePath);
    const windows = this.window(this.segment(file.content));

    const chunks: ChunkRecord[] = [];
    for (const window of windows) {
      const text = window.map((segment) => segment.text).join("\n");
      const first = window[0];
      const last = window[window.length - 1];
      if (!first || !last || text.trim().length === 0) continue;
      chunks.push({
        chunkId: chunks.length,
        filePath,
        language,
        text,
        startLine: first.line,
        endLine: last.line,
        chunkSize: text.length,
      });
    }
    return chunks;
  }

  /**
   * Lines with their 1-based numbers; lines over budget are hard-split
   */
  private segment(content: string): Segment[] {
    const lines = content.split(/\r?\n/);
    if (lines.length > 1 && lines[lines.length - 1] === "") {
      lines.pop();
    }

    const segments: Segment[] = [];
    lines.forEach((text, index) => {
      const line = index + 1;
      if (text.length <= this.chunkSize) {
        segments.push({ line, text });
        return;
      }
      for (let offset = 0; offset < text.length; offset += this.chunkSize) {
        segments.push({ line, text: text.slice(offset, offset + this.chunkSize) });
      }
    });
    return segments;
  }

  /**
   * Greedily pack segments into windows of at most chunkSize characters
   * (joined with newlines), seeding each window with the previous window's
   * trailing segments up to chunkOverlap characters.
   */
  private window(segments: Segment[]): Segment[][] {
    const windows: Segment[][] = [];
    let current: Segment[] = [];
    let currentLength = 0;

    for (const segment of segments) {
      const added = current.length === 0 ? segment.text.length : currentLength + 1 + segment.text.length;
      if (added <= this.chunkSize) {
        current.push(segment);
        currentLength = added;
        continue;
      }

      windows.push(current);
      current = this.overlapTail(current);
      currentLength = joinedLength(current);

      // Shed carried lines until the new segment fits
      while (current.length > 0 && currentLength + 1 + segment.text.length > this.chunkSize) {
        current.shift();
        currentLength = joinedLength(current);
      }

      current.push(segment);
      currentLength = joinedLength(current);
    }

    if (current.length > 0) {
      windows.push(current);
    }
    return windows;
  }

  private overlapTail(window: Segment[]): Segment[] {
    if (this.chunkOverlap === 0) return [];
    const tail: Segment[] = [];
    let length = 0;
    for (let i = window.length - 1; i >= 0; i--) {
      const segment = window[i];
      if (!segment) break;
      const next = tail.length === 0 ? segment.text.length : length + 1 + segment.text.length;
      if (next > this.chunkOverlap) break;
      tail.unshift(segment);
      length = next;
    }
    return tail;
  }
}

function joinedLength(segments: Segment[]): number {
  if (segments.length === 0) return 0;
  return segments.reduce((sum, segment) => sum + segment.text.length, 0) + segments.length - 1;
}

// =============================================================================
// Helpers
// =============================================================================

export function validateChunkerOptions(options: ChunkerOptions): void {
  const issues: string[] = [];
  if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer (got ${options.chunkSize})`);
  }
  if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
    issues.push(`chunkOverlap must be a non-negative integer (got ${options.chunkOverlap})`);
  }
  if (options.chunkOverlap >= options.chunkSize) {
    issues.push(
      `chunkOverlap (${options.chunkOverlap}) must be smaller than chunkSize (${options.chunkSize})`
    );
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid chunking parameters", ErrorCode.CONFIG_CHUNKING_INVALID, {
      issues,
    });
  }
}

/**
 * File node properties for a source file and its chunks
 */
export function describeFile(file: SourceFile, chunks: readonly ChunkRecord[]): FileRecord {
  const filePath = toPosixPath(file.filePath);
  const lines = file.content.split(/\r?\n/);
  const totalLines = lines.length > 1 && lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
  return {
    path: filePath,
    name: path.posix.basename(filePath),
    extension: fileExtension(filePath),
    language: file.language ?? detectLanguage(filePath),
    totalChunks: chunks.length,
    totalLines: file.content.length === 0 ? 0 : totalLines,
  };
}
