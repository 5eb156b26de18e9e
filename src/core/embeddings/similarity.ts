/**
 * Vector similarity helpers shared by the store adapters
 *
 * @module
 */

import type { ScoredChunk } from "../../types/index.js";
import { DimensionMismatchError } from "../errors.js";

/**
 * Throw unless the vector has the expected number of components
 */
export function assertDimension(vector: readonly number[], expected: number, context?: Record<string, unknown>): void {
  if (vector.length !== expected) {
    throw new DimensionMismatchError(expected, vector.length, context);
  }
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has no magnitude
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Search order: score descending, then chunk id, then file path
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.chunk.chunkId !== b.chunk.chunkId) return a.chunk.chunkId - b.chunk.chunkId;
  return a.chunk.filePath < b.chunk.filePath ? -1 : a.chunk.filePath > b.chunk.filePath ? 1 : 0;
}

export function topK(hits: ScoredChunk[], k: number): ScoredChunk[] {
  return [...hits].sort(compareScoredChunks).slice(0, k);
}
