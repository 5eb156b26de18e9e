/**
 * Core module - everything the CLI builds on, for embedding the engine in
 * other programs
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./config.js";
export * from "./chunking/index.js";
export * from "./extraction/index.js";
export * from "./embeddings/index.js";
export * from "./bridge/index.js";
export * from "./query/index.js";
export * from "./graph/index.js";
export * from "./llm/index.js";
export * from "./sources/index.js";
export * from "./pipeline/index.js";
export * from "./runtime.js";
export type { IGraphStore, ChunkFilter, EmbeddingWrite, ExtractionWriteSummary } from "./interfaces/IGraphStore.js";

// Re-export types
export * from "../types/index.js";
export * from "../types/result.js";
export {
  CancellationToken,
  CancellationTokenSource,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
} from "../utils/async.js";
export {
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
} from "../utils/validation.js";
