/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the engine configuration. Every section has defaults so a
 * partial document (or none at all) parses into a complete configuration.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Section Schemas
// =============================================================================

export const StoreConfigSchema = z.object({
  /** "memory" keeps the graph in process; useful for tests and dry runs */
  engine: z.enum(["neo4j", "memory"]).default("neo4j"),
  uri: z.string().min(1).default("neo4j://localhost:7687"),
  username: z.string().min(1).default("neo4j"),
  password: z.string().default("password"),
  database: z.string().min(1).default("neo4j"),
  vectorIndexName: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain identifier")
    .default("code_chunks_vector_index"),
  connectionTimeoutMs: z.number().int().positive().default(10_000),
});

export const ChunkingConfigSchema = z
  .object({
    chunkSize: z.number().int().default(500),
    chunkOverlap: z.number().int().default(50),
    /** Language names or extensions; empty means every language */
    allowedLanguages: z.array(z.string().min(1)).default([]),
  })
  .superRefine((value, ctx) => {
    if (value.chunkSize <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["chunkSize"], message: "must be positive" });
    }
    if (value.chunkOverlap < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["chunkOverlap"], message: "must not be negative" });
    }
    if (value.chunkOverlap >= value.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["chunkOverlap"],
        message: "must be smaller than chunkSize",
      });
    }
  });

export const LLMConfigSchema = z.object({
  provider: z.enum(["openai", "anthropic"]).default("openai"),
  model: z.string().min(1).default("gpt-4o"),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  maxTokens: z.number().int().positive().default(2048),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(["openai"]).default("openai"),
  model: z.string().min(1).default("text-embedding-3-large"),
  dimension: z.number().int().positive().default(3072),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  initialDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(8000),
  backoffFactor: z.number().min(1).default(2),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const ExtractionConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(4),
  requestsPerSecond: z.number().nonnegative().default(5),
  /** Attempts per chunk when the response does not parse */
  maxParseAttempts: z.number().int().min(1).default(3),
});

export const IndexingConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(2048).default(16),
  concurrency: z.number().int().min(1).default(2),
  requestsPerSecond: z.number().nonnegative().default(5),
});

export const BridgeConfigSchema = z.object({
  minConfidence: z.number().min(0).max(1).default(0.5),
  /** Mentions needed for an identifier match to reach full confidence */
  mentionSaturation: z.number().int().min(1).default(2),
});

export const QueryConfigSchema = z.object({
  k: z.number().int().min(1).max(50).default(5),
  similarityFloor: z.number().min(-1).max(1).default(0.2),
  includeGraphContext: z.boolean().default(true),
  traversalDepth: z.number().int().min(0).max(5).default(2),
  timeoutMs: z.number().int().positive().default(60_000),
  /** Chunks quoted verbatim in the synthesis prompt */
  maxContextChunks: z.number().int().min(1).default(3),
  temperature: z.number().min(0).max(2).default(0.7),
  maxAnswerTokens: z.number().int().positive().default(1000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
  file: z.boolean().default(false),
});

// =============================================================================
// Engine Configuration
// =============================================================================

export const EngineConfigSchema = z.object({
  store: StoreConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  llm: LLMConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  indexing: IndexingConfigSchema.default({}),
  bridge: BridgeConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
