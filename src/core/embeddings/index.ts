/**
 * Embedding service
 * Turns chunk text and queries into fixed-dimension vectors
 */

import OpenAI from "openai";
import { createLogger, type Logger } from "../../utils/logger.js";
import { DEFAULT_RETRY_POLICY, retry, timeout, type RetryPolicy } from "../../utils/async.js";
import type { EmbeddingsConfig, RetryConfig } from "../../utils/validation.js";
import { ConfigurationError, ErrorCode, isTransientServiceFailure, ServiceError } from "../errors.js";
import { assertDimension } from "./similarity.js";

export interface EmbeddingResult {
  vector: number[];
  modelId: string;
}

export interface IEmbeddingService {
  readonly isReady: boolean;
  initialize(): Promise<void>;
  /** Every returned vector has exactly `getDimension()` components */
  embed(text: string): Promise<EmbeddingResult>;
  embedBatch(texts: string[]): Promise<EmbeddingResult[]>;
  getDimension(): number;
  getModelId(): string;
  shutdown(): Promise<void>;
}

// =============================================================================
// OpenAI Embeddings
// =============================================================================

export interface OpenAIEmbeddingServiceConfig {
  modelId: string;
  dimension: number;
  apiKey?: string;
  baseUrl?: string;
  retry?: RetryPolicy;
}

export class OpenAIEmbeddingService implements IEmbeddingService {
  private readonly config: OpenAIEmbeddingServiceConfig;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private client: OpenAI | null = null;

  constructor(config: OpenAIEmbeddingServiceConfig) {
    const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        "API key not found. Set OPENAI_API_KEY or provide embeddings.apiKey in config.",
        ErrorCode.CONFIG_MISSING_CREDENTIALS,
        { provider: "openai" }
      );
    }
    this.config = { ...config, apiKey };
    this.policy = config.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = createLogger("embedding-service");
  }

  get isReady(): boolean {
    return this.client !== null;
  }

  async initialize(): Promise<void> {
    if (this.client) return;
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: 0,
      timeout: this.policy.timeoutMs,
    });
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embedBatch([text]);
    if (!result) {
      throw new ServiceError("Embedding service returned no vector", ErrorCode.SERVICE_REQUEST_FAILED, {
        service: "embedding",
      });
    }
    return result;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    const client = this.client;
    if (!client) {
      throw new ServiceError("Service not initialized. Call initialize() first.", ErrorCode.SERVICE_NOT_READY, {
        service: "embedding",
      });
    }
    if (texts.length === 0) return [];

    let vectors: number[][];
    try {
      vectors = await retry(
        async () => {
          const response = await timeout(
            client.embeddings.create(
              {
                model: this.config.modelId,
                input: texts,
                dimensions: this.config.dimension,
              },
              { timeout: this.policy.timeoutMs }
            ),
            this.policy.timeoutMs,
            "Embedding request timed out"
          );
          return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
        },
        {
          ...this.policy,
          retryIf: isTransientServiceFailure,
          onRetry: (error, attempt) => {
            this.logger.warn({ err: error, attempt, batchSize: texts.length }, "Embedding request failed, retrying");
          },
        }
      );
    } catch (error) {
      throw new ServiceError(
        "Embedding request failed",
        ErrorCode.SERVICE_REQUEST_FAILED,
        { service: "embedding", model: this.config.modelId, batchSize: texts.length },
        { cause: error }
      );
    }

    if (vectors.length !== texts.length) {
      throw new ServiceError(
        `Embedding service returned ${vectors.length} vectors for ${texts.length} inputs`,
        ErrorCode.SERVICE_REQUEST_FAILED,
        { service: "embedding" }
      );
    }

    return vectors.map((vector) => {
      assertDimension(vector, this.config.dimension, { model: this.config.modelId });
      return { vector, modelId: this.config.modelId };
    });
  }

  getDimension(): number {
    return this.config.dimension;
  }

  getModelId(): string {
    return this.config.modelId;
  }

  async shutdown(): Promise<void> {
    this.client = null;
  }
}

export function createEmbeddingService(config: EmbeddingsConfig, retryPolicy: RetryConfig): IEmbeddingService {
  return new OpenAIEmbeddingService({
    modelId: config.model,
    dimension: config.dimension,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    retry: retryPolicy,
  });
}

export * from "./similarity.js";
export * from "./embedding-indexer.js";
