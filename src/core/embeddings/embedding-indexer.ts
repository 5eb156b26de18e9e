/**
 * Embedding Indexer
 *
 * Attaches vectors to stored chunks. Batches go to the embedding service
 * together; a failed batch is retried one chunk at a time and chunks that
 * still fail stay in the store without a vector, as do the chunks of a
 * batch whose vectors the store rejects.
 *
 * @module
 */

import { chunkKeyOf, type ChunkKey, type ChunkRecord } from "../../types/index.js";
import {
  forEachConcurrent,
  RateLimiter,
  type CancellationToken,
} from "../../utils/async.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import {
  DimensionMismatchError,
  describeError,
  isServiceError,
  StoreConnectivityError,
} from "../errors.js";
import type { EmbeddingWrite, IGraphStore } from "../interfaces/IGraphStore.js";
import type { IEmbeddingService } from "./index.js";

// =============================================================================
// Types
// =============================================================================

export interface EmbeddingIndexerOptions {
  batchSize: number;
  concurrency: number;
  /** 0 disables rate limiting */
  requestsPerSecond: number;
}

export interface IndexRunOptions {
  /** Re-embed chunks that already carry a vector */
  force?: boolean;
  token?: CancellationToken;
}

export interface EmbeddingFailure {
  chunk: ChunkKey;
  error: string;
}

export interface EmbeddingReport {
  totalChunks: number;
  /** Vectors written by this run */
  embeddedChunks: number;
  /** Chunks left alone because they already had a vector */
  alreadyEmbedded: number;
  failedChunks: number;
  /** Chunks of this run with a vector afterwards, over all chunks of this run */
  coverage: number;
  failures: EmbeddingFailure[];
  cancelled: boolean;
  durationMs: number;
}

const DEFAULT_OPTIONS: EmbeddingIndexerOptions = {
  batchSize: 16,
  concurrency: 2,
  requestsPerSecond: 0,
};

function isRecoverable(error: unknown): boolean {
  return isServiceError(error) || error instanceof DimensionMismatchError;
}

// =============================================================================
// Embedding Indexer
// =============================================================================

export class EmbeddingIndexer {
  private readonly options: EmbeddingIndexerOptions;
  private readonly logger: Logger;

  constructor(
    private readonly store: IGraphStore,
    private readonly embeddings: IEmbeddingService,
    options: Partial<EmbeddingIndexerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = createLogger("embedding-indexer");

    if (embeddings.getDimension() !== store.dimension) {
      throw new DimensionMismatchError(store.dimension, embeddings.getDimension(), {
        model: embeddings.getModelId(),
        reason: "embedding service and vector index disagree",
      });
    }
  }

  /**
   * Embed the given (already stored) chunks
   */
  async index(chunks: readonly ChunkRecord[], runOptions: IndexRunOptions = {}): Promise<EmbeddingReport> {
    const startTime = Date.now();
    const filePaths = [...new Set(chunks.map((chunk) => chunk.filePath))];
    const alreadyEmbedded = new Set(
      filePaths.length === 0
        ? []
        : (await this.store.listChunks({ filePaths, embedded: true })).map((chunk) => chunkKeyOf(chunk))
    );

    const requested = new Set(chunks.map((chunk) => chunkKeyOf(chunk)));
    const withVector = new Set([...alreadyEmbedded].filter((key) => requested.has(key)));
    const keptCount = withVector.size;
    const pending = runOptions.force
      ? [...chunks]
      : chunks.filter((chunk) => !alreadyEmbedded.has(chunkKeyOf(chunk)));

    const batches: ChunkRecord[][] = [];
    for (let i = 0; i < pending.length; i += this.options.batchSize) {
      batches.push(pending.slice(i, i + this.options.batchSize));
    }

    let embeddedChunks = 0;
    const failures: EmbeddingFailure[] = [];
    const limiter = new RateLimiter(this.options.requestsPerSecond);

    const run = await forEachConcurrent(
      batches,
      async (batch, batchIndex) => {
        const outcome = await this.embedBatch(batch, batchIndex, limiter);
        failures.push(...outcome.failures);
        if (outcome.writes.length === 0) return;

        try {
          await this.store.writeEmbeddings(outcome.writes);
        } catch (error) {
          if (error instanceof StoreConnectivityError) throw error;
          this.logger.warn({ err: error, batch: batchIndex, size: outcome.writes.length }, "Store rejected embeddings");
          const message = describeError(error);
          failures.push(...outcome.writes.map((write) => ({ chunk: write.chunk, error: message })));
          return;
        }
        embeddedChunks += outcome.writes.length;
        outcome.writes.forEach((write) => withVector.add(chunkKeyOf(write.chunk)));
      },
      { concurrency: this.options.concurrency, token: runOptions.token, rateLimiter: limiter }
    );

    const totalChunks = requested.size;
    const report: EmbeddingReport = {
      totalChunks,
      embeddedChunks,
      alreadyEmbedded: runOptions.force ? 0 : keptCount,
      failedChunks: failures.length,
      coverage: totalChunks === 0 ? 0 : withVector.size / totalChunks,
      failures,
      cancelled: run.cancelled,
      durationMs: Date.now() - startTime,
    };

    this.logger.info(
      {
        total: report.totalChunks,
        embedded: report.embeddedChunks,
        skipped: report.alreadyEmbedded,
        failed: report.failedChunks,
        coverage: Number(report.coverage.toFixed(4)),
      },
      "Embedding run complete"
    );
    return report;
  }

  private async embedBatch(
    batch: ChunkRecord[],
    batchIndex: number,
    limiter: RateLimiter
  ): Promise<{ writes: EmbeddingWrite[]; failures: EmbeddingFailure[] }> {
    try {
      const results = await this.embeddings.embedBatch(batch.map((chunk) => chunk.text));
      return {
        writes: batch.flatMap((chunk, index) => {
          const result = results[index];
          return result ? [{ chunk: keyOf(chunk), vector: result.vector }] : [];
        }),
        failures: [],
      };
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      this.logger.warn({ err: error, batch: batchIndex, size: batch.length }, "Batch embedding failed, retrying per chunk");
    }

    const writes: EmbeddingWrite[] = [];
    const failures: EmbeddingFailure[] = [];
    for (const chunk of batch) {
      try {
        await limiter.acquire();
        const result = await this.embeddings.embed(chunk.text);
        writes.push({ chunk: keyOf(chunk), vector: result.vector });
      } catch (error) {
        if (!isRecoverable(error)) throw error;
        this.logger.warn({ err: error, chunk: chunkKeyOf(chunk) }, "Chunk left unembedded");
        failures.push({ chunk: keyOf(chunk), error: describeError(error) });
      }
    }
    return { writes, failures };
  }
}

function keyOf(chunk: ChunkKey): ChunkKey {
  return { filePath: chunk.filePath, chunkId: chunk.chunkId };
}
