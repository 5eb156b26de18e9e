/**
 * Embedding Indexer Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { EmbeddingIndexer } from "../embedding-indexer.js";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { describeFile } from "../../chunking/chunker.js";
import { DimensionMismatchError, StoreConnectivityError, StoreError } from "../../errors.js";
import { CancellationTokenSource } from "../../../utils/async.js";
import type { ChunkRecord } from "../../../types/index.js";
import { chunkOf, HashingEmbeddingService } from "../../__tests__/helpers/fakes.js";

const FILE_PATH = "src/Steps.java";

function stepText(index: number): string {
  return `void step${index}() { run(${index}); }`;
}

describe("EmbeddingIndexer", () => {
  let store: MemoryGraphStore;
  let embeddings: HashingEmbeddingService;
  let chunks: ChunkRecord[];

  beforeEach(async () => {
    store = new MemoryGraphStore(64);
    await store.initialize();
    embeddings = new HashingEmbeddingService(64);

    chunks = Array.from({ length: 20 }, (_, index) => chunkOf(FILE_PATH, index, stepText(index), index + 1));
    const content = chunks.map((chunk) => chunk.text).join("\n");
    await store.upsertFile(describeFile({ filePath: FILE_PATH, content }, chunks), chunks);
  });

  it("embeds every chunk but the one the service refuses", async () => {
    embeddings.failWhen((text) => text === stepText(7));
    const indexer = new EmbeddingIndexer(store, embeddings, { batchSize: 8, concurrency: 1 });

    const report = await indexer.index(chunks);

    expect(report.totalChunks).toBe(20);
    expect(report.embeddedChunks).toBe(19);
    expect(report.failedChunks).toBe(1);
    expect(report.coverage).toBe(0.95);
    expect(report.failures).toEqual([
      { chunk: { filePath: FILE_PATH, chunkId: 7 }, error: "[E6000] ServiceError: embedding refused" },
    ]);
    expect(embeddings.batchCalls).toBe(3);
    expect(embeddings.embedCalls).toBe(8);

    const stats = await store.getStats();
    expect(stats.embeddedChunks).toBe(19);
    const [unembedded] = await store.listChunks({ embedded: false });
    expect(unembedded?.chunkId).toBe(7);
  });

  it("leaves a batch unembedded when the store rejects its vectors and carries on", async () => {
    vi.spyOn(store, "writeEmbeddings").mockRejectedValueOnce(new StoreError("transient deadlock"));
    const indexer = new EmbeddingIndexer(store, embeddings, { batchSize: 8, concurrency: 1 });

    const report = await indexer.index(chunks);

    expect(report.embeddedChunks).toBe(12);
    expect(report.failedChunks).toBe(8);
    expect(report.coverage).toBe(0.6);
    expect(report.failures[0]).toEqual({
      chunk: { filePath: FILE_PATH, chunkId: 0 },
      error: "[E3001] StoreError: transient deadlock",
    });
    expect(report.failures.map((failure) => failure.chunk.chunkId)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect((await store.getStats()).embeddedChunks).toBe(12);
  });

  it("fails the run when the store becomes unreachable", async () => {
    vi.spyOn(store, "writeEmbeddings").mockRejectedValue(new StoreConnectivityError("connection refused"));

    await expect(new EmbeddingIndexer(store, embeddings).index(chunks)).rejects.toBeInstanceOf(StoreConnectivityError);
  });

  it("only embeds chunks still missing a vector on the next run", async () => {
    embeddings.failWhen((text) => text === stepText(7));
    const indexer = new EmbeddingIndexer(store, embeddings, { batchSize: 8, concurrency: 1 });
    await indexer.index(chunks);

    embeddings.failWhen(() => false);
    const report = await indexer.index(chunks);

    expect(report.embeddedChunks).toBe(1);
    expect(report.alreadyEmbedded).toBe(19);
    expect(report.coverage).toBe(1);
    expect(embeddings.batchCalls).toBe(4);
  });

  it("re-embeds everything when forced", async () => {
    const indexer = new EmbeddingIndexer(store, embeddings, { batchSize: 8 });
    await indexer.index(chunks);

    const report = await indexer.index(chunks, { force: true });

    expect(report.embeddedChunks).toBe(20);
    expect(report.alreadyEmbedded).toBe(0);
    expect(report.coverage).toBe(1);
  });

  it("stores the service's vector for each chunk", async () => {
    const indexer = new EmbeddingIndexer(store, embeddings);
    await indexer.index(chunks.slice(0, 2));

    const stored = await store.listChunks({ embedded: true });
    expect(stored.map((chunk) => chunk.embedding)).toEqual([
      embeddings.vectorFor(stepText(0)),
      embeddings.vectorFor(stepText(1)),
    ]);
  });

  it("reports an empty run", async () => {
    const report = await new EmbeddingIndexer(store, embeddings).index([]);

    expect(report.totalChunks).toBe(0);
    expect(report.coverage).toBe(0);
    expect(embeddings.batchCalls).toBe(0);
  });

  it("stops taking batches once cancelled", async () => {
    const source = new CancellationTokenSource();
    source.cancel();

    const report = await new EmbeddingIndexer(store, embeddings).index(chunks, { token: source.token });

    expect(report.cancelled).toBe(true);
    expect(report.embeddedChunks).toBe(0);
  });

  it("refuses an embedding service whose dimension differs from the index", () => {
    expect(() => new EmbeddingIndexer(store, new HashingEmbeddingService(32))).toThrow(DimensionMismatchError);
  });
});
