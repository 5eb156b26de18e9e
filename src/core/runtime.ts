/**
 * Runtime
 *
 * Opens the store and service clients named by the configuration once,
 * wires the components over them, and closes everything again in reverse
 * order.
 *
 * @module
 */

import { createLogger } from "../utils/logger.js";
import type { EngineConfig } from "../utils/validation.js";
import { BridgeLinker } from "./bridge/bridge-linker.js";
import { Chunker } from "./chunking/chunker.js";
import { createEmbeddingService, EmbeddingIndexer, type IEmbeddingService } from "./embeddings/index.js";
import { StructuralExtractor } from "./extraction/structural-extractor.js";
import { createGraphStore, type DriverFactory } from "./graph/index.js";
import type { IGraphStore } from "./interfaces/IGraphStore.js";
import { createLLMService, type ILLMService } from "./llm/index.js";
import { IngestionPipeline, type IngestionProgressEvent } from "./pipeline/ingestion-pipeline.js";
import { HybridQueryEngine } from "./query/hybrid-query-engine.js";

const logger = createLogger("runtime");

// =============================================================================
// Types
// =============================================================================

/**
 * Pre-built collaborators; anything left out is created from the config
 */
export interface RuntimeDependencies {
  store?: IGraphStore;
  llm?: ILLMService;
  embeddings?: IEmbeddingService;
  driverFactory?: DriverFactory;
  onProgress?: (event: IngestionProgressEvent) => void;
}

export interface Runtime {
  readonly config: EngineConfig;
  readonly store: IGraphStore;
  readonly llm: ILLMService;
  readonly embeddings: IEmbeddingService;
  readonly chunker: Chunker;
  readonly extractor: StructuralExtractor;
  readonly indexer: EmbeddingIndexer;
  readonly linker: BridgeLinker;
  readonly pipeline: IngestionPipeline;
  readonly engine: HybridQueryEngine;
  close(): Promise<void>;
}

// =============================================================================
// Opening
// =============================================================================

/**
 * Connect to the configured store only, for administration
 */
export async function openStore(config: EngineConfig, driverFactory?: DriverFactory): Promise<IGraphStore> {
  const store = createGraphStore(config.store, config.embeddings.dimension, driverFactory);
  await store.initialize();
  return store;
}

export async function openRuntime(config: EngineConfig, deps: RuntimeDependencies = {}): Promise<Runtime> {
  const store = deps.store ?? createGraphStore(config.store, config.embeddings.dimension, deps.driverFactory);
  const llm = deps.llm ?? createLLMService(config.llm, config.retry);
  const embeddings = deps.embeddings ?? createEmbeddingService(config.embeddings, config.retry);

  try {
    await store.initialize();
    await llm.initialize();
    await embeddings.initialize();
  } catch (error) {
    await shutdown(store, llm, embeddings);
    throw error;
  }

  const chunker = new Chunker(config.chunking);
  const extractor = new StructuralExtractor(store, llm, {
    ...config.extraction,
    retry: config.retry,
  });
  const indexer = new EmbeddingIndexer(store, embeddings, config.indexing);
  const linker = new BridgeLinker(store, config.bridge);
  const pipeline = new IngestionPipeline({
    store,
    chunker,
    extractor,
    indexer,
    linker,
    onProgress: deps.onProgress,
  });
  const engine = new HybridQueryEngine(store, embeddings, llm, config.query);

  logger.debug(
    { store: config.store.engine, llm: llm.modelId, embeddings: embeddings.getModelId() },
    "Runtime opened"
  );

  return {
    config,
    store,
    llm,
    embeddings,
    chunker,
    extractor,
    indexer,
    linker,
    pipeline,
    engine,
    close: () => shutdown(store, llm, embeddings),
  };
}

/**
 * Release services, then the store. Every close is attempted; the first
 * failure is rethrown afterwards.
 */
async function shutdown(store: IGraphStore, llm: ILLMService, embeddings: IEmbeddingService): Promise<void> {
  const results = await Promise.allSettled([llm.shutdown(), embeddings.shutdown()]);
  results.push(...(await Promise.allSettled([store.close()])));

  const failure = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
  if (failure) {
    logger.warn({ err: failure.reason }, "Runtime did not close cleanly");
    throw failure.reason;
  }
}
