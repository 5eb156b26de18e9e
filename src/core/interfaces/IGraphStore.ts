/**
 * IGraphStore - graph store interface
 *
 * One store holds both layers: File and CodeChunk nodes with their vectors,
 * the structural entities extracted from them, and the bridge edges between
 * the two. Every write is an upsert by natural key, so repeating a write
 * leaves the graph unchanged.
 *
 * @module
 */

import type {
  BridgeTarget,
  ChunkAnchor,
  ChunkExtraction,
  ChunkKey,
  ChunkLinks,
  ChunkRecord,
  ClearSummary,
  FileRecord,
  GraphEdge,
  NodeRef,
  ScoredChunk,
  StoredChunk,
  StoredEntity,
  StoreStats,
} from "../../types/index.js";

export interface ChunkFilter {
  filePaths?: string[];
  /** true: only chunks with a vector; false: only chunks without */
  embedded?: boolean;
}

export interface EmbeddingWrite {
  chunk: ChunkKey;
  vector: number[];
}

export interface ExtractionWriteSummary {
  entitiesWritten: number;
  relationshipsWritten: number;
}

/**
 * Graph store interface.
 *
 * @example
 * ```typescript
 * const store = createGraphStore(config.store, config.embeddings.dimension);
 * await store.initialize();
 *
 * await store.upsertFile(file, chunks);
 * await store.writeEmbeddings([{ chunk: { filePath, chunkId: 0 }, vector }]);
 * const hits = await store.vectorSearch(queryVector, 5);
 *
 * await store.close();
 * ```
 */
export interface IGraphStore {
  /** Dimension of the vector index */
  readonly dimension: number;

  readonly isReady: boolean;

  /**
   * Connect and apply constraints and the vector index. Fails with
   * StoreConnectivityError when the store cannot be reached.
   */
  initialize(): Promise<void>;

  close(): Promise<void>;

  healthCheck(): Promise<boolean>;

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  /**
   * Upsert a File with its chunks and CONTAINS_CHUNK edges in one
   * transaction. Chunks whose text changed lose their vector and bridge
   * edges; chunks beyond the new chunk count are removed.
   */
  upsertFile(file: FileRecord, chunks: readonly ChunkRecord[], codebasePath?: string): Promise<void>;

  /**
   * Attach vectors to existing chunks. Vectors must match `dimension`.
   */
  writeEmbeddings(writes: readonly EmbeddingWrite[]): Promise<void>;

  /**
   * Commit one chunk's entities and relationships atomically
   */
  writeExtraction(extraction: ChunkExtraction): Promise<ExtractionWriteSummary>;

  /**
   * Replace a chunk's REPRESENTS and PART_OF_FILE edges atomically
   */
  replaceBridge(chunk: ChunkKey, target: BridgeTarget): Promise<void>;

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /** Chunks ordered by file path, then chunk id */
  listChunks(filter?: ChunkFilter): Promise<StoredChunk[]>;

  /** Structural entities sighted in a file */
  listEntities(filePath: string): Promise<StoredEntity[]>;

  /**
   * Top-k chunks by cosine similarity, score descending, ties by chunk id
   * then file path. Rejects vectors of the wrong dimension.
   */
  vectorSearch(vector: readonly number[], k: number): Promise<ScoredChunk[]>;

  /** Bridge targets of the given chunks */
  getAnchors(chunks: readonly ChunkKey[]): Promise<ChunkAnchor[]>;

  /** Structural edges touching any of the given nodes, either direction */
  getNeighbors(nodes: readonly NodeRef[]): Promise<GraphEdge[]>;

  getChunkLinks(chunk: ChunkKey): Promise<ChunkLinks>;

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  getStats(): Promise<StoreStats>;

  /** Delete every node and relationship */
  clear(): Promise<ClearSummary>;
}
