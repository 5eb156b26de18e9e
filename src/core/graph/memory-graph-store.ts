/**
 * In-process graph store
 *
 * Same semantics as the Neo4j store, kept in maps. Each public method
 * validates first and then mutates without awaiting, so every write is
 * atomic with respect to other callers.
 *
 * @module
 */

import {
  chunkKeyOf,
  emptyNodeCounts,
  emptyRelationshipCounts,
  nodeKeyOf,
  type BridgeTarget,
  type ChunkAnchor,
  type ChunkExtraction,
  type ChunkKey,
  type ChunkLinks,
  type ChunkRecord,
  type ClearSummary,
  type FileRecord,
  type GraphEdge,
  type GraphNode,
  type NodeRef,
  type ScoredChunk,
  type StoredChunk,
  type StoredEntity,
  type StoreStats,
  type StructuralRelationshipKind,
} from "../../types/index.js";
import { assertDimension, cosineSimilarity, topK } from "../embeddings/similarity.js";
import { ErrorCode, StoreError } from "../errors.js";
import type {
  ChunkFilter,
  EmbeddingWrite,
  ExtractionWriteSummary,
  IGraphStore,
} from "../interfaces/IGraphStore.js";
import { toChunkRecord } from "./schema.js";

interface StoredRelationship {
  source: NodeRef;
  type: StructuralRelationshipKind;
  target: NodeRef;
}

interface BridgeEdges {
  represents: NodeRef | null;
  partOf: NodeRef;
}

export class MemoryGraphStore implements IGraphStore {
  readonly dimension: number;

  private files = new Map<string, FileRecord>();
  private chunks = new Map<string, StoredChunk>();
  private entities = new Map<string, StoredEntity>();
  private relationships = new Map<string, StoredRelationship>();
  private bridges = new Map<string, BridgeEdges>();
  private ready = false;

  constructor(dimension: number) {
    this.dimension = dimension;
  }

  get isReady(): boolean {
    return this.ready;
  }

  async initialize(): Promise<void> {
    this.ready = true;
  }

  async close(): Promise<void> {
    this.ready = false;
  }

  async healthCheck(): Promise<boolean> {
    return this.ready;
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  async upsertFile(file: FileRecord, chunks: readonly ChunkRecord[], codebasePath?: string): Promise<void> {
    for (const chunk of chunks) {
      if (chunk.filePath !== file.path) {
        throw new StoreError(`Chunk ${chunkKeyOf(chunk)} does not belong to ${file.path}`);
      }
    }

    this.files.set(file.path, { ...file });

    for (const chunk of chunks) {
      const key = chunkKeyOf(chunk);
      const existing = this.chunks.get(key);
      const kept = existing !== undefined && existing.text === chunk.text ? existing.embedding : null;
      this.chunks.set(key, {
        ...toChunkRecord(chunk),
        embedding: kept,
        codebasePath: codebasePath ?? existing?.codebasePath ?? null,
      });
      if (existing !== undefined && existing.text !== chunk.text) {
        this.bridges.delete(key);
      }
    }

    for (const [key, stored] of this.chunks) {
      if (stored.filePath === file.path && stored.chunkId >= chunks.length) {
        this.chunks.delete(key);
        this.bridges.delete(key);
      }
    }
  }

  async writeEmbeddings(writes: readonly EmbeddingWrite[]): Promise<void> {
    const targets = writes.map((write) => {
      assertDimension(write.vector, this.dimension, { chunk: chunkKeyOf(write.chunk) });
      const stored = this.chunks.get(chunkKeyOf(write.chunk));
      if (!stored) {
        throw new StoreError(`Unknown chunk ${chunkKeyOf(write.chunk)}`, ErrorCode.STORE_UNKNOWN_NODE);
      }
      return { stored, vector: write.vector };
    });

    for (const { stored, vector } of targets) {
      stored.embedding = [...vector];
    }
  }

  async writeExtraction(extraction: ChunkExtraction): Promise<ExtractionWriteSummary> {
    const declared = new Set(extraction.entities.map((entity) => nodeKeyOf(entity)));
    for (const relationship of extraction.relationships) {
      for (const end of [relationship.source, relationship.target]) {
        if (!declared.has(nodeKeyOf(end)) && !this.hasNode(end)) {
          throw new StoreError(`Unknown relationship endpoint ${nodeKeyOf(end)}`, ErrorCode.STORE_UNKNOWN_NODE, {
            chunk: chunkKeyOf(extraction.chunk),
          });
        }
      }
    }

    for (const entity of extraction.entities) {
      const key = nodeKeyOf(entity);
      const existing = this.entities.get(key);
      if (!existing) {
        this.entities.set(key, {
          ...entity,
          startLine: entity.startLine,
          endLine: entity.endLine,
          filePaths: [entity.filePath],
        });
        continue;
      }
      if (!existing.filePaths.includes(entity.filePath)) {
        existing.filePaths.push(entity.filePath);
      }
      if (entity.startLine === undefined || entity.endLine === undefined) continue;
      if (existing.startLine === undefined || existing.endLine === undefined) {
        // The first declared span relocates the entity to its file
        existing.startLine = entity.startLine;
        existing.endLine = entity.endLine;
        existing.filePath = entity.filePath;
      } else if (existing.filePath === entity.filePath) {
        existing.startLine = Math.min(existing.startLine, entity.startLine);
        existing.endLine = Math.max(existing.endLine, entity.endLine);
      }
    }

    for (const relationship of extraction.relationships) {
      const key = `${nodeKeyOf(relationship.source)}|${relationship.type}|${nodeKeyOf(relationship.target)}`;
      this.relationships.set(key, {
        source: { kind: relationship.source.kind, id: relationship.source.id },
        type: relationship.type,
        target: { kind: relationship.target.kind, id: relationship.target.id },
      });
    }

    return {
      entitiesWritten: extraction.entities.length,
      relationshipsWritten: extraction.relationships.length,
    };
  }

  async replaceBridge(chunk: ChunkKey, target: BridgeTarget): Promise<void> {
    const key = chunkKeyOf(chunk);
    if (!this.chunks.has(key)) {
      throw new StoreError(`Unknown chunk ${key}`, ErrorCode.STORE_UNKNOWN_NODE);
    }

    if (target.kind === "entity") {
      if (!this.hasNode(target.entity)) {
        throw new StoreError(`Unknown entity ${nodeKeyOf(target.entity)}`, ErrorCode.STORE_UNKNOWN_NODE);
      }
      this.bridges.set(key, { represents: target.entity, partOf: target.entity });
      return;
    }

    if (!this.files.has(target.filePath)) {
      throw new StoreError(`Unknown file ${target.filePath}`, ErrorCode.STORE_UNKNOWN_NODE);
    }
    this.bridges.set(key, { represents: null, partOf: { kind: "File", id: target.filePath } });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  async listChunks(filter: ChunkFilter = {}): Promise<StoredChunk[]> {
    const paths = filter.filePaths ? new Set(filter.filePaths) : null;
    return [...this.chunks.values()]
      .filter((chunk) => !paths || paths.has(chunk.filePath))
      .filter((chunk) => filter.embedded === undefined || (chunk.embedding !== null) === filter.embedded)
      .sort((a, b) => (a.filePath === b.filePath ? a.chunkId - b.chunkId : a.filePath < b.filePath ? -1 : 1))
      .map((chunk) => ({ ...chunk, embedding: chunk.embedding ? [...chunk.embedding] : null }));
  }

  async listEntities(filePath: string): Promise<StoredEntity[]> {
    return [...this.entities.values()]
      .filter((entity) => entity.filePaths.includes(filePath))
      .map((entity) => ({ ...entity, filePaths: [...entity.filePaths] }));
  }

  async vectorSearch(vector: readonly number[], k: number): Promise<ScoredChunk[]> {
    assertDimension(vector, this.dimension, { operation: "vectorSearch" });
    const hits: ScoredChunk[] = [];
    for (const chunk of this.chunks.values()) {
      if (!chunk.embedding || chunk.embedding.length !== this.dimension) continue;
      hits.push({ chunk: toChunkRecord(chunk), score: cosineSimilarity(vector, chunk.embedding) });
    }
    return topK(hits, k);
  }

  async getAnchors(chunks: readonly ChunkKey[]): Promise<ChunkAnchor[]> {
    const anchors: ChunkAnchor[] = [];
    for (const chunk of chunks) {
      const edges = this.bridges.get(chunkKeyOf(chunk));
      if (!edges) continue;
      const key = { filePath: chunk.filePath, chunkId: chunk.chunkId };
      if (edges.represents) {
        const node = this.describeNode(edges.represents);
        if (node) anchors.push({ chunk: key, via: "REPRESENTS", node });
      }
      const partOf = this.describeNode(edges.partOf);
      if (partOf) anchors.push({ chunk: key, via: "PART_OF_FILE", node: partOf });
    }
    return anchors;
  }

  async getNeighbors(nodes: readonly NodeRef[]): Promise<GraphEdge[]> {
    const wanted = new Set(nodes.map((node) => nodeKeyOf(node)));
    const edges: GraphEdge[] = [];
    for (const relationship of this.relationships.values()) {
      if (!wanted.has(nodeKeyOf(relationship.source)) && !wanted.has(nodeKeyOf(relationship.target))) {
        continue;
      }
      const source = this.describeNode(relationship.source);
      const target = this.describeNode(relationship.target);
      if (source && target) {
        edges.push({ source, type: relationship.type, target });
      }
    }
    return edges;
  }

  async getChunkLinks(chunk: ChunkKey): Promise<ChunkLinks> {
    const key = chunkKeyOf(chunk);
    const stored = this.chunks.get(key);
    const edges = this.bridges.get(key);
    return {
      containedBy: stored && this.files.has(stored.filePath) ? [stored.filePath] : [],
      represents: edges?.represents ?? null,
      partOf: edges ? [edges.partOf] : [],
    };
  }

  // ===========================================================================
  // Administration
  // ===========================================================================

  async getStats(): Promise<StoreStats> {
    const nodeCounts = emptyNodeCounts();
    nodeCounts.File = this.files.size;
    nodeCounts.CodeChunk = this.chunks.size;
    for (const entity of this.entities.values()) {
      nodeCounts[entity.kind]++;
    }

    const relationshipCounts = emptyRelationshipCounts();
    for (const relationship of this.relationships.values()) {
      relationshipCounts[relationship.type]++;
    }
    relationshipCounts.CONTAINS_CHUNK = [...this.chunks.values()].filter((chunk) => this.files.has(chunk.filePath)).length;
    for (const edges of this.bridges.values()) {
      if (edges.represents) relationshipCounts.REPRESENTS++;
      relationshipCounts.PART_OF_FILE++;
    }

    const embeddedChunks = [...this.chunks.values()].filter((chunk) => chunk.embedding !== null).length;
    return {
      nodeCounts,
      relationshipCounts,
      totalChunks: this.chunks.size,
      embeddedChunks,
      coverage: this.chunks.size === 0 ? 0 : embeddedChunks / this.chunks.size,
      vectorIndexPresent: this.ready,
    };
  }

  async clear(): Promise<ClearSummary> {
    const stats = await this.getStats();
    const nodesDeleted = Object.values(stats.nodeCounts).reduce((sum, count) => sum + count, 0);
    const relationshipsDeleted = Object.values(stats.relationshipCounts).reduce((sum, count) => sum + count, 0);

    this.files.clear();
    this.chunks.clear();
    this.entities.clear();
    this.relationships.clear();
    this.bridges.clear();

    return { nodesDeleted, relationshipsDeleted };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private hasNode(ref: NodeRef): boolean {
    return ref.kind === "File" ? this.files.has(ref.id) : this.entities.has(nodeKeyOf(ref));
  }

  private describeNode(ref: NodeRef): GraphNode | null {
    if (ref.kind === "File") {
      const file = this.files.get(ref.id);
      return file ? { kind: "File", id: file.path, name: file.name, filePath: file.path } : null;
    }
    const entity = this.entities.get(nodeKeyOf(ref));
    return entity ? { kind: entity.kind, id: entity.id, name: entity.name, filePath: entity.filePath } : null;
  }
}
