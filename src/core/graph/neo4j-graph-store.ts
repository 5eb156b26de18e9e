/**
 * Neo4j Graph Store Adapter
 *
 * Implements IGraphStore over Neo4j 5.x with the official driver. Writes go
 * through managed write transactions, so a failed statement rolls back the
 * whole unit (one file, one chunk extraction, one bridge replacement).
 *
 * @module
 */

import neo4j, {
  Neo4jError,
  type Driver,
  type ManagedTransaction,
  type QueryResult,
  type Session,
} from "neo4j-driver";
import { z } from "zod";
import {
  ENTITY_KINDS,
  NODE_LABELS,
  RELATIONSHIP_TYPES,
  STRUCTURAL_NODE_KINDS,
  STRUCTURAL_RELATIONSHIP_KINDS,
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
  type EntityKind,
  type EntityRecord,
  type FileRecord,
  type GraphEdge,
  type GraphNode,
  type NodeRef,
  type RelationshipRecord,
  type ScoredChunk,
  type StoredChunk,
  type StoredEntity,
  type StoreStats,
} from "../../types/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { StoreConfig } from "../../utils/validation.js";
import { assertDimension, topK } from "../embeddings/similarity.js";
import {
  CodeGraphError,
  ErrorCode,
  StoreConnectivityError,
  StoreError,
} from "../errors.js";
import type {
  ChunkFilter,
  EmbeddingWrite,
  ExtractionWriteSummary,
  IGraphStore,
} from "../interfaces/IGraphStore.js";
import { fromIndexScore, keyProperty, schemaElements } from "./schema.js";

// =============================================================================
// Types
// =============================================================================

export type DriverFactory = (config: StoreConfig) => Driver;

export const defaultDriverFactory: DriverFactory = (config) =>
  neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
    disableLosslessIntegers: true,
    connectionTimeout: config.connectionTimeoutMs,
  });

const CONNECTIVITY_CODES = new Set([
  "ServiceUnavailable",
  "SessionExpired",
  "Neo.ClientError.Security.Unauthorized",
]);

const STRUCTURAL_TYPES = STRUCTURAL_RELATIONSHIP_KINDS.join("|");

// =============================================================================
// Row Schemas
// =============================================================================

const CountRow = z.object({ count: z.number() });

const ChunkRow = z.object({
  file_path: z.string(),
  chunk_id: z.number().int(),
  text: z.string(),
  language: z.string().nullable(),
  start_line: z.number().int(),
  end_line: z.number().int(),
  chunk_size: z.number().int().nullable(),
  embedding: z.array(z.number()).nullable(),
  codebase_path: z.string().nullable(),
});

const ExistingChunkRow = z.object({ chunk_id: z.number().int(), text: z.string().nullable() });

const ScoredChunkRow = ChunkRow.omit({ embedding: true, codebase_path: true }).extend({ score: z.number() });

const EntityKindSchema = z.enum(["Class", "Function", "Interface", "Package"]);
const NodeKindSchema = z.enum(STRUCTURAL_NODE_KINDS);
const StructuralTypeSchema = z.enum(STRUCTURAL_RELATIONSHIP_KINDS);

const EntityRow = z.object({
  kind: EntityKindSchema,
  id: z.string(),
  name: z.string(),
  file_path: z.string(),
  file_paths: z.array(z.string()).nullable(),
  start_line: z.number().int().nullable(),
  end_line: z.number().int().nullable(),
});

const AnchorRow = z.object({
  chunk_file_path: z.string(),
  chunk_id: z.number().int(),
  via: z.enum(["REPRESENTS", "PART_OF_FILE"]),
  kind: NodeKindSchema,
  id: z.string(),
  name: z.string(),
  file_path: z.string().nullable(),
});

const EdgeRow = z.object({
  source_kind: NodeKindSchema,
  source_id: z.string(),
  source_name: z.string(),
  source_file: z.string().nullable(),
  type: StructuralTypeSchema,
  target_kind: NodeKindSchema,
  target_id: z.string(),
  target_name: z.string(),
  target_file: z.string().nullable(),
});

const LinksRow = z.object({
  containers: z.array(z.string()),
  links: z.array(
    z.object({
      via: z.enum(["REPRESENTS", "PART_OF_FILE"]).nullable(),
      kind: NodeKindSchema.nullable(),
      id: z.string().nullable(),
    })
  ),
});

function parseRows<T>(result: QueryResult, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return result.records.map((record) => schema.parse(record.toObject()));
}

function firstCount(result: QueryResult): number {
  return parseRows(result, CountRow)[0]?.count ?? 0;
}

function int(value: number): ReturnType<typeof neo4j.int> {
  return neo4j.int(value);
}

// =============================================================================
// Neo4jGraphStore
// =============================================================================

export class Neo4jGraphStore implements IGraphStore {
  readonly dimension: number;

  private readonly config: StoreConfig;
  private readonly driverFactory: DriverFactory;
  private readonly logger: Logger;
  private driver: Driver | null = null;

  constructor(config: StoreConfig, dimension: number, driverFactory: DriverFactory = defaultDriverFactory) {
    this.config = config;
    this.dimension = dimension;
    this.driverFactory = driverFactory;
    this.logger = createLogger("neo4j-store");
  }

  get isReady(): boolean {
    return this.driver !== null;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async initialize(): Promise<void> {
    if (this.driver) return;

    const driver = this.driverFactory(this.config);
    try {
      await driver.verifyConnectivity({ database: this.config.database });
    } catch (error) {
      await driver.close();
      throw new StoreConnectivityError(
        `Cannot reach Neo4j at ${this.config.uri}`,
        { uri: this.config.uri, database: this.config.database },
        { cause: error }
      );
    }
    this.driver = driver;

    const session = driver.session({ database: this.config.database });
    try {
      for (const element of schemaElements(this.config.vectorIndexName, this.dimension)) {
        await session.run(element.cypher);
      }
    } catch (error) {
      await session.close();
      this.driver = null;
      await driver.close();
      throw new StoreError("Failed to apply graph schema", ErrorCode.STORE_SCHEMA_FAILED, {}, { cause: error });
    }
    await session.close();

    this.logger.debug(
      { uri: this.config.uri, database: this.config.database, dimension: this.dimension },
      "Neo4j store initialized"
    );
  }

  async close(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    if (driver) {
      await driver.close();
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) return false;
    try {
      await this.read("healthCheck", (tx) => tx.run("RETURN 1 AS count"));
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "Health check failed");
      return false;
    }
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

    await this.write("upsertFile", async (tx) => {
      const existing = parseRows(
        await tx.run(
          "MATCH (c:CodeChunk {file_path: $path}) RETURN c.chunk_id AS chunk_id, c.text AS text",
          { path: file.path }
        ),
        ExistingChunkRow
      );
      const previousText = new Map(existing.map((row) => [row.chunk_id, row.text]));
      const changed = chunks
        .filter((chunk) => previousText.has(chunk.chunkId) && previousText.get(chunk.chunkId) !== chunk.text)
        .map((chunk) => int(chunk.chunkId));

      await tx.run(
        `MERGE (f:File {path: $path})
         SET f.name = $name, f.extension = $extension, f.language = $language,
             f.total_chunks = $total_chunks, f.total_lines = $total_lines`,
        {
          path: file.path,
          name: file.name,
          extension: file.extension,
          language: file.language,
          total_chunks: int(file.totalChunks),
          total_lines: int(file.totalLines),
        }
      );

      if (chunks.length > 0) {
        await tx.run(
          `MATCH (f:File {path: $path})
           UNWIND $chunks AS c
           MERGE (ch:CodeChunk {file_path: c.file_path, chunk_id: c.chunk_id})
           SET ch.text = c.text, ch.language = c.language, ch.start_line = c.start_line,
               ch.end_line = c.end_line, ch.chunk_size = c.chunk_size,
               ch.codebase_path = coalesce(c.codebase_path, ch.codebase_path)
           MERGE (f)-[:CONTAINS_CHUNK]->(ch)`,
          {
            path: file.path,
            chunks: chunks.map((chunk) => ({
              file_path: chunk.filePath,
              chunk_id: int(chunk.chunkId),
              text: chunk.text,
              language: chunk.language,
              start_line: int(chunk.startLine),
              end_line: int(chunk.endLine),
              chunk_size: int(chunk.chunkSize),
              codebase_path: codebasePath ?? null,
            })),
          }
        );
      }

      if (changed.length > 0) {
        await tx.run(
          `MATCH (c:CodeChunk {file_path: $path}) WHERE c.chunk_id IN $changed
           REMOVE c.embedding
           WITH c
           OPTIONAL MATCH (c)-[r:REPRESENTS|PART_OF_FILE]->()
           DELETE r`,
          { path: file.path, changed }
        );
      }

      await tx.run("MATCH (c:CodeChunk {file_path: $path}) WHERE c.chunk_id >= $count DETACH DELETE c", {
        path: file.path,
        count: int(chunks.length),
      });
    });
  }

  async writeEmbeddings(writes: readonly EmbeddingWrite[]): Promise<void> {
    if (writes.length === 0) return;
    for (const write of writes) {
      assertDimension(write.vector, this.dimension, { chunk: chunkKeyOf(write.chunk) });
    }

    await this.write("writeEmbeddings", async (tx) => {
      const updated = firstCount(
        await tx.run(
          `UNWIND $rows AS row
           MATCH (c:CodeChunk {file_path: row.file_path, chunk_id: row.chunk_id})
           SET c.embedding = row.vector
           RETURN count(c) AS count`,
          {
            rows: writes.map((write) => ({
              file_path: write.chunk.filePath,
              chunk_id: int(write.chunk.chunkId),
              vector: write.vector,
            })),
          }
        )
      );
      if (updated !== writes.length) {
        throw new StoreError(
          `Embedding write matched ${updated} of ${writes.length} chunks`,
          ErrorCode.STORE_UNKNOWN_NODE
        );
      }
    });
  }

  async writeExtraction(extraction: ChunkExtraction): Promise<ExtractionWriteSummary> {
    return this.write("writeExtraction", async (tx) => {
      for (const kind of ENTITY_KINDS) {
        const entities = extraction.entities.filter((entity) => entity.kind === kind);
        if (entities.length > 0) {
          await this.mergeEntities(tx, kind, entities);
        }
      }

      const groups = new Map<string, RelationshipRecord[]>();
      for (const relationship of extraction.relationships) {
        const key = `${relationship.source.kind}|${relationship.type}|${relationship.target.kind}`;
        const group = groups.get(key) ?? [];
        group.push(relationship);
        groups.set(key, group);
      }

      for (const group of groups.values()) {
        const [first] = group;
        if (!first) continue;
        const { source, type, target } = first;
        const merged = firstCount(
          await tx.run(
            `UNWIND $rels AS rel
             MATCH (s:${source.kind} {${keyProperty(source.kind)}: rel.source})
             MATCH (t:${target.kind} {${keyProperty(target.kind)}: rel.target})
             MERGE (s)-[:${type}]->(t)
             RETURN count(*) AS count`,
            { rels: group.map((rel) => ({ source: rel.source.id, target: rel.target.id })) }
          )
        );
        if (merged !== group.length) {
          throw new StoreError(
            `Relationship endpoints missing for ${group.length - merged} ${type} edge(s)`,
            ErrorCode.STORE_UNKNOWN_NODE,
            { chunk: chunkKeyOf(extraction.chunk) }
          );
        }
      }

      return {
        entitiesWritten: extraction.entities.length,
        relationshipsWritten: extraction.relationships.length,
      };
    });
  }

  private async mergeEntities(tx: ManagedTransaction, kind: EntityKind, entities: EntityRecord[]): Promise<void> {
    await tx.run(
      `UNWIND $entities AS e
       MERGE (n:${kind} {id: e.id})
       ON CREATE SET n.name = e.name, n.file_path = e.file_path, n.file_paths = [e.file_path]
       SET n.file_paths = CASE WHEN e.file_path IN coalesce(n.file_paths, [])
                               THEN n.file_paths ELSE coalesce(n.file_paths, []) + e.file_path END
       WITH n, e
       WHERE e.start_line IS NOT NULL AND e.end_line IS NOT NULL
         AND (n.start_line IS NULL OR n.end_line IS NULL OR n.file_path = e.file_path)
       SET n.start_line = CASE WHEN n.start_line IS NULL OR e.start_line < n.start_line
                               THEN e.start_line ELSE n.start_line END,
           n.end_line = CASE WHEN n.end_line IS NULL OR e.end_line > n.end_line
                             THEN e.end_line ELSE n.end_line END,
           n.file_path = e.file_path`,
      {
        entities: entities.map((entity) => ({
          id: entity.id,
          name: entity.name,
          file_path: entity.filePath,
          start_line: entity.startLine === undefined ? null : int(entity.startLine),
          end_line: entity.endLine === undefined ? null : int(entity.endLine),
        })),
      }
    );
  }

  async replaceBridge(chunk: ChunkKey, target: BridgeTarget): Promise<void> {
    const params = { file_path: chunk.filePath, chunk_id: int(chunk.chunkId) };

    await this.write("replaceBridge", async (tx) => {
      const found = firstCount(
        await tx.run(
          `MATCH (c:CodeChunk {file_path: $file_path, chunk_id: $chunk_id})
           OPTIONAL MATCH (c)-[r:REPRESENTS|PART_OF_FILE]->()
           DELETE r
           RETURN count(DISTINCT c) AS count`,
          params
        )
      );
      if (found === 0) {
        throw new StoreError(`Unknown chunk ${chunkKeyOf(chunk)}`, ErrorCode.STORE_UNKNOWN_NODE);
      }

      const linked =
        target.kind === "entity"
          ? await tx.run(
              `MATCH (c:CodeChunk {file_path: $file_path, chunk_id: $chunk_id})
               MATCH (n:${target.entity.kind} {${keyProperty(target.entity.kind)}: $id})
               MERGE (c)-[rep:REPRESENTS]->(n)
               SET rep.score = $score
               MERGE (c)-[:PART_OF_FILE]->(n)
               RETURN count(n) AS count`,
              { ...params, id: target.entity.id, score: target.score }
            )
          : await tx.run(
              `MATCH (c:CodeChunk {file_path: $file_path, chunk_id: $chunk_id})
               MATCH (f:File {path: $path})
               MERGE (c)-[:PART_OF_FILE]->(f)
               RETURN count(f) AS count`,
              { ...params, path: target.filePath }
            );

      if (firstCount(linked) === 0) {
        const missing = target.kind === "entity" ? nodeKeyOf(target.entity) : `File:${target.filePath}`;
        throw new StoreError(`Unknown bridge target ${missing}`, ErrorCode.STORE_UNKNOWN_NODE);
      }
    });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  async listChunks(filter: ChunkFilter = {}): Promise<StoredChunk[]> {
    const rows = await this.read("listChunks", async (tx) =>
      parseRows(
        await tx.run(
          `MATCH (c:CodeChunk)
           WHERE ($file_paths IS NULL OR c.file_path IN $file_paths)
             AND ($embedded IS NULL OR (c.embedding IS NOT NULL) = $embedded)
           RETURN c.file_path AS file_path, c.chunk_id AS chunk_id, c.text AS text, c.language AS language,
                  c.start_line AS start_line, c.end_line AS end_line, c.chunk_size AS chunk_size,
                  c.embedding AS embedding, c.codebase_path AS codebase_path
           ORDER BY file_path, chunk_id`,
          { file_paths: filter.filePaths ?? null, embedded: filter.embedded ?? null }
        ),
        ChunkRow
      )
    );

    return rows.map((row) => ({
      chunkId: row.chunk_id,
      filePath: row.file_path,
      language: row.language ?? "unknown",
      text: row.text,
      startLine: row.start_line,
      endLine: row.end_line,
      chunkSize: row.chunk_size ?? row.text.length,
      embedding: row.embedding,
      codebasePath: row.codebase_path,
    }));
  }

  async listEntities(filePath: string): Promise<StoredEntity[]> {
    const rows = await this.read("listEntities", async (tx) =>
      parseRows(
        await tx.run(
          `MATCH (n)
           WHERE (n:Class OR n:Function OR n:Interface OR n:Package) AND $file_path IN n.file_paths
           RETURN labels(n)[0] AS kind, n.id AS id, n.name AS name, n.file_path AS file_path,
                  n.file_paths AS file_paths, n.start_line AS start_line, n.end_line AS end_line
           ORDER BY kind, id`,
          { file_path: filePath }
        ),
        EntityRow
      )
    );

    return rows.map((row) => ({
      kind: row.kind,
      id: row.id,
      name: row.name,
      filePath: row.file_path,
      filePaths: row.file_paths ?? [row.file_path],
      startLine: row.start_line ?? undefined,
      endLine: row.end_line ?? undefined,
    }));
  }

  async vectorSearch(vector: readonly number[], k: number): Promise<ScoredChunk[]> {
    assertDimension(vector, this.dimension, { operation: "vectorSearch" });
    if (!Number.isInteger(k) || k < 1) {
      throw new StoreError(`k must be a positive integer (got ${k})`, ErrorCode.STORE_QUERY_FAILED);
    }

    // Extra candidates so ties at the cut-off are resolved by our ordering
    const candidates = k * 2;
    const rows = await this.read("vectorSearch", async (tx) =>
      parseRows(
        await tx.run(
          `CALL db.index.vector.queryNodes($index, $candidates, $vector) YIELD node, score
           RETURN node.file_path AS file_path, node.chunk_id AS chunk_id, node.text AS text,
                  node.language AS language, node.start_line AS start_line, node.end_line AS end_line,
                  node.chunk_size AS chunk_size, score`,
          { index: this.config.vectorIndexName, candidates: int(candidates), vector: [...vector] }
        ),
        ScoredChunkRow
      )
    );

    const hits = rows.map((row) => ({
      chunk: {
        chunkId: row.chunk_id,
        filePath: row.file_path,
        language: row.language ?? "unknown",
        text: row.text,
        startLine: row.start_line,
        endLine: row.end_line,
        chunkSize: row.chunk_size ?? row.text.length,
      },
      score: fromIndexScore(row.score),
    }));
    return topK(hits, k);
  }

  async getAnchors(chunks: readonly ChunkKey[]): Promise<ChunkAnchor[]> {
    if (chunks.length === 0) return [];
    const rows = await this.read("getAnchors", async (tx) =>
      parseRows(
        await tx.run(
          `UNWIND $keys AS key
           MATCH (c:CodeChunk {file_path: key.file_path, chunk_id: key.chunk_id})-[r:REPRESENTS|PART_OF_FILE]->(n)
           RETURN key.file_path AS chunk_file_path, key.chunk_id AS chunk_id, type(r) AS via,
                  labels(n)[0] AS kind, coalesce(n.id, n.path) AS id, n.name AS name,
                  coalesce(n.file_path, n.path) AS file_path`,
          { keys: chunks.map((chunk) => ({ file_path: chunk.filePath, chunk_id: int(chunk.chunkId) })) }
        ),
        AnchorRow
      )
    );

    const viaOrder = { REPRESENTS: 0, PART_OF_FILE: 1 };
    const position = new Map(chunks.map((chunk, index) => [chunkKeyOf(chunk), index]));
    return rows
      .map((row): ChunkAnchor => ({
        chunk: { filePath: row.chunk_file_path, chunkId: row.chunk_id },
        via: row.via,
        node: { kind: row.kind, id: row.id, name: row.name, filePath: row.file_path },
      }))
      .sort(
        (a, b) =>
          (position.get(chunkKeyOf(a.chunk)) ?? 0) - (position.get(chunkKeyOf(b.chunk)) ?? 0) ||
          viaOrder[a.via] - viaOrder[b.via]
      );
  }

  async getNeighbors(nodes: readonly NodeRef[]): Promise<GraphEdge[]> {
    if (nodes.length === 0) return [];

    const edges = new Map<string, GraphEdge>();
    await this.read("getNeighbors", async (tx) => {
      for (const kind of STRUCTURAL_NODE_KINDS) {
        const ids = nodes.filter((node) => node.kind === kind).map((node) => node.id);
        if (ids.length === 0) continue;

        const result = await tx.run(
          `UNWIND $ids AS nid
           MATCH (n:${kind} {${keyProperty(kind)}: nid})-[r:${STRUCTURAL_TYPES}]-()
           WITH DISTINCT r
           WITH r, startNode(r) AS s, endNode(r) AS t
           RETURN labels(s)[0] AS source_kind, coalesce(s.id, s.path) AS source_id, s.name AS source_name,
                  coalesce(s.file_path, s.path) AS source_file, type(r) AS type,
                  labels(t)[0] AS target_kind, coalesce(t.id, t.path) AS target_id, t.name AS target_name,
                  coalesce(t.file_path, t.path) AS target_file`,
          { ids }
        );

        for (const row of parseRows(result, EdgeRow)) {
          const source: GraphNode = {
            kind: row.source_kind,
            id: row.source_id,
            name: row.source_name,
            filePath: row.source_file,
          };
          const target: GraphNode = {
            kind: row.target_kind,
            id: row.target_id,
            name: row.target_name,
            filePath: row.target_file,
          };
          edges.set(`${nodeKeyOf(source)}|${row.type}|${nodeKeyOf(target)}`, { source, type: row.type, target });
        }
      }
    });
    return [...edges.values()];
  }

  async getChunkLinks(chunk: ChunkKey): Promise<ChunkLinks> {
    const [row] = await this.read("getChunkLinks", async (tx) =>
      parseRows(
        await tx.run(
          `MATCH (c:CodeChunk {file_path: $file_path, chunk_id: $chunk_id})
           OPTIONAL MATCH (f:File)-[:CONTAINS_CHUNK]->(c)
           WITH c, collect(f.path) AS containers
           OPTIONAL MATCH (c)-[r:REPRESENTS|PART_OF_FILE]->(n)
           RETURN containers,
                  collect({via: type(r), kind: labels(n)[0], id: coalesce(n.id, n.path)}) AS links`,
          { file_path: chunk.filePath, chunk_id: int(chunk.chunkId) }
        ),
        LinksRow
      )
    );

    const links: ChunkLinks = { containedBy: row?.containers ?? [], represents: null, partOf: [] };
    for (const link of row?.links ?? []) {
      if (!link.via || !link.kind || !link.id) continue;
      const ref: NodeRef = { kind: link.kind, id: link.id };
      if (link.via === "REPRESENTS") links.represents = ref;
      else links.partOf.push(ref);
    }
    return links;
  }

  // ===========================================================================
  // Administration
  // ===========================================================================

  async getStats(): Promise<StoreStats> {
    const stats = await this.read("getStats", async (tx) => {
      const nodeCounts = emptyNodeCounts();
      for (const label of NODE_LABELS) {
        nodeCounts[label] = firstCount(await tx.run(`MATCH (n:${label}) RETURN count(n) AS count`));
      }
      const relationshipCounts = emptyRelationshipCounts();
      for (const type of RELATIONSHIP_TYPES) {
        relationshipCounts[type] = firstCount(await tx.run(`MATCH ()-[r:${type}]->() RETURN count(r) AS count`));
      }
      const embeddedChunks = firstCount(
        await tx.run("MATCH (c:CodeChunk) WHERE c.embedding IS NOT NULL RETURN count(c) AS count")
      );
      return { nodeCounts, relationshipCounts, embeddedChunks };
    });

    const indexes = await this.withSession("getStats", "READ", async (session) =>
      firstCount(
        await session.run("SHOW INDEXES YIELD name WHERE name = $name RETURN count(*) AS count", {
          name: this.config.vectorIndexName,
        })
      )
    );

    const totalChunks = stats.nodeCounts.CodeChunk;
    return {
      ...stats,
      totalChunks,
      coverage: totalChunks === 0 ? 0 : stats.embeddedChunks / totalChunks,
      vectorIndexPresent: indexes > 0,
    };
  }

  async clear(): Promise<ClearSummary> {
    const stats = await this.getStats();
    await this.write("clear", (tx) => tx.run("MATCH (n) DETACH DELETE n"));
    this.logger.info({ uri: this.config.uri }, "Graph store cleared");
    return {
      nodesDeleted: Object.values(stats.nodeCounts).reduce((sum, count) => sum + count, 0),
      relationshipsDeleted: Object.values(stats.relationshipCounts).reduce((sum, count) => sum + count, 0),
    };
  }

  // ===========================================================================
  // Sessions
  // ===========================================================================

  private read<T>(operation: string, work: (tx: ManagedTransaction) => Promise<T>): Promise<T> {
    return this.withSession(operation, "READ", (session) => session.executeRead(work));
  }

  private write<T>(operation: string, work: (tx: ManagedTransaction) => Promise<T>): Promise<T> {
    return this.withSession(operation, "WRITE", (session) => session.executeWrite(work));
  }

  private async withSession<T>(
    operation: string,
    mode: "READ" | "WRITE",
    work: (session: Session) => Promise<T>
  ): Promise<T> {
    const driver = this.driver;
    if (!driver) {
      throw new StoreConnectivityError("Graph store is not initialized", { operation });
    }

    const session = driver.session({
      database: this.config.database,
      defaultAccessMode: mode === "READ" ? neo4j.session.READ : neo4j.session.WRITE,
    });
    try {
      return await work(session);
    } catch (error) {
      throw this.mapError(error, operation);
    } finally {
      await session.close();
    }
  }

  private mapError(error: unknown, operation: string): CodeGraphError {
    if (error instanceof CodeGraphError) {
      return error;
    }
    if (error instanceof Neo4jError && CONNECTIVITY_CODES.has(error.code)) {
      return new StoreConnectivityError(`Lost connection to Neo4j during ${operation}`, { operation }, { cause: error });
    }
    if (error instanceof z.ZodError) {
      return new StoreError(`Unexpected row shape from ${operation}`, ErrorCode.STORE_QUERY_FAILED, { operation }, {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StoreError(`Neo4j ${operation} failed: ${message}`, ErrorCode.STORE_QUERY_FAILED, { operation }, {
      cause: error,
    });
  }
}
