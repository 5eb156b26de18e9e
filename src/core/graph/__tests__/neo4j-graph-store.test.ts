/**
 * Neo4j Graph Store Tests
 *
 * Runs the adapter against a scripted driver that records every statement.
 */

import { describe, it, expect, beforeEach } from "vitest";
import neo4j, { type Driver } from "neo4j-driver";
import { Neo4jGraphStore } from "../neo4j-graph-store.js";
import { StoreConfigSchema } from "../../../utils/validation.js";
import { DimensionMismatchError, ErrorCode, StoreConnectivityError, StoreError } from "../../errors.js";
import { chunkOf } from "../../__tests__/helpers/fakes.js";

// =============================================================================
// Scripted Driver
// =============================================================================

type Row = Record<string, unknown>;
type Responder = (cypher: string, params: Row) => Row[] | Error;

interface Statement {
  cypher: string;
  params: Row;
}

class ScriptedDriver {
  readonly statements: Statement[] = [];
  connectivityError: Error | null = null;
  closed = false;

  constructor(public responder: Responder = () => []) {}

  async verifyConnectivity(): Promise<void> {
    if (this.connectivityError) throw this.connectivityError;
  }

  session(): ScriptedSession {
    return new ScriptedSession(this);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async run(cypher: string, params: Row = {}): Promise<{ records: Array<{ toObject: () => Row }> }> {
    this.statements.push({ cypher, params });
    const reply = this.responder(cypher, params);
    if (reply instanceof Error) throw reply;
    return { records: reply.map((row) => ({ toObject: () => row })) };
  }

  find(fragment: string): Statement | undefined {
    return this.statements.find((statement) => statement.cypher.includes(fragment));
  }
}

class ScriptedSession {
  constructor(private readonly driver: ScriptedDriver) {}

  run(cypher: string, params?: Row) {
    return this.driver.run(cypher, params);
  }

  executeRead<T>(work: (tx: ScriptedSession) => Promise<T>): Promise<T> {
    return work(this);
  }

  executeWrite<T>(work: (tx: ScriptedSession) => Promise<T>): Promise<T> {
    return work(this);
  }

  async close(): Promise<void> {}
}

const CONFIG = StoreConfigSchema.parse({ uri: "neo4j://graph.test:7687", password: "test-secret" });

function chunkRow(filePath: string, chunkId: number, score: number, extra: Row = {}): Row {
  return {
    file_path: filePath,
    chunk_id: chunkId,
    text: `chunk ${chunkId}`,
    language: "java",
    start_line: 1,
    end_line: 1,
    chunk_size: 7,
    score,
    ...extra,
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("Neo4jGraphStore", () => {
  let driver: ScriptedDriver;
  let store: Neo4jGraphStore;

  beforeEach(() => {
    driver = new ScriptedDriver();
    store = new Neo4jGraphStore(CONFIG, 3, () => driver as unknown as Driver);
  });

  describe("initialize", () => {
    it("applies constraints, the chunk index and the vector index", async () => {
      await store.initialize();

      expect(store.isReady).toBe(true);
      expect(driver.statements).toHaveLength(8);
      expect(driver.statements[7]?.cypher).toBe(
        "CREATE VECTOR INDEX code_chunks_vector_index IF NOT EXISTS FOR (c:CodeChunk) ON (c.embedding) " +
          "OPTIONS {indexConfig: {`vector.dimensions`: 3, `vector.similarity_function`: 'cosine'}}"
      );
    });

    it("fails with a connectivity error when the server cannot be reached", async () => {
      driver.connectivityError = new Error("connect ECONNREFUSED");

      await expect(store.initialize()).rejects.toBeInstanceOf(StoreConnectivityError);
      expect(driver.closed).toBe(true);
      expect(store.isReady).toBe(false);
    });

    it("fails with a schema error when a statement is rejected", async () => {
      driver.responder = (cypher) => (cypher.startsWith("CREATE CONSTRAINT") ? new Error("forbidden") : []);

      await expect(store.initialize()).rejects.toMatchObject({ code: ErrorCode.STORE_SCHEMA_FAILED });
      expect(driver.closed).toBe(true);
      expect(store.isReady).toBe(false);
    });

    it("refuses work before it is initialized", async () => {
      await expect(store.listChunks()).rejects.toBeInstanceOf(StoreConnectivityError);
    });
  });

  describe("writes", () => {
    beforeEach(async () => {
      await store.initialize();
      driver.statements.length = 0;
    });

    it("resets changed chunks and drops stale ones when a file is upserted", async () => {
      driver.responder = (cypher) =>
        cypher.includes("RETURN c.chunk_id AS chunk_id, c.text AS text")
          ? [
              { chunk_id: 0, text: "old" },
              { chunk_id: 1, text: "same" },
              { chunk_id: 2, text: "gone" },
            ]
          : [];
      const chunks = [chunkOf("src/A.java", 0, "new"), chunkOf("src/A.java", 1, "same", 2)];

      await store.upsertFile(
        { path: "src/A.java", name: "A.java", extension: "java", language: "java", totalChunks: 2, totalLines: 2 },
        chunks,
        "/repo"
      );

      expect(driver.statements).toHaveLength(5);
      expect(driver.find("REMOVE c.embedding")?.params.changed).toEqual([neo4j.int(0)]);
      expect(driver.find("DETACH DELETE c")?.params.count).toEqual(neo4j.int(2));
    });

    it("rejects embeddings that did not match every chunk", async () => {
      driver.responder = (cypher) => (cypher.includes("SET c.embedding") ? [{ count: 1 }] : []);

      await expect(
        store.writeEmbeddings([
          { chunk: { filePath: "src/A.java", chunkId: 0 }, vector: [1, 0, 0] },
          { chunk: { filePath: "src/A.java", chunkId: 1 }, vector: [0, 1, 0] },
        ])
      ).rejects.toMatchObject({ code: ErrorCode.STORE_UNKNOWN_NODE });
    });

    it("checks vector dimensions before writing", async () => {
      await expect(
        store.writeEmbeddings([{ chunk: { filePath: "src/A.java", chunkId: 0 }, vector: [1, 0] }])
      ).rejects.toBeInstanceOf(DimensionMismatchError);
      expect(driver.statements).toHaveLength(0);
    });

    it("fails an extraction whose relationship endpoints are missing", async () => {
      driver.responder = (cypher) => (cypher.includes("MERGE (s)-[:INHERITS]->(t)") ? [{ count: 0 }] : []);

      await expect(
        store.writeExtraction({
          chunk: { filePath: "src/A.java", chunkId: 0 },
          entities: [{ kind: "Class", id: "a", name: "A", filePath: "src/A.java" }],
          relationships: [
            { source: { kind: "Class", id: "a" }, type: "INHERITS", target: { kind: "Class", id: "base" } },
          ],
        })
      ).rejects.toMatchObject({ code: ErrorCode.STORE_UNKNOWN_NODE });
    });

    it("merges a declared span into the stored one within the same file", async () => {
      await store.writeExtraction({
        chunk: { filePath: "src/A.java", chunkId: 1 },
        entities: [{ kind: "Class", id: "a", name: "A", filePath: "src/A.java", startLine: 11, endLine: 20 }],
        relationships: [],
      });

      const merge = driver.find("MERGE (n:Class {id: e.id})");
      expect(merge?.cypher).toContain("n.start_line IS NULL OR n.end_line IS NULL OR n.file_path = e.file_path");
      expect(merge?.cypher).toContain("e.start_line < n.start_line");
      expect(merge?.cypher).toContain("e.end_line > n.end_line");
      expect(merge?.params.entities).toEqual([
        { id: "a", name: "A", file_path: "src/A.java", start_line: neo4j.int(11), end_line: neo4j.int(20) },
      ]);
    });

    it("reports an unknown chunk when replacing its bridge", async () => {
      driver.responder = () => [{ count: 0 }];

      await expect(
        store.replaceBridge({ filePath: "src/A.java", chunkId: 0 }, { kind: "file", filePath: "src/A.java" })
      ).rejects.toThrow("Unknown chunk src/A.java#0");
    });
  });

  describe("reads", () => {
    beforeEach(async () => {
      await store.initialize();
      driver.statements.length = 0;
    });

    it("maps index scores back to cosine similarity and orders ties", async () => {
      driver.responder = () => [
        chunkRow("src/B.java", 0, 1),
        chunkRow("src/A.java", 0, 1),
        chunkRow("src/A.java", 1, 0.75, { language: null, chunk_size: null }),
      ];

      const hits = await store.vectorSearch([1, 0, 0], 3);

      expect(hits.map(({ chunk, score }) => [chunk.filePath, chunk.chunkId, score])).toEqual([
        ["src/A.java", 0, 1],
        ["src/B.java", 0, 1],
        ["src/A.java", 1, 0.5],
      ]);
      expect(hits[2]?.chunk).toMatchObject({ language: "unknown", chunkSize: 7 });
      expect(driver.statements[0]?.params.candidates).toEqual(neo4j.int(6));
    });

    it("rejects a query vector of the wrong dimension", async () => {
      await expect(store.vectorSearch([1, 0], 3)).rejects.toBeInstanceOf(DimensionMismatchError);
    });

    it("orders anchors by the requested chunks, representation first", async () => {
      driver.responder = () => [
        { chunk_file_path: "src/A.java", chunk_id: 1, via: "PART_OF_FILE", kind: "File", id: "src/A.java", name: "A.java", file_path: "src/A.java" },
        { chunk_file_path: "src/A.java", chunk_id: 0, via: "PART_OF_FILE", kind: "Class", id: "a", name: "A", file_path: "src/A.java" },
        { chunk_file_path: "src/A.java", chunk_id: 0, via: "REPRESENTS", kind: "Class", id: "a", name: "A", file_path: "src/A.java" },
      ];

      const anchors = await store.getAnchors([
        { filePath: "src/A.java", chunkId: 0 },
        { filePath: "src/A.java", chunkId: 1 },
      ]);

      expect(anchors.map((anchor) => [anchor.chunk.chunkId, anchor.via, anchor.node.kind])).toEqual([
        [0, "REPRESENTS", "Class"],
        [0, "PART_OF_FILE", "Class"],
        [1, "PART_OF_FILE", "File"],
      ]);
    });

    it("fills in entity defaults for missing properties", async () => {
      driver.responder = () => [
        { kind: "Class", id: "a", name: "A", file_path: "src/A.java", file_paths: null, start_line: null, end_line: null },
      ];

      expect(await store.listEntities("src/A.java")).toEqual([
        { kind: "Class", id: "a", name: "A", filePath: "src/A.java", filePaths: ["src/A.java"] },
      ]);
    });

    it("collects the links of a chunk, skipping empty matches", async () => {
      driver.responder = () => [
        {
          containers: ["src/A.java"],
          links: [
            { via: "REPRESENTS", kind: "Class", id: "a" },
            { via: "PART_OF_FILE", kind: "Class", id: "a" },
            { via: null, kind: null, id: null },
          ],
        },
      ];

      expect(await store.getChunkLinks({ filePath: "src/A.java", chunkId: 0 })).toEqual({
        containedBy: ["src/A.java"],
        represents: { kind: "Class", id: "a" },
        partOf: [{ kind: "Class", id: "a" }],
      });
    });

    it("reports counts, coverage and the vector index", async () => {
      driver.responder = (cypher) => {
        if (cypher === "MATCH (n:CodeChunk) RETURN count(n) AS count") return [{ count: 4 }];
        if (cypher.includes("c.embedding IS NOT NULL")) return [{ count: 1 }];
        if (cypher === "MATCH ()-[r:REPRESENTS]->() RETURN count(r) AS count") return [{ count: 3 }];
        if (cypher.startsWith("SHOW INDEXES")) return [{ count: 1 }];
        return [{ count: 0 }];
      };

      const stats = await store.getStats();

      expect(stats.nodeCounts.CodeChunk).toBe(4);
      expect(stats.relationshipCounts.REPRESENTS).toBe(3);
      expect(stats.totalChunks).toBe(4);
      expect(stats.embeddedChunks).toBe(1);
      expect(stats.coverage).toBe(0.25);
      expect(stats.vectorIndexPresent).toBe(true);
    });
  });

  describe("error mapping", () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it("wraps other driver failures as store errors", async () => {
      driver.responder = () => new Error("boom");

      const error = await store.listChunks().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(StoreError);
      expect(error).toMatchObject({ message: "Neo4j listChunks failed: boom", code: ErrorCode.STORE_QUERY_FAILED });
    });

    it("rejects rows of an unexpected shape", async () => {
      driver.responder = () => [{ file_path: 42 }];

      await expect(store.listChunks()).rejects.toThrow("Unexpected row shape from listChunks");
    });

    it("reports an unhealthy store instead of throwing", async () => {
      driver.responder = () => new Error("boom");

      expect(await store.healthCheck()).toBe(false);
    });
  });
});
