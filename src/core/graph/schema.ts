/**
 * Graph Schema Definitions
 *
 * Constraints and indexes for the Neo4j 5.x store. Every statement uses
 * IF NOT EXISTS so applying the schema is idempotent.
 *
 * @module
 */

import type { ChunkRecord, StructuralNodeKind } from "../../types/index.js";

// =============================================================================
// Schema Elements
// =============================================================================

export interface SchemaElement {
  name: string;
  type: "constraint" | "index" | "vector_index";
  description: string;
  cypher: string;
}

export const CONSTRAINTS: readonly SchemaElement[] = [
  {
    name: "file_path_unique",
    type: "constraint",
    description: "One File node per path",
    cypher: "CREATE CONSTRAINT file_path_unique IF NOT EXISTS FOR (f:File) REQUIRE f.path IS UNIQUE",
  },
  {
    name: "chunk_key_unique",
    type: "constraint",
    description: "One CodeChunk per (file_path, chunk_id)",
    cypher:
      "CREATE CONSTRAINT chunk_key_unique IF NOT EXISTS FOR (c:CodeChunk) REQUIRE (c.file_path, c.chunk_id) IS UNIQUE",
  },
  {
    name: "class_id_unique",
    type: "constraint",
    description: "One Class per normalized identifier",
    cypher: "CREATE CONSTRAINT class_id_unique IF NOT EXISTS FOR (n:Class) REQUIRE n.id IS UNIQUE",
  },
  {
    name: "function_id_unique",
    type: "constraint",
    description: "One Function per normalized identifier",
    cypher: "CREATE CONSTRAINT function_id_unique IF NOT EXISTS FOR (n:Function) REQUIRE n.id IS UNIQUE",
  },
  {
    name: "interface_id_unique",
    type: "constraint",
    description: "One Interface per normalized identifier",
    cypher: "CREATE CONSTRAINT interface_id_unique IF NOT EXISTS FOR (n:Interface) REQUIRE n.id IS UNIQUE",
  },
  {
    name: "package_id_unique",
    type: "constraint",
    description: "One Package per normalized identifier",
    cypher: "CREATE CONSTRAINT package_id_unique IF NOT EXISTS FOR (n:Package) REQUIRE n.id IS UNIQUE",
  },
] as const;

export const INDEXES: readonly SchemaElement[] = [
  {
    name: "chunk_file_path",
    type: "index",
    description: "Chunks of a file",
    cypher: "CREATE INDEX chunk_file_path IF NOT EXISTS FOR (c:CodeChunk) ON (c.file_path)",
  },
] as const;

/**
 * Vector index over CodeChunk.embedding. The dimension is validated by the
 * caller and interpolated, since index options cannot be parameterized.
 */
export function vectorIndexElement(name: string, dimension: number): SchemaElement {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new RangeError(`Vector dimension must be a positive integer (got ${dimension})`);
  }
  return {
    name,
    type: "vector_index",
    description: "Cosine similarity over chunk embeddings",
    cypher:
      `CREATE VECTOR INDEX ${name} IF NOT EXISTS FOR (c:CodeChunk) ON (c.embedding) ` +
      `OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimension}, \`vector.similarity_function\`: 'cosine'}}`,
  };
}

export function schemaElements(vectorIndexName: string, dimension: number): SchemaElement[] {
  return [...CONSTRAINTS, ...INDEXES, vectorIndexElement(vectorIndexName, dimension)];
}

// =============================================================================
// Node Addressing
// =============================================================================

/** Property holding the natural key of a structural node */
export function keyProperty(kind: StructuralNodeKind): "path" | "id" {
  return kind === "File" ? "path" : "id";
}

/**
 * Neo4j reports cosine similarity rescaled to [0, 1]; map it back to [-1, 1]
 */
export function fromIndexScore(score: number): number {
  return 2 * score - 1;
}

/**
 * Copy only the chunk properties, dropping vectors and store bookkeeping
 */
export function toChunkRecord(chunk: ChunkRecord): ChunkRecord {
  return {
    chunkId: chunk.chunkId,
    filePath: chunk.filePath,
    language: chunk.language,
    text: chunk.text,
    startLine: chunk.startLine,
    endLine: chunk.endLine,
    chunkSize: chunk.chunkSize,
  };
}
