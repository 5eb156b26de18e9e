/**
 * Shared types for codegraph-rag
 */

// =============================================================================
// Schema Vocabulary
// =============================================================================

/** Node kinds the structural extractor may emit */
export const STRUCTURAL_NODE_KINDS = ["File", "Class", "Function", "Interface", "Package"] as const;
export type StructuralNodeKind = (typeof STRUCTURAL_NODE_KINDS)[number];

/** Node kinds persisted as standalone entities (File nodes come from ingestion) */
export type EntityKind = Exclude<StructuralNodeKind, "File">;
export const ENTITY_KINDS: readonly EntityKind[] = ["Class", "Function", "Interface", "Package"];

/** Relationship kinds the structural extractor may emit */
export const STRUCTURAL_RELATIONSHIP_KINDS = [
  "CONTAINS",
  "INHERITS",
  "IMPLEMENTS",
  "CALLS",
  "IMPORTS",
  "DEPENDS_ON",
] as const;
export type StructuralRelationshipKind = (typeof STRUCTURAL_RELATIONSHIP_KINDS)[number];

export type BridgeRelationshipKind = "REPRESENTS" | "PART_OF_FILE";

export const NODE_LABELS = ["File", "CodeChunk", "Class", "Function", "Interface", "Package"] as const;
export type NodeLabel = (typeof NODE_LABELS)[number];

export const RELATIONSHIP_TYPES = [
  ...STRUCTURAL_RELATIONSHIP_KINDS,
  "CONTAINS_CHUNK",
  "REPRESENTS",
  "PART_OF_FILE",
] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

// =============================================================================
// Source Files and Chunks
// =============================================================================

/**
 * A source file as handed over by a file source
 */
export interface SourceFile {
  filePath: string;
  /** Language name; detected from the extension when omitted */
  language?: string;
  content: string;
}

/**
 * File node properties
 */
export interface FileRecord {
  path: string;
  name: string;
  extension: string;
  language: string;
  totalChunks: number;
  totalLines: number;
}

/** Natural key of a chunk */
export interface ChunkKey {
  filePath: string;
  chunkId: number;
}

/**
 * A contiguous window of a file's text, as produced by the chunker
 */
export interface ChunkRecord extends ChunkKey {
  text: string;
  language: string;
  /** 1-based, inclusive */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
  /** Text length in characters */
  chunkSize: number;
}

/**
 * A chunk as persisted in the store
 */
export interface StoredChunk extends ChunkRecord {
  embedding: number[] | null;
  codebasePath: string | null;
}

export interface ScoredChunk {
  chunk: ChunkRecord;
  /** Cosine similarity in [-1, 1] */
  score: number;
}

// =============================================================================
// Structural Layer
// =============================================================================

/**
 * Reference to a node of the structural layer. File nodes are keyed by
 * path; every other kind by its normalized identifier.
 */
export interface NodeRef {
  kind: StructuralNodeKind;
  id: string;
}

/**
 * A structural entity ready to be upserted
 */
export interface EntityRecord {
  kind: EntityKind;
  /** Normalized identifier */
  id: string;
  /** Display name as extracted */
  name: string;
  /** File the entity was sighted in */
  filePath: string;
  startLine?: number;
  endLine?: number;
}

/**
 * A structural entity as persisted
 */
export interface StoredEntity extends EntityRecord {
  /** Every file the entity has been sighted in */
  filePaths: string[];
}

export interface RelationshipRecord {
  source: NodeRef;
  type: StructuralRelationshipKind;
  target: NodeRef;
}

/**
 * Everything one chunk contributes to the structural layer
 */
export interface ChunkExtraction {
  chunk: ChunkKey;
  entities: EntityRecord[];
  relationships: RelationshipRecord[];
}

// =============================================================================
// Bridge Layer
// =============================================================================

export type BridgeTarget =
  | { kind: "entity"; entity: NodeRef; score: number }
  | { kind: "file"; filePath: string };

/** A node summary returned by read queries */
export interface GraphNode extends NodeRef {
  name: string;
  filePath: string | null;
}

export interface ChunkAnchor {
  chunk: ChunkKey;
  via: BridgeRelationshipKind;
  node: GraphNode;
}

export interface GraphEdge {
  source: GraphNode;
  type: StructuralRelationshipKind;
  target: GraphNode;
}

/**
 * The edges attached to one chunk, for inspection
 */
export interface ChunkLinks {
  containedBy: string[];
  represents: NodeRef | null;
  partOf: NodeRef[];
}

// =============================================================================
// Store Administration
// =============================================================================

export interface StoreStats {
  nodeCounts: Record<NodeLabel, number>;
  relationshipCounts: Record<RelationshipType, number>;
  totalChunks: number;
  embeddedChunks: number;
  /** embedded / total, 0 for an empty store */
  coverage: number;
  vectorIndexPresent: boolean;
}

export interface ClearSummary {
  nodesDeleted: number;
  relationshipsDeleted: number;
}

export function emptyNodeCounts(): Record<NodeLabel, number> {
  return { File: 0, CodeChunk: 0, Class: 0, Function: 0, Interface: 0, Package: 0 };
}

export function emptyRelationshipCounts(): Record<RelationshipType, number> {
  return {
    CONTAINS: 0,
    INHERITS: 0,
    IMPLEMENTS: 0,
    CALLS: 0,
    IMPORTS: 0,
    DEPENDS_ON: 0,
    CONTAINS_CHUNK: 0,
    REPRESENTS: 0,
    PART_OF_FILE: 0,
  };
}

export function chunkKeyOf(key: ChunkKey): string {
  return `${key.filePath}#${key.chunkId}`;
}

export function nodeKeyOf(ref: NodeRef): string {
  return `${ref.kind}:${ref.id}`;
}

/**
 * Normalized identifier of a structural entity: trimmed, inner whitespace
 * collapsed, lower-cased
 */
export function normalizeIdentifier(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}
