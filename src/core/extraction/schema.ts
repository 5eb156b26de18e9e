/**
 * Extraction response contract
 *
 * The completion service answers with JSON naming nodes and relationships.
 * Everything it says is untrusted: the payload is parsed here into tagged
 * variants, and elements outside the fixed schema are quarantined instead
 * of reaching the store.
 *
 * @module
 */

import { z } from "zod";
import {
  normalizeIdentifier,
  STRUCTURAL_NODE_KINDS,
  STRUCTURAL_RELATIONSHIP_KINDS,
  type ChunkExtraction,
  type ChunkRecord,
  type EntityKind,
  type EntityRecord,
  type NodeRef,
  type RelationshipRecord,
  type StructuralNodeKind,
  type StructuralRelationshipKind,
} from "../../types/index.js";
import { err, ok, type Result } from "../../types/result.js";
import { ErrorCode, ParseError } from "../errors.js";
import { formatIssues } from "../../utils/validation.js";

// =============================================================================
// Raw Payload
// =============================================================================

const LineNumber = z.number().int().positive().nullish();

const RawNodeSchema = z.object({
  id: z.string().trim().min(1),
  type: z.string(),
  start_line: LineNumber,
  end_line: LineNumber,
});

const RawRelationshipSchema = z.object({
  source: z.string().trim().min(1),
  type: z.string(),
  target: z.string().trim().min(1),
  source_type: z.string().nullish(),
  target_type: z.string().nullish(),
});

export const RawExtractionSchema = z.object({
  nodes: z.array(RawNodeSchema).default([]),
  relationships: z.array(RawRelationshipSchema).default([]),
});

export type RawNode = z.infer<typeof RawNodeSchema>;
export type RawRelationship = z.infer<typeof RawRelationshipSchema>;

// =============================================================================
// Tagged Variants
// =============================================================================

const FileNodeSchema = RawNodeSchema.extend({ type: z.literal("File") });
const entityNode = <K extends EntityKind>(kind: K) => RawNodeSchema.extend({ type: z.literal(kind) });

export const NodeVariantSchema = z.discriminatedUnion("type", [
  FileNodeSchema,
  entityNode("Class"),
  entityNode("Function"),
  entityNode("Interface"),
  entityNode("Package"),
]);

const relationship = <K extends StructuralRelationshipKind>(kind: K) =>
  RawRelationshipSchema.extend({ type: z.literal(kind) });

export const RelationshipVariantSchema = z.discriminatedUnion("type", [
  relationship("CONTAINS"),
  relationship("INHERITS"),
  relationship("IMPLEMENTS"),
  relationship("CALLS"),
  relationship("IMPORTS"),
  relationship("DEPENDS_ON"),
]);

export type NodeVariant = z.infer<typeof NodeVariantSchema>;
export type RelationshipVariant = z.infer<typeof RelationshipVariantSchema>;

// =============================================================================
// Endpoint Rules
// =============================================================================

const ANY: readonly StructuralNodeKind[] = STRUCTURAL_NODE_KINDS;

/**
 * Allowed (source, target) kinds per relationship kind
 */
export const ENDPOINT_RULES: Record<
  StructuralRelationshipKind,
  { sources: readonly StructuralNodeKind[]; targets: readonly StructuralNodeKind[]; pairs?: ReadonlyArray<[StructuralNodeKind, StructuralNodeKind]> }
> = {
  CONTAINS: { sources: ["File", "Package", "Class", "Interface"], targets: ["Package", "Class", "Function", "Interface"] },
  INHERITS: {
    sources: ["Class", "Interface"],
    targets: ["Class", "Interface"],
    pairs: [
      ["Class", "Class"],
      ["Interface", "Interface"],
    ],
  },
  IMPLEMENTS: { sources: ["Class"], targets: ["Interface"] },
  CALLS: { sources: ["File", "Class", "Function"], targets: ["Function"] },
  IMPORTS: { sources: ANY, targets: ANY },
  DEPENDS_ON: { sources: ANY, targets: ANY },
};

export function endpointsAllowed(
  type: StructuralRelationshipKind,
  source: StructuralNodeKind,
  target: StructuralNodeKind
): boolean {
  const rule = ENDPOINT_RULES[type];
  if (rule.pairs) {
    return rule.pairs.some(([s, t]) => s === source && t === target);
  }
  return rule.sources.includes(source) && rule.targets.includes(target);
}

// =============================================================================
// Parsing
// =============================================================================

export type QuarantineReason =
  | "unknown-node-kind"
  | "unknown-relationship-kind"
  | "undeclared-endpoint"
  | "endpoint-rule";

export interface QuarantinedElement {
  reason: QuarantineReason;
  element: RawNode | RawRelationship;
}

export interface ParsedExtraction {
  extraction: ChunkExtraction;
  quarantined: QuarantinedElement[];
}

/**
 * Map loose spellings ("class", "depends on") onto the schema vocabulary
 */
function canonicalNodeKind(raw: string): string {
  const wanted = raw.trim().toLowerCase();
  return STRUCTURAL_NODE_KINDS.find((kind) => kind.toLowerCase() === wanted) ?? raw;
}

function canonicalRelationshipKind(raw: string): string {
  return raw.trim().toUpperCase().replace(/[\s-]+/g, "_");
}

/**
 * Pull the JSON document out of a reply that may be wrapped in a code fence
 */
export function extractJsonText(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  return (fenced?.[1] ?? text).trim();
}

interface DeclaredNode {
  ref: NodeRef;
  entity: EntityRecord | null;
}

/**
 * Parse a completion reply for one chunk into the entities and
 * relationships it may contribute
 */
export function parseExtractionResponse(text: string, chunk: ChunkRecord): Result<ParsedExtraction, ParseError> {
  let payload: unknown;
  try {
    payload = JSON.parse(extractJsonText(text));
  } catch {
    return err(
      new ParseError("Completion reply is not JSON", ErrorCode.PARSE_NOT_JSON, {
        raw: text.slice(0, 500),
        filePath: chunk.filePath,
        chunkId: chunk.chunkId,
      })
    );
  }

  const parsed = RawExtractionSchema.safeParse(payload);
  if (!parsed.success) {
    return err(
      new ParseError("Completion reply does not match the extraction schema", ErrorCode.PARSE_SCHEMA_MISMATCH, {
        issues: formatIssues(parsed.error),
        filePath: chunk.filePath,
        chunkId: chunk.chunkId,
      })
    );
  }

  const quarantined: QuarantinedElement[] = [];
  const declared = new Map<string, DeclaredNode[]>();
  const entities = new Map<string, EntityRecord>();

  for (const raw of parsed.data.nodes) {
    const variant = NodeVariantSchema.safeParse({ ...raw, type: canonicalNodeKind(raw.type) });
    if (!variant.success) {
      quarantined.push({ reason: "unknown-node-kind", element: raw });
      continue;
    }

    const node = variant.data;
    const name = normalizeIdentifier(node.id);
    const candidates = declared.get(name) ?? [];
    declared.set(name, candidates);

    if (node.type === "File") {
      if (!candidates.some((candidate) => candidate.ref.kind === "File")) {
        candidates.push({ ref: { kind: "File", id: chunk.filePath }, entity: null });
      }
      continue;
    }

    const ref: NodeRef = { kind: node.type, id: name };
    if (candidates.some((candidate) => candidate.ref.kind === ref.kind)) continue;

    const entity: EntityRecord = {
      kind: node.type,
      id: name,
      name: node.id.trim(),
      filePath: chunk.filePath,
      ...spanWithin(node, chunk),
    };
    candidates.push({ ref, entity });
    entities.set(`${entity.kind}:${entity.id}`, entity);
  }

  const relationships = new Map<string, RelationshipRecord>();
  for (const raw of parsed.data.relationships) {
    const variant = RelationshipVariantSchema.safeParse({ ...raw, type: canonicalRelationshipKind(raw.type) });
    if (!variant.success) {
      quarantined.push({ reason: "unknown-relationship-kind", element: raw });
      continue;
    }

    const rel = variant.data;
    const sources = filterByKind(declared.get(normalizeIdentifier(rel.source)), rel.source_type);
    const targets = filterByKind(declared.get(normalizeIdentifier(rel.target)), rel.target_type);
    if (sources.length === 0 || targets.length === 0) {
      quarantined.push({ reason: "undeclared-endpoint", element: raw });
      continue;
    }

    const pair = firstAllowedPair(rel.type, sources, targets);
    if (!pair) {
      quarantined.push({ reason: "endpoint-rule", element: raw });
      continue;
    }

    const [source, target] = pair;
    relationships.set(`${source.kind}:${source.id}|${rel.type}|${target.kind}:${target.id}`, {
      source,
      type: rel.type,
      target,
    });
  }

  return ok({
    extraction: {
      chunk: { filePath: chunk.filePath, chunkId: chunk.chunkId },
      entities: [...entities.values()],
      relationships: [...relationships.values()],
    },
    quarantined,
  });
}

/**
 * Keep a declared span only when it is well-formed and inside the chunk
 */
function spanWithin(node: RawNode, chunk: ChunkRecord): { startLine?: number; endLine?: number } {
  const { start_line: start, end_line: end } = node;
  if (start == null || end == null) return {};
  if (start > end || start < chunk.startLine || end > chunk.endLine) return {};
  return { startLine: start, endLine: end };
}

function filterByKind(candidates: DeclaredNode[] | undefined, kind: string | null | undefined): NodeRef[] {
  const refs = (candidates ?? []).map((candidate) => candidate.ref);
  if (!kind) return refs;
  const wanted = canonicalNodeKind(kind);
  return refs.filter((ref) => ref.kind === wanted);
}

function firstAllowedPair(
  type: StructuralRelationshipKind,
  sources: NodeRef[],
  targets: NodeRef[]
): [NodeRef, NodeRef] | null {
  for (const source of sources) {
    for (const target of targets) {
      if (endpointsAllowed(type, source.kind, target.kind)) {
        return [source, target];
      }
    }
  }
  return null;
}

// =============================================================================
// Response Format
// =============================================================================

/**
 * JSON shape requested from the completion service, embedded in the prompt
 */
export const RESPONSE_FORMAT_EXAMPLE = {
  nodes: [
    { id: "OrderService", type: "Class", start_line: 12, end_line: 80 },
    { id: "Repository", type: "Interface" },
  ],
  relationships: [{ source: "OrderService", type: "IMPLEMENTS", target: "Repository" }],
};

export const NODE_KIND_LIST = STRUCTURAL_NODE_KINDS.join(", ");
export const RELATIONSHIP_KIND_LIST = STRUCTURAL_RELATIONSHIP_KINDS.join(", ");
