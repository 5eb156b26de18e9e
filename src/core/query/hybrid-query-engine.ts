/**
 * Hybrid Query Engine
 *
 * Answers a natural-language question in stages:
 *
 *   Embedding → VectorSearch → EntityMapping → GraphExpansion → Synthesis → Done
 *
 * A query that cannot be embedded fails. Everything after the vector search
 * degrades instead: a store error during graph work leaves a vector-only
 * answer, a synthesis failure leaves a canned answer built from the results,
 * and running out of time returns whatever context was gathered so far.
 *
 * @module
 */

import {
  nodeKeyOf,
  type ChunkAnchor,
  type GraphEdge,
  type GraphNode,
  type NodeRef,
  type ScoredChunk,
} from "../../types/index.js";
import { timeout, TimeoutError } from "../../utils/async.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { QueryConfig } from "../../utils/validation.js";
import {
  DimensionMismatchError,
  ErrorCode,
  isCodeGraphError,
  QueryError,
} from "../errors.js";
import type { IEmbeddingService } from "../embeddings/index.js";
import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import {
  ANSWER_SYSTEM_PROMPT,
  buildAnswerPrompt,
  buildFallbackAnswer,
  NO_RESULTS_ANSWER,
  prepareContext,
  type QueryContext,
} from "./context-builder.js";

// =============================================================================
// Types
// =============================================================================

export type QueryStage =
  | "Embedding"
  | "VectorSearch"
  | "EntityMapping"
  | "GraphExpansion"
  | "Synthesis"
  | "Done"
  | "EmbeddingFailed"
  | "GraphExpansionFailed";

export interface HybridQueryOptions {
  k?: number;
  includeGraphContext?: boolean;
  traversalDepth?: number;
  similarityFloor?: number;
}

/** How the answer was produced */
export type SynthesisMode = "llm" | "fallback" | "none";

export interface HybridQueryResult {
  query: string;
  answer: string;
  chunks: ScoredChunk[];
  anchors: ChunkAnchor[];
  /** Empty when degraded or when graph context is off */
  context: QueryContext;
  degraded: boolean;
  stages: QueryStage[];
  timedOut: boolean;
  synthesis: SynthesisMode;
  durationMs: number;
}

export type HybridQueryEngineOptions = QueryConfig;

const DEFAULT_OPTIONS: HybridQueryEngineOptions = {
  k: 5,
  similarityFloor: 0.2,
  includeGraphContext: true,
  traversalDepth: 2,
  timeoutMs: 60_000,
  maxContextChunks: 3,
  temperature: 0.7,
  maxAnswerTokens: 1000,
};

const MAX_K = 50;
const MAX_TRAVERSAL_DEPTH = 5;

function emptyContext(): QueryContext {
  return { entities: [], relationships: [] };
}

/**
 * Detach the returned result from stages that may still be running after a
 * timeout
 */
function snapshot(result: HybridQueryResult): HybridQueryResult {
  return {
    ...result,
    chunks: [...result.chunks],
    anchors: [...result.anchors],
    context: { entities: [...result.context.entities], relationships: [...result.context.relationships] },
    stages: [...result.stages],
  };
}

function edgeKey(edge: GraphEdge): string {
  return `${nodeKeyOf(edge.source)}|${edge.type}|${nodeKeyOf(edge.target)}`;
}

// =============================================================================
// Hybrid Query Engine
// =============================================================================

export class HybridQueryEngine {
  private readonly options: HybridQueryEngineOptions;
  private readonly logger: Logger;

  constructor(
    private readonly store: IGraphStore,
    private readonly embeddings: IEmbeddingService,
    private readonly llm: ILLMService,
    options: Partial<HybridQueryEngineOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = createLogger("query-engine");
  }

  async query(question: string, options: HybridQueryOptions = {}): Promise<HybridQueryResult> {
    const startTime = Date.now();
    const k = options.k ?? this.options.k;
    const includeGraphContext = options.includeGraphContext ?? this.options.includeGraphContext;
    const traversalDepth = options.traversalDepth ?? this.options.traversalDepth;
    const similarityFloor = options.similarityFloor ?? this.options.similarityFloor;

    const query = question.trim();
    if (query.length === 0) {
      throw new QueryError("Query text is empty", ErrorCode.QUERY_INVALID);
    }
    if (!Number.isInteger(k) || k < 1 || k > MAX_K) {
      throw new QueryError(`k must be an integer between 1 and ${MAX_K}`, ErrorCode.QUERY_INVALID, { k });
    }
    if (!Number.isInteger(traversalDepth) || traversalDepth < 0 || traversalDepth > MAX_TRAVERSAL_DEPTH) {
      throw new QueryError(
        `traversalDepth must be an integer between 0 and ${MAX_TRAVERSAL_DEPTH}`,
        ErrorCode.QUERY_INVALID,
        { traversalDepth }
      );
    }

    const result: HybridQueryResult = {
      query,
      answer: "",
      chunks: [],
      anchors: [],
      context: emptyContext(),
      degraded: false,
      stages: [],
      timedOut: false,
      synthesis: "none",
      durationMs: 0,
    };

    const vector = await this.embedQuery(query, result);

    result.stages.push("VectorSearch");
    let hits: ScoredChunk[];
    try {
      hits = await this.store.vectorSearch(vector, k);
    } catch (error) {
      throw new QueryError("Similarity search failed", ErrorCode.QUERY_SEARCH_FAILED, { stage: "VectorSearch" }, { cause: error });
    }
    result.chunks = hits.filter((hit) => hit.score >= similarityFloor);

    const deadline = startTime + this.options.timeoutMs;
    try {
      await this.withinDeadline(this.enrich(result, includeGraphContext, traversalDepth), deadline);
      await this.withinDeadline(this.synthesize(result), deadline);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      this.logger.warn({ query, timeoutMs: this.options.timeoutMs }, "Query timed out, returning partial results");
      result.timedOut = true;
      result.answer = buildFallbackAnswer(result.chunks, result.context);
      result.synthesis = "fallback";
    }

    result.stages.push("Done");
    result.durationMs = Date.now() - startTime;
    const settled = snapshot(result);
    this.logger.info(
      {
        chunks: result.chunks.length,
        entities: result.context.entities.length,
        relationships: result.context.relationships.length,
        degraded: result.degraded,
        timedOut: result.timedOut,
        synthesis: result.synthesis,
        durationMs: result.durationMs,
      },
      "Query complete"
    );
    return settled;
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private async embedQuery(query: string, result: HybridQueryResult): Promise<number[]> {
    result.stages.push("Embedding");
    let vector: number[];
    try {
      vector = (await this.embeddings.embed(query)).vector;
    } catch (error) {
      result.stages.push("EmbeddingFailed");
      throw new QueryError("Could not embed the query", ErrorCode.QUERY_EMBEDDING_FAILED, { stage: "Embedding" }, { cause: error });
    }

    if (vector.length !== this.store.dimension) {
      result.stages.push("EmbeddingFailed");
      throw new QueryError(
        "Query vector does not match the store's vector index",
        ErrorCode.QUERY_EMBEDDING_FAILED,
        { stage: "Embedding" },
        { cause: new DimensionMismatchError(this.store.dimension, vector.length) }
      );
    }
    return vector;
  }

  /**
   * Anchors, then the structural neighbourhood around them. A store error
   * here drops the graph context instead of failing the query.
   */
  private async enrich(result: HybridQueryResult, includeGraphContext: boolean, traversalDepth: number): Promise<void> {
    if (result.chunks.length === 0) return;

    result.stages.push("EntityMapping");
    try {
      result.anchors = await this.store.getAnchors(result.chunks.map(({ chunk }) => chunk));
    } catch (error) {
      if (!isCodeGraphError(error)) throw error;
      this.degrade(result, error);
      return;
    }

    if (!includeGraphContext) return;

    result.stages.push("GraphExpansion");
    try {
      result.context = await this.expand(result.anchors, traversalDepth);
    } catch (error) {
      if (!isCodeGraphError(error)) throw error;
      this.degrade(result, error);
    }
  }

  private degrade(result: HybridQueryResult, error: unknown): void {
    this.logger.warn({ err: error }, "Graph context unavailable, falling back to vector results");
    result.stages.push("GraphExpansionFailed");
    result.degraded = true;
    result.context = emptyContext();
  }

  /**
   * Breadth-first walk over structural edges in both directions, bounded by
   * depth, visiting each node once
   */
  async expand(anchors: readonly ChunkAnchor[], depth: number): Promise<QueryContext> {
    const visited = new Map<string, GraphNode>();
    const edges = new Map<string, GraphEdge>();

    let frontier: NodeRef[] = [];
    for (const anchor of anchors) {
      const key = nodeKeyOf(anchor.node);
      if (visited.has(key)) continue;
      visited.set(key, anchor.node);
      frontier.push({ kind: anchor.node.kind, id: anchor.node.id });
    }

    for (let level = 0; level < depth && frontier.length > 0; level++) {
      const next: NodeRef[] = [];
      for (const edge of await this.store.getNeighbors(frontier)) {
        edges.set(edgeKey(edge), edge);
        for (const node of [edge.source, edge.target]) {
          const key = nodeKeyOf(node);
          if (visited.has(key)) continue;
          visited.set(key, node);
          next.push({ kind: node.kind, id: node.id });
        }
      }
      frontier = next;
    }

    return {
      entities: [...visited.values()].filter((node) => node.kind !== "File"),
      relationships: [...edges.values()],
    };
  }

  private async synthesize(result: HybridQueryResult): Promise<void> {
    if (result.chunks.length === 0) {
      result.answer = NO_RESULTS_ANSWER;
      result.synthesis = "none";
      return;
    }

    result.stages.push("Synthesis");
    const prompt = buildAnswerPrompt(
      prepareContext(result.query, result.chunks, result.context, this.options.maxContextChunks)
    );

    try {
      const reply = await this.llm.infer(prompt, {
        systemPrompt: ANSWER_SYSTEM_PROMPT,
        temperature: this.options.temperature,
        maxTokens: this.options.maxAnswerTokens,
      });
      result.answer = reply.text.trim();
      result.synthesis = "llm";
    } catch (error) {
      if (!isCodeGraphError(error)) throw error;
      this.logger.warn({ err: error }, "Answer synthesis failed, using fallback answer");
      result.answer = buildFallbackAnswer(result.chunks, result.context);
      result.synthesis = "fallback";
    }
  }

  private withinDeadline<T>(work: Promise<T>, deadline: number): Promise<T> {
    return timeout(work, deadline - Date.now(), "Query timed out");
  }
}
