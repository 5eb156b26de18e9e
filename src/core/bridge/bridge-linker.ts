/**
 * Bridge Linker
 *
 * Connects the semantic layer to the structural one: every chunk gets a
 * REPRESENTS edge to the entity it most plausibly shows, plus PART_OF_FILE
 * to that entity, or PART_OF_FILE to its File when nothing matches well
 * enough. Linking a chunk again replaces its previous edges.
 *
 * @module
 */

import {
  chunkKeyOf,
  type ChunkKey,
  type ChunkRecord,
  type NodeRef,
  type StoredEntity,
} from "../../types/index.js";
import type { CancellationToken } from "../../utils/async.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { describeError, StoreConnectivityError } from "../errors.js";
import type { IGraphStore } from "../interfaces/IGraphStore.js";

// =============================================================================
// Types
// =============================================================================

export interface BridgeLinkerOptions {
  /** Lowest score that still counts as a match */
  minConfidence: number;
  /** Mentions needed for an identifier match to score 1 */
  mentionSaturation: number;
}

export interface EntityScore {
  entity: StoredEntity;
  score: number;
  basis: "span" | "identifier";
}

export interface BridgeTie {
  chunk: ChunkKey;
  score: number;
  /** Normalized identifiers that tied, in tie-break order */
  candidates: string[];
  chosen: NodeRef;
}

export interface BridgeFailure {
  chunk: ChunkKey;
  error: string;
}

export interface BridgeReport {
  linkedChunks: number;
  fileFallbacks: number;
  ties: BridgeTie[];
  failures: BridgeFailure[];
  cancelled: boolean;
  durationMs: number;
}

export interface EntitySelection {
  winner: EntityScore | null;
  tie: BridgeTie | null;
}

const DEFAULT_OPTIONS: BridgeLinkerOptions = {
  minConfidence: 0.5,
  mentionSaturation: 2,
};

const SCORE_EPSILON = 1e-9;

// =============================================================================
// Scoring
// =============================================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word, case-insensitive occurrences of `name` in `text`
 */
export function countMentions(text: string, name: string): number {
  const trimmed = name.trim();
  if (trimmed.length === 0) return 0;
  const pattern = new RegExp(`(?<![A-Za-z0-9_$])${escapeRegExp(trimmed)}(?![A-Za-z0-9_$])`, "gi");
  return text.match(pattern)?.length ?? 0;
}

/**
 * Span containment when the entity declares a span in this chunk's file,
 * identifier mentions otherwise
 */
export function scoreEntity(chunk: ChunkRecord, entity: StoredEntity, mentionSaturation: number): EntityScore {
  if (entity.filePath === chunk.filePath && entity.startLine !== undefined && entity.endLine !== undefined) {
    const overlap = Math.min(entity.endLine, chunk.endLine) - Math.max(entity.startLine, chunk.startLine) + 1;
    const chunkLines = chunk.endLine - chunk.startLine + 1;
    return { entity, score: Math.max(0, overlap) / chunkLines, basis: "span" };
  }

  const mentions = countMentions(chunk.text, entity.name);
  return { entity, score: Math.min(1, mentions / mentionSaturation), basis: "identifier" };
}

/**
 * Highest score at or above `minConfidence`; equal scores go to the shortest
 * normalized identifier, then the lexicographically smallest
 */
export function selectEntity(
  chunk: ChunkRecord,
  entities: readonly StoredEntity[],
  options: BridgeLinkerOptions
): EntitySelection {
  const qualified = entities
    .map((entity) => scoreEntity(chunk, entity, options.mentionSaturation))
    .filter((scored) => scored.score >= options.minConfidence && scored.score > 0);

  if (qualified.length === 0) {
    return { winner: null, tie: null };
  }

  const best = Math.max(...qualified.map((scored) => scored.score));
  const top = qualified
    .filter((scored) => best - scored.score < SCORE_EPSILON)
    .sort((a, b) => {
      if (a.entity.id.length !== b.entity.id.length) return a.entity.id.length - b.entity.id.length;
      if (a.entity.id !== b.entity.id) return a.entity.id < b.entity.id ? -1 : 1;
      return a.entity.kind < b.entity.kind ? -1 : a.entity.kind > b.entity.kind ? 1 : 0;
    });

  const winner = top[0] ?? null;
  if (!winner || top.length === 1) {
    return { winner, tie: null };
  }

  return {
    winner,
    tie: {
      chunk: { filePath: chunk.filePath, chunkId: chunk.chunkId },
      score: best,
      candidates: top.map((scored) => `${scored.entity.kind}:${scored.entity.id}`),
      chosen: { kind: winner.entity.kind, id: winner.entity.id },
    },
  };
}

// =============================================================================
// Bridge Linker
// =============================================================================

export class BridgeLinker {
  private readonly options: BridgeLinkerOptions;
  private readonly logger: Logger;

  constructor(
    private readonly store: IGraphStore,
    options: Partial<BridgeLinkerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = createLogger("bridge-linker");
  }

  /**
   * Link every chunk currently in the store
   */
  async linkAll(token?: CancellationToken): Promise<BridgeReport> {
    return this.link(await this.store.listChunks(), token);
  }

  async link(chunks: readonly ChunkRecord[], token?: CancellationToken): Promise<BridgeReport> {
    const startTime = Date.now();
    const report: BridgeReport = {
      linkedChunks: 0,
      fileFallbacks: 0,
      ties: [],
      failures: [],
      cancelled: false,
      durationMs: 0,
    };

    const byFile = new Map<string, ChunkRecord[]>();
    for (const chunk of chunks) {
      const group = byFile.get(chunk.filePath) ?? [];
      group.push(chunk);
      byFile.set(chunk.filePath, group);
    }

    outer: for (const [filePath, fileChunks] of byFile) {
      const entities = await this.store.listEntities(filePath);

      for (const chunk of fileChunks) {
        if (token?.cancelled) {
          report.cancelled = true;
          break outer;
        }
        await this.linkChunk(chunk, entities, report);
      }
    }

    report.durationMs = Date.now() - startTime;
    this.logger.info(
      {
        linked: report.linkedChunks,
        fileFallbacks: report.fileFallbacks,
        ties: report.ties.length,
        failures: report.failures.length,
      },
      "Bridge linking complete"
    );
    return report;
  }

  private async linkChunk(chunk: ChunkRecord, entities: StoredEntity[], report: BridgeReport): Promise<void> {
    const key = { filePath: chunk.filePath, chunkId: chunk.chunkId };
    const { winner, tie } = selectEntity(chunk, entities, this.options);

    try {
      if (winner) {
        await this.store.replaceBridge(key, {
          kind: "entity",
          entity: { kind: winner.entity.kind, id: winner.entity.id },
          score: winner.score,
        });
        report.linkedChunks++;
      } else {
        await this.store.replaceBridge(key, { kind: "file", filePath: chunk.filePath });
        report.fileFallbacks++;
      }
    } catch (error) {
      if (error instanceof StoreConnectivityError) throw error;
      this.logger.warn({ err: error, chunk: chunkKeyOf(chunk) }, "Failed to replace bridge edges");
      report.failures.push({ chunk: key, error: describeError(error) });
      return;
    }

    if (tie) {
      this.logger.debug({ chunk: chunkKeyOf(chunk), candidates: tie.candidates }, "Bridge tie broken");
      report.ties.push(tie);
    }
  }
}
