/**
 * In-process stand-ins for the external services, shared by the tests
 */

import type { ChunkRecord, SourceFile } from "../../../types/index.js";
import { ErrorCode, ServiceError } from "../../errors.js";
import type { EmbeddingResult, IEmbeddingService } from "../../embeddings/index.js";
import type { InferenceOptions, InferenceResult, ILLMService, LLMStats } from "../../llm/interfaces/ILLMService.js";

// =============================================================================
// Embeddings
// =============================================================================

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9_]+/g) ?? [];
}

/**
 * Deterministic bag-of-words embedder: each token bumps one bucket, then the
 * vector is L2-normalized. Texts sharing words score higher.
 */
export class HashingEmbeddingService implements IEmbeddingService {
  readonly isReady = true;
  embedCalls = 0;
  batchCalls = 0;
  private failing: (text: string) => boolean;

  constructor(
    private readonly dimension = 64,
    failOn: (text: string) => boolean = () => false,
    private readonly modelId = "hashing-test"
  ) {
    this.failing = failOn;
  }

  failWhen(predicate: (text: string) => boolean): void {
    this.failing = predicate;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const bucket = fnv1a(token) % this.dimension;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  async initialize(): Promise<void> {}

  async embed(text: string): Promise<EmbeddingResult> {
    this.embedCalls++;
    if (this.failing(text)) {
      throw new ServiceError("embedding refused", ErrorCode.SERVICE_REQUEST_FAILED, { service: "embeddings" });
    }
    return { vector: this.vectorFor(text), modelId: this.modelId };
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    this.batchCalls++;
    if (texts.some((text) => this.failing(text))) {
      throw new ServiceError("batch refused", ErrorCode.SERVICE_REQUEST_FAILED, { service: "embeddings" });
    }
    return texts.map((text) => ({ vector: this.vectorFor(text), modelId: this.modelId }));
  }

  getDimension(): number {
    return this.dimension;
  }

  getModelId(): string {
    return this.modelId;
  }

  async shutdown(): Promise<void> {}
}

// =============================================================================
// Completion Service
// =============================================================================

export type Responder = (prompt: string, options: InferenceOptions) => string | Error | Promise<string | Error>;

/**
 * Completion service that answers from a script and records every prompt
 */
export class ScriptedLLMService implements ILLMService {
  readonly isReady = true;
  readonly modelId = "scripted-test";
  readonly prompts: Array<{ prompt: string; options: InferenceOptions }> = [];

  constructor(private responder: Responder) {}

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  async initialize(): Promise<void> {}

  async infer(prompt: string, options: InferenceOptions = {}): Promise<InferenceResult> {
    this.prompts.push({ prompt, options });
    const reply = await this.responder(prompt, options);
    if (reply instanceof Error) throw reply;
    return { text: reply, tokensGenerated: tokenize(reply).length, durationMs: 0, attempts: 1 };
  }

  getStats(): LLMStats {
    return { totalCalls: this.prompts.length, failedCalls: 0, retries: 0, totalTokens: 0, avgDurationMs: 0 };
  }

  async shutdown(): Promise<void> {}
}

export function serviceFailure(message = "service unavailable"): ServiceError {
  return new ServiceError(message, ErrorCode.SERVICE_REQUEST_FAILED, { service: "llm" });
}

// =============================================================================
// Extraction Payloads
// =============================================================================

export interface ScriptedNode {
  id: string;
  type: string;
  start_line?: number;
  end_line?: number;
}

export interface ScriptedRelationship {
  source: string;
  type: string;
  target: string;
}

export function extractionReply(nodes: ScriptedNode[], relationships: ScriptedRelationship[] = []): string {
  return JSON.stringify({ nodes, relationships });
}

/** "File: <path>" header line of an extraction prompt */
export function promptFilePath(prompt: string): string {
  return prompt.split("\n")[0]?.replace(/^File: /, "") ?? "";
}

// =============================================================================
// Fixtures
// =============================================================================

export function chunkOf(filePath: string, chunkId: number, text: string, startLine = 1): ChunkRecord {
  const lineCount = text.split("\n").length;
  return {
    filePath,
    chunkId,
    text,
    language: "java",
    startLine,
    endLine: startLine + lineCount - 1,
    chunkSize: text.length,
  };
}

export const SMITHY_FILES: SourceFile[] = [
  {
    filePath: "src/Blacksmith.java",
    language: "java",
    content: [
      "package smithy;",
      "",
      "public abstract class Blacksmith {",
      "  public abstract Weapon forgeWeapon(WeaponType type);",
      "}",
    ].join("\n"),
  },
  {
    filePath: "src/OrcBlacksmith.java",
    language: "java",
    content: [
      "package smithy;",
      "",
      "public class OrcBlacksmith extends Blacksmith {",
      "  public Weapon forgeWeapon(WeaponType type) {",
      "    return new OrcWeapon(type);",
      "  }",
      "}",
    ].join("\n"),
  },
  {
    filePath: "src/ElfBlacksmith.java",
    language: "java",
    content: [
      "package smithy;",
      "",
      "public class ElfBlacksmith extends Blacksmith {",
      "  public Weapon forgeWeapon(WeaponType type) {",
      "    return new ElfWeapon(type);",
      "  }",
      "}",
    ].join("\n"),
  },
];
