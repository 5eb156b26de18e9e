/**
 * Structural Extractor
 *
 * Sends each chunk to the completion service, parses the reply against the
 * fixed schema and commits the chunk's entities and relationships in one
 * store transaction. A chunk that keeps failing is skipped and recorded;
 * the rest of the batch carries on.
 *
 * @module
 */

import { chunkKeyOf, type ChunkKey, type ChunkRecord } from "../../types/index.js";
import {
  DEFAULT_RETRY_POLICY,
  forEachConcurrent,
  RateLimiter,
  retry,
  type CancellationToken,
  type RetryPolicy,
} from "../../utils/async.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import {
  CancelledError,
  describeError,
  isParseError,
  isServiceError,
  StoreConnectivityError,
} from "../errors.js";
import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import { buildExtractionPrompt, EXTRACTION_SYSTEM_PROMPT } from "./prompts.js";
import { parseExtractionResponse, type ParsedExtraction, type QuarantinedElement } from "./schema.js";

// =============================================================================
// Types
// =============================================================================

export interface StructuralExtractorOptions {
  concurrency: number;
  /** 0 disables rate limiting */
  requestsPerSecond: number;
  /** Attempts per chunk while replies fail to parse */
  maxParseAttempts: number;
  /** Backoff between parse attempts */
  retry: RetryPolicy;
}

export interface ExtractionFailure {
  chunk: ChunkKey;
  stage: "service" | "parse" | "store";
  error: string;
}

export interface QuarantineRecord extends QuarantinedElement {
  chunk: ChunkKey;
}

export interface ExtractionReport {
  processedChunks: number;
  skippedChunks: number;
  entitiesWritten: number;
  relationshipsWritten: number;
  quarantined: QuarantineRecord[];
  failures: ExtractionFailure[];
  cancelled: boolean;
  durationMs: number;
}

const DEFAULT_OPTIONS: StructuralExtractorOptions = {
  concurrency: 4,
  requestsPerSecond: 0,
  maxParseAttempts: 3,
  retry: DEFAULT_RETRY_POLICY,
};

// =============================================================================
// Structural Extractor
// =============================================================================

export class StructuralExtractor {
  private readonly options: StructuralExtractorOptions;
  private readonly logger: Logger;

  constructor(
    private readonly store: IGraphStore,
    private readonly llm: ILLMService,
    options: Partial<StructuralExtractorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = createLogger("structural-extractor");
  }

  async extract(chunks: readonly ChunkRecord[], token?: CancellationToken): Promise<ExtractionReport> {
    const startTime = Date.now();
    const report: ExtractionReport = {
      processedChunks: 0,
      skippedChunks: 0,
      entitiesWritten: 0,
      relationshipsWritten: 0,
      quarantined: [],
      failures: [],
      cancelled: false,
      durationMs: 0,
    };

    const run = await forEachConcurrent(
      chunks,
      async (chunk) => {
        await this.processChunk(chunk, report, token);
      },
      {
        concurrency: this.options.concurrency,
        token,
        rateLimiter: new RateLimiter(this.options.requestsPerSecond),
      }
    );

    report.cancelled = report.cancelled || run.cancelled;
    report.durationMs = Date.now() - startTime;
    this.logger.info(
      {
        processed: report.processedChunks,
        skipped: report.skippedChunks,
        entities: report.entitiesWritten,
        relationships: report.relationshipsWritten,
        quarantined: report.quarantined.length,
        cancelled: report.cancelled,
      },
      "Structural extraction complete"
    );
    return report;
  }

  /**
   * Request and parse one chunk's structure without writing it
   */
  async extractChunk(chunk: ChunkRecord, token?: CancellationToken): Promise<ParsedExtraction> {
    const prompt = buildExtractionPrompt(chunk);
    return retry(
      async () => {
        const reply = await this.llm.infer(prompt, {
          systemPrompt: EXTRACTION_SYSTEM_PROMPT,
          json: true,
          temperature: 0,
        });
        const parsed = parseExtractionResponse(reply.text, chunk);
        if (!parsed.ok) throw parsed.error;
        return parsed.value;
      },
      {
        ...this.options.retry,
        maxAttempts: this.options.maxParseAttempts,
        retryIf: isParseError,
        token,
        onRetry: (error, attempt) => {
          this.logger.debug({ err: error, attempt, chunk: chunkKeyOf(chunk) }, "Unparseable reply, asking again");
        },
      }
    );
  }

  private async processChunk(
    chunk: ChunkRecord,
    report: ExtractionReport,
    token: CancellationToken | undefined
  ): Promise<void> {
    const key = { filePath: chunk.filePath, chunkId: chunk.chunkId };

    let parsed: ParsedExtraction;
    try {
      parsed = await this.extractChunk(chunk, token);
    } catch (error) {
      if (error instanceof CancelledError) {
        report.cancelled = true;
        return;
      }
      if (!isParseError(error) && !isServiceError(error)) throw error;
      this.logger.warn({ err: error, chunk: chunkKeyOf(chunk) }, "Skipping chunk after failed extraction");
      report.skippedChunks++;
      report.failures.push({ chunk: key, stage: isParseError(error) ? "parse" : "service", error: describeError(error) });
      return;
    }

    for (const element of parsed.quarantined) {
      this.logger.debug({ chunk: chunkKeyOf(chunk), reason: element.reason, element: element.element }, "Quarantined");
      report.quarantined.push({ ...element, chunk: key });
    }

    try {
      const written = await this.store.writeExtraction(parsed.extraction);
      report.entitiesWritten += written.entitiesWritten;
      report.relationshipsWritten += written.relationshipsWritten;
      report.processedChunks++;
    } catch (error) {
      if (error instanceof StoreConnectivityError) throw error;
      this.logger.warn({ err: error, chunk: chunkKeyOf(chunk) }, "Store rejected chunk extraction");
      report.skippedChunks++;
      report.failures.push({ chunk: key, stage: "store", error: describeError(error) });
    }
  }
}
