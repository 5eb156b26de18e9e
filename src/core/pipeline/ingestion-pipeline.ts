/**
 * Ingestion Pipeline
 *
 * Runs one ingestion pass over a file source:
 *
 *   Read → Chunk → Store → (Extract ∥ Embed) → Link
 *
 * Extraction and embedding work on the same stored chunks and run side by
 * side; the bridge linker runs once both are done. Unreadable files are
 * skipped and reported.
 *
 * @module
 */

import type { ChunkRecord, SourceFile } from "../../types/index.js";
import { fromPromiseWith, partition, type Result } from "../../types/result.js";
import { CancellationTokenSource, type CancellationToken } from "../../utils/async.js";
import { toPosixPath } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { BridgeLinker, BridgeReport } from "../bridge/bridge-linker.js";
import type { Chunker } from "../chunking/chunker.js";
import { describeFile } from "../chunking/chunker.js";
import type { EmbeddingIndexer, EmbeddingReport } from "../embeddings/embedding-indexer.js";
import { describeError, StoreConnectivityError } from "../errors.js";
import type { ExtractionReport, StructuralExtractor } from "../extraction/structural-extractor.js";
import type { IFileSource } from "../interfaces/IFileSource.js";
import type { IGraphStore } from "../interfaces/IGraphStore.js";

// =============================================================================
// Types
// =============================================================================

export type IngestionPhase = "reading" | "chunking" | "extracting" | "embedding" | "linking" | "complete";

export interface IngestionProgressEvent {
  phase: IngestionPhase;
  processed: number;
  total: number;
  message: string;
}

export interface FileFailure {
  filePath: string;
  stage: "read" | "store";
  error: string;
}

export interface IngestionReport {
  source: string;
  files: {
    listed: number;
    read: number;
    /** Files that produced at least one chunk and were stored */
    ingested: number;
    /** Blank or filtered-out files */
    empty: number;
    failures: FileFailure[];
  };
  chunks: number;
  /** null when the stage was turned off or the run was cancelled first */
  extraction: ExtractionReport | null;
  embedding: EmbeddingReport | null;
  bridge: BridgeReport | null;
  cancelled: boolean;
  durationMs: number;
}

export interface IngestionPipelineOptions {
  store: IGraphStore;
  chunker: Chunker;
  extractor: StructuralExtractor;
  indexer: EmbeddingIndexer;
  linker: BridgeLinker;
  onProgress?: (event: IngestionProgressEvent) => void;
}

export interface IngestionRunOptions {
  token?: CancellationToken;
  /** Recorded on every stored chunk */
  codebasePath?: string;
  /** Run structural extraction (default: true) */
  extract?: boolean;
  /** Run embedding (default: true) */
  embed?: boolean;
  /** Re-embed chunks that already carry a vector */
  forceEmbeddings?: boolean;
}

// =============================================================================
// Ingestion Pipeline
// =============================================================================

export class IngestionPipeline {
  private readonly logger: Logger;

  constructor(private readonly options: IngestionPipelineOptions) {
    this.logger = createLogger("ingestion-pipeline");
  }

  async run(source: IFileSource, runOptions: IngestionRunOptions = {}): Promise<IngestionReport> {
    const startTime = Date.now();
    const { token } = runOptions;
    const report: IngestionReport = {
      source: source.description,
      files: { listed: 0, read: 0, ingested: 0, empty: 0, failures: [] },
      chunks: 0,
      extraction: null,
      embedding: null,
      bridge: null,
      cancelled: false,
      durationMs: 0,
    };

    const files = await this.readFiles(source, report);
    const chunks = await this.storeChunks(files, report, runOptions.codebasePath, token);
    report.chunks = chunks.length;

    if (token?.cancelled) {
      return this.finish(report, startTime, true);
    }

    const [extraction, embedding] = await this.enrich(chunks, runOptions);
    report.extraction = extraction;
    report.embedding = embedding;

    if (token?.cancelled || extraction?.cancelled === true || embedding?.cancelled === true) {
      return this.finish(report, startTime, true);
    }

    this.progress("linking", 0, chunks.length, "Linking chunks to entities");
    report.bridge = await this.options.linker.link(chunks, token);

    return this.finish(report, startTime, report.bridge.cancelled);
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private async readFiles(source: IFileSource, report: IngestionReport): Promise<SourceFile[]> {
    const paths = await source.list();
    report.files.listed = paths.length;
    this.progress("reading", 0, paths.length, `Reading ${paths.length} files from ${source.description}`);

    const results: Result<SourceFile, FileFailure>[] = [];
    for (const filePath of paths) {
      results.push(
        await fromPromiseWith(source.read(filePath), (error): FileFailure => ({
          filePath,
          stage: "read",
          error: describeError(error),
        }))
      );
    }

    const { oks, errs } = partition(results);
    for (const failure of errs) {
      this.logger.warn({ filePath: failure.filePath, error: failure.error }, "Skipping unreadable file");
    }
    report.files.read = oks.length;
    report.files.failures.push(...errs);
    return oks;
  }

  private async storeChunks(
    files: SourceFile[],
    report: IngestionReport,
    codebasePath: string | undefined,
    token: CancellationToken | undefined
  ): Promise<ChunkRecord[]> {
    const { chunker, store } = this.options;
    const stored: ChunkRecord[] = [];

    for (const [index, file] of files.entries()) {
      if (token?.cancelled) break;
      this.progress("chunking", index, files.length, `Chunking ${file.filePath}`);

      const chunks = chunker.chunk(file);
      try {
        if (chunks.length === 0) {
          report.files.empty++;
          await this.dropStaleChunks(file);
          continue;
        }
        await store.upsertFile(describeFile(file, chunks), chunks, codebasePath);
      } catch (error) {
        if (error instanceof StoreConnectivityError) throw error;
        this.logger.warn({ err: error, filePath: file.filePath }, "Store rejected file");
        report.files.failures.push({ filePath: file.filePath, stage: "store", error: describeError(error) });
        continue;
      }

      report.files.ingested++;
      stored.push(...chunks);
    }

    return stored;
  }

  /**
   * A file that no longer yields chunks keeps none in the store either
   */
  private async dropStaleChunks(file: SourceFile): Promise<void> {
    const { store } = this.options;
    const stale = await store.listChunks({ filePaths: [toPosixPath(file.filePath)] });
    if (stale.length === 0) return;
    this.logger.debug({ filePath: file.filePath, chunks: stale.length }, "Removing chunks of emptied file");
    await store.upsertFile(describeFile(file, []), []);
  }

  /**
   * Extraction and embedding side by side. If either fails outright the
   * other is cancelled before the failure propagates.
   */
  private async enrich(
    chunks: ChunkRecord[],
    runOptions: IngestionRunOptions
  ): Promise<[ExtractionReport | null, EmbeddingReport | null]> {
    const { extractor, indexer } = this.options;
    const shared = new CancellationTokenSource();
    const unlink = runOptions.token?.onCancel(() => shared.cancel(runOptions.token?.reason));

    const abortOnFailure = <T>(work: Promise<T>): Promise<T> =>
      work.catch((error: unknown) => {
        shared.cancel("sibling stage failed");
        throw error;
      });

    let extraction: Promise<ExtractionReport | null> = Promise.resolve(null);
    if (runOptions.extract !== false) {
      this.progress("extracting", 0, chunks.length, "Extracting structure");
      extraction = abortOnFailure(extractor.extract(chunks, shared.token));
    }

    let embedding: Promise<EmbeddingReport | null> = Promise.resolve(null);
    if (runOptions.embed !== false) {
      this.progress("embedding", 0, chunks.length, "Embedding chunks");
      embedding = abortOnFailure(indexer.index(chunks, { force: runOptions.forceEmbeddings, token: shared.token }));
    }

    try {
      return await Promise.all([extraction, embedding]);
    } finally {
      unlink?.();
    }
  }

  private finish(report: IngestionReport, startTime: number, cancelled: boolean): IngestionReport {
    report.cancelled = cancelled;
    report.durationMs = Date.now() - startTime;
    this.progress("complete", report.chunks, report.chunks, cancelled ? "Ingestion cancelled" : "Ingestion complete");
    this.logger.info(
      {
        source: report.source,
        files: report.files.ingested,
        failedFiles: report.files.failures.length,
        chunks: report.chunks,
        cancelled,
        durationMs: report.durationMs,
      },
      "Ingestion pass finished"
    );
    return report;
  }

  private progress(phase: IngestionPhase, processed: number, total: number, message: string): void {
    this.options.onProgress?.({ phase, processed, total, message });
  }
}
