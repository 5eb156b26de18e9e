/**
 * ingest command - Build the graph for a directory
 */

import * as path from "node:path";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { createLogger } from "../../utils/logger.js";
import { openRuntime } from "../../core/runtime.js";
import { DirectorySource } from "../../core/sources/index.js";
import type { IngestionProgressEvent, IngestionReport } from "../../core/pipeline/index.js";
import { cancellableRun, formatDuration, formatPercent, loadCliConfig, type GlobalOptions } from "../shared.js";

const logger = createLogger("ingest");

export interface IngestOptions extends GlobalOptions {
  /** Comma-separated extensions to include */
  ext?: string;
  exclude?: string[];
  /** commander sets these false for --no-extract / --no-embed */
  extract: boolean;
  embed: boolean;
  forceEmbeddings?: boolean;
}

const PHASE_LABELS: Record<IngestionProgressEvent["phase"], string> = {
  reading: "Reading",
  chunking: "Chunking",
  extracting: "Extracting",
  embedding: "Embedding",
  linking: "Linking",
  complete: "Done",
};

export async function ingestCommand(directory: string | undefined, options: IngestOptions): Promise<void> {
  const root = path.resolve(directory ?? ".");
  logger.info({ root, options }, "Starting ingestion");

  const config = loadCliConfig(options);
  const extensions = options.ext
    ? options.ext.split(",").map((ext) => ext.trim()).filter((ext) => ext.length > 0)
    : [];

  console.log();
  console.log(chalk.cyan.bold("Ingesting"), chalk.dim(root));
  console.log(chalk.dim("─".repeat(40)));

  const spinner = ora("Connecting...").start();
  const { source: cancellation, release } = cancellableRun();
  const runtime = await openRuntime(config, {
    onProgress: (event) => updateSpinner(spinner, event),
  }).catch((error: unknown) => {
    spinner.fail(chalk.red("Could not open the store or services"));
    release();
    throw error;
  });

  try {
    const report = await runtime.pipeline.run(new DirectorySource(root, { extensions, exclude: options.exclude }), {
      token: cancellation.token,
      codebasePath: root,
      extract: options.extract,
      embed: options.embed,
      forceEmbeddings: options.forceEmbeddings,
    });

    if (report.cancelled) {
      spinner.warn(chalk.yellow("Ingestion cancelled"));
    } else if (report.files.failures.length > 0) {
      spinner.warn(chalk.yellow("Ingestion completed with errors"));
    } else {
      spinner.succeed(chalk.green("Ingestion complete"));
    }

    printReport(report);
    logger.info({ chunks: report.chunks, durationMs: report.durationMs }, "Ingestion complete");
  } catch (error) {
    spinner.fail(chalk.red("Ingestion failed"));
    logger.error({ err: error }, "Ingestion failed");
    throw error;
  } finally {
    release();
    await runtime.close();
  }
}

function updateSpinner(spinner: Ora, event: IngestionProgressEvent): void {
  const progress = event.total > 0 ? ` (${event.processed}/${event.total})` : "";
  spinner.text = `${PHASE_LABELS[event.phase]}: ${event.message}${progress}`;
}

function printReport(report: IngestionReport): void {
  console.log();
  console.log(chalk.white.bold("Files"));
  console.log(`  Listed:      ${report.files.listed}`);
  console.log(`  Ingested:    ${report.files.ingested}`);
  console.log(`  Empty:       ${report.files.empty}`);
  console.log(`  Failed:      ${report.files.failures.length}`);
  console.log(`  Chunks:      ${report.chunks}`);

  if (report.extraction) {
    const { extraction } = report;
    console.log();
    console.log(chalk.white.bold("Structure"));
    console.log(`  Chunks processed:  ${extraction.processedChunks}`);
    console.log(`  Chunks skipped:    ${extraction.skippedChunks}`);
    console.log(`  Entities:          ${extraction.entitiesWritten}`);
    console.log(`  Relationships:     ${extraction.relationshipsWritten}`);
    console.log(`  Quarantined:       ${extraction.quarantined.length}`);
  }

  if (report.embedding) {
    const { embedding } = report;
    console.log();
    console.log(chalk.white.bold("Embeddings"));
    console.log(`  Embedded:    ${embedding.embeddedChunks}`);
    console.log(`  Reused:      ${embedding.alreadyEmbedded}`);
    console.log(`  Failed:      ${embedding.failedChunks}`);
    console.log(`  Coverage:    ${formatPercent(embedding.coverage)}`);
  }

  if (report.bridge) {
    console.log();
    console.log(chalk.white.bold("Bridge"));
    console.log(`  Linked to entities:  ${report.bridge.linkedChunks}`);
    console.log(`  Linked to files:     ${report.bridge.fileFallbacks}`);
    console.log(`  Ties broken:         ${report.bridge.ties.length}`);
  }

  if (report.files.failures.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Errors (${report.files.failures.length})`));
    for (const failure of report.files.failures.slice(0, 5)) {
      console.log(`  ${chalk.red("✗")} ${failure.filePath}: ${failure.error}`);
    }
    if (report.files.failures.length > 5) {
      console.log(chalk.dim(`  ... and ${report.files.failures.length - 5} more errors`));
    }
  }

  console.log();
  console.log(chalk.dim(`Duration: ${formatDuration(report.durationMs)}`));
  console.log(chalk.dim("─".repeat(40)));
}
