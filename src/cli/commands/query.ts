/**
 * query command - Ask a question about the ingested code
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/logger.js";
import { openRuntime } from "../../core/runtime.js";
import type { HybridQueryResult } from "../../core/query/index.js";
import { formatDuration, loadCliConfig, type GlobalOptions } from "../shared.js";

const logger = createLogger("query");

export interface QueryOptions extends GlobalOptions {
  k?: number;
  /** false for --no-graph */
  graph: boolean;
  depth?: number;
  floor?: number;
  json?: boolean;
}

export async function queryCommand(question: string, options: QueryOptions): Promise<void> {
  logger.info({ question, options }, "Running query");
  const config = loadCliConfig(options);

  const spinner = options.json ? null : ora("Searching...").start();
  const runtime = await openRuntime(config).catch((error: unknown) => {
    spinner?.fail(chalk.red("Could not open the store or services"));
    throw error;
  });

  try {
    const result = await runtime.engine.query(question, {
      k: options.k,
      includeGraphContext: options.graph,
      traversalDepth: options.depth,
      similarityFloor: options.floor,
    });
    spinner?.stop();

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    printResult(result);
  } catch (error) {
    spinner?.fail(chalk.red("Query failed"));
    throw error;
  } finally {
    await runtime.close();
  }
}

function printResult(result: HybridQueryResult): void {
  console.log();
  console.log(result.answer);
  console.log();
  console.log(chalk.dim("─".repeat(40)));

  if (result.chunks.length > 0) {
    console.log(chalk.white.bold("Sources"));
    for (const { chunk, score } of result.chunks) {
      console.log(`  ${chalk.cyan(score.toFixed(3))}  ${chunk.filePath}:${chunk.startLine}-${chunk.endLine}`);
    }
  }

  if (result.context.relationships.length > 0) {
    console.log();
    console.log(chalk.white.bold("Related"));
    for (const edge of result.context.relationships.slice(0, 10)) {
      console.log(`  ${edge.source.name} ${chalk.dim(edge.type)} ${edge.target.name}`);
    }
    if (result.context.relationships.length > 10) {
      console.log(chalk.dim(`  ... and ${result.context.relationships.length - 10} more`));
    }
  }

  const notes: string[] = [];
  if (result.degraded) notes.push("graph context unavailable");
  if (result.timedOut) notes.push("timed out");
  if (result.synthesis === "fallback") notes.push("answer built without the language model");

  console.log();
  if (notes.length > 0) {
    console.log(chalk.yellow(`Note: ${notes.join("; ")}`));
  }
  console.log(chalk.dim(`Answered in ${formatDuration(result.durationMs)}`));
}
