/**
 * status command - Show what the graph store holds
 */

import chalk from "chalk";
import { createLogger } from "../../utils/logger.js";
import { openStore } from "../../core/runtime.js";
import { NODE_LABELS, RELATIONSHIP_TYPES } from "../../types/index.js";
import { formatPercent, loadCliConfig, type GlobalOptions } from "../shared.js";

const logger = createLogger("status");

export interface StatusOptions extends GlobalOptions {
  json?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  logger.info({ options }, "Checking status");
  const config = loadCliConfig(options);

  const store = await openStore(config);
  try {
    const healthy = await store.healthCheck();
    const stats = await store.getStats();

    if (options.json) {
      console.log(JSON.stringify({ healthy, ...stats }, null, 2));
      return;
    }

    console.log();
    console.log(chalk.cyan.bold("Graph Store Status"));
    console.log(chalk.dim("─".repeat(40)));
    console.log(`  Engine:        ${config.store.engine}`);
    if (config.store.engine === "neo4j") {
      console.log(`  URI:           ${chalk.dim(config.store.uri)}`);
    }
    console.log(`  Health:        ${healthy ? chalk.green("ok") : chalk.red("unreachable")}`);
    console.log(`  Vector index:  ${stats.vectorIndexPresent ? chalk.green("present") : chalk.yellow("missing")}`);

    console.log();
    console.log(chalk.white.bold("Nodes"));
    for (const label of NODE_LABELS) {
      console.log(`  ${label.padEnd(14)} ${stats.nodeCounts[label]}`);
    }

    console.log();
    console.log(chalk.white.bold("Relationships"));
    for (const type of RELATIONSHIP_TYPES) {
      console.log(`  ${type.padEnd(14)} ${stats.relationshipCounts[type]}`);
    }

    console.log();
    console.log(chalk.white.bold("Embeddings"));
    console.log(`  Embedded:      ${stats.embeddedChunks}/${stats.totalChunks}`);
    console.log(`  Coverage:      ${formatPercent(stats.coverage)}`);
    console.log(chalk.dim("─".repeat(40)));
  } finally {
    await store.close();
  }
}
