/**
 * clear command - Delete everything in the graph store
 */

import chalk from "chalk";
import { createLogger } from "../../utils/logger.js";
import { openStore } from "../../core/runtime.js";
import { askQuestion, loadCliConfig, type GlobalOptions } from "../shared.js";

const logger = createLogger("clear");

export interface ClearOptions extends GlobalOptions {
  yes?: boolean;
}

export async function clearCommand(options: ClearOptions): Promise<void> {
  const config = loadCliConfig(options);
  const target = config.store.engine === "neo4j" ? `${config.store.uri} (${config.store.database})` : "memory";

  if (!options.yes) {
    const answer = await askQuestion(
      chalk.yellow(`Delete every node and relationship in ${target}? Type "yes" to confirm: `)
    );
    if (answer.toLowerCase() !== "yes") {
      console.log(chalk.dim("Nothing deleted."));
      return;
    }
  }

  const store = await openStore(config);
  try {
    const summary = await store.clear();
    logger.info({ target, ...summary }, "Store cleared");
    console.log(
      chalk.green(`Deleted ${summary.nodesDeleted} nodes and ${summary.relationshipsDeleted} relationships.`)
    );
  } finally {
    await store.close();
  }
}
