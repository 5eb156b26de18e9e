#!/usr/bin/env node

/**
 * codegraph CLI
 * Ingest a codebase into the graph store and ask questions about it
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { ingestCommand, type IngestOptions } from "./commands/ingest.js";
import { queryCommand, type QueryOptions } from "./commands/query.js";
import { statusCommand, type StatusOptions } from "./commands/status.js";
import { clearCommand, type ClearOptions } from "./commands/clear.js";
import { configCommand, type ConfigOptions } from "./commands/config.js";
import { cancelActiveRuns } from "./shared.js";
import { createLogger } from "../utils/logger.js";
import { ConfigurationError, isCodeGraphError } from "../core/errors.js";

const logger = createLogger("cli");

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// Create the main program
const program = new Command();

program
  .name("codegraph")
  .description("Hybrid graph and vector retrieval over source code")
  .version("0.1.0")
  .option("-c, --config <path>", "Configuration file (default: .codegraph/config.json)")
  .option("-s, --store <engine>", "Store engine override (neo4j, memory)")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("ingest")
  .description("Chunk, extract, embed and link the files of a directory")
  .argument("[directory]", "Directory to ingest", ".")
  .option("-e, --ext <extensions>", "Comma-separated extensions to include (e.g. java,kt)")
  .option("-x, --exclude <pattern>", "Glob pattern to skip (repeatable)", collect, [])
  .option("--no-extract", "Skip structural extraction")
  .option("--no-embed", "Skip embedding")
  .option("--force-embeddings", "Re-embed chunks that already have a vector")
  .action((directory: string, _options: unknown, command: Command) =>
    ingestCommand(directory, command.optsWithGlobals<IngestOptions>())
  );

program
  .command("query")
  .description("Ask a question about the ingested code")
  .argument("<question...>", "Question in natural language")
  .option("-k, --k <count>", "Chunks to retrieve (1-50)", parseInteger)
  .option("--no-graph", "Answer from similar chunks only")
  .option("-d, --depth <depth>", "Graph traversal depth (0-5)", parseInteger)
  .option("-f, --floor <similarity>", "Minimum similarity to keep a chunk", parseNumber)
  .option("--json", "Print the full result as JSON")
  .action((words: string[], _options: unknown, command: Command) =>
    queryCommand(words.join(" "), command.optsWithGlobals<QueryOptions>())
  );

program
  .command("status")
  .description("Show node, relationship and embedding counts")
  .option("--json", "Print statistics as JSON")
  .action((_options: unknown, command: Command) => statusCommand(command.optsWithGlobals<StatusOptions>()));

program
  .command("clear")
  .description("Delete every node and relationship in the store")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action((_options: unknown, command: Command) => clearCommand(command.optsWithGlobals<ClearOptions>()));

program
  .command("config")
  .description("Show the effective configuration")
  .option("--init", "Write a configuration file with the defaults")
  .option("--force", "Overwrite an existing file with --init")
  .option("--path", "Print the configuration file path")
  .action((_options: unknown, command: Command) => configCommand(command.optsWithGlobals<ConfigOptions>()));

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    logger.error({ err: error }, "Invalid configuration");
    console.error(chalk.red(`\nError: ${error.message}`));
    for (const issue of error.issues) {
      console.error(chalk.red(`  • ${issue}`));
    }
  } else if (isCodeGraphError(error)) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError [${error.code}]: ${error.message}`));
    if (error.cause instanceof Error) {
      console.error(chalk.dim(`  Caused by: ${error.cause.message}`));
    }
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

/**
 * First signal cancels running work between chunks; a second one exits
 */
function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");

  if (cancelActiveRuns(`received ${signal}`)) {
    console.log(chalk.dim(`\nReceived ${signal}, finishing the current chunks... (again to force)`));
    return;
  }
  process.exit(0);
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
