/**
 * Helpers shared by the CLI commands
 */

import * as readline from "node:readline";
import { loadConfig } from "../core/config.js";
import { configureLogging } from "../utils/logger.js";
import type { EngineConfig } from "../utils/validation.js";
import { CancellationTokenSource } from "../utils/async.js";

export interface GlobalOptions {
  /** Path to a configuration file other than .codegraph/config.json */
  config?: string;
  /** Store engine override */
  store?: string;
}

/**
 * Load the configuration for a command and apply its logging section
 */
export function loadCliConfig(options: GlobalOptions): EngineConfig {
  const config = loadConfig({
    configPath: options.config,
    overrides: options.store ? { store: { engine: options.store } } : {},
  });
  configureLogging({ level: config.logging.level, enableFileLogging: config.logging.file });
  return config;
}

export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Ask a question on the terminal and return the trimmed answer
 */
export async function askQuestion(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await new Promise((resolve) => {
      rl.question(question, (answer) => resolve(answer.trim()));
    });
  } finally {
    rl.close();
  }
}

// =============================================================================
// Cancellation
// =============================================================================

const activeRuns = new Set<CancellationTokenSource>();

/**
 * A cancellation source that the first SIGINT/SIGTERM cancels
 */
export function cancellableRun(): { source: CancellationTokenSource; release: () => void } {
  const source = new CancellationTokenSource();
  activeRuns.add(source);
  return { source, release: () => activeRuns.delete(source) };
}

/**
 * Cancel every running command; returns false when nothing was running
 */
export function cancelActiveRuns(reason: string): boolean {
  if (activeRuns.size === 0) return false;
  for (const source of activeRuns) {
    source.cancel(reason);
  }
  return true;
}
