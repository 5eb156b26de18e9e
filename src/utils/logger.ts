/**
 * Logger Module
 * Structured logging using pino with console or file output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as path from "node:path";
import { ensureDir, getLogsDir } from "./index.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

/**
 * Pretty output only makes sense for a human watching a terminal
 */
function wantsPrettyOutput(): boolean {
  return !isProduction() && process.env.NODE_ENV !== "test" && process.stderr.isTTY === true;
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isProduction() ? "info" : "debug";
}

/**
 * Process-wide overrides applied by the CLI after configuration is loaded
 */
let globalOptions: LoggerOptions = {};

export function configureLogging(options: LoggerOptions): void {
  globalOptions = { ...options };
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "chunker", "bridge-linker")
 *
 * @example
 * ```typescript
 * const logger = createLogger("embedding-indexer");
 * logger.info({ batch: 3 }, "Embedded batch");
 * logger.warn({ err }, "Batch failed, retrying per element");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const {
    level = getLogLevel(),
    enableFileLogging = false,
    logDir,
  } = { ...globalOptions, ...options };

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
    serializers: { err: pino.stdSerializers.err },
  };

  if (enableFileLogging) {
    const dir = logDir ?? getLogsDir();
    ensureDir(dir);
    const destination = pino.destination({
      dest: path.join(dir, "codegraph.log"),
      sync: false,
    });
    return pino(baseOptions, destination);
  }

  if (wantsPrettyOutput()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  // stderr keeps stdout free for command output
  return pino(baseOptions, pino.destination(2));
}

export type Logger = PinoLogger;
