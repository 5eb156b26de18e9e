/**
 * Engine configuration loading
 *
 * Resolution order, later wins: built-in defaults, `.codegraph/config.json`,
 * environment variables, explicit overrides (CLI flags).
 *
 * @module
 */

import { ZodError } from "zod";
import { getConfigPath, readJson } from "../utils/index.js";
import {
  EngineConfigSchema,
  formatIssues,
  type EngineConfig,
} from "../utils/validation.js";
import { ConfigurationError, ErrorCode } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface LoadConfigOptions {
  projectRoot?: string;
  /** Explicit config file; defaults to `.codegraph/config.json` under the project root */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigTree;
}

/** Loose nested document as read from JSON or assembled from the environment */
export type ConfigTree = { [key: string]: unknown };

// =============================================================================
// Environment Mapping
// =============================================================================

type EnvParser = (raw: string) => unknown;

const asString: EnvParser = (raw) => raw;
const asNumber: EnvParser = (raw) => {
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : raw;
};
const asList: EnvParser = (raw) =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const ENV_BINDINGS: ReadonlyArray<[string, [string, string], EnvParser]> = [
  ["NEO4J_URI", ["store", "uri"], asString],
  ["NEO4J_USERNAME", ["store", "username"], asString],
  ["NEO4J_PASSWORD", ["store", "password"], asString],
  ["NEO4J_DATABASE", ["store", "database"], asString],
  ["CODEGRAPH_STORE", ["store", "engine"], asString],
  ["LLM_PROVIDER", ["llm", "provider"], asString],
  ["LLM_MODEL", ["llm", "model"], asString],
  ["EMBEDDING_MODEL", ["embeddings", "model"], asString],
  ["EMBEDDING_DIMENSION", ["embeddings", "dimension"], asNumber],
  ["CHUNK_SIZE", ["chunking", "chunkSize"], asNumber],
  ["CHUNK_OVERLAP", ["chunking", "chunkOverlap"], asNumber],
  ["ALLOWED_LANGUAGES", ["chunking", "allowedLanguages"], asList],
];

function isTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a partial configuration document from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigTree {
  const tree: ConfigTree = {};

  const put = (section: string, key: string, value: unknown): void => {
    const existing = tree[section];
    const target: ConfigTree = isTree(existing) ? existing : {};
    target[key] = value;
    tree[section] = target;
  };

  for (const [name, [section, key], parse] of ENV_BINDINGS) {
    const raw = env[name];
    if (raw !== undefined && raw !== "") {
      put(section, key, parse(raw));
    }
  }

  // API keys follow the provider that needs them
  const provider = env.LLM_PROVIDER ?? (isTree(tree.llm) ? tree.llm.provider : undefined);
  const llmKey = provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  if (llmKey) put("llm", "apiKey", llmKey);
  if (env.OPENAI_API_KEY) put("embeddings", "apiKey", env.OPENAI_API_KEY);

  return tree;
}

/**
 * Deep-merge configuration documents; arrays and scalars are replaced
 */
export function mergeConfig(base: ConfigTree, override: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isTree(current) && isTree(value) ? mergeConfig(current, value) : value;
  }
  return merged;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate a configuration document, failing with every issue listed
 */
export function parseConfig(document: unknown): EngineConfig {
  try {
    return EngineConfigSchema.parse(document);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = formatIssues(error);
      throw new ConfigurationError("Invalid configuration", ErrorCode.CONFIG_INVALID, { issues });
    }
    throw error;
  }
}

export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const { env = process.env, overrides = {} } = options;
  const configPath = options.configPath ?? getConfigPath(options.projectRoot);

  let fileConfig: unknown;
  try {
    fileConfig = readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${configPath}`,
      ErrorCode.CONFIG_FILE_UNREADABLE,
      { configPath, reason: error instanceof Error ? error.message : String(error) }
    );
  }

  if (fileConfig !== null && !isTree(fileConfig)) {
    throw new ConfigurationError(
      `Configuration file ${configPath} must contain a JSON object`,
      ErrorCode.CONFIG_FILE_UNREADABLE,
      { configPath }
    );
  }

  const fileLayer: ConfigTree = isTree(fileConfig) ? fileConfig : {};
  const document = [fileLayer, configFromEnv(env), overrides].reduce<ConfigTree>(
    (acc, layer) => mergeConfig(acc, layer),
    {}
  );

  return parseConfig(document);
}

/**
 * Configuration with secrets masked, for display
 */
export function redactConfig(config: EngineConfig): EngineConfig {
  const mask = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : "********";
  return {
    ...config,
    store: { ...config.store, password: mask(config.store.password) ?? "" },
    llm: { ...config.llm, apiKey: mask(config.llm.apiKey) },
    embeddings: { ...config.embeddings, apiKey: mask(config.embeddings.apiKey) },
  };
}
