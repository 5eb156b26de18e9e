/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { configFromEnv, loadConfig, mergeConfig, parseConfig, redactConfig } from "../config.js";
import { ConfigurationError, ErrorCode } from "../errors.js";

function errorCodeOf(fn: () => unknown): ErrorCode | null {
  try {
    fn();
    return null;
  } catch (error) {
    return error instanceof ConfigurationError ? error.code : null;
  }
}

describe("configuration", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "codegraph-config-"));
    configPath = path.join(tempDir, "config.json");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 50, allowedLanguages: [] });
    expect(config.llm.model).toBe("gpt-4o");
    expect(config.embeddings).toMatchObject({ model: "text-embedding-3-large", dimension: 3072 });
    expect(config.store).toMatchObject({
      engine: "neo4j",
      uri: "neo4j://localhost:7687",
      vectorIndexName: "code_chunks_vector_index",
    });
    expect(config.query).toMatchObject({ k: 5, traversalDepth: 2, includeGraphContext: true });
    expect(config.bridge).toEqual({ minConfidence: 0.5, mentionSaturation: 2 });
  });

  it("maps environment variables onto sections", () => {
    expect(
      configFromEnv({
        CHUNK_SIZE: "800",
        ALLOWED_LANGUAGES: "java, kt",
        LLM_PROVIDER: "anthropic",
        ANTHROPIC_API_KEY: "test-secret",
        OPENAI_API_KEY: "test-openai-key",
      })
    ).toEqual({
      chunking: { chunkSize: 800, allowedLanguages: ["java", "kt"] },
      llm: { provider: "anthropic", apiKey: "test-secret" },
      embeddings: { apiKey: "test-openai-key" },
    });
  });

  it("merges nested sections and replaces scalars", () => {
    expect(mergeConfig({ query: { k: 5, traversalDepth: 2 } }, { query: { k: 9 } })).toEqual({
      query: { k: 9, traversalDepth: 2 },
    });
  });

  it("layers file, environment and overrides in that order", async () => {
    await fs.writeFile(configPath, JSON.stringify({ chunking: { chunkSize: 300, chunkOverlap: 10 }, query: { k: 7 } }));

    const config = loadConfig({
      configPath,
      env: { CHUNK_OVERLAP: "20", NEO4J_URI: "bolt://graph:7687" },
      overrides: { store: { engine: "memory" }, query: { k: 3 } },
    });

    expect(config.chunking.chunkSize).toBe(300);
    expect(config.chunking.chunkOverlap).toBe(20);
    expect(config.query.k).toBe(3);
    expect(config.store.engine).toBe("memory");
    expect(config.store.uri).toBe("bolt://graph:7687");
  });

  it("uses defaults when the file does not exist", () => {
    const config = loadConfig({ configPath: path.join(tempDir, "missing.json"), env: {} });
    expect(config.chunking.chunkSize).toBe(500);
  });

  it("lists every issue of an invalid document", () => {
    try {
      parseConfig({ chunking: { chunkSize: 100, chunkOverlap: 100 }, query: { k: 80 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
        expect(error.issues).toContain("chunking.chunkOverlap: must be smaller than chunkSize");
        expect(error.issues.some((issue) => issue.startsWith("query.k:"))).toBe(true);
      }
    }
  });

  it("rejects files that are not a JSON object", async () => {
    await fs.writeFile(configPath, "{ not json");
    expect(errorCodeOf(() => loadConfig({ configPath, env: {} }))).toBe(ErrorCode.CONFIG_FILE_UNREADABLE);

    await fs.writeFile(configPath, "[1, 2]");
    expect(errorCodeOf(() => loadConfig({ configPath, env: {} }))).toBe(ErrorCode.CONFIG_FILE_UNREADABLE);
  });

  it("masks secrets for display", () => {
    const config = parseConfig({ llm: { apiKey: "test-secret" }, store: { password: "test-password" } });
    const redacted = redactConfig(config);
    expect(redacted.llm.apiKey).toBe("********");
    expect(redacted.store.password).toBe("********");
    expect(redacted.embeddings.apiKey).toBeUndefined();
  });
});
