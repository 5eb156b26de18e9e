/**
 * Structural Extractor Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { StructuralExtractor, type StructuralExtractorOptions } from "../structural-extractor.js";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { describeFile } from "../../chunking/chunker.js";
import { CancellationTokenSource, DEFAULT_RETRY_POLICY } from "../../../utils/async.js";
import type { ChunkRecord } from "../../../types/index.js";
import {
  chunkOf,
  extractionReply,
  promptFilePath,
  type ScriptedNode,
  type ScriptedRelationship,
  ScriptedLLMService,
  serviceFailure,
  SMITHY_FILES,
} from "../../__tests__/helpers/fakes.js";

const FAST: Partial<StructuralExtractorOptions> = {
  concurrency: 1,
  retry: { ...DEFAULT_RETRY_POLICY, initialDelayMs: 0 },
};

function smithyReply(filePath: string): string {
  const fileName = filePath.split("/").pop() ?? filePath;
  const className = fileName.replace(/\.java$/, "");
  const nodes: ScriptedNode[] = [
    { id: className, type: "Class", start_line: 3, end_line: className === "Blacksmith" ? 5 : 7 },
    { id: fileName, type: "File" },
  ];
  const relationships: ScriptedRelationship[] = [{ source: fileName, type: "CONTAINS", target: className }];
  if (className !== "Blacksmith") {
    nodes.push({ id: "Blacksmith", type: "Class" });
    relationships.push({ source: className, type: "INHERITS", target: "Blacksmith" });
  }
  return extractionReply(nodes, relationships);
}

describe("StructuralExtractor", () => {
  let store: MemoryGraphStore;
  let chunks: ChunkRecord[];

  beforeEach(async () => {
    store = new MemoryGraphStore(8);
    await store.initialize();
    chunks = [];
    for (const file of SMITHY_FILES) {
      const chunk = chunkOf(file.filePath, 0, file.content);
      await store.upsertFile(describeFile(file, [chunk]), [chunk]);
      chunks.push(chunk);
    }
  });

  it("writes the entities and relationships of every chunk", async () => {
    const llm = new ScriptedLLMService((prompt) => smithyReply(promptFilePath(prompt)));
    const extractor = new StructuralExtractor(store, llm, FAST);

    const report = await extractor.extract(chunks);

    expect(report.processedChunks).toBe(3);
    expect(report.skippedChunks).toBe(0);
    expect(report.entitiesWritten).toBe(5);
    expect(report.relationshipsWritten).toBe(5);
    expect(report.cancelled).toBe(false);

    const stats = await store.getStats();
    expect(stats.nodeCounts.Class).toBe(3);
    expect(stats.relationshipCounts.INHERITS).toBe(2);
    expect(stats.relationshipCounts.CONTAINS).toBe(3);
  });

  it("asks for JSON at temperature 0", async () => {
    const llm = new ScriptedLLMService((prompt) => smithyReply(promptFilePath(prompt)));
    await new StructuralExtractor(store, llm, FAST).extract(chunks.slice(0, 1));

    expect(llm.prompts[0]?.options).toMatchObject({ json: true, temperature: 0 });
    expect(llm.prompts[0]?.prompt.split("\n").slice(0, 3)).toEqual([
      "File: src/Blacksmith.java",
      "Language: java",
      "Lines 1-5:",
    ]);
  });

  it("asks again after an unparseable reply", async () => {
    let calls = 0;
    const llm = new ScriptedLLMService((prompt) => {
      calls++;
      return calls === 1 ? "Here is the structure you asked for" : smithyReply(promptFilePath(prompt));
    });

    const report = await new StructuralExtractor(store, llm, FAST).extract(chunks.slice(0, 1));

    expect(llm.prompts).toHaveLength(2);
    expect(report.processedChunks).toBe(1);
    expect(report.failures).toEqual([]);
  });

  it("skips a chunk once its parse attempts run out", async () => {
    const llm = new ScriptedLLMService(() => "not json");
    const extractor = new StructuralExtractor(store, llm, { ...FAST, maxParseAttempts: 2 });

    const report = await extractor.extract(chunks.slice(0, 1));

    expect(llm.prompts).toHaveLength(2);
    expect(report.skippedChunks).toBe(1);
    expect(report.failures).toEqual([
      {
        chunk: { filePath: "src/Blacksmith.java", chunkId: 0 },
        stage: "parse",
        error: "[E2000] ParseError: Completion reply is not JSON",
      },
    ]);
  });

  it("skips a chunk the service fails on without retrying it and carries on", async () => {
    const llm = new ScriptedLLMService((prompt) => {
      const filePath = promptFilePath(prompt);
      return filePath === "src/OrcBlacksmith.java" ? serviceFailure() : smithyReply(filePath);
    });

    const report = await new StructuralExtractor(store, llm, FAST).extract(chunks);

    expect(llm.prompts).toHaveLength(3);
    expect(report.processedChunks).toBe(2);
    expect(report.failures.map((failure) => [failure.chunk.filePath, failure.stage])).toEqual([
      ["src/OrcBlacksmith.java", "service"],
    ]);
  });

  it("records a chunk the store rejects", async () => {
    const orphan = chunkOf("src/Unstored.java", 0, "class Unstored {}");
    const llm = new ScriptedLLMService(() =>
      extractionReply(
        [
          { id: "Unstored", type: "Class" },
          { id: "Unstored.java", type: "File" },
        ],
        [{ source: "Unstored.java", type: "CONTAINS", target: "Unstored" }]
      )
    );

    const report = await new StructuralExtractor(store, llm, FAST).extract([orphan]);

    expect(report.skippedChunks).toBe(1);
    expect(report.failures[0]?.stage).toBe("store");
    expect((await store.getStats()).nodeCounts.Class).toBe(0);
  });

  it("reports quarantined elements with their chunk", async () => {
    const llm = new ScriptedLLMService(() =>
      extractionReply([{ id: "forge", type: "Method" }], [{ source: "a", type: "OVERRIDES", target: "b" }])
    );

    const report = await new StructuralExtractor(store, llm, FAST).extract(chunks.slice(0, 1));

    expect(report.processedChunks).toBe(1);
    expect(report.quarantined.map((element) => [element.chunk.filePath, element.reason])).toEqual([
      ["src/Blacksmith.java", "unknown-node-kind"],
      ["src/Blacksmith.java", "unknown-relationship-kind"],
    ]);
  });

  it("leaves the graph unchanged when the same chunks are extracted again", async () => {
    const llm = new ScriptedLLMService((prompt) => smithyReply(promptFilePath(prompt)));
    const extractor = new StructuralExtractor(store, llm, FAST);

    await extractor.extract(chunks);
    const before = await store.getStats();
    await extractor.extract(chunks);

    expect(await store.getStats()).toEqual(before);
    expect(before.relationshipCounts.INHERITS).toBe(2);
  });

  it("takes no chunks after cancellation", async () => {
    const llm = new ScriptedLLMService((prompt) => smithyReply(promptFilePath(prompt)));
    const source = new CancellationTokenSource();
    source.cancel("stopped");

    const report = await new StructuralExtractor(store, llm, FAST).extract(chunks, source.token);

    expect(report.cancelled).toBe(true);
    expect(llm.prompts).toHaveLength(0);
  });

  it("stops asking again once cancelled mid-chunk", async () => {
    const source = new CancellationTokenSource();
    const llm = new ScriptedLLMService(() => {
      source.cancel("stopped");
      return "not json";
    });

    const report = await new StructuralExtractor(store, llm, FAST).extract(chunks.slice(0, 1), source.token);

    expect(llm.prompts).toHaveLength(1);
    expect(report.cancelled).toBe(true);
    expect(report.processedChunks).toBe(0);
    expect(report.skippedChunks).toBe(0);
    expect(report.failures).toEqual([]);
  });
});
