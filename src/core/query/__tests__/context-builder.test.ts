/**
 * Answer Context Tests
 */

import { describe, it, expect } from "vitest";
import {
  buildAnswerPrompt,
  buildFallbackAnswer,
  NO_RESULTS_ANSWER,
  prepareContext,
  truncateCode,
  type QueryContext,
} from "../context-builder.js";
import type { GraphNode, ScoredChunk } from "../../../types/index.js";
import { chunkOf } from "../../__tests__/helpers/fakes.js";

function scored(filePath: string, score: number, text = "class X {}"): ScoredChunk {
  return { chunk: chunkOf(filePath, 0, text), score };
}

function node(name: string, filePath: string): GraphNode {
  return { kind: "Class", id: name.toLowerCase(), name, filePath };
}

const EMPTY: QueryContext = { entities: [], relationships: [] };

describe("truncateCode", () => {
  it("leaves short code alone", () => {
    expect(truncateCode("int x = 1;")).toBe("int x = 1;");
  });

  it("cuts at the last line break before the limit", () => {
    const code = `${"a".repeat(900)}\n${"b".repeat(300)}`;
    expect(truncateCode(code)).toBe(`${"a".repeat(900)}\n... (truncated for brevity)`);
  });

  it("cuts hard when no line break is close enough", () => {
    const code = `${"a".repeat(500)}\n${"b".repeat(700)}`;
    expect(truncateCode(code)).toBe(`${"a".repeat(500)}\n${"b".repeat(499)}...`);
  });
});

describe("prepareContext", () => {
  it("keeps the top chunks and groups graph context", () => {
    const chunks = [scored("src/a/Alpha.java", 0.91234), scored("src/Beta.java", 0.5), scored("src/a/Alpha.java", 0.4)];
    const alpha = node("Alpha", "src/a/Alpha.java");
    const beta = node("Beta", "src/Beta.java");

    const prepared = prepareContext(
      "what extends Beta?",
      chunks,
      { entities: [alpha, beta], relationships: [{ source: alpha, type: "INHERITS", target: beta }] },
      2
    );

    expect(prepared.totalChunks).toBe(3);
    expect(prepared.totalFiles).toBe(2);
    expect(prepared.codeChunks.map((chunk) => [chunk.rank, chunk.fileName, chunk.similarity, chunk.lines])).toEqual([
      [1, "Alpha.java", "0.912", "1-1"],
      [2, "Beta.java", "0.500", "1-1"],
    ]);
    expect([...prepared.entities]).toEqual([["Class", ["Alpha", "Beta"]]]);
    expect([...prepared.relationships]).toEqual([["INHERITS", ["Alpha → Beta"]]]);
  });
});

describe("buildAnswerPrompt", () => {
  it("renders chunks, entities and relationships", () => {
    const alpha = node("Alpha", "src/Alpha.java");
    const beta = node("Beta", "src/Beta.java");
    const prompt = buildAnswerPrompt(
      prepareContext(
        "what extends Beta?",
        [scored("src/Alpha.java", 0.75, "class Alpha extends Beta {}")],
        { entities: [alpha], relationships: [{ source: alpha, type: "INHERITS", target: beta }] },
        3
      )
    );

    const lines = prompt.split("\n");
    expect(lines.slice(0, 9)).toEqual([
      'The user asked: "what extends Beta?"',
      "",
      "I found 1 relevant code chunks across 1 files.",
      "",
      "Most relevant code found:",
      "",
      "1. File: Alpha.java (Lines 1-1, java)",
      "Code:",
      "```java",
    ]);
    expect(lines).toContain("- Classes: Alpha");
    expect(lines).toContain("- INHERITS: Alpha → Beta");
  });
});

describe("buildFallbackAnswer", () => {
  const chunks = [
    scored("src/a/Alpha.java", 0.9),
    scored("src/Beta.java", 0.8),
    scored("Gamma.java", 0.7),
    scored("src/Delta.java", 0.6),
  ];

  it("names the top three files and the entity count", () => {
    const context: QueryContext = { entities: [node("Alpha", "src/a/Alpha.java"), node("Beta", "src/Beta.java")], relationships: [] };
    expect(buildFallbackAnswer(chunks, context)).toBe(
      "I found 4 relevant code chunks that might help with your question. " +
        "The most relevant files are: Alpha.java, Beta.java, Gamma.java. " +
        "These files contain 2 related code entities including classes and functions. " +
        "You might want to explore these files to find what you're looking for."
    );
  });

  it("omits the entity sentence without graph context", () => {
    expect(buildFallbackAnswer(chunks.slice(0, 1), EMPTY)).toBe(
      "I found 1 relevant code chunks that might help with your question. " +
        "The most relevant files are: Alpha.java. " +
        "You might want to explore these files to find what you're looking for."
    );
  });

  it("falls back to the no-results answer without chunks", () => {
    expect(buildFallbackAnswer([], EMPTY)).toBe(NO_RESULTS_ANSWER);
  });
});
