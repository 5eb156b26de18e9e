/**
 * Extraction Response Parsing Tests
 */

import { describe, it, expect } from "vitest";
import { endpointsAllowed, extractJsonText, parseExtractionResponse } from "../schema.js";
import { ErrorCode } from "../../errors.js";
import { chunkOf, extractionReply } from "../../__tests__/helpers/fakes.js";

const ORC_SOURCE = [
  "package smithy;",
  "",
  "public class OrcBlacksmith extends Blacksmith {",
  "  public Weapon forgeWeapon(WeaponType type) {",
  "    return new OrcWeapon(type);",
  "  }",
  "}",
].join("\n");

const orcChunk = chunkOf("src/OrcBlacksmith.java", 0, ORC_SOURCE);

describe("parseExtractionResponse", () => {
  it("fails with a ParseError when the reply is not JSON", () => {
    const result = parseExtractionResponse("Sure! Here are the entities.", orcChunk);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PARSE_NOT_JSON);
    }
  });

  it("fails with a ParseError when the payload has the wrong shape", () => {
    const result = parseExtractionResponse(JSON.stringify({ nodes: "OrcBlacksmith" }), orcChunk);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PARSE_SCHEMA_MISMATCH);
    }
  });

  it("reads JSON wrapped in a code fence", () => {
    expect(extractJsonText('```json\n{"nodes": []}\n```')).toBe('{"nodes": []}');
    const result = parseExtractionResponse("```\n{}\n```", orcChunk);
    expect(result.ok && result.value.extraction).toEqual({
      chunk: { filePath: "src/OrcBlacksmith.java", chunkId: 0 },
      entities: [],
      relationships: [],
    });
  });

  it("keeps schema elements and quarantines the rest", () => {
    const reply = extractionReply(
      [
        { id: "OrcBlacksmith", type: "class", start_line: 3, end_line: 7 },
        { id: "Blacksmith", type: "Class" },
        { id: "OrcBlacksmith.java", type: "File" },
        { id: "forgeWeapon", type: "Method" },
      ],
      [
        { source: "OrcBlacksmith", type: "inherits", target: "Blacksmith" },
        { source: "OrcBlacksmith.java", type: "CONTAINS", target: "OrcBlacksmith" },
        { source: "OrcBlacksmith", type: "OVERRIDES", target: "Blacksmith" },
        { source: "OrcBlacksmith", type: "CALLS", target: "forgeWeapon" },
        { source: "OrcBlacksmith", type: "IMPLEMENTS", target: "Blacksmith" },
      ]
    );

    const result = parseExtractionResponse(reply, orcChunk);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const { extraction, quarantined } = result.value;
    expect(extraction.entities).toEqual([
      {
        kind: "Class",
        id: "orcblacksmith",
        name: "OrcBlacksmith",
        filePath: "src/OrcBlacksmith.java",
        startLine: 3,
        endLine: 7,
      },
      { kind: "Class", id: "blacksmith", name: "Blacksmith", filePath: "src/OrcBlacksmith.java" },
    ]);
    expect(extraction.relationships).toEqual([
      {
        source: { kind: "Class", id: "orcblacksmith" },
        type: "INHERITS",
        target: { kind: "Class", id: "blacksmith" },
      },
      {
        source: { kind: "File", id: "src/OrcBlacksmith.java" },
        type: "CONTAINS",
        target: { kind: "Class", id: "orcblacksmith" },
      },
    ]);
    expect(quarantined.map((element) => element.reason)).toEqual([
      "unknown-node-kind",
      "unknown-relationship-kind",
      "undeclared-endpoint",
      "endpoint-rule",
    ]);
  });

  it("drops spans that fall outside the chunk", () => {
    const chunk = chunkOf("src/Big.java", 3, "class Big {\n  int size;\n}", 10);
    const reply = extractionReply([
      { id: "Big", type: "Class", start_line: 3, end_line: 40 },
      { id: "Size", type: "Class", start_line: 11, end_line: 11 },
    ]);

    const result = parseExtractionResponse(reply, chunk);
    expect(result.ok && result.value.extraction.entities).toEqual([
      { kind: "Class", id: "big", name: "Big", filePath: "src/Big.java" },
      { kind: "Class", id: "size", name: "Size", filePath: "src/Big.java", startLine: 11, endLine: 11 },
    ]);
  });

  it("collapses repeated nodes and relationships", () => {
    const reply = extractionReply(
      [
        { id: "Blacksmith", type: "Class" },
        { id: " blacksmith ", type: "Class" },
        { id: "OrcBlacksmith", type: "Class" },
      ],
      [
        { source: "OrcBlacksmith", type: "INHERITS", target: "Blacksmith" },
        { source: "orcblacksmith", type: "INHERITS", target: "BLACKSMITH" },
      ]
    );

    const result = parseExtractionResponse(reply, orcChunk);
    expect(result.ok && result.value.extraction.entities.map((entity) => entity.id)).toEqual([
      "blacksmith",
      "orcblacksmith",
    ]);
    expect(result.ok && result.value.extraction.relationships).toHaveLength(1);
  });

  it("resolves a name declared under two kinds through the endpoint rules", () => {
    const reply = extractionReply(
      [
        { id: "Repository", type: "Class" },
        { id: "Repository", type: "Interface" },
        { id: "OrderService", type: "Class" },
      ],
      [{ source: "OrderService", type: "IMPLEMENTS", target: "Repository" }]
    );

    const result = parseExtractionResponse(reply, orcChunk);
    expect(result.ok && result.value.extraction.relationships).toEqual([
      {
        source: { kind: "Class", id: "orderservice" },
        type: "IMPLEMENTS",
        target: { kind: "Interface", id: "repository" },
      },
    ]);
  });
});

describe("endpointsAllowed", () => {
  it("lets classes inherit classes and interfaces inherit interfaces", () => {
    expect(endpointsAllowed("INHERITS", "Class", "Class")).toBe(true);
    expect(endpointsAllowed("INHERITS", "Interface", "Interface")).toBe(true);
    expect(endpointsAllowed("INHERITS", "Class", "Interface")).toBe(false);
  });

  it("requires a function at the end of CALLS", () => {
    expect(endpointsAllowed("CALLS", "Function", "Function")).toBe(true);
    expect(endpointsAllowed("CALLS", "Function", "Class")).toBe(false);
  });

  it("accepts any pair for IMPORTS and DEPENDS_ON", () => {
    expect(endpointsAllowed("IMPORTS", "File", "Package")).toBe(true);
    expect(endpointsAllowed("DEPENDS_ON", "Interface", "File")).toBe(true);
  });
});
