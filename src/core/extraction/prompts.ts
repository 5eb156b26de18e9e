/**
 * Prompts for structural extraction
 *
 * @module
 */

import type { ChunkRecord } from "../../types/index.js";
import { NODE_KIND_LIST, RELATIONSHIP_KIND_LIST, RESPONSE_FORMAT_EXAMPLE } from "./schema.js";

export const EXTRACTION_SYSTEM_PROMPT = `You extract the structure of source code into a knowledge graph.

Allowed node types: ${NODE_KIND_LIST}.
Allowed relationship types: ${RELATIONSHIP_KIND_LIST}.

Rules:
- Use the exact identifier from the code as the node id (class, interface, function or package name).
- Use type "File" for the file itself; never invent other node types.
- INHERITS links a class to its superclass (or an interface to the interface it extends).
- IMPLEMENTS links a class to an interface it implements.
- CALLS links a caller to the function or method it invokes.
- CONTAINS links a file, package, class or interface to something declared inside it.
- IMPORTS and DEPENDS_ON link any two nodes where one uses the other.
- Every relationship source and target must also appear in "nodes".
- For nodes declared in the code shown, give start_line and end_line using the line numbers printed at the left.
- Respond with JSON only, shaped like:
${JSON.stringify(RESPONSE_FORMAT_EXAMPLE, null, 2)}`;

/**
 * User prompt for one chunk, with absolute line numbers in the margin
 */
export function buildExtractionPrompt(chunk: ChunkRecord): string {
  const lines = chunk.text.split("\n");
  const width = String(chunk.startLine + lines.length - 1).length;
  const numbered = lines
    .map((line, index) => `${String(chunk.startLine + index).padStart(width, " ")} | ${line}`)
    .join("\n");

  return [
    `File: ${chunk.filePath}`,
    `Language: ${chunk.language}`,
    `Lines ${chunk.startLine}-${chunk.endLine}:`,
    "",
    numbered,
  ].join("\n");
}
