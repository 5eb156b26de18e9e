/**
 * Answer context
 *
 * Turns retrieved chunks and graph context into the payload sent to the
 * completion service, and into the canned answer used when synthesis is
 * unavailable.
 *
 * @module
 */

import * as path from "node:path";
import type { GraphEdge, GraphNode, ScoredChunk } from "../../types/index.js";

// =============================================================================
// Types
// =============================================================================

export interface QueryContext {
  entities: GraphNode[];
  relationships: GraphEdge[];
}

export interface PromptChunk {
  rank: number;
  fileName: string;
  filePath: string;
  language: string;
  lines: string;
  similarity: string;
  code: string;
}

export interface PromptContext {
  query: string;
  totalChunks: number;
  totalFiles: number;
  codeChunks: PromptChunk[];
  /** Display names per entity kind */
  entities: Map<string, string[]>;
  /** "source → target" per relationship type */
  relationships: Map<string, string[]>;
}

const MAX_CODE_CHARS = 1000;
const MIN_LINE_BREAK = 800;
const ENTITIES_PER_KIND = 5;
const RELATIONSHIPS_PER_TYPE = 3;

export const NO_RESULTS_ANSWER =
  "I couldn't find any code relevant to your question in the indexed files. Try rephrasing it or ingesting more of the codebase.";

export const ANSWER_SYSTEM_PROMPT = `You are a helpful AI coding assistant that explains code in a natural, conversational way.

Your responses should be:
- Conversational and friendly
- Technically accurate but easy to understand
- Focused on helping developers understand code
- Include relevant code snippets when helpful
- Explain relationships between code components
- Suggest next steps or related areas to explore

Avoid:
- Overly formal or structured language
- Repeating the user's question
- Generic responses
- Bullet points or formal sections`;

// =============================================================================
// Context Preparation
// =============================================================================

/**
 * Cut long code at a line break near the limit, or hard at the limit
 */
export function truncateCode(text: string): string {
  if (text.length <= MAX_CODE_CHARS) return text;
  const breakPoint = text.lastIndexOf("\n", MAX_CODE_CHARS - 1);
  if (breakPoint > MIN_LINE_BREAK) {
    return `${text.slice(0, breakPoint)}\n... (truncated for brevity)`;
  }
  return `${text.slice(0, MAX_CODE_CHARS)}...`;
}

function plural(kind: string): string {
  return kind.endsWith("s") ? `${kind}es` : `${kind}s`;
}

function pushGrouped(groups: Map<string, string[]>, key: string, value: string): void {
  const group = groups.get(key) ?? [];
  if (!group.includes(value)) group.push(value);
  groups.set(key, group);
}

export function prepareContext(
  query: string,
  chunks: readonly ScoredChunk[],
  context: QueryContext,
  maxChunks: number
): PromptContext {
  const codeChunks = chunks.slice(0, maxChunks).map(({ chunk, score }, index) => ({
    rank: index + 1,
    fileName: path.posix.basename(chunk.filePath),
    filePath: chunk.filePath,
    language: chunk.language,
    lines: `${chunk.startLine}-${chunk.endLine}`,
    similarity: score.toFixed(3),
    code: truncateCode(chunk.text),
  }));

  const entities = new Map<string, string[]>();
  for (const entity of context.entities) {
    pushGrouped(entities, entity.kind, entity.name);
  }

  const relationships = new Map<string, string[]>();
  for (const edge of context.relationships) {
    pushGrouped(relationships, edge.type, `${edge.source.name} → ${edge.target.name}`);
  }

  return {
    query,
    totalChunks: chunks.length,
    totalFiles: new Set(chunks.map(({ chunk }) => chunk.filePath)).size,
    codeChunks,
    entities,
    relationships,
  };
}

// =============================================================================
// Prompt and Fallback
// =============================================================================

export function buildAnswerPrompt(context: PromptContext): string {
  const parts: string[] = [
    `The user asked: "${context.query}"`,
    `\nI found ${context.totalChunks} relevant code chunks across ${context.totalFiles} files.`,
    "\nMost relevant code found:",
  ];

  for (const chunk of context.codeChunks) {
    parts.push(`\n${chunk.rank}. File: ${chunk.fileName} (Lines ${chunk.lines}, ${chunk.language})`);
    parts.push(`Code:\n\`\`\`${chunk.language}\n${chunk.code}\n\`\`\``);
  }

  if (context.entities.size > 0) {
    parts.push("\nCode entities found:");
    for (const [kind, names] of context.entities) {
      parts.push(`- ${plural(kind)}: ${names.slice(0, ENTITIES_PER_KIND).join(", ")}`);
    }
  }

  if (context.relationships.size > 0) {
    parts.push("\nCode relationships:");
    for (const [type, pairs] of context.relationships) {
      parts.push(`- ${type}: ${pairs.slice(0, RELATIONSHIPS_PER_TYPE).join(", ")}`);
    }
  }

  parts.push(
    "\nPlease provide a helpful, conversational explanation of what you found. Focus on answering the user's question in a natural way, explaining the code and its relationships. Be specific about what the code does and how the components work together."
  );

  return parts.join("\n");
}

/**
 * Answer assembled from the results alone
 */
export function buildFallbackAnswer(chunks: readonly ScoredChunk[], context: QueryContext): string {
  if (chunks.length === 0) return NO_RESULTS_ANSWER;

  const fileNames = chunks.slice(0, 3).map(({ chunk }) => path.posix.basename(chunk.filePath));
  let answer = `I found ${chunks.length} relevant code chunks that might help with your question. `;
  answer += `The most relevant files are: ${fileNames.join(", ")}. `;

  if (context.entities.length > 0) {
    answer += `These files contain ${context.entities.length} related code entities including classes and functions. `;
  }

  answer += "You might want to explore these files to find what you're looking for.";
  return answer;
}
