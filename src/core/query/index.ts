/**
 * Query Module
 *
 * @module
 */

export {
  HybridQueryEngine,
  type HybridQueryEngineOptions,
  type HybridQueryOptions,
  type HybridQueryResult,
  type QueryStage,
  type SynthesisMode,
} from "./hybrid-query-engine.js";
export {
  ANSWER_SYSTEM_PROMPT,
  buildAnswerPrompt,
  buildFallbackAnswer,
  NO_RESULTS_ANSWER,
  prepareContext,
  truncateCode,
  type PromptChunk,
  type PromptContext,
  type QueryContext,
} from "./context-builder.js";
