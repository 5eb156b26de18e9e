/**
 * Structural extraction module
 *
 * @module
 */

export * from "./schema.js";
export * from "./prompts.js";
export * from "./structural-extractor.js";
