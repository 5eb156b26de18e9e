/**
 * Chunking module
 *
 * @module
 */

export * from "./chunker.js";
