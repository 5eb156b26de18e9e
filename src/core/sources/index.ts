/**
 * File Sources
 *
 * @module
 */

export type { IFileSource } from "../interfaces/IFileSource.js";
export { DirectorySource, type DirectorySourceOptions } from "./directory-source.js";
export { MemorySource } from "./memory-source.js";
