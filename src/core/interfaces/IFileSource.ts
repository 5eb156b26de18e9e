/**
 * IFileSource - where source files come from
 *
 * @module
 */

import type { SourceFile } from "../../types/index.js";

export interface IFileSource {
  /** Human-readable location, used in logs and reports */
  readonly description: string;

  /** Paths of the files this source offers, in a stable order */
  list(): Promise<string[]>;

  /**
   * Read one listed file. Rejects when the file cannot be read; callers
   * skip it and carry on.
   */
  read(filePath: string): Promise<SourceFile>;
}
