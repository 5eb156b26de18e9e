/**
 * In-memory file source
 *
 * @module
 */

import type { SourceFile } from "../../types/index.js";
import { CodeGraphError, ErrorCode } from "../errors.js";
import type { IFileSource } from "../interfaces/IFileSource.js";

export class MemorySource implements IFileSource {
  readonly description = "memory";
  private readonly files = new Map<string, SourceFile>();

  constructor(files: readonly SourceFile[] = []) {
    for (const file of files) {
      this.files.set(file.filePath, file);
    }
  }

  add(file: SourceFile): void {
    this.files.set(file.filePath, file);
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()];
  }

  async read(filePath: string): Promise<SourceFile> {
    const file = this.files.get(filePath);
    if (!file) {
      throw new CodeGraphError(`No such file: ${filePath}`, ErrorCode.FILE_SYSTEM_ERROR, { filePath });
    }
    return file;
  }
}
