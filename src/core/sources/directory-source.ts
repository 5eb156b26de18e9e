/**
 * Local directory file source
 *
 * @module
 */

import * as path from "node:path";
import type { SourceFile } from "../../types/index.js";
import { extensionPatterns, findFiles, isLikelyBinary, readTextFile, toPosixPath } from "../../utils/fs.js";
import { CodeGraphError, ErrorCode } from "../errors.js";
import type { IFileSource } from "../interfaces/IFileSource.js";

export interface DirectorySourceOptions {
  /** Extensions to include (".java" or "java"); empty includes every file */
  extensions?: string[];
  /** Extra glob patterns to skip, on top of the default ignores */
  exclude?: string[];
}

/**
 * Files under a root directory, addressed by their POSIX path relative to it
 */
export class DirectorySource implements IFileSource {
  readonly description: string;
  private readonly root: string;

  constructor(
    root: string,
    private readonly options: DirectorySourceOptions = {}
  ) {
    this.root = path.resolve(root);
    this.description = this.root;
  }

  async list(): Promise<string[]> {
    const files = await findFiles({
      patterns: extensionPatterns(this.options.extensions ?? []),
      ignore: this.options.exclude ?? [],
      cwd: this.root,
    });
    return files.map(toPosixPath);
  }

  /**
   * Binary content is refused like an unreadable file, so the pipeline
   * skips it instead of chunking it.
   */
  async read(filePath: string): Promise<SourceFile> {
    let content: string;
    try {
      content = await readTextFile(path.join(this.root, filePath));
    } catch (error) {
      throw new CodeGraphError(`Cannot read ${filePath}`, ErrorCode.FILE_SYSTEM_ERROR, { root: this.root, filePath }, { cause: error });
    }
    if (isLikelyBinary(content)) {
      throw new CodeGraphError(`Not a text file: ${filePath}`, ErrorCode.FILE_NOT_TEXT, { root: this.root, filePath });
    }
    return { filePath: toPosixPath(filePath), content };
  }
}
