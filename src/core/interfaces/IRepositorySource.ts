/**
 * IRepositorySource - Where source files come from
 *
 * Resolves a repository reference (git URL or local path) to a directory on
 * disk and lists the Python files in it.
 *
 * @module
 */

/**
 * A discovered source file.
 */
export interface SourceFile {
  absolutePath: string;
  /** Relative to the repository root, forward slashes */
  relativePath: string;
  /** Bytes */
  size: number;
}

export interface IRepositorySource {
  /**
   * Makes the repository available locally and returns its root directory.
   */
  download(reference: string): Promise<string>;

  /**
   * Python source files under `localPath`, sorted by relative path.
   */
  listSourceFiles(localPath: string): Promise<SourceFile[]>;

  read(filePath: string): Promise<string>;
}
