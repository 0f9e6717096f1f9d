/**
 * Repository Sources
 *
 * Resolve a repository reference to a directory on disk and discover the
 * Python files in it. `LocalRepositorySource` reads a checkout in place;
 * `GitRepositorySource` clones into the configured clone path first.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { IRepositorySource, SourceFile } from "../interfaces/IRepositorySource.js";
import { ErrorCode, RepositoryError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { fileExists, findFiles, getRelativePath } from "../../utils/fs.js";
import type { RepositoryConfig } from "../../utils/validation.js";

const logger = createLogger("repository-source");
const execFileAsync = promisify(execFile);

/**
 * Directories never descended into.
 */
export const SKIPPED_DIRECTORIES = [".git", "__pycache__", ".tox", "venv", ".venv", "build", "dist", "node_modules"];

const SOURCE_PATTERNS = ["**/*.py"];
const BYTES_PER_MB = 1024 * 1024;

/**
 * Whether a repository-relative path belongs to a test suite: a file under a
 * `test` or `tests` directory, or named `test_*.py` or `*_test.py`.
 */
export function isTestFile(relativePath: string): boolean {
  const segments = relativePath.replace(/\\/g, "/").split("/");
  const fileName = segments.pop() ?? "";
  return (
    segments.some((segment) => segment === "test" || segment === "tests") ||
    fileName.startsWith("test_") ||
    fileName.endsWith("_test.py")
  );
}

// =============================================================================
// Local Repository Source
// =============================================================================

/**
 * @example
 * ```typescript
 * const source = new LocalRepositorySource({ maxFileSizeMb: 10 });
 * const root = await source.download("./my-project");
 * const files = await source.listSourceFiles(root);
 * ```
 */
export class LocalRepositorySource implements IRepositorySource {
  protected readonly maxFileSizeMb: number;

  constructor(config: Pick<RepositoryConfig, "maxFileSizeMb">) {
    this.maxFileSizeMb = config.maxFileSizeMb;
  }

  async download(reference: string): Promise<string> {
    const root = path.resolve(reference);
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(root)).isDirectory();
    } catch (error) {
      throw new RepositoryError(`Repository path not found: ${root}`, ErrorCode.REPOSITORY_READ_FAILED, {
        source: reference,
        cause: errorMessage(error),
      });
    }
    if (!isDirectory) {
      throw new RepositoryError(`Repository path is not a directory: ${root}`, ErrorCode.REPOSITORY_READ_FAILED, {
        source: reference,
      });
    }
    return root;
  }

  async listSourceFiles(localPath: string): Promise<SourceFile[]> {
    const absolutePaths = await findFiles({
      patterns: SOURCE_PATTERNS,
      cwd: localPath,
      ignore: SKIPPED_DIRECTORIES.map((directory) => `**/${directory}/**`),
    });

    const files: SourceFile[] = [];
    for (const absolutePath of absolutePaths) {
      const { size } = await fs.stat(absolutePath);
      if (size > this.maxFileSizeMb * BYTES_PER_MB) {
        logger.warn({ file: absolutePath, size }, "Skipping file above size limit");
        continue;
      }
      files.push({ absolutePath, relativePath: getRelativePath(absolutePath, localPath), size });
    }

    logger.info({ root: localPath, count: files.length }, "Python files found");
    return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  }

  async read(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new RepositoryError(`Failed to read ${filePath}`, ErrorCode.REPOSITORY_READ_FAILED, {
        source: filePath,
        cause: errorMessage(error),
      });
    }
  }
}

// =============================================================================
// Git Repository Source
// =============================================================================

/**
 * Directory name for a clone: the last URL segment without `.git`.
 */
export function repositoryNameFromUrl(url: string): string {
  const lastSegment = url.replace(/\/+$/, "").split(/[/:]/).pop() ?? "repository";
  return lastSegment.replace(/\.git$/, "") || "repository";
}

/**
 * Clones into `<clonePath>/<name>`. An existing clone is fetched and hard-reset;
 * when that fails the directory is removed and cloned again.
 */
export class GitRepositorySource extends LocalRepositorySource {
  private readonly clonePath: string;

  constructor(config: RepositoryConfig) {
    super(config);
    this.clonePath = config.clonePath;
  }

  override async download(reference: string): Promise<string> {
    const target = path.resolve(this.clonePath, repositoryNameFromUrl(reference));

    try {
      if (await fileExists(target)) {
        logger.info({ path: target }, "Repository already exists, updating");
        try {
          await this.update(target);
        } catch (error) {
          logger.info({ path: target, reason: errorMessage(error) }, "Update failed, removing and re-cloning");
          await fs.rm(target, { recursive: true, force: true });
          await this.clone(reference, target);
        }
      } else {
        logger.info({ url: reference, path: target }, "Cloning repository");
        await this.clone(reference, target);
      }
    } catch (error) {
      throw new RepositoryError(`Failed to download repository ${reference}`, ErrorCode.REPOSITORY_CLONE_FAILED, {
        source: reference,
        cause: errorMessage(error),
      });
    }

    return target;
  }

  private async clone(url: string, target: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await execFileAsync("git", ["clone", url, target]);
    logger.info({ path: target }, "Repository cloned");
  }

  private async update(target: string): Promise<void> {
    await execFileAsync("git", ["fetch", "origin"], { cwd: target });
    await execFileAsync("git", ["reset", "--hard", "FETCH_HEAD"], { cwd: target });
    logger.info({ path: target }, "Repository updated");
  }
}

/**
 * Whether a reference names a remote repository rather than a local path.
 */
export function isRemoteReference(reference: string): boolean {
  return /^(https?:\/\/|git@|ssh:\/\/|git:\/\/)/.test(reference);
}

/**
 * Source for a reference: git for URLs, in-place reading for local paths.
 */
export function createRepositorySource(reference: string, config: RepositoryConfig): IRepositorySource {
  return isRemoteReference(reference) ? new GitRepositorySource(config) : new LocalRepositorySource(config);
}
