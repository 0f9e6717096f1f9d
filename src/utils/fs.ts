/**
 * File System Utilities
 * File discovery and JSON persistence helpers
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns, sorted for deterministic traversal
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = true, onlyFiles = true } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    ignore: ["**/node_modules/**", "**/.git/**", ...ignore],
    dot: false,
  });
  return files.sort();
}

/**
 * Repository-relative path with forward slashes
 */
export function getRelativePath(filePath: string, projectRoot: string): string {
  return toPosixPath(path.relative(projectRoot, filePath));
}

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON file; null when it does not exist
 */
export async function readJson(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  const content = await fsPromises.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/**
 * Write a value as pretty-printed JSON, creating parent directories
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, JSON.stringify(data, null, 2));
}
