/**
 * Module Dependency Analysis
 *
 * Builds the module import graph of a repository from its extractions and
 * answers two questions over it: which imports form cycles, and how deep the
 * dependency chain of a module goes.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { FileExtraction } from "./types.js";

const logger = createLogger("dependency-analysis");

// =============================================================================
// Types
// =============================================================================

/** Module name → names of the local modules it imports */
export type ImportGraph = Map<string, Set<string>>;

export interface DependencyDepth {
  module: string;
  /** Longest shortest-path distance to any transitive dependency */
  maxDepth: number;
  directDependencies: number;
  totalDependencies: number;
  /** Every transitive dependency, sorted */
  allDependencies: string[];
}

// =============================================================================
// Graph Construction
// =============================================================================

/**
 * Resolves an import identifier as written in a file of `packagePath`.
 *
 * @example
 * ```typescript
 * resolveImport("pkg.api", ".models");  // "pkg.api.models"
 * resolveImport("pkg.api", "..core");   // "pkg.core"
 * resolveImport("pkg.api", "os.path");  // "os.path"
 * ```
 */
export function resolveImport(packagePath: string, imported: string): string {
  const dots = /^\.*/.exec(imported)?.[0].length ?? 0;
  if (dots === 0) return imported;

  const base = packagePath ? packagePath.split(".") : [];
  const kept = base.slice(0, Math.max(0, base.length - (dots - 1)));
  const rest = imported.slice(dots);
  return [...kept, ...(rest ? [rest] : [])].join(".");
}

/**
 * Import graph restricted to modules of the repository itself.
 */
export function buildImportGraph(extractions: readonly FileExtraction[]): ImportGraph {
  const localModules = new Set(extractions.map((file) => file.qualifiedModule));
  const graph: ImportGraph = new Map();

  for (const file of extractions) {
    const targets = graph.get(file.qualifiedModule) ?? new Set<string>();
    for (const imported of file.imports) {
      const resolved = resolveImport(file.packagePath, imported);
      if (resolved !== file.qualifiedModule && localModules.has(resolved)) {
        targets.add(resolved);
      }
    }
    graph.set(file.qualifiedModule, targets);
  }

  return graph;
}

// =============================================================================
// Cycles
// =============================================================================

/**
 * Import cycles found by depth-first search. Each cycle starts and ends with the
 * same module and is rotated to begin at its smallest name, so one loop is
 * reported once.
 *
 * @example
 * ```typescript
 * findCircularDependencies(new Map([["a", new Set(["b"])], ["b", new Set(["a"])]]));
 * // [["a", "b", "a"]]
 * ```
 */
export function findCircularDependencies(graph: ImportGraph): string[][] {
  const cycles: string[][] = [];
  const seen = new Set<string>();
  const visited = new Set<string>();
  const onStack = new Set<string>();

  const visit = (node: string, path: string[]): void => {
    visited.add(node);
    onStack.add(node);
    path.push(node);

    for (const neighbor of [...(graph.get(node) ?? [])].sort()) {
      if (!visited.has(neighbor)) {
        visit(neighbor, path);
      } else if (onStack.has(neighbor)) {
        const loop = canonicalLoop(path.slice(path.indexOf(neighbor)));
        const key = loop.join(" -> ");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push([...loop, loop[0] ?? neighbor]);
        }
      }
    }

    path.pop();
    onStack.delete(node);
  };

  for (const node of [...graph.keys()].sort()) {
    if (!visited.has(node)) visit(node, []);
  }

  if (cycles.length > 0) {
    logger.warn({ cycles: cycles.length }, "Circular dependencies found");
  }
  return cycles;
}

function canonicalLoop(loop: string[]): string[] {
  let start = 0;
  loop.forEach((name, index) => {
    if (name < (loop[start] ?? name)) start = index;
  });
  return [...loop.slice(start), ...loop.slice(0, start)];
}

// =============================================================================
// Depth
// =============================================================================

/**
 * Breadth-first walk over the dependencies of one module.
 */
export function analyzeDependencyDepth(graph: ImportGraph, moduleName: string): DependencyDepth {
  const visited = new Set([moduleName]);
  const dependencies = new Set<string>();
  const queue: Array<[string, number]> = [[moduleName, 0]];
  let maxDepth = 0;

  for (let head = 0; head < queue.length; head++) {
    const entry = queue[head];
    if (!entry) break;
    const [node, depth] = entry;
    maxDepth = Math.max(maxDepth, depth);

    for (const neighbor of graph.get(node) ?? []) {
      if (neighbor !== moduleName) dependencies.add(neighbor);
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        queue.push([neighbor, depth + 1]);
      }
    }
  }

  return {
    module: moduleName,
    maxDepth,
    directDependencies: graph.get(moduleName)?.size ?? 0,
    totalDependencies: dependencies.size,
    allDependencies: [...dependencies].sort(),
  };
}
