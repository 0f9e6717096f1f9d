/**
 * Entity Identity
 *
 * Deterministic keys and module paths for extracted entities.
 *
 * Identity is semantic: (name, qualified module, kind). Line numbers are not part
 * of it, so re-extracting an unchanged file yields the same keys.
 *
 * @module
 */

import type { Entity, EntityKind, EntityRef } from "./types.js";

// =============================================================================
// Entity Keys
// =============================================================================

/**
 * Stable identity key for an entity.
 *
 * @example
 * ```typescript
 * entityKey({ kind: "Class", name: "Sub", qualifiedModule: "pkg.sub", parentClass: null });
 * // "Class:pkg.sub:Sub"
 * entityKey({ kind: "Method", name: "save", qualifiedModule: "pkg.sub", parentClass: "Sub" });
 * // "Method:pkg.sub:Sub.save"
 * ```
 */
export function entityKey(entity: Pick<Entity, "kind" | "name" | "qualifiedModule" | "parentClass">): string {
  const scope = entity.parentClass ? `${entity.parentClass}.` : "";
  return `${entity.kind}:${entity.qualifiedModule}:${scope}${entity.name}`;
}

/**
 * Reference to a local entity, with its module.
 */
export function refOf(entity: Pick<Entity, "kind" | "name" | "qualifiedModule" | "parentClass">): EntityRef {
  return {
    name: entity.name,
    kind: entity.kind,
    module: entity.qualifiedModule,
    parentClass: entity.parentClass,
  };
}

/**
 * Reference to an entity resolved by name later.
 */
export function refByName(name: string, kind: EntityKind): EntityRef {
  return { name, kind, module: null, parentClass: null };
}

// =============================================================================
// Module Paths
// =============================================================================

/**
 * Module path for a repository-relative Python file.
 *
 * `pkg/sub.py` → `pkg.sub`, `pkg/__init__.py` → `pkg`, `main.py` → `main`.
 */
export function modulePathFor(relativePath: string): string {
  const parts = relativePath.replace(/\\/g, "/").split("/").filter((part) => part.length > 0);
  const fileName = parts.pop() ?? "";
  const stem = fileName.replace(/\.pyi?$/, "");
  if (stem !== "__init__") {
    parts.push(stem);
  }
  return parts.join(".");
}

/**
 * Dotted directory of a repository-relative file, "" at the root.
 */
export function packagePathFor(relativePath: string): string {
  const parts = relativePath.replace(/\\/g, "/").split("/").filter((part) => part.length > 0);
  parts.pop();
  return parts.join(".");
}

/**
 * All dotted prefixes of a package path, outermost first.
 *
 * @example
 * ```typescript
 * packagePrefixes("a.b.c"); // ["a", "a.b", "a.b.c"]
 * ```
 */
export function packagePrefixes(packagePath: string): string[] {
  if (!packagePath) return [];
  const segments = packagePath.split(".");
  return segments.map((_, index) => segments.slice(0, index + 1).join("."));
}

/**
 * Parent of a dotted package path, or null for a top-level package.
 */
export function parentPackage(packagePath: string): string | null {
  const index = packagePath.lastIndexOf(".");
  return index === -1 ? null : packagePath.slice(0, index);
}

/**
 * Last segment of a dotted name: `pkg.Base` → `Base`.
 */
export function lastSegment(dottedName: string): string {
  const index = dottedName.lastIndexOf(".");
  return index === -1 ? dottedName : dottedName.slice(index + 1);
}
