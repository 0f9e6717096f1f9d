/**
 * IGraphStore - Abstract property graph interface
 *
 * Provides idempotent node and edge writes plus the typed reads used by the
 * resolver and the CLI. Writes create-or-match; they never update in place.
 *
 * @module
 */

import type { EntityKind, RelationshipKind } from "../extraction/types.js";

/**
 * One row returned by a raw query.
 */
export type GraphRecord = Record<string, unknown>;

/**
 * Identity properties of a node. Only defined fields are present, so a key
 * never matches on a null property.
 */
export type NodeKey = Readonly<Record<string, string>>;

export type PropertyValue = string | number | boolean | null | readonly string[];

export type NodeProperties = Readonly<Record<string, PropertyValue>>;

/**
 * One endpoint of an edge write.
 */
export interface GraphEndpoint {
  kind: EntityKind;
  key: NodeKey;
}

/**
 * Named entity as seen by the resolver.
 */
export interface EntitySummary {
  name: string;
  type: EntityKind;
  module: string | null;
  filePath: string | null;
  lineNumber: number | null;
  docstring: string | null;
}

export interface RelatedEntity {
  name: string;
  type: EntityKind;
  relationship: RelationshipKind;
}

/**
 * Neighbourhood of an entity over IMPORTS, CALLS, INHERITS_FROM and CONTAINS.
 */
export interface EntityRelationships {
  entity: EntitySummary;
  /** Entities pointing at this one */
  dependents: RelatedEntity[];
  /** Entities this one points at */
  dependencies: RelatedEntity[];
  /** Containers (incoming CONTAINS) */
  parents: RelatedEntity[];
  counts: {
    dependents: number;
    dependencies: number;
    parents: number;
  };
}

/**
 * Point-in-time counts of the graph.
 */
export interface GraphStatistics {
  nodes: Record<string, number>;
  relationships: Record<string, number>;
  totalNodes: number;
  totalRelationships: number;
}

/**
 * Relationship types that count as dependencies for entity lookups.
 */
export const DEPENDENCY_RELATIONSHIPS: readonly RelationshipKind[] = [
  "IMPORTS",
  "CALLS",
  "INHERITS_FROM",
  "CONTAINS",
];

/**
 * Kinds listed by inventory and name lookups. Parameters, return types and
 * docstrings hang off these and are reached through their edges.
 */
export const INVENTORY_KINDS: readonly EntityKind[] = ["Package", "File", "Class", "Function", "Method"];

/**
 * Graph store interface.
 *
 * @example
 * ```typescript
 * const store = createGraphStore(config);
 * await store.initialize();
 *
 * await store.upsertNode("Class", { name: "Base", module: "pkg" }, { filePath: "pkg/__init__.py" });
 * await store.upsertNode("Class", { name: "Sub", module: "pkg.sub" }, { filePath: "pkg/sub.py" });
 * const matched = await store.upsertEdge(
 *   { kind: "Class", key: { name: "Sub", module: "pkg.sub" } },
 *   { kind: "Class", key: { name: "Base" } },
 *   "INHERITS_FROM"
 * );
 *
 * await store.close();
 * ```
 */
export interface IGraphStore {
  readonly isReady: boolean;

  initialize(): Promise<void>;

  /**
   * Runs a raw query in the store's native language.
   */
  execute(query: string, params?: Record<string, unknown>): Promise<GraphRecord[]>;

  /**
   * Creates the node if no node of this kind has the key; otherwise leaves it as is.
   */
  upsertNode(kind: EntityKind, key: NodeKey, properties: NodeProperties): Promise<void>;

  /**
   * Creates the edge between every pair of matching endpoints that lacks it.
   *
   * @returns Number of (source, target) pairs matched; 0 when an endpoint is missing
   */
  upsertEdge(source: GraphEndpoint, target: GraphEndpoint, kind: RelationshipKind): Promise<number>;

  /**
   * Removes every node and edge.
   */
  clearAll(): Promise<void>;

  /**
   * Named entities ordered by type then name.
   */
  listEntities(limit: number): Promise<EntitySummary[]>;

  /**
   * Entities whose name contains `name`, case-insensitively; exact matches first.
   */
  findEntities(name: string, limit: number): Promise<EntitySummary[]>;

  entityExists(name: string): Promise<boolean>;

  /**
   * Relationships of the first entity named `name` (case-insensitive), or null.
   */
  getRelationships(name: string): Promise<EntityRelationships | null>;

  getStatistics(): Promise<GraphStatistics>;

  close(): Promise<void>;
}
