/**
 * In-Memory Graph Store
 *
 * IGraphStore held in process. Mirrors the Neo4j adapter's matching rules:
 * a key matches every node of the kind whose properties equal all key fields,
 * nodes are created only when nothing matches, and edges are unique per
 * (source, kind, target). Raw queries are not supported.
 *
 * @module
 */

import type { EntityKind, RelationshipKind } from "../extraction/types.js";
import {
  DEPENDENCY_RELATIONSHIPS,
  INVENTORY_KINDS,
  type EntityRelationships,
  type EntitySummary,
  type GraphEndpoint,
  type GraphRecord,
  type GraphStatistics,
  type IGraphStore,
  type NodeKey,
  type NodeProperties,
  type PropertyValue,
  type RelatedEntity,
} from "../interfaces/IGraphStore.js";
import { ErrorCode, GraphError } from "../errors.js";

interface StoredNode {
  id: number;
  kind: EntityKind;
  properties: Record<string, PropertyValue>;
}

interface StoredEdge {
  source: number;
  target: number;
  kind: RelationshipKind;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function textProperty(node: StoredNode, field: string): string | null {
  const value = node.properties[field];
  return typeof value === "string" ? value : null;
}

function numberProperty(node: StoredNode, field: string): number | null {
  const value = node.properties[field];
  return typeof value === "number" ? value : null;
}

/**
 * @example
 * ```typescript
 * const store = new InMemoryGraphStore();
 * await store.initialize();
 * await store.upsertNode("Package", { name: "pkg" }, {});
 * await store.getStatistics(); // { nodes: { Package: 1 }, ... }
 * ```
 */
export class InMemoryGraphStore implements IGraphStore {
  private nodes: StoredNode[] = [];
  private edges: StoredEdge[] = [];
  private edgeKeys = new Set<string>();
  private nextId = 1;
  private initialized = false;

  get isReady(): boolean {
    return this.initialized;
  }

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async close(): Promise<void> {
    this.initialized = false;
  }

  async execute(query: string): Promise<GraphRecord[]> {
    throw new GraphError("Raw queries are not supported by the in-memory graph store", ErrorCode.GRAPH_QUERY_UNSUPPORTED, {
      query,
    });
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  async upsertNode(kind: EntityKind, key: NodeKey, properties: NodeProperties): Promise<void> {
    if (this.match(kind, key).length > 0) return;
    this.nodes.push({
      id: this.nextId++,
      kind,
      properties: { ...properties, ...key },
    });
  }

  async upsertEdge(source: GraphEndpoint, target: GraphEndpoint, kind: RelationshipKind): Promise<number> {
    const sources = this.match(source.kind, source.key);
    const targets = this.match(target.kind, target.key);

    for (const from of sources) {
      for (const to of targets) {
        const edgeKey = `${from.id}|${kind}|${to.id}`;
        if (!this.edgeKeys.has(edgeKey)) {
          this.edgeKeys.add(edgeKey);
          this.edges.push({ source: from.id, target: to.id, kind });
        }
      }
    }
    return sources.length * targets.length;
  }

  async clearAll(): Promise<void> {
    this.nodes = [];
    this.edges = [];
    this.edgeKeys.clear();
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  async listEntities(limit: number): Promise<EntitySummary[]> {
    return this.inventory()
      .sort((a, b) => compareText(a.kind, b.kind) || compareText(textProperty(a, "name") ?? "", textProperty(b, "name") ?? ""))
      .slice(0, limit)
      .map((node) => this.summarize(node));
  }

  async findEntities(name: string, limit: number): Promise<EntitySummary[]> {
    const needle = name.toLowerCase();
    const exact = (node: StoredNode): number => ((textProperty(node, "name") ?? "").toLowerCase() === needle ? 0 : 1);

    return this.inventory()
      .filter((node) => (textProperty(node, "name") ?? "").toLowerCase().includes(needle))
      .sort(
        (a, b) =>
          exact(a) - exact(b) ||
          compareText(a.kind, b.kind) ||
          compareText(textProperty(a, "name") ?? "", textProperty(b, "name") ?? "")
      )
      .slice(0, limit)
      .map((node) => this.summarize(node));
  }

  async entityExists(name: string): Promise<boolean> {
    return this.findExact(name) !== null;
  }

  async getRelationships(name: string): Promise<EntityRelationships | null> {
    const node = this.findExact(name);
    if (!node) return null;

    const dependents = this.related(node, "incoming", DEPENDENCY_RELATIONSHIPS);
    const dependencies = this.related(node, "outgoing", DEPENDENCY_RELATIONSHIPS);
    const parents = this.related(node, "incoming", ["CONTAINS"]);

    return {
      entity: this.summarize(node),
      dependents,
      dependencies,
      parents,
      counts: {
        dependents: dependents.length,
        dependencies: dependencies.length,
        parents: parents.length,
      },
    };
  }

  async getStatistics(): Promise<GraphStatistics> {
    const nodes: Record<string, number> = {};
    for (const node of this.nodes) {
      nodes[node.kind] = (nodes[node.kind] ?? 0) + 1;
    }
    const relationships: Record<string, number> = {};
    for (const edge of this.edges) {
      relationships[edge.kind] = (relationships[edge.kind] ?? 0) + 1;
    }
    return {
      nodes,
      relationships,
      totalNodes: this.nodes.length,
      totalRelationships: this.edges.length,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private match(kind: EntityKind, key: NodeKey): StoredNode[] {
    const fields = Object.entries(key);
    return this.nodes.filter(
      (node) => node.kind === kind && fields.every(([field, value]) => node.properties[field] === value)
    );
  }

  private inventory(): StoredNode[] {
    return this.nodes.filter((node) => INVENTORY_KINDS.includes(node.kind) && textProperty(node, "name") !== null);
  }

  /**
   * First inventory node with the name, by type then module (missing modules last).
   */
  private findExact(name: string): StoredNode | null {
    const needle = name.toLowerCase();
    const candidates = this.inventory()
      .filter((node) => (textProperty(node, "name") ?? "").toLowerCase() === needle)
      .sort((a, b) => {
        const byKind = compareText(a.kind, b.kind);
        if (byKind !== 0) return byKind;
        const moduleA = textProperty(a, "module");
        const moduleB = textProperty(b, "module");
        if (moduleA === null) return moduleB === null ? 0 : 1;
        if (moduleB === null) return -1;
        return compareText(moduleA, moduleB);
      });
    return candidates[0] ?? null;
  }

  private related(
    node: StoredNode,
    direction: "incoming" | "outgoing",
    kinds: readonly RelationshipKind[]
  ): RelatedEntity[] {
    const seen = new Set<string>();
    const result: RelatedEntity[] = [];

    for (const edge of this.edges) {
      if (!kinds.includes(edge.kind)) continue;
      const ownEnd = direction === "incoming" ? edge.target : edge.source;
      if (ownEnd !== node.id) continue;

      const otherId = direction === "incoming" ? edge.source : edge.target;
      const other = this.nodes.find((candidate) => candidate.id === otherId);
      const otherName = other ? textProperty(other, "name") : null;
      if (!other || otherName === null) continue;

      const key = `${otherName}|${other.kind}|${edge.kind}`;
      if (seen.has(key)) continue;
      seen.add(key);
      result.push({ name: otherName, type: other.kind, relationship: edge.kind });
    }

    return result.sort((a, b) => compareText(a.relationship, b.relationship) || compareText(a.name, b.name));
  }

  private summarize(node: StoredNode): EntitySummary {
    return {
      name: textProperty(node, "name") ?? "",
      type: node.kind,
      module: textProperty(node, "module"),
      filePath: textProperty(node, "filePath"),
      lineNumber: numberProperty(node, "lineNumber"),
      docstring: textProperty(node, "docstring"),
    };
  }
}
