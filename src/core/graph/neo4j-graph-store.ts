/**
 * Neo4j Graph Store Adapter
 *
 * Implements IGraphStore over a Neo4j database with Cypher.
 * Node writes use `MERGE ... ON CREATE SET`, so re-indexing matches existing
 * nodes and never rewrites them. Edge writes `MERGE` the relationship, which
 * keeps them idempotent on (source, kind, target).
 *
 * @module
 */

import neo4j, { type Driver } from "neo4j-driver";
import { ENTITY_KINDS, RELATIONSHIP_KINDS, type EntityKind, type RelationshipKind } from "../extraction/types.js";
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
  type RelatedEntity,
} from "../interfaces/IGraphStore.js";
import { ErrorCode, GraphError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import type { Neo4jConfig } from "../../utils/validation.js";
import { compact, readNumber, readString, toEntitySummary, toRelatedEntity } from "./records.js";

const logger = createLogger("neo4j-graph-store");

const PROPERTY_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Label carried by vector chunks, which share the database but not the graph */
export const CHUNK_LABEL = "CodeChunk";

const INVENTORY_FILTER = INVENTORY_KINDS.map((kind) => `n:${kind}`).join(" OR ");
const DEPENDENCY_TYPES = DEPENDENCY_RELATIONSHIPS.join("|");

// =============================================================================
// Cypher Builders
// =============================================================================

function assertLabel(kind: string): EntityKind {
  const label = ENTITY_KINDS.find((candidate) => candidate === kind);
  if (!label) {
    throw new GraphError(`Unknown node label: ${kind}`, ErrorCode.GRAPH_WRITE_FAILED);
  }
  return label;
}

function assertRelationshipType(kind: string): RelationshipKind {
  const type = RELATIONSHIP_KINDS.find((candidate) => candidate === kind);
  if (!type) {
    throw new GraphError(`Unknown relationship type: ${kind}`, ErrorCode.GRAPH_EDGE_WRITE_FAILED);
  }
  return type;
}

/**
 * `{name: $key.name, module: $key.module}` for the defined key fields.
 */
function keyPattern(key: NodeKey, parameter: string): string {
  const fields = Object.keys(key).map((field) => {
    if (!PROPERTY_NAME.test(field)) {
      throw new GraphError(`Invalid property name: ${field}`, ErrorCode.GRAPH_WRITE_FAILED);
    }
    return `${field}: $${parameter}.${field}`;
  });
  return `{${fields.join(", ")}}`;
}

// =============================================================================
// Neo4jGraphStore Implementation
// =============================================================================

/**
 * Neo4j implementation of IGraphStore.
 *
 * @example
 * ```typescript
 * const store = new Neo4jGraphStore(config.neo4j);
 * await store.initialize();
 *
 * const stats = await store.getStatistics();
 * console.log(stats.nodes.Class);
 *
 * await store.close();
 * ```
 */
export class Neo4jGraphStore implements IGraphStore {
  private driver: Driver | null = null;
  private initialized = false;

  constructor(private readonly config: Neo4jConfig) {}

  get isReady(): boolean {
    return this.initialized;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const driver = neo4j.driver(this.config.uri, neo4j.auth.basic(this.config.user, this.config.password), {
      connectionTimeout: this.config.connectionTimeoutMs,
    });

    try {
      await driver.verifyConnectivity({ database: this.config.database });
    } catch (error) {
      await driver.close();
      throw new GraphError(`Cannot connect to Neo4j at ${this.config.uri}`, ErrorCode.GRAPH_CONNECTION_FAILED, {
        cause: errorMessage(error),
      });
    }

    this.driver = driver;
    await this.createIndexes();
    this.initialized = true;
    logger.info({ uri: this.config.uri, database: this.config.database }, "Connected to Neo4j");
  }

  /**
   * Name indexes back the MERGE lookups of every label.
   */
  private async createIndexes(): Promise<void> {
    for (const label of ENTITY_KINDS) {
      await this.run(`CREATE INDEX ${label.toLowerCase()}_name IF NOT EXISTS FOR (n:${label}) ON (n.name)`);
    }
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
    this.initialized = false;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  private async run(query: string, params: Record<string, unknown> = {}): Promise<GraphRecord[]> {
    if (!this.driver) {
      throw new GraphError("Neo4jGraphStore not initialized. Call initialize() first.", ErrorCode.GRAPH_NOT_INITIALIZED);
    }

    const session = this.driver.session({ database: this.config.database });
    try {
      const result = await session.run(query, params);
      return result.records.map((record) => record.toObject());
    } finally {
      await session.close();
    }
  }

  async execute(query: string, params: Record<string, unknown> = {}): Promise<GraphRecord[]> {
    try {
      return await this.run(query, params);
    } catch (error) {
      if (error instanceof GraphError) throw error;
      throw new GraphError(`Query failed: ${errorMessage(error)}`, ErrorCode.GRAPH_QUERY_FAILED, { query });
    }
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  async upsertNode(kind: EntityKind, key: NodeKey, properties: NodeProperties): Promise<void> {
    const label = assertLabel(kind);
    await this.execute(`MERGE (n:${label} ${keyPattern(key, "key")}) ON CREATE SET n += $properties`, {
      key,
      properties,
    });
  }

  async upsertEdge(source: GraphEndpoint, target: GraphEndpoint, kind: RelationshipKind): Promise<number> {
    const sourceLabel = assertLabel(source.kind);
    const targetLabel = assertLabel(target.kind);
    const type = assertRelationshipType(kind);

    const records = await this.execute(
      `MATCH (s:${sourceLabel} ${keyPattern(source.key, "source")})
       MATCH (t:${targetLabel} ${keyPattern(target.key, "target")})
       MERGE (s)-[:${type}]->(t)
       RETURN count(*) AS matched`,
      { source: source.key, target: target.key }
    );
    const first = records[0];
    return first ? (readNumber(first, "matched") ?? 0) : 0;
  }

  async clearAll(): Promise<void> {
    await this.execute(`MATCH (n) WHERE NOT n:${CHUNK_LABEL} DETACH DELETE n`);
    logger.info("Graph cleared");
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  async listEntities(limit: number): Promise<EntitySummary[]> {
    const records = await this.execute(
      `MATCH (n) WHERE (${INVENTORY_FILTER}) AND n.name IS NOT NULL
       RETURN n.name AS name, labels(n)[0] AS type, n.module AS module,
              n.filePath AS filePath, n.lineNumber AS lineNumber, n.docstring AS docstring
       ORDER BY type, name
       LIMIT $limit`,
      { limit: neo4j.int(limit) }
    );
    return compact(records.map(toEntitySummary));
  }

  async findEntities(name: string, limit: number): Promise<EntitySummary[]> {
    const records = await this.execute(
      `MATCH (n) WHERE (${INVENTORY_FILTER}) AND toLower(n.name) CONTAINS toLower($name)
       RETURN n.name AS name, labels(n)[0] AS type, n.module AS module,
              n.filePath AS filePath, n.lineNumber AS lineNumber, n.docstring AS docstring,
              toLower(n.name) = toLower($name) AS exact
       ORDER BY exact DESC, type, name
       LIMIT $limit`,
      { name, limit: neo4j.int(limit) }
    );
    return compact(records.map(toEntitySummary));
  }

  async entityExists(name: string): Promise<boolean> {
    const records = await this.execute(
      `MATCH (n) WHERE (${INVENTORY_FILTER}) AND toLower(n.name) = toLower($name)
       RETURN count(n) AS count`,
      { name }
    );
    const first = records[0];
    return first ? (readNumber(first, "count") ?? 0) > 0 : false;
  }

  async getRelationships(name: string): Promise<EntityRelationships | null> {
    const found = await this.execute(
      `MATCH (n) WHERE (${INVENTORY_FILTER}) AND toLower(n.name) = toLower($name)
       RETURN elementId(n) AS id, n.name AS name, labels(n)[0] AS type, n.module AS module,
              n.filePath AS filePath, n.lineNumber AS lineNumber, n.docstring AS docstring
       ORDER BY type, module
       LIMIT 1`,
      { name }
    );
    const record = found[0];
    const entity = record ? toEntitySummary(record) : null;
    const id = record ? readString(record, "id") : null;
    if (!entity || id === null) return null;

    const related = async (pattern: string): Promise<Array<RelatedEntity | null>> => {
      const records = await this.execute(
        `MATCH ${pattern} WHERE elementId(n) = $id
         RETURN DISTINCT m.name AS name, labels(m)[0] AS type, type(r) AS relationship
         ORDER BY relationship, name`,
        { id }
      );
      return records.map(toRelatedEntity);
    };

    const dependents = compact(await related(`(n)<-[r:${DEPENDENCY_TYPES}]-(m)`));
    const dependencies = compact(await related(`(n)-[r:${DEPENDENCY_TYPES}]->(m)`));
    const parents = compact(await related(`(n)<-[r:CONTAINS]-(m)`));

    return {
      entity,
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
    const nodeRecords = await this.execute(
      `MATCH (n) WHERE NOT n:${CHUNK_LABEL} RETURN labels(n)[0] AS label, count(*) AS count ORDER BY label`
    );
    const edgeRecords = await this.execute(
      `MATCH (s)-[r]->() WHERE NOT s:${CHUNK_LABEL} RETURN type(r) AS type, count(*) AS count ORDER BY type`
    );

    const nodes: Record<string, number> = {};
    for (const record of nodeRecords) {
      const label = readString(record, "label");
      if (label !== null) nodes[label] = readNumber(record, "count") ?? 0;
    }
    const relationships: Record<string, number> = {};
    for (const record of edgeRecords) {
      const type = readString(record, "type");
      if (type !== null) relationships[type] = readNumber(record, "count") ?? 0;
    }

    return {
      nodes,
      relationships,
      totalNodes: Object.values(nodes).reduce((sum, count) => sum + count, 0),
      totalRelationships: Object.values(relationships).reduce((sum, count) => sum + count, 0),
    };
  }
}
