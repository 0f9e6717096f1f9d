/**
 * Graph Database Module
 *
 * Property graph storage for the code structure: packages, files, classes,
 * functions and their relationships.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { Neo4jConfig } from "../../utils/validation.js";
import { Neo4jGraphStore } from "./neo4j-graph-store.js";

export type {
  IGraphStore,
  GraphRecord,
  NodeKey,
  NodeProperties,
  GraphEndpoint,
  EntitySummary,
  RelatedEntity,
  EntityRelationships,
  GraphStatistics,
} from "../interfaces/IGraphStore.js";

export { DEPENDENCY_RELATIONSHIPS, INVENTORY_KINDS } from "../interfaces/IGraphStore.js";
export { Neo4jGraphStore, CHUNK_LABEL } from "./neo4j-graph-store.js";
export { InMemoryGraphStore } from "./memory-graph-store.js";
export { readNumber, readString, toEntitySummary } from "./records.js";

/**
 * Creates and connects the Neo4j graph store.
 */
export async function createGraphStore(config: Neo4jConfig): Promise<IGraphStore> {
  const store = new Neo4jGraphStore(config);
  await store.initialize();
  return store;
}
